import puppeteer, { type Browser, type ElementHandle } from 'puppeteer-core';
import type { ILogger, PageAdapterFactory } from '../core/interfaces';
import type { ReviewSyncConfig } from '../config/env';
import { PuppeteerPageAdapter } from '../adapters/PuppeteerPageAdapter';

type BrowserConfig = ReviewSyncConfig['browser'];

const VIEWPORT = { width: 1180, height: 800 };

/**
 * Launches the locally installed Chrome. Without CHROME_EXECUTABLE_PATH the
 * stable channel install location is used.
 */
export async function launchBrowser(config: BrowserConfig, logger: ILogger): Promise<Browser> {
  const args = [
    '--window-size=1200,900',
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-first-run',
    '--no-default-browser-check',
    '--lang=ru-RU',
  ];

  logger.info('Launching browser', {
    headless: config.headless,
    executablePath: config.executablePath ?? 'chrome channel',
  });

  return puppeteer.launch({
    headless: config.headless,
    args,
    defaultViewport: VIEWPORT,
    ...(config.executablePath ? { executablePath: config.executablePath } : { channel: 'chrome' as const }),
  });
}

/**
 * One fresh page per traversal, configured with the user agent and timeouts
 */
export function createPageAdapterFactory(
  browser: Browser,
  config: BrowserConfig,
  logger: ILogger
): PageAdapterFactory<ElementHandle<Element>> {
  return async () => {
    const page = await browser.newPage();
    try {
      await page.setUserAgent(config.userAgent);
      await page.setExtraHTTPHeaders({ 'Accept-Language': 'ru-RU,ru;q=0.9,en;q=0.8' });
      page.setDefaultTimeout(config.requestTimeoutMs);
      page.setDefaultNavigationTimeout(config.requestTimeoutMs);
    } catch (error) {
      await page.close();
      throw error;
    }

    return new PuppeteerPageAdapter(page, {
      logger: logger.child({ component: 'page' }),
      requestTimeoutMs: config.requestTimeoutMs,
      screenshots: { enabled: config.debugScreenshots, dir: config.debugDir },
    });
  };
}
