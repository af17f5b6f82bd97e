import type { Page } from 'puppeteer-core';
import type { ILogger, Outcome } from '../core/interfaces';
import { deriveNextPageUrl } from '../core/listingUrl';
import { humanScroll } from '../utils/humanBehavior';
import { delay } from '../utils/delay';
import selectorData from '../collectors/reviewSelectors.json';

const NAVIGATION_WAIT_MS = 15000;

export interface ReviewPaginatorOptions {
  nextPageTexts?: string[];
  nextPageSelectors?: string[];
  /** Fall back to `?page=N+1` when no next control is clickable */
  urlFallback?: boolean;
}

/**
 * Moves the listing to its next page: the "Дальше" control first, then the
 * page query parameter. Success means the URL actually changed.
 */
export class ReviewPaginator {
  private readonly nextPageTexts: string[];
  private readonly nextPageSelectors: string[];
  private readonly urlFallback: boolean;

  constructor(private readonly logger: ILogger, options: ReviewPaginatorOptions = {}) {
    this.nextPageTexts = options.nextPageTexts ?? selectorData.nextPageTexts;
    this.nextPageSelectors = options.nextPageSelectors ?? selectorData.nextPageSelectors;
    this.urlFallback = options.urlFallback ?? true;
  }

  async goToNextPage(page: Page): Promise<Outcome> {
    const currentUrl = page.url();

    const clicked = await this.clickNextControl(page);
    if (clicked) {
      await page
        .waitForNavigation({ waitUntil: 'domcontentloaded', timeout: NAVIGATION_WAIT_MS })
        .catch(() => this.logger.debug('No navigation event after next-page click'));
      if (page.url() !== currentUrl) {
        await this.afterNavigation(page);
        return { ok: true };
      }
      this.logger.warn('URL unchanged after next-page click', { url: currentUrl });
    }

    if (!this.urlFallback) {
      return { ok: false, reason: clicked ? 'next-page click did not navigate' : 'no next-page control' };
    }

    const nextUrl = deriveNextPageUrl(currentUrl);
    if (!nextUrl) {
      return { ok: false, reason: `cannot derive next page from ${currentUrl}` };
    }

    this.logger.debug('Navigating to next page by URL', { nextUrl });
    const response = await page.goto(nextUrl, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_WAIT_MS });
    if (response && !response.ok()) {
      return { ok: false, reason: `next page answered HTTP ${response.status()}` };
    }
    if (page.url() === currentUrl) {
      return { ok: false, reason: 'next page redirected back to the current page' };
    }

    await this.afterNavigation(page);
    return { ok: true };
  }

  private async clickNextControl(page: Page): Promise<boolean> {
    return page.evaluate(
      (selectors: string[], texts: string[]) => {
        let target: HTMLElement | null = null;
        for (const selector of selectors) {
          target = document.querySelector<HTMLElement>(selector);
          if (target) break;
        }
        if (!target) {
          const wanted = texts.map(text => text.toLowerCase());
          target =
            Array.from(document.querySelectorAll<HTMLElement>('a, button, div'))
              .filter(node => node.children.length === 0 || node.tagName !== 'DIV')
              .find(node => wanted.includes(node.innerText.trim().toLowerCase())) ?? null;
        }
        if (!target) return false;
        target.scrollIntoView({ block: 'center' });
        target.click();
        return true;
      },
      this.nextPageSelectors,
      this.nextPageTexts
    );
  }

  private async afterNavigation(page: Page): Promise<void> {
    await humanScroll(page, 600);
    await delay(1000 + Math.random() * 1000);
  }
}
