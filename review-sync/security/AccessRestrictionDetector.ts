import type { Page } from 'puppeteer-core';
import type { ILogger } from '../core/interfaces';
import { delay } from '../utils/delay';

/**
 * "Access restricted" interstitial detector
 *
 * The marketplace shows a soft block page with a refresh button; one click on
 * it is often enough to get through.
 */
export class AccessRestrictionDetector {
  readonly name = 'AccessRestrictionDetector';

  private readonly blockedKeywords = ['Доступ ограничен'];
  private readonly refreshLabels = ['Обновить'];

  constructor(private readonly logger: ILogger) {}

  async isRestricted(page: Page): Promise<boolean> {
    return page.evaluate((keywords: string[]) => {
      const bodyText = document.body?.innerText ?? '';
      return keywords.some(keyword => bodyText.includes(keyword));
    }, this.blockedKeywords);
  }

  /**
   * Clicks the refresh button once and checks again
   */
  async tryRecover(page: Page): Promise<boolean> {
    this.logger.warn('Access restriction detected, trying refresh');

    await delay(1000 + Math.random() * 1000);
    const clicked = await page.evaluate((labels: string[]) => {
      const button = Array.from(document.querySelectorAll<HTMLElement>('button'))
        .find(node => labels.includes(node.innerText.trim()));
      if (!button) return false;
      button.click();
      return true;
    }, this.refreshLabels);

    if (!clicked) {
      this.logger.warn('Refresh button not found on restriction page');
      return false;
    }

    await page
      .waitForNavigation({ waitUntil: 'domcontentloaded', timeout: 15000 })
      .catch(() => this.logger.debug('No navigation after refresh click'));
    await delay(3000 + Math.random() * 3000);

    const stillRestricted = await this.isRestricted(page);
    if (stillRestricted) {
      this.logger.warn('Access restriction persists after refresh');
      return false;
    }
    this.logger.info('Access restriction cleared');
    return true;
  }
}
