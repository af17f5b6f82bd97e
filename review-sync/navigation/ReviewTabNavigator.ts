import type { Page } from 'puppeteer-core';
import type { ILogger, Outcome } from '../core/interfaces';
import { delay } from '../utils/delay';
import selectorData from '../collectors/reviewSelectors.json';

const TAB_WAIT_MS = 15000;

/**
 * Review tab navigator
 *
 * From an opened product page, follows the link or tab that leads to the
 * review listing, then waits for review cards (or the empty notice).
 */
export class ReviewTabNavigator {
  constructor(
    private readonly logger: ILogger,
    private readonly tabTexts: string[] = selectorData.reviewsTabTexts,
    private readonly containerSelectors: string[] = selectorData.container
  ) {}

  async activateReviewsTab(page: Page): Promise<Outcome> {
    const clicked = await page.evaluate((texts: string[]) => {
      const anchors = Array.from(document.querySelectorAll<HTMLAnchorElement>('a[href*="/reviews"], a[href*="tab=reviews"]'));
      const byText = Array.from(document.querySelectorAll<HTMLElement>('a, button'))
        .filter(node => texts.some(text => node.innerText.trim().toLowerCase().startsWith(text.toLowerCase())));
      const target = anchors[0] ?? byText[0];
      if (!target) return false;
      target.removeAttribute('target');
      target.scrollIntoView({ block: 'center' });
      target.click();
      return true;
    }, this.tabTexts);

    if (!clicked) {
      return { ok: false, reason: 'reviews tab not found' };
    }

    this.logger.debug('Reviews tab clicked, waiting for listing');
    const navigated = await page
      .waitForNavigation({ waitUntil: 'domcontentloaded', timeout: TAB_WAIT_MS })
      .then(() => true, () => false);
    if (!navigated) {
      this.logger.debug('No navigation after tab click, treating as in-page tab');
    }
    await delay(1000 + Math.random() * 1000);

    const listingVisible = await page
      .waitForSelector(this.containerSelectors.join(', '), { timeout: TAB_WAIT_MS })
      .then(handle => handle !== null, () => false);
    if (!listingVisible) {
      return { ok: false, reason: 'review listing did not appear after activating the tab' };
    }
    return { ok: true };
  }
}
