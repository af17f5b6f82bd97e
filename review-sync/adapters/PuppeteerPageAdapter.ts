import { promises as fs } from 'fs';
import * as path from 'path';
import type { ElementHandle, Page } from 'puppeteer-core';
import type { ILogger, IPageAdapter, Outcome } from '../core/interfaces';
import type { RawReviewFields } from '../core/types';
import { describeError } from '../core/errors';
import { ReviewElementCollector } from '../collectors/ReviewElementCollector';
import { ReviewTabNavigator } from '../navigation/ReviewTabNavigator';
import { ReviewPaginator } from '../navigation/ReviewPaginator';
import { AccessRestrictionDetector } from '../security/AccessRestrictionDetector';
import { humanGlance } from '../utils/humanBehavior';

export interface DebugScreenshotOptions {
  enabled: boolean;
  dir: string;
}

export interface PuppeteerPageAdapterOptions {
  logger: ILogger;
  requestTimeoutMs: number;
  screenshots?: DebugScreenshotOptions;
  collector?: ReviewElementCollector;
  navigator?: ReviewTabNavigator;
  paginator?: ReviewPaginator;
  securityDetector?: AccessRestrictionDetector;
}

/**
 * Page adapter over one puppeteer page
 *
 * Composes the collector, the tab navigator, the paginator and the access
 * restriction detector; owns the page and closes it.
 */
export class PuppeteerPageAdapter implements IPageAdapter<ElementHandle<Element>> {
  private readonly logger: ILogger;
  private readonly collector: ReviewElementCollector;
  private readonly navigator: ReviewTabNavigator;
  private readonly paginator: ReviewPaginator;
  private readonly securityDetector: AccessRestrictionDetector;

  constructor(private readonly page: Page, private readonly options: PuppeteerPageAdapterOptions) {
    this.logger = options.logger;
    this.collector = options.collector ?? new ReviewElementCollector(this.logger);
    this.navigator = options.navigator ?? new ReviewTabNavigator(this.logger);
    this.paginator = options.paginator ?? new ReviewPaginator(this.logger);
    this.securityDetector = options.securityDetector ?? new AccessRestrictionDetector(this.logger);
  }

  async open(url: string): Promise<Outcome> {
    this.logger.debug('Opening page', { url });
    let status: number | null = null;
    try {
      const response = await this.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.requestTimeoutMs,
      });
      status = response ? response.status() : null;
    } catch (error) {
      await this.screenshot('open-error');
      return { ok: false, reason: describeError(error) };
    }

    await this.settle();

    if (await this.securityDetector.isRestricted(this.page)) {
      const recovered = await this.securityDetector.tryRecover(this.page);
      if (!recovered) {
        await this.screenshot('access-restricted');
        return { ok: false, reason: 'access restricted' };
      }
    }

    if (status !== null && status >= 400) {
      await this.screenshot('open-http-error');
      return { ok: false, reason: `HTTP ${status}` };
    }

    await humanGlance(this.page);
    return { ok: true };
  }

  async activateReviewsTab(): Promise<Outcome> {
    const outcome = await this.navigator.activateReviewsTab(this.page);
    if (!outcome.ok) {
      await this.screenshot('no-reviews-tab');
    }
    return outcome;
  }

  async listReviewElements(): Promise<ElementHandle<Element>[]> {
    return this.collector.listReviewElements(this.page);
  }

  async extractFields(element: ElementHandle<Element>): Promise<RawReviewFields> {
    return this.collector.extractFields(element);
  }

  async hasNoReviewsIndicator(): Promise<boolean> {
    return this.collector.hasNoReviewsIndicator(this.page);
  }

  async goToNextPage(): Promise<Outcome> {
    await this.screenshot('before-next-page');
    const outcome = await this.paginator.goToNextPage(this.page);
    if (!outcome.ok) {
      this.logger.debug('No next page', { reason: outcome.reason });
      await this.screenshot('failed-next-page');
    }
    return outcome;
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }

  private async settle(): Promise<void> {
    await this.page
      .waitForNetworkIdle({ idleTime: 500, timeout: this.options.requestTimeoutMs })
      .catch(() => this.logger.debug('Network did not go idle, continuing'));
  }

  private async screenshot(label: string): Promise<void> {
    const settings = this.options.screenshots;
    if (!settings?.enabled) return;

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const file = path.join(settings.dir, `${label}_${stamp}.png`);
    try {
      await fs.mkdir(settings.dir, { recursive: true });
      await this.page.screenshot({ path: file, fullPage: false });
      this.logger.debug('Debug screenshot saved', { file });
    } catch (error) {
      this.logger.debug('Debug screenshot failed', { label, error: describeError(error) });
    }
  }
}
