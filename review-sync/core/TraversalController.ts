import type { ILogger, IPageAdapter, Outcome, PageAdapterFactory } from './interfaces';
import type { CrawlMode, DelayRange, ReviewRecord, StopReason, TraversalRun } from './types';
import {
  AdapterTransientError,
  InvalidProductUrlError,
  ListingUnreachableError,
  TraversalTimeoutError,
  describeError,
} from './errors';
import { ReviewNormalizer } from './ReviewNormalizer';
import { buildListingUrl } from './listingUrl';
import { ProductIdExtractorFactory } from '../extractors/ProductIdExtractorFactory';
import { delay, pickDelayMs, type Sleep } from '../utils/delay';

export interface TraversalOptions {
  mode: CrawlMode;
  /** Cap on raw records, checked before incremental filtering */
  maxReviews?: number | null;
  signal?: AbortSignal;
}

export interface TraversalControllerDeps<E> {
  adapterFactory: PageAdapterFactory<E>;
  logger: ILogger;
  pageDelay: DelayRange;
  normalizer?: ReviewNormalizer;
  extractorFactory?: ProductIdExtractorFactory;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Crawl state machine for one product:
 * START → OPEN_LISTING → COLLECT_PAGE → (CONTINUE | STOP)
 *
 * Owns the adapter for the whole traversal and closes it on every exit path.
 *
 * @example
 * const controller = new TraversalController({ adapterFactory, logger, pageDelay: { minMs: 1000, maxMs: 2000 } });
 * const run = await controller.traverse(url, { mode: 'incremental', maxReviews: 500 });
 */
export class TraversalController<E = unknown> {
  private readonly adapterFactory: PageAdapterFactory<E>;
  private readonly logger: ILogger;
  private readonly pageDelay: DelayRange;
  private readonly normalizer: ReviewNormalizer;
  private readonly extractorFactory: ProductIdExtractorFactory;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(deps: TraversalControllerDeps<E>) {
    this.adapterFactory = deps.adapterFactory;
    this.logger = deps.logger;
    this.pageDelay = deps.pageDelay;
    this.normalizer = deps.normalizer ?? new ReviewNormalizer();
    this.extractorFactory = deps.extractorFactory ?? new ProductIdExtractorFactory();
    this.sleep = deps.sleep ?? delay;
    this.random = deps.random ?? Math.random;
  }

  /** START: product id from URL, or InvalidProductUrlError */
  resolveProductId(productUrl: string): string {
    const { productId } = this.extractorFactory.extract(productUrl);
    if (!productId) {
      throw new InvalidProductUrlError(productUrl);
    }
    return productId;
  }

  async traverse(productUrl: string, options: TraversalOptions): Promise<TraversalRun> {
    const productId = this.resolveProductId(productUrl);
    const log = this.logger.child({ productId });
    const run: TraversalRun = {
      productId,
      productUrl,
      mode: options.mode,
      pageIndex: 1,
      pagesFetched: 0,
      rawCollected: [],
      stopped: false,
      stopReason: null,
    };

    this.throwIfAborted(options.signal, productId);
    const adapter = await this.adapterFactory();

    try {
      await this.openListing(adapter, productUrl, productId, log);

      const seenIds = new Set<string>();
      while (!run.stopped) {
        this.throwIfAborted(options.signal, productId);

        const stopReason = await this.collectPage(adapter, run, seenIds, options, log);
        if (stopReason) {
          run.stopped = true;
          run.stopReason = stopReason;
          break;
        }

        await this.sleep(pickDelayMs(this.pageDelay, this.random), options.signal);
        this.throwIfAborted(options.signal, productId);
        run.pageIndex++;
      }
      // The last page may have been in flight when the signal fired.
      this.throwIfAborted(options.signal, productId);
    } finally {
      await this.releaseAdapter(adapter, log);
    }

    log.info('Traversal finished', {
      stopReason: run.stopReason,
      pagesFetched: run.pagesFetched,
      rawCollected: run.rawCollected.length,
    });
    return run;
  }

  /** OPEN_LISTING: direct listing URL first, then product page + reviews tab */
  private async openListing(
    adapter: IPageAdapter<E>,
    productUrl: string,
    productId: string,
    log: ILogger
  ): Promise<void> {
    const listingUrl = buildListingUrl(productUrl);
    log.info('Opening review listing', { listingUrl });

    const direct = await attempt(() => adapter.open(listingUrl));
    if (direct.ok) return;

    log.warn('Direct listing URL failed, falling back to product page', { reason: direct.reason });
    const productPage = await attempt(() => adapter.open(productUrl));
    if (!productPage.ok) {
      throw new ListingUnreachableError(productId, `listing: ${direct.reason}; product page: ${productPage.reason}`);
    }

    const tab = await attempt(() => adapter.activateReviewsTab());
    if (!tab.ok) {
      throw new ListingUnreachableError(productId, `reviews tab: ${tab.reason}`);
    }
  }

  /**
   * COLLECT_PAGE, then the termination checks in order:
   * no-reviews indicator, nothing new on the page, raw cap, no next page.
   */
  private async collectPage(
    adapter: IPageAdapter<E>,
    run: TraversalRun,
    seenIds: Set<string>,
    options: TraversalOptions,
    log: ILogger
  ): Promise<StopReason | null> {
    let pageRecords: ReviewRecord[];
    let noReviews: boolean;

    try {
      pageRecords = await this.readPage(adapter, run, log);
      noReviews = await adapter.hasNoReviewsIndicator();
    } catch (error) {
      run.pagesFetched++;
      if (run.pageIndex === 1) {
        throw new AdapterTransientError(run.pageIndex, error);
      }
      log.warn('Page collection failed, treating page as empty', {
        pageIndex: run.pageIndex,
        error: describeError(error),
      });
      return 'noRecordsOnPage';
    }
    run.pagesFetched++;

    // A page that only repeats earlier records means pagination did not advance.
    const fresh: ReviewRecord[] = [];
    for (const record of pageRecords) {
      if (seenIds.has(record.reviewId)) continue;
      seenIds.add(record.reviewId);
      fresh.push(record);
      run.rawCollected.push(record);
    }

    log.info('Page collected', {
      pageIndex: run.pageIndex,
      pageRecords: pageRecords.length,
      fresh: fresh.length,
      rawCollected: run.rawCollected.length,
    });

    if (noReviews) return 'exhausted';
    if (fresh.length === 0) return 'noRecordsOnPage';
    if (options.maxReviews && run.rawCollected.length >= options.maxReviews) return 'limitReached';

    let next: Outcome;
    try {
      next = await adapter.goToNextPage();
    } catch (error) {
      log.warn('Next-page navigation threw', { pageIndex: run.pageIndex, error: describeError(error) });
      return 'navigationFailed';
    }
    if (!next.ok) {
      log.info('No next page', { pageIndex: run.pageIndex, reason: next.reason });
      return 'exhausted';
    }
    return null;
  }

  private async readPage(adapter: IPageAdapter<E>, run: TraversalRun, log: ILogger): Promise<ReviewRecord[]> {
    const elements = await adapter.listReviewElements();
    const records: ReviewRecord[] = [];

    for (const element of elements) {
      const fields = await adapter.extractFields(element);
      const result = this.normalizer.normalize(fields, run.productId, run.productUrl);
      if (result.ok) {
        records.push(result.record);
      } else {
        log.debug('Review element rejected', { reason: result.reason });
      }
    }
    return records;
  }

  private async releaseAdapter(adapter: IPageAdapter<E>, log: ILogger): Promise<void> {
    try {
      await adapter.close();
    } catch (error) {
      log.warn('Adapter close failed', { error: describeError(error) });
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined, productId: string): void {
    if (signal?.aborted) {
      throw new TraversalTimeoutError(productId);
    }
  }
}

async function attempt(action: () => Promise<Outcome>): Promise<Outcome> {
  try {
    return await action();
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}
