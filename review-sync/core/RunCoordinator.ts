import type { ILogger } from './interfaces';
import type { CrawlMode, CrawlRequest, DelayRange, ProductSyncResult, RunSummary } from './types';
import { TraversalTimeoutError, WatermarkUnavailableError, describeError } from './errors';
import type { ProductReviewParser } from './ProductReviewParser';
import { delay, pickDelayMs, type Sleep } from '../utils/delay';

/** The part of ProductReviewParser the coordinator drives */
export type ProductSync = Pick<ProductReviewParser, 'parseProductReviews'>;

export interface RunCoordinatorOptions {
  defaultMode: CrawlMode;
  defaultMaxReviews: number | null;
  /** Pause between products, separate from the page delay */
  productDelay: DelayRange;
  /** Aborts one product's traversal; null disables */
  productTimeoutMs?: number | null;
  sleep?: Sleep;
  random?: () => number;
  clock?: () => number;
}

/**
 * Runs product syncs one after another.
 *
 * A failing product is logged and counted as zero; only an unavailable
 * watermark store stops the run.
 */
export class RunCoordinator {
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly clock: () => number;

  constructor(
    private readonly parser: ProductSync,
    private readonly logger: ILogger,
    private readonly options: RunCoordinatorOptions
  ) {
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
  }

  async run(requests: CrawlRequest[]): Promise<RunSummary> {
    const startedAt = this.clock();
    const results: ProductSyncResult[] = [];
    const counts: Record<string, number> = {};

    this.logger.info('Review sync run started', { products: requests.length });

    for (let index = 0; index < requests.length; index++) {
      const request = requests[index];
      const result = await this.runOne(request, index, requests.length);
      results.push(result);
      counts[request.url] = (counts[request.url] ?? 0) + result.acceptedCount;

      if (index < requests.length - 1) {
        await this.sleep(pickDelayMs(this.options.productDelay, this.random));
      }
    }

    const totalAccepted = results.reduce((sum, result) => sum + result.acceptedCount, 0);
    const durationMs = this.clock() - startedAt;
    this.logger.info('Review sync run finished', {
      products: results.length,
      failed: results.filter(result => result.error).length,
      totalAccepted,
      durationMs,
    });

    return { counts, results, totalAccepted, durationMs };
  }

  private async runOne(request: CrawlRequest, index: number, total: number): Promise<ProductSyncResult> {
    const mode = request.mode ?? this.options.defaultMode;
    const maxReviews = request.maxReviews ?? this.options.defaultMaxReviews;
    const log = this.logger.child({ url: request.url });

    log.info(`Product ${index + 1}/${total}`, { mode, maxReviews });

    try {
      const result = await this.withTimeout(
        request.url,
        signal => this.parser.parseProductReviews(request.url, { mode, maxReviews, signal }),
        log
      );
      log.info('Product synced', {
        accepted: result.acceptedCount,
        saved: result.savedCount,
        stopReason: result.stopReason,
      });
      return result;
    } catch (error) {
      if (error instanceof WatermarkUnavailableError) {
        log.error('Watermark store unavailable, aborting run', { error: describeError(error) });
        throw error;
      }

      log.error('Product sync failed', { error: describeError(error) });
      return {
        url: request.url,
        productId: null,
        requestedMode: mode,
        effectiveMode: mode,
        rawCount: 0,
        acceptedCount: 0,
        savedCount: 0,
        stopReason: null,
        error: describeError(error),
      };
    }
  }

  /**
   * Races the task against the product timeout. On timeout the task's signal
   * is aborted and the task is awaited until it settles, so its page is closed
   * before the next product starts.
   */
  private async withTimeout<T>(
    target: string,
    task: (signal?: AbortSignal) => Promise<T>,
    log: ILogger
  ): Promise<T> {
    const timeoutMs = this.options.productTimeoutMs;
    if (!timeoutMs || timeoutMs <= 0) {
      return task();
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // settle the timeout before aborting the task
        reject(new TraversalTimeoutError(target, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    const running = task(controller.signal);
    try {
      return await Promise.race([running, timeout]);
    } catch (error) {
      if (controller.signal.aborted) {
        await running.then(
          () => log.warn('Timed-out product finished late, result discarded'),
          lateError => log.debug('Timed-out product stopped', { error: describeError(lateError) })
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
