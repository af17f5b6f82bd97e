import type { ILogger, IReviewRepository, IWatermarkStore } from './interfaces';
import type { CalendarDate, CrawlMode, ProductSyncResult, ProductWatermark, ReviewRecord, WatermarkUpdate } from './types';
import { TraversalTimeoutError, WatermarkUnavailableError, describeError } from './errors';
import { filterNewReviews, resolveEffectiveMode } from './IncrementalFilter';
import type { TraversalController } from './TraversalController';

export interface ParseOptions {
  mode: CrawlMode;
  maxReviews?: number | null;
  signal?: AbortSignal;
}

export interface ProductReviewParserDeps<E> {
  controller: TraversalController<E>;
  repository: IReviewRepository;
  watermarkStore: IWatermarkStore;
  logger: ILogger;
}

/**
 * One product, end to end: traverse, filter against the watermark, flush the
 * accepted records, then advance the watermark. The watermark is only written
 * after the records are saved.
 */
export class ProductReviewParser<E = unknown> {
  constructor(private readonly deps: ProductReviewParserDeps<E>) {}

  async parseProductReviews(productUrl: string, options: ParseOptions): Promise<ProductSyncResult> {
    const { controller, repository, watermarkStore } = this.deps;
    const productId = controller.resolveProductId(productUrl);
    const log = this.deps.logger.child({ productId });

    const watermark = await this.readWatermark(productId);
    const effectiveMode = resolveEffectiveMode(options.mode, watermark);
    if (options.mode === 'incremental' && effectiveMode === 'full') {
      log.info('No previous baseline, running a full sync');
    } else if (watermark?.lastReviewDate) {
      log.info('Incremental baseline loaded', {
        lastReviewDate: watermark.lastReviewDate,
        recentIds: watermark.recentReviewIds.length,
      });
    }

    const run = await controller.traverse(productUrl, {
      mode: effectiveMode,
      maxReviews: options.maxReviews,
      signal: options.signal,
    });

    const accepted = filterNewReviews(run.rawCollected, watermark, effectiveMode);
    log.info('Filtered collected reviews', { raw: run.rawCollected.length, accepted: accepted.length });

    throwIfAborted(options.signal, productId);
    const savedCount = accepted.length > 0 ? await repository.saveRecords(accepted) : 0;
    throwIfAborted(options.signal, productId);
    await this.advanceWatermark(productId, watermark, accepted, savedCount);

    return {
      url: productUrl,
      productId,
      requestedMode: options.mode,
      effectiveMode,
      rawCount: run.rawCollected.length,
      acceptedCount: accepted.length,
      savedCount,
      stopReason: run.stopReason,
    };
  }

  private async readWatermark(productId: string): Promise<ProductWatermark | null> {
    try {
      return await this.deps.watermarkStore.getWatermark(productId);
    } catch (error) {
      if (error instanceof WatermarkUnavailableError) throw error;
      throw new WatermarkUnavailableError(`Cannot read watermark for ${productId}: ${describeError(error)}`, error);
    }
  }

  private async advanceWatermark(
    productId: string,
    previous: ProductWatermark | null,
    accepted: ReviewRecord[],
    savedCount: number
  ): Promise<void> {
    const update: WatermarkUpdate = {
      totalReviews: (previous?.totalReviews ?? 0) + savedCount,
    };

    const lastReviewDate = latestReliableDate(accepted);
    if (lastReviewDate) {
      update.lastReviewDate = lastReviewDate;
    }

    // Oldest first, so the window keeps the newest ids.
    const trusted = accepted
      .filter(record => !record.idSynthetic)
      .map((record, index) => ({ record, index }))
      .sort((a, b) => compareDates(a.record.publishedAt, b.record.publishedAt) || a.index - b.index)
      .map(({ record }) => record.reviewId);
    if (trusted.length > 0) {
      update.newIds = trusted;
    }

    await this.deps.watermarkStore.upsert(productId, update);
  }
}

/** A timed-out product must not write anything after the run has moved on */
function throwIfAborted(signal: AbortSignal | undefined, productId: string): void {
  if (signal?.aborted) {
    throw new TraversalTimeoutError(productId);
  }
}

function latestReliableDate(records: ReviewRecord[]): CalendarDate | null {
  let latest: CalendarDate | null = null;
  for (const record of records) {
    if (record.dateUnreliable) continue;
    if (latest === null || record.publishedAt > latest) {
      latest = record.publishedAt;
    }
  }
  return latest;
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
