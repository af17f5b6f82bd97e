import type { CrawlMode, ProductWatermark, ReviewRecord } from './types';

type Baseline = Pick<ProductWatermark, 'lastReviewDate' | 'recentReviewIds'>;

/**
 * An incremental request without a baseline date is a full sync.
 */
export function resolveEffectiveMode(mode: CrawlMode, watermark: Baseline | null): CrawlMode {
  if (mode === 'full') return 'full';
  return watermark?.lastReviewDate ? 'incremental' : 'full';
}

/**
 * Whether a record is new relative to the watermark.
 *
 * Synthesized ids never match the id window; such records are judged by date
 * alone. Unreliable dates always count as new.
 */
export function isNewReview(record: ReviewRecord, watermark: Baseline, recentIds: ReadonlySet<string>): boolean {
  if (!watermark.lastReviewDate) return true;

  if (!record.idSynthetic && recentIds.has(record.reviewId)) {
    return false;
  }

  if (!record.dateUnreliable && record.publishedAt < watermark.lastReviewDate) {
    return false;
  }

  return true;
}

/**
 * Keeps the records that are new for this product.
 *
 * A per-record predicate with no cross-record state, so input order never
 * changes which records are kept. It never decides whether to keep paging.
 */
export function filterNewReviews(
  raw: ReviewRecord[],
  watermark: Baseline | null,
  mode: CrawlMode
): ReviewRecord[] {
  if (resolveEffectiveMode(mode, watermark) === 'full' || !watermark) {
    return [...raw];
  }

  const recentIds = new Set(watermark.recentReviewIds);
  return raw.filter(record => isNewReview(record, watermark, recentIds));
}
