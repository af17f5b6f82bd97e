/**
 * Review-Sync shared types
 */

/** Calendar date in `YYYY-MM-DD` form */
export type CalendarDate = string;

export type CrawlMode = 'full' | 'incremental';

export type StopReason = 'exhausted' | 'limitReached' | 'noRecordsOnPage' | 'navigationFailed';

/** One normalized customer review */
export interface ReviewRecord {
  reviewId: string;
  /** The adapter exposed no stable identifier, so the id was synthesized */
  idSynthetic: boolean;
  productId: string;
  productUrl: string;
  author: string;
  /** 0 = unknown */
  rating: number;
  publishedAt: CalendarDate;
  /** `publishedAt` is the collection date because the source date did not parse */
  dateUnreliable: boolean;
  text: string;
  likes: number;
  dislikes: number;
  /** ISO-8601 timestamp */
  collectedAt: string;
}

/** Field candidates as the page adapter found them */
export type RawReviewFields = Record<string, string | number | null>;

export type NormalizeRejection = 'MISSING_TEXT' | 'TEXT_TOO_SHORT' | 'MISSING_PRODUCT_ID';

export type NormalizeResult =
  | { ok: true; record: ReviewRecord }
  | { ok: false; reason: NormalizeRejection };

/** Durable per-product sync state */
export interface ProductWatermark {
  productId: string;
  lastReviewDate: CalendarDate | null;
  /** Most recently seen ids, oldest first */
  recentReviewIds: string[];
  totalReviews: number;
  lastSyncedAt: string;
}

export interface WatermarkUpdate {
  lastReviewDate?: CalendarDate | null;
  newIds?: string[];
  totalReviews?: number;
}

/** Ephemeral state of one product traversal */
export interface TraversalRun {
  productId: string;
  productUrl: string;
  mode: CrawlMode;
  pageIndex: number;
  pagesFetched: number;
  rawCollected: ReviewRecord[];
  stopped: boolean;
  stopReason: StopReason | null;
}

/** Pacing interval, picked uniformly at random */
export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface CrawlRequest {
  url: string;
  maxReviews?: number | null;
  mode?: CrawlMode | null;
}

export interface ProductSyncResult {
  url: string;
  productId: string | null;
  requestedMode: CrawlMode;
  /** `full` when an incremental request had no baseline */
  effectiveMode: CrawlMode;
  rawCount: number;
  acceptedCount: number;
  savedCount: number;
  stopReason: StopReason | null;
  error?: string;
}

export interface RunSummary {
  /** url → accepted record count */
  counts: Record<string, number>;
  results: ProductSyncResult[];
  totalAccepted: number;
  durationMs: number;
}
