import type { ReviewRecord } from '../types';

/**
 * Persistence backend for review records
 */
export interface IReviewRepository {
  /** Returns how many records were new; duplicates by reviewId are skipped */
  saveRecords(records: ReviewRecord[]): Promise<number>;

  queryByProduct(productId: string, limit?: number): Promise<ReviewRecord[]>;

  close(): Promise<void>;
}
