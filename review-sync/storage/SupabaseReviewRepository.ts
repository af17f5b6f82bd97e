import type { SupabaseClient } from '@supabase/supabase-js';
import type { ILogger, IReviewRepository } from '../core/interfaces';
import type { ReviewRecord } from '../core/types';
import { REVIEW_TABLE, ReviewRowSchema, reviewFromRow, reviewToRow } from './supabaseRows';

const DEFAULT_QUERY_LIMIT = 100;
const INSERT_BATCH_SIZE = 500;

/**
 * Reviews in `product_reviews`; the unique (product_id, review_id) key makes
 * repeated inserts no-ops.
 */
export class SupabaseReviewRepository implements IReviewRepository {
  constructor(private readonly supabase: SupabaseClient, private readonly logger: ILogger) {}

  async saveRecords(records: ReviewRecord[]): Promise<number> {
    let saved = 0;
    for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
      const batch = records.slice(start, start + INSERT_BATCH_SIZE).map(reviewToRow);
      const { data, error } = await this.supabase
        .from(REVIEW_TABLE)
        .upsert(batch, { onConflict: 'product_id,review_id', ignoreDuplicates: true })
        .select('review_id');

      if (error) {
        throw new Error(`Failed to store reviews: ${error.message}`, { cause: error });
      }
      saved += data?.length ?? 0;
    }

    this.logger.info('Reviews stored', { offered: records.length, saved });
    return saved;
  }

  async queryByProduct(productId: string, limit = DEFAULT_QUERY_LIMIT): Promise<ReviewRecord[]> {
    const { data, error } = await this.supabase
      .from(REVIEW_TABLE)
      .select('*')
      .eq('product_id', productId)
      .order('published_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to query reviews for ${productId}: ${error.message}`, { cause: error });
    }

    const rows = ReviewRowSchema.array().parse(data ?? []);
    return rows.map(reviewFromRow);
  }

  async close(): Promise<void> {
    // shared client, nothing to release
  }
}
