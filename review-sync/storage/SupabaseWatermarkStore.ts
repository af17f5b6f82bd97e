import type { SupabaseClient } from '@supabase/supabase-js';
import type { ILogger, IWatermarkStore } from '../core/interfaces';
import type { CalendarDate, ProductWatermark, WatermarkUpdate } from '../core/types';
import { WatermarkUnavailableError } from '../core/errors';
import { RECENT_ID_CAPACITY } from '../core/RecentIdWindow';
import { KeyedMutex } from '../utils/keyedMutex';
import { mergeWatermark } from './JsonWatermarkStore';
import { WATERMARK_TABLE, WatermarkRowSchema, watermarkFromRow, watermarkToRow } from './supabaseRows';

export interface SupabaseWatermarkStoreOptions {
  clock?: () => Date;
  recentIdCapacity?: number;
}

/**
 * Watermarks in the `product_watermarks` table, one row per product.
 *
 * Read-merge-write is serialized per product inside this process only; two
 * processes syncing the same product can still interleave.
 */
export class SupabaseWatermarkStore implements IWatermarkStore {
  private readonly mutex = new KeyedMutex();
  private readonly clock: () => Date;
  private readonly capacity: number;

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly logger: ILogger,
    options: SupabaseWatermarkStoreOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.capacity = options.recentIdCapacity ?? RECENT_ID_CAPACITY;
  }

  async getWatermark(productId: string): Promise<ProductWatermark | null> {
    const { data, error } = await this.supabase
      .from(WATERMARK_TABLE)
      .select('*')
      .eq('product_id', productId)
      .maybeSingle();

    if (error) {
      throw new WatermarkUnavailableError(`Cannot read watermark for ${productId}: ${error.message}`, error);
    }
    if (!data) return null;

    const parsed = WatermarkRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new WatermarkUnavailableError(`Malformed watermark row for ${productId}: ${parsed.error.message}`);
    }
    return watermarkFromRow(parsed.data);
  }

  async getLastReviewDate(productId: string): Promise<CalendarDate | null> {
    const watermark = await this.getWatermark(productId);
    return watermark?.lastReviewDate ?? null;
  }

  async getRecentIds(productId: string): Promise<Set<string>> {
    const watermark = await this.getWatermark(productId);
    return new Set(watermark?.recentReviewIds ?? []);
  }

  async upsert(productId: string, update: WatermarkUpdate): Promise<ProductWatermark> {
    return this.mutex.runExclusive(productId, async () => {
      const current = await this.getWatermark(productId);
      const next = mergeWatermark(productId, current, update, this.clock(), this.capacity);

      const { error } = await this.supabase
        .from(WATERMARK_TABLE)
        .upsert(watermarkToRow(next), { onConflict: 'product_id' });

      if (error) {
        throw new WatermarkUnavailableError(`Cannot write watermark for ${productId}: ${error.message}`, error);
      }

      this.logger.debug('Watermark updated', {
        productId,
        lastReviewDate: next.lastReviewDate,
        totalReviews: next.totalReviews,
      });
      return next;
    });
  }

  async close(): Promise<void> {
    // the client is shared with the review repository and has no pool to drain
  }
}
