import type { CalendarDate, ProductWatermark, WatermarkUpdate } from '../types';

/**
 * Durable per-product sync state
 *
 * `upsert` is atomic per product. Implementations throw
 * `WatermarkUnavailableError` when the backing store cannot be reached.
 */
export interface IWatermarkStore {
  getLastReviewDate(productId: string): Promise<CalendarDate | null>;

  getRecentIds(productId: string): Promise<Set<string>>;

  getWatermark(productId: string): Promise<ProductWatermark | null>;

  upsert(productId: string, update: WatermarkUpdate): Promise<ProductWatermark>;

  close(): Promise<void>;
}
