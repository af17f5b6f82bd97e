export { JsonWatermarkStore, mergeWatermark } from './JsonWatermarkStore';
export { JsonReviewRepository } from './JsonReviewRepository';
export { SupabaseWatermarkStore } from './SupabaseWatermarkStore';
export { SupabaseReviewRepository } from './SupabaseReviewRepository';
export { createStorage } from './createStorage';
export type { Storage } from './createStorage';
