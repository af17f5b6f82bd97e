import { z } from 'zod';
import type { ProductWatermark, ReviewRecord } from '../core/types';

export const WATERMARK_TABLE = 'product_watermarks';
export const REVIEW_TABLE = 'product_reviews';

export const WatermarkRowSchema = z.object({
  product_id: z.string(),
  last_review_date: z.string().nullable(),
  recent_review_ids: z.array(z.string()).nullable(),
  total_reviews: z.number().int(),
  last_synced_at: z.string(),
});
export type WatermarkRow = z.infer<typeof WatermarkRowSchema>;

export const ReviewRowSchema = z.object({
  product_id: z.string(),
  review_id: z.string(),
  id_synthetic: z.boolean(),
  product_url: z.string(),
  author: z.string(),
  rating: z.number().int(),
  published_at: z.string(),
  date_unreliable: z.boolean(),
  text: z.string(),
  likes: z.number().int(),
  dislikes: z.number().int(),
  collected_at: z.string(),
});
export type ReviewRow = z.infer<typeof ReviewRowSchema>;

// PostgreSQL `date` columns come back as YYYY-MM-DD; timestamps keep their offset.

export function watermarkFromRow(row: WatermarkRow): ProductWatermark {
  return {
    productId: row.product_id,
    lastReviewDate: row.last_review_date ? row.last_review_date.slice(0, 10) : null,
    recentReviewIds: row.recent_review_ids ?? [],
    totalReviews: row.total_reviews,
    lastSyncedAt: row.last_synced_at,
  };
}

export function watermarkToRow(watermark: ProductWatermark): WatermarkRow {
  return {
    product_id: watermark.productId,
    last_review_date: watermark.lastReviewDate,
    recent_review_ids: watermark.recentReviewIds,
    total_reviews: watermark.totalReviews,
    last_synced_at: watermark.lastSyncedAt,
  };
}

export function reviewToRow(record: ReviewRecord): ReviewRow {
  return {
    product_id: record.productId,
    review_id: record.reviewId,
    id_synthetic: record.idSynthetic,
    product_url: record.productUrl,
    author: record.author,
    rating: record.rating,
    published_at: record.publishedAt,
    date_unreliable: record.dateUnreliable,
    text: record.text,
    likes: record.likes,
    dislikes: record.dislikes,
    collected_at: record.collectedAt,
  };
}

export function reviewFromRow(row: ReviewRow): ReviewRecord {
  return {
    reviewId: row.review_id,
    idSynthetic: row.id_synthetic,
    productId: row.product_id,
    productUrl: row.product_url,
    author: row.author,
    rating: row.rating,
    publishedAt: row.published_at.slice(0, 10),
    dateUnreliable: row.date_unreliable,
    text: row.text,
    likes: row.likes,
    dislikes: row.dislikes,
    collectedAt: row.collected_at,
  };
}
