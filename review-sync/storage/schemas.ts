import { z } from 'zod';

const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const ReviewRecordSchema = z.object({
  reviewId: z.string().min(1),
  idSynthetic: z.boolean().default(false),
  productId: z.string().min(1),
  productUrl: z.string(),
  author: z.string(),
  rating: z.number().int().min(0).max(5),
  publishedAt: CalendarDateSchema,
  dateUnreliable: z.boolean().default(false),
  text: z.string().min(1),
  likes: z.number().int().min(0).default(0),
  dislikes: z.number().int().min(0).default(0),
  collectedAt: z.string(),
});

export const ReviewFileSchema = z.array(ReviewRecordSchema);

export const ProductWatermarkSchema = z.object({
  productId: z.string().min(1),
  lastReviewDate: CalendarDateSchema.nullable(),
  recentReviewIds: z.array(z.string()),
  totalReviews: z.number().int().min(0),
  lastSyncedAt: z.string(),
});
