import { createHash } from 'crypto';
import type { NormalizeResult, RawReviewFields } from './types';
import { calendarDateOf, parseReviewDate } from './reviewDate';

const DEFAULT_MIN_TEXT_LENGTH = 10;
export const UNKNOWN_AUTHOR = 'unknown';

/** UI fallback strings the listing renders in place of real content */
export const PLACEHOLDER_PHRASES = [
  'Пользователь предпочёл скрыть свои данные',
  'Пользователь предпочел скрыть свои данные',
  'Пользователь скрыл свои данные',
  'Неизвестный автор',
  'user chose to hide their data',
];

export interface ReviewNormalizerOptions {
  clock?: () => Date;
  minTextLength?: number;
  placeholderPhrases?: string[];
}

/**
 * Turns raw adapter field candidates into a ReviewRecord.
 *
 * Pure apart from the injected clock, which supplies `collectedAt` and the
 * fallback date for unparseable ones.
 */
export class ReviewNormalizer {
  private readonly clock: () => Date;
  private readonly minTextLength: number;
  private readonly placeholderPattern: RegExp | null;

  constructor(options: ReviewNormalizerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
    const phrases = options.placeholderPhrases ?? PLACEHOLDER_PHRASES;
    this.placeholderPattern = phrases.length > 0
      ? new RegExp(phrases.map(escapeRegExp).join('|'), 'giu')
      : null;
  }

  normalize(fields: RawReviewFields, productId: string, productUrl: string): NormalizeResult {
    if (!productId.trim()) {
      return { ok: false, reason: 'MISSING_PRODUCT_ID' };
    }

    const rawText = readString(fields, 'text');
    if (!rawText) {
      return { ok: false, reason: 'MISSING_TEXT' };
    }

    const text = this.stripPlaceholders(rawText);
    if (text.length < this.minTextLength) {
      return { ok: false, reason: 'TEXT_TOO_SHORT' };
    }

    const author = this.stripPlaceholders(readString(fields, 'author')) || UNKNOWN_AUTHOR;
    const rawDate = readString(fields, 'date');
    const now = this.clock();
    const parsedDate = parseReviewDate(rawDate);

    const adapterId = readString(fields, 'reviewId');
    const reviewId = adapterId || synthesizeReviewId(productId, author, rawDate, text);

    return {
      ok: true,
      record: {
        reviewId,
        idSynthetic: !adapterId,
        productId,
        productUrl,
        author,
        rating: readRating(fields.rating),
        publishedAt: parsedDate ?? calendarDateOf(now),
        dateUnreliable: parsedDate === null,
        text,
        likes: readCount(fields.likes),
        dislikes: readCount(fields.dislikes),
        collectedAt: now.toISOString(),
      },
    };
  }

  private stripPlaceholders(value: string): string {
    const stripped = this.placeholderPattern ? value.replace(this.placeholderPattern, ' ') : value;
    return stripped.replace(/\s+/g, ' ').trim();
  }
}

/**
 * Content-derived id for reviews the listing exposes no id for. Identical
 * content yields the same id on every run; edited reviews get a new one.
 */
export function synthesizeReviewId(productId: string, author: string, rawDate: string, text: string): string {
  const digest = createHash('sha256')
    .update([productId, author, rawDate, text].join('\u0000'))
    .digest('hex');
  return `${productId}-syn-${digest.slice(0, 20)}`;
}

function readString(fields: RawReviewFields, key: string): string {
  const value = fields[key];
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

function readRating(value: RawReviewFields[string] | undefined): number {
  const rating = toInteger(value);
  return rating !== null && rating >= 0 && rating <= 5 ? rating : 0;
}

function readCount(value: RawReviewFields[string] | undefined): number {
  const count = toInteger(value);
  return count !== null && count >= 0 ? count : 0;
}

function toInteger(value: RawReviewFields[string] | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string') {
    const compact = value.replace(/\s+/g, '');
    return /^\d+$/.test(compact) ? Number(compact) : null;
  }
  return null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
