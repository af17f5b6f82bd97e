/**
 * Shared fakes for core tests: a scripted page adapter and in-memory stores.
 */

import type { IPageAdapter, IReviewRepository, IWatermarkStore, Outcome } from '../interfaces';
import type { CalendarDate, ProductWatermark, RawReviewFields, ReviewRecord, WatermarkUpdate } from '../types';
import { mergeWatermark } from '../../storage/JsonWatermarkStore';
import { delay } from '../../utils/delay';

export const PRODUCT_URL = 'https://shop.example/product/test-phone-608191880/';
export const PRODUCT_ID = '608191880';
export const LISTING_URL = 'https://shop.example/product/test-phone-608191880/reviews/';

export interface FakePage {
  fields: RawReviewFields[];
  noReviews?: boolean;
  error?: Error;
}

export interface FakeSiteOptions {
  pages: FakePage[];
  openOutcome?: (url: string) => Outcome | Error;
  tabOutcome?: Outcome;
  /** goToNextPage throws when leaving this 1-based page */
  nextThrowsOnPage?: number;
  /** Time each listReviewElements call takes */
  listDelayMs?: number;
}

export class FakeAdapter implements IPageAdapter<RawReviewFields> {
  readonly opened: string[] = [];
  fetches = 0;
  closeCount = 0;
  tabActivations = 0;
  private current = 0;

  constructor(private readonly site: FakeSiteOptions) {}

  async open(url: string): Promise<Outcome> {
    this.opened.push(url);
    const outcome = this.site.openOutcome?.(url) ?? { ok: true };
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }

  async activateReviewsTab(): Promise<Outcome> {
    this.tabActivations++;
    return this.site.tabOutcome ?? { ok: true };
  }

  async listReviewElements(): Promise<RawReviewFields[]> {
    this.fetches++;
    if (this.site.listDelayMs) await delay(this.site.listDelayMs);
    const page = this.site.pages[this.current];
    if (!page) return [];
    if (page.error) throw page.error;
    return page.fields;
  }

  async extractFields(element: RawReviewFields): Promise<RawReviewFields> {
    return element;
  }

  async hasNoReviewsIndicator(): Promise<boolean> {
    const page = this.site.pages[this.current];
    return page ? page.noReviews === true : true;
  }

  async goToNextPage(): Promise<Outcome> {
    if (this.site.nextThrowsOnPage === this.current + 1) {
      throw new Error('navigation crashed');
    }
    if (this.current + 1 >= this.site.pages.length) {
      return { ok: false, reason: 'last page' };
    }
    this.current++;
    return { ok: true };
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

/** Raw fields as the adapter would report them */
export function rawReview(id: string | null, date: string, overrides: RawReviewFields = {}): RawReviewFields {
  return {
    reviewId: id,
    author: 'Иван П.',
    rating: 5,
    date,
    text: `Подробный отзыв о товаре ${id ?? date}`,
    likes: 0,
    dislikes: 0,
    ...overrides,
  };
}

/** A page of distinct reviews, ids `${prefix}-1..n`, all dated `date` */
export function reviewPage(prefix: string, count: number, date = '10.01.2024'): FakePage {
  return {
    fields: Array.from({ length: count }, (_, i) => rawReview(`${prefix}-${i + 1}`, date)),
  };
}

export function makeRecord(overrides: Partial<ReviewRecord> & Pick<ReviewRecord, 'reviewId' | 'publishedAt'>): ReviewRecord {
  return {
    idSynthetic: false,
    productId: PRODUCT_ID,
    productUrl: PRODUCT_URL,
    author: 'unknown',
    rating: 0,
    dateUnreliable: false,
    text: 'Текст отзыва для теста',
    likes: 0,
    dislikes: 0,
    collectedAt: '2024-02-01T00:00:00.000Z',
    ...overrides,
  };
}

export class InMemoryWatermarkStore implements IWatermarkStore {
  readonly watermarks = new Map<string, ProductWatermark>();
  readonly upserts: Array<{ productId: string; update: WatermarkUpdate }> = [];

  constructor(private readonly clock: () => Date = () => new Date('2024-02-01T00:00:00.000Z')) {}

  async getWatermark(productId: string): Promise<ProductWatermark | null> {
    return this.watermarks.get(productId) ?? null;
  }

  async getLastReviewDate(productId: string): Promise<CalendarDate | null> {
    return this.watermarks.get(productId)?.lastReviewDate ?? null;
  }

  async getRecentIds(productId: string): Promise<Set<string>> {
    return new Set(this.watermarks.get(productId)?.recentReviewIds ?? []);
  }

  async upsert(productId: string, update: WatermarkUpdate): Promise<ProductWatermark> {
    this.upserts.push({ productId, update });
    const next = mergeWatermark(productId, this.watermarks.get(productId) ?? null, update, this.clock());
    this.watermarks.set(productId, next);
    return next;
  }

  async close(): Promise<void> {}
}

export class InMemoryReviewRepository implements IReviewRepository {
  readonly records: ReviewRecord[] = [];

  async saveRecords(records: ReviewRecord[]): Promise<number> {
    let saved = 0;
    for (const record of records) {
      const exists = this.records.some(
        stored => stored.productId === record.productId && stored.reviewId === record.reviewId
      );
      if (exists) continue;
      this.records.push(record);
      saved++;
    }
    return saved;
  }

  async queryByProduct(productId: string, limit = 100): Promise<ReviewRecord[]> {
    return this.records.filter(record => record.productId === productId).slice(0, limit);
  }

  async close(): Promise<void> {}
}
