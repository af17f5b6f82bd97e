import { promises as fs } from 'fs';
import * as path from 'path';
import type { ILogger, IReviewRepository } from '../core/interfaces';
import type { ReviewRecord } from '../core/types';
import { KeyedMutex } from '../utils/keyedMutex';
import { ReviewFileSchema } from './schemas';
import { readJsonDocument, safeFileKey, writeJsonDocument } from './jsonFile';

const DEFAULT_QUERY_LIMIT = 100;

/**
 * Reviews stored as `reviews_<productId>.json`, one array per product.
 */
export class JsonReviewRepository implements IReviewRepository {
  private readonly mutex = new KeyedMutex();

  private constructor(private readonly dir: string, private readonly logger: ILogger) {}

  static async open(dir: string, logger: ILogger): Promise<JsonReviewRepository> {
    await fs.mkdir(dir, { recursive: true });
    return new JsonReviewRepository(dir, logger);
  }

  async saveRecords(records: ReviewRecord[]): Promise<number> {
    const byProduct = new Map<string, ReviewRecord[]>();
    for (const record of records) {
      const group = byProduct.get(record.productId) ?? [];
      group.push(record);
      byProduct.set(record.productId, group);
    }

    let saved = 0;
    for (const [productId, group] of byProduct) {
      saved += await this.mutex.runExclusive(productId, () => this.appendNew(productId, group));
    }
    return saved;
  }

  async queryByProduct(productId: string, limit = DEFAULT_QUERY_LIMIT): Promise<ReviewRecord[]> {
    const stored = await this.load(productId);
    return stored.slice(0, Math.max(0, limit));
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private async appendNew(productId: string, records: ReviewRecord[]): Promise<number> {
    const stored = await this.load(productId);
    const known = new Set(stored.map(record => record.reviewId));

    const fresh: ReviewRecord[] = [];
    for (const record of records) {
      if (known.has(record.reviewId)) continue;
      known.add(record.reviewId);
      fresh.push(record);
    }

    if (fresh.length === 0) {
      this.logger.debug('No new reviews to store', { productId, offered: records.length });
      return 0;
    }

    await writeJsonDocument(this.fileFor(productId), [...stored, ...fresh]);
    this.logger.info('Reviews stored', {
      productId,
      saved: fresh.length,
      skipped: records.length - fresh.length,
      total: stored.length + fresh.length,
    });
    return fresh.length;
  }

  private async load(productId: string): Promise<ReviewRecord[]> {
    return (await readJsonDocument(this.fileFor(productId), ReviewFileSchema)) ?? [];
  }

  private fileFor(productId: string): string {
    return path.join(this.dir, `reviews_${safeFileKey(productId)}.json`);
  }
}
