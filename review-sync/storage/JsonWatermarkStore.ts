import { promises as fs } from 'fs';
import * as path from 'path';
import type { ILogger, IWatermarkStore } from '../core/interfaces';
import type { CalendarDate, ProductWatermark, WatermarkUpdate } from '../core/types';
import { WatermarkUnavailableError, describeError } from '../core/errors';
import { RecentIdWindow, RECENT_ID_CAPACITY } from '../core/RecentIdWindow';
import { KeyedMutex } from '../utils/keyedMutex';
import { ProductWatermarkSchema } from './schemas';
import { readJsonDocument, safeFileKey, writeJsonDocument } from './jsonFile';

export interface JsonWatermarkStoreOptions {
  clock?: () => Date;
  recentIdCapacity?: number;
}

/**
 * Watermarks as one JSON document per product under `<root>/watermarks/`.
 */
export class JsonWatermarkStore implements IWatermarkStore {
  private readonly mutex = new KeyedMutex();
  private readonly clock: () => Date;
  private readonly capacity: number;

  private constructor(
    private readonly dir: string,
    private readonly logger: ILogger,
    options: JsonWatermarkStoreOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.capacity = options.recentIdCapacity ?? RECENT_ID_CAPACITY;
  }

  /** Creates the directory; an unusable location is a WatermarkUnavailableError */
  static async open(
    rootDir: string,
    logger: ILogger,
    options: JsonWatermarkStoreOptions = {}
  ): Promise<JsonWatermarkStore> {
    const dir = path.join(rootDir, 'watermarks');
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.access(dir, fs.constants.R_OK | fs.constants.W_OK);
    } catch (error) {
      throw new WatermarkUnavailableError(`Watermark directory ${dir} is not usable: ${describeError(error)}`, error);
    }
    logger.debug('JSON watermark store ready', { dir });
    return new JsonWatermarkStore(dir, logger, options);
  }

  async getWatermark(productId: string): Promise<ProductWatermark | null> {
    try {
      return await readJsonDocument(this.fileFor(productId), ProductWatermarkSchema);
    } catch (error) {
      throw new WatermarkUnavailableError(`Cannot read watermark for ${productId}: ${describeError(error)}`, error);
    }
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

      try {
        await writeJsonDocument(this.fileFor(productId), next);
      } catch (error) {
        throw new WatermarkUnavailableError(`Cannot write watermark for ${productId}: ${describeError(error)}`, error);
      }

      this.logger.debug('Watermark updated', {
        productId,
        lastReviewDate: next.lastReviewDate,
        recentIds: next.recentReviewIds.length,
        totalReviews: next.totalReviews,
      });
      return next;
    });
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private fileFor(productId: string): string {
    return path.join(this.dir, `${safeFileKey(productId)}.json`);
  }
}

/**
 * Applies an update to a stored watermark. The date only moves forward and
 * new ids enter the window oldest first.
 */
export function mergeWatermark(
  productId: string,
  current: ProductWatermark | null,
  update: WatermarkUpdate,
  now: Date,
  capacity = RECENT_ID_CAPACITY
): ProductWatermark {
  const window = new RecentIdWindow(current?.recentReviewIds ?? [], capacity);
  window.addAll(update.newIds ?? []);

  return {
    productId,
    lastReviewDate: laterDate(current?.lastReviewDate ?? null, update.lastReviewDate ?? null),
    recentReviewIds: window.toArray(),
    totalReviews: update.totalReviews ?? current?.totalReviews ?? 0,
    lastSyncedAt: now.toISOString(),
  };
}

function laterDate(a: CalendarDate | null, b: CalendarDate | null): CalendarDate | null {
  if (!a) return b;
  if (!b) return a;
  return b > a ? b : a;
}
