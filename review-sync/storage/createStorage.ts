import { createClient } from '@supabase/supabase-js';
import type { ILogger, IReviewRepository, IWatermarkStore } from '../core/interfaces';
import { WatermarkUnavailableError } from '../core/errors';
import type { ReviewSyncConfig } from '../config/env';
import { JsonReviewRepository } from './JsonReviewRepository';
import { JsonWatermarkStore } from './JsonWatermarkStore';
import { SupabaseReviewRepository } from './SupabaseReviewRepository';
import { SupabaseWatermarkStore } from './SupabaseWatermarkStore';

export interface Storage {
  repository: IReviewRepository;
  watermarkStore: IWatermarkStore;
  close(): Promise<void>;
}

/**
 * Builds the repository and watermark store for the configured backend.
 */
export async function createStorage(config: ReviewSyncConfig['storage'], logger: ILogger): Promise<Storage> {
  const log = logger.child({ component: 'storage', backend: config.backend });

  let repository: IReviewRepository;
  let watermarkStore: IWatermarkStore;

  if (config.backend === 'supabase') {
    if (!config.supabaseUrl || !config.supabaseKey) {
      throw new WatermarkUnavailableError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase backend');
    }
    const supabase = createClient(config.supabaseUrl, config.supabaseKey, {
      auth: { persistSession: false },
    });
    repository = new SupabaseReviewRepository(supabase, log);
    watermarkStore = new SupabaseWatermarkStore(supabase, log);
  } else {
    watermarkStore = await JsonWatermarkStore.open(config.reviewStoragePath, log);
    repository = await JsonReviewRepository.open(config.reviewStoragePath, log);
  }

  log.info('Storage ready', { path: config.backend === 'json' ? config.reviewStoragePath : undefined });

  return {
    repository,
    watermarkStore,
    async close() {
      await Promise.all([repository.close(), watermarkStore.close()]);
    },
  };
}
