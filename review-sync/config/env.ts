import type { CrawlMode, DelayRange } from '../core/types';

export type StorageBackend = 'json' | 'supabase';

export interface ReviewSyncConfig {
  logLevel: string;
  browser: {
    headless: boolean;
    executablePath: string | null;
    userAgent: string;
    requestTimeoutMs: number;
    debugScreenshots: boolean;
    debugDir: string;
  };
  crawl: {
    maxReviewsPerProduct: number | null;
    defaultMode: CrawlMode;
    pageDelay: DelayRange;
    productDelay: DelayRange;
    productTimeoutMs: number;
  };
  storage: {
    backend: StorageBackend;
    reviewStoragePath: string;
    supabaseUrl: string | null;
    supabaseKey: string | null;
  };
}

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function optionalInt(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optionalBool(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key];
  if (!val) return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

/**
 * Builds the runtime configuration from environment variables.
 * `MAX_REVIEWS_PER_PRODUCT=0` disables the cap.
 */
export function loadConfig(env: Env = process.env): ReviewSyncConfig {
  const maxReviews = optionalInt(env, 'MAX_REVIEWS_PER_PRODUCT', 5000);
  const backend = optional(env, 'STORAGE_BACKEND', 'json');
  if (backend !== 'json' && backend !== 'supabase') {
    throw new Error(`STORAGE_BACKEND must be "json" or "supabase", got "${backend}"`);
  }

  return {
    logLevel: optional(env, 'LOG_LEVEL', 'info'),
    browser: {
      headless: optionalBool(env, 'HEADLESS', false),
      executablePath: env.CHROME_EXECUTABLE_PATH || null,
      userAgent: optional(
        env,
        'USER_AGENT',
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
      ),
      requestTimeoutMs: optionalInt(env, 'REQUEST_TIMEOUT', 30000),
      debugScreenshots: optionalBool(env, 'DEBUG_SCREENSHOTS', false),
      debugDir: optional(env, 'DEBUG_DIR', 'debug'),
    },
    crawl: {
      maxReviewsPerProduct: maxReviews > 0 ? maxReviews : null,
      defaultMode: optionalBool(env, 'INCREMENTAL_PARSING', true) ? 'incremental' : 'full',
      pageDelay: {
        minMs: optionalInt(env, 'PAGE_DELAY_MIN_MS', 1000),
        maxMs: optionalInt(env, 'PAGE_DELAY_MAX_MS', 2000),
      },
      productDelay: {
        minMs: optionalInt(env, 'MIN_DELAY_BETWEEN_REQUESTS', 2000),
        maxMs: optionalInt(env, 'MAX_DELAY_BETWEEN_REQUESTS', 5000),
      },
      productTimeoutMs: optionalInt(env, 'PRODUCT_TIMEOUT_MS', 15 * 60 * 1000),
    },
    storage: {
      backend,
      reviewStoragePath: optional(env, 'REVIEW_STORAGE_PATH', 'data/reviews'),
      supabaseUrl: env.SUPABASE_URL || null,
      supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || null,
    },
  };
}
