import type { StorageBackend } from '../config/env';
import type { CrawlRequest } from '../core/types';

export interface CliArgs {
  url: string | null;
  file: string | null;
  full: boolean;
  max: number | null;
  store: StorageBackend | null;
  debug: boolean;
}

/**
 * Reads `--flag=value` style arguments; unknown flags are ignored.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { url: null, file: null, full: false, max: null, store: null, debug: false };

  for (const arg of argv) {
    const [flag, ...rest] = arg.split('=');
    const value = rest.join('=');

    if (flag === '--url' && value) {
      args.url = value;
    } else if (flag === '--file' && value) {
      args.file = value;
    } else if (flag === '--full') {
      args.full = true;
    } else if (flag === '--debug') {
      args.debug = true;
    } else if (flag === '--max') {
      if (!/^\d+$/.test(value)) {
        throw new Error(`--max expects a non-negative integer, got "${value}"`);
      }
      args.max = parseInt(value, 10);
    } else if (flag === '--store') {
      if (value !== 'json' && value !== 'supabase') {
        throw new Error(`--store expects "json" or "supabase", got "${value}"`);
      }
      args.store = value;
    }
  }

  return args;
}

/**
 * The `--url` request comes first, then the file's lines. `--max` fills in
 * where a line gives no limit (0 means unlimited); `--full` forces every
 * request to full mode.
 */
export function buildRequests(args: CliArgs, fileRequests: CrawlRequest[]): CrawlRequest[] {
  const requests: CrawlRequest[] = [];
  if (args.url) {
    requests.push({ url: args.url });
  }
  requests.push(...fileRequests);

  return requests.map(request => {
    const next: CrawlRequest = { ...request };
    if (next.maxReviews === undefined && args.max !== null) {
      next.maxReviews = args.max;
    }
    if (args.full) {
      next.mode = 'full';
    }
    return next;
  });
}
