import { promises as fs } from 'fs';
import type { ILogger } from '../core/interfaces';
import type { CrawlMode, CrawlRequest } from '../core/types';
import { describeError } from '../core/errors';

function parseMode(token: string | undefined): CrawlMode | undefined {
  const lower = token?.toLowerCase();
  return lower === 'full' || lower === 'incremental' ? lower : undefined;
}

/**
 * Parses a URL list: one `URL [maxReviews] [full|incremental]` per line.
 * Blank lines and `#` comments are skipped; the mode may also stand in the
 * second column.
 */
export function parseUrlList(content: string): CrawlRequest[] {
  const requests: CrawlRequest[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const [url, second, third] = line.split(/\s+/);
    const request: CrawlRequest = { url };

    if (second !== undefined && /^\d+$/.test(second)) {
      request.maxReviews = parseInt(second, 10);
    }
    const mode = parseMode(third) ?? parseMode(second);
    if (mode) {
      request.mode = mode;
    }

    requests.push(request);
  }

  return requests;
}

export async function readUrlListFile(filePath: string): Promise<CrawlRequest[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseUrlList(content);
}

/**
 * URL list for the CLI. A missing or unreadable file is logged and
 * contributes no requests, so a `--url` given alongside it still runs.
 */
export async function loadUrlListFile(filePath: string, logger: ILogger): Promise<CrawlRequest[]> {
  try {
    const requests = await readUrlListFile(filePath);
    logger.info('URL list loaded', { filePath, urls: requests.length });
    return requests;
  } catch (error) {
    logger.error('URL list file not readable', { filePath, error: describeError(error) });
    return [];
  }
}
