#!/usr/bin/env -S npx tsx
/**
 * Review sync CLI
 *
 * Usage:
 *   npx tsx review-sync/batch/sync-reviews.ts --url=<product url> [--full] [--max=N]
 *   npx tsx review-sync/batch/sync-reviews.ts --file=product_urls.txt [--store=json|supabase] [--debug]
 *
 * Exit code 0 when the run completes (failed products included), 1 when no
 * URL resolves to a product or the watermark store is unavailable.
 */

import 'dotenv/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Browser } from 'puppeteer-core';
import { loadConfig } from '../config/env';
import { createLogger } from '../logging/logger';
import { createStorage, type Storage } from '../storage';
import { launchBrowser, createPageAdapterFactory } from '../browser/launchBrowser';
import { TraversalController } from '../core/TraversalController';
import { ProductReviewParser } from '../core/ProductReviewParser';
import { RunCoordinator } from '../core/RunCoordinator';
import { WatermarkUnavailableError, describeError } from '../core/errors';
import type { RunSummary } from '../core/types';
import { extractProductId } from '../extractors';
import { loadUrlListFile } from '../utils/urlList';
import { buildRequests, parseArgs } from './cliArgs';

const RESULTS_DIR = 'results';

async function writeResults(summary: RunSummary, startedAt: Date): Promise<string> {
  await fs.mkdir(RESULTS_DIR, { recursive: true });
  const timestamp = startedAt.toISOString().replace(/[:.]/g, '-');
  const filename = path.join(RESULTS_DIR, `review_sync_${timestamp}.json`);
  await fs.writeFile(
    filename,
    JSON.stringify({ timestamp: startedAt.toISOString(), ...summary }, null, 2),
    'utf-8'
  );
  return filename;
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const config = loadConfig();
  if (args.store) {
    config.storage.backend = args.store;
  }
  if (args.debug) {
    config.logLevel = 'debug';
    config.browser.debugScreenshots = true;
  }

  const logger = createLogger({ level: config.logLevel });

  if (!args.url && !args.file) {
    logger.error('Pass a product URL (--url=) or a URL list file (--file=)');
    return 1;
  }

  const fileRequests = args.file ? await loadUrlListFile(args.file, logger) : [];
  const requests = buildRequests(args, fileRequests);
  const resolvable = requests.filter(request => extractProductId(request.url) !== null);
  if (resolvable.length === 0) {
    logger.error('No URL resolves to a product id', { urls: requests.map(request => request.url) });
    return 1;
  }

  logger.info('Review sync starting', {
    products: requests.length,
    resolvable: resolvable.length,
    defaultMode: config.crawl.defaultMode,
    backend: config.storage.backend,
  });

  const startedAt = new Date();
  let storage: Storage | null = null;
  let browser: Browser | null = null;

  try {
    storage = await createStorage(config.storage, logger);
    browser = await launchBrowser(config.browser, logger);

    const controller = new TraversalController({
      adapterFactory: createPageAdapterFactory(browser, config.browser, logger),
      logger,
      pageDelay: config.crawl.pageDelay,
    });
    const parser = new ProductReviewParser({
      controller,
      repository: storage.repository,
      watermarkStore: storage.watermarkStore,
      logger,
    });
    const coordinator = new RunCoordinator(parser, logger, {
      defaultMode: config.crawl.defaultMode,
      defaultMaxReviews: config.crawl.maxReviewsPerProduct,
      productDelay: config.crawl.productDelay,
      productTimeoutMs: config.crawl.productTimeoutMs,
    });

    const summary = await coordinator.run(requests);

    process.stdout.write(`${JSON.stringify(summary.counts, null, 2)}\n`);
    const filename = await writeResults(summary, startedAt);
    logger.info('Results saved', { filename, totalAccepted: summary.totalAccepted, durationMs: summary.durationMs });
    return 0;
  } catch (error) {
    if (error instanceof WatermarkUnavailableError) {
      logger.error('Watermark store unavailable', { error: describeError(error) });
      return 1;
    }
    throw error;
  } finally {
    if (browser) {
      await browser.close().catch(error => logger.warn('Browser close failed', { error: describeError(error) }));
    }
    if (storage) {
      await storage.close();
    }
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
