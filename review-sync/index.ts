/**
 * review-sync public API
 */
export * from './core';
export * from './extractors';
export * from './storage';
export { createLogger, createSilentLogger } from './logging/logger';
export { loadConfig } from './config/env';
export type { ReviewSyncConfig, StorageBackend } from './config/env';
export { launchBrowser, createPageAdapterFactory } from './browser/launchBrowser';
export { PuppeteerPageAdapter } from './adapters/PuppeteerPageAdapter';
export { parseUrlList, readUrlListFile } from './utils/urlList';
