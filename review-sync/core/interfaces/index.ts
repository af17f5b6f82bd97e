/**
 * Interface module entry point
 */
export * from './IProductIdExtractor';
export * from './IPageAdapter';
export * from './IWatermarkStore';
export * from './IReviewRepository';
export * from './ILogger';
