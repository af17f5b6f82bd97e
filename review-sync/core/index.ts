export * from './types';
export * from './errors';
export * from './interfaces';
export { ReviewNormalizer, PLACEHOLDER_PHRASES, UNKNOWN_AUTHOR, synthesizeReviewId } from './ReviewNormalizer';
export type { ReviewNormalizerOptions } from './ReviewNormalizer';
export { parseReviewDate, toCalendarDate, calendarDateOf } from './reviewDate';
export { RecentIdWindow, RECENT_ID_CAPACITY } from './RecentIdWindow';
export { filterNewReviews, isNewReview, resolveEffectiveMode } from './IncrementalFilter';
export { buildListingUrl, deriveNextPageUrl } from './listingUrl';
export { TraversalController } from './TraversalController';
export type { TraversalControllerDeps, TraversalOptions } from './TraversalController';
export { ProductReviewParser } from './ProductReviewParser';
export type { ParseOptions, ProductReviewParserDeps } from './ProductReviewParser';
export { RunCoordinator } from './RunCoordinator';
export type { ProductSync, RunCoordinatorOptions } from './RunCoordinator';
