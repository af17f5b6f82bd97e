export { SlugSuffixExtractor } from './SlugSuffixExtractor';
export { QueryParamExtractor } from './QueryParamExtractor';
export { ProductIdExtractorFactory, extractProductId } from './ProductIdExtractorFactory';
export type { ProductIdExtractionResult } from './ProductIdExtractorFactory';
