import type { IProductIdExtractor } from '../core/interfaces';
import { SlugSuffixExtractor } from './SlugSuffixExtractor';
import { QueryParamExtractor } from './QueryParamExtractor';

export interface ProductIdExtractionResult {
  productId: string | null;
  source: 'slug-suffix' | 'query-param' | 'custom' | 'failed';
  originalUrl: string;
}

/**
 * Product id extractor factory
 *
 * New URL shapes are added by registering another extractor;
 * extractors are tried in registration order.
 */
export class ProductIdExtractorFactory {
  private extractors: IProductIdExtractor[] = [];

  constructor() {
    this.registerExtractor(new SlugSuffixExtractor());
    this.registerExtractor(new QueryParamExtractor());
  }

  registerExtractor(extractor: IProductIdExtractor): void {
    this.extractors.push(extractor);
  }

  /** Insert at a given priority */
  insertExtractor(extractor: IProductIdExtractor, index: number): void {
    this.extractors.splice(index, 0, extractor);
  }

  extract(url: string): ProductIdExtractionResult {
    const trimmed = url.trim();
    for (const extractor of this.extractors) {
      if (extractor.canHandle(trimmed)) {
        const productId = extractor.extract(trimmed);
        if (productId) {
          return {
            productId,
            source: this.getSourceType(extractor.name),
            originalUrl: url,
          };
        }
      }
    }

    return {
      productId: null,
      source: 'failed',
      originalUrl: url,
    };
  }

  private getSourceType(name: string): ProductIdExtractionResult['source'] {
    switch (name) {
      case 'SlugSuffixExtractor':
        return 'slug-suffix';
      case 'QueryParamExtractor':
        return 'query-param';
      default:
        return 'custom';
    }
  }
}

export function extractProductId(url: string, factory = new ProductIdExtractorFactory()): string | null {
  return factory.extract(url).productId;
}
