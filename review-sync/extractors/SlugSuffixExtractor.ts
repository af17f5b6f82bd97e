import type { IProductIdExtractor } from '../core/interfaces';

const SLUG_SUFFIX_PATTERN = /\/product\/[^/]*-(\d+)(?:\/reviews)?\/?$/;

/**
 * Product id from the trailing slug segment
 *
 * Supported shapes:
 * - /product/smartfon-x-128gb-608191880/
 * - /product/smartfon-x-128gb-608191880/reviews/
 */
export class SlugSuffixExtractor implements IProductIdExtractor {
  readonly name = 'SlugSuffixExtractor';

  canHandle(url: string): boolean {
    try {
      return new URL(url).pathname.includes('/product/');
    } catch {
      return false;
    }
  }

  extract(url: string): string | null {
    try {
      const match = new URL(url).pathname.match(SLUG_SUFFIX_PATTERN);
      return match ? match[1] : null;
    } catch {
      return null;
    }
  }
}
