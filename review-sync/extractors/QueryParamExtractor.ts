import type { IProductIdExtractor } from '../core/interfaces';

/**
 * Product id from the query string
 *
 * Supported shape:
 * - ?id=608191880
 */
export class QueryParamExtractor implements IProductIdExtractor {
  readonly name = 'QueryParamExtractor';

  canHandle(url: string): boolean {
    try {
      return new URL(url).searchParams.has('id');
    } catch {
      return false;
    }
  }

  extract(url: string): string | null {
    try {
      const id = new URL(url).searchParams.get('id');
      return id && /^\d+$/.test(id) ? id : null;
    } catch {
      return null;
    }
  }
}
