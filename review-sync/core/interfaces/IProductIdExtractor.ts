/**
 * Product id extractor interface
 *
 * A new URL shape means a new class implementing this interface,
 * registered with the factory.
 */
export interface IProductIdExtractor {
  /** Whether this extractor recognizes the URL */
  canHandle(url: string): boolean;

  /** Product id from the URL */
  extract(url: string): string | null;

  /** Extractor name (for logs) */
  readonly name: string;
}
