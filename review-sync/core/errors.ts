export type ReviewSyncErrorCode =
  | 'INVALID_PRODUCT_URL'
  | 'LISTING_UNREACHABLE'
  | 'ADAPTER_TRANSIENT'
  | 'WATERMARK_UNAVAILABLE'
  | 'TRAVERSAL_TIMEOUT';

export class ReviewSyncError extends Error {
  constructor(
    readonly code: ReviewSyncErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal for one product */
export class InvalidProductUrlError extends ReviewSyncError {
  constructor(readonly url: string) {
    super('INVALID_PRODUCT_URL', `Cannot resolve product id from URL: ${url}`);
  }
}

/** Fatal for one product */
export class ListingUnreachableError extends ReviewSyncError {
  constructor(readonly productId: string, reason: string) {
    super('LISTING_UNREACHABLE', `Review listing unreachable for product ${productId}: ${reason}`);
  }
}

/** Recovered on later pages, fatal on page 1 */
export class AdapterTransientError extends ReviewSyncError {
  constructor(readonly pageIndex: number, cause: unknown) {
    super('ADAPTER_TRANSIENT', `Adapter failed on page ${pageIndex}: ${describeError(cause)}`, { cause });
  }
}

/** Fatal for the whole run */
export class WatermarkUnavailableError extends ReviewSyncError {
  constructor(message: string, cause?: unknown) {
    super('WATERMARK_UNAVAILABLE', message, { cause });
  }
}

/** Fatal for one product */
export class TraversalTimeoutError extends ReviewSyncError {
  constructor(readonly target: string, timeoutMs?: number) {
    super(
      'TRAVERSAL_TIMEOUT',
      timeoutMs ? `Traversal of ${target} timed out after ${timeoutMs}ms` : `Traversal of ${target} aborted`
    );
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
