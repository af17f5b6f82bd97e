import type { RawReviewFields } from '../types';

export type Outcome = { ok: true } | { ok: false; reason: string };

/**
 * Page automation adapter
 *
 * Owns one browser page for one traversal. Every "not found" case is an
 * `Outcome`; a throw means something unexpected went wrong.
 */
export interface IPageAdapter<E = unknown> {
  open(url: string): Promise<Outcome>;

  /** Reach the review listing from an already opened product page */
  activateReviewsTab(): Promise<Outcome>;

  listReviewElements(): Promise<E[]>;

  extractFields(element: E): Promise<RawReviewFields>;

  /** The page explicitly says the product has no (more) reviews */
  hasNoReviewsIndicator(): Promise<boolean>;

  goToNextPage(): Promise<Outcome>;

  close(): Promise<void>;
}

/** Acquires a fresh adapter for one traversal */
export type PageAdapterFactory<E = unknown> = () => Promise<IPageAdapter<E>>;
