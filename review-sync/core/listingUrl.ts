/**
 * Direct review-listing URL for a product page URL.
 *
 * https://shop.example/product/phone-123/?from=main → https://shop.example/product/phone-123/reviews/
 */
export function buildListingUrl(productUrl: string): string {
  const base = productUrl.trim().split(/[?#]/)[0];
  if (/\/reviews\/?$/.test(base)) {
    return base.endsWith('/') ? base : `${base}/`;
  }
  return base.endsWith('/') ? `${base}reviews/` : `${base}/reviews/`;
}

/**
 * Next page URL derived from the current one through its `page` query
 * parameter. A URL without one is page 1.
 */
export function deriveNextPageUrl(currentUrl: string): string | null {
  let url: URL;
  try {
    url = new URL(currentUrl);
  } catch {
    return null;
  }

  const current = url.searchParams.get('page');
  const pageNumber = current === null ? 1 : parseInt(current, 10);
  if (!Number.isFinite(pageNumber) || pageNumber < 1) return null;

  url.searchParams.set('page', String(pageNumber + 1));
  return url.toString();
}
