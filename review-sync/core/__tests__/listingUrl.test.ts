import { describe, it, expect } from 'vitest';
import { buildListingUrl, deriveNextPageUrl } from '../listingUrl';

describe('buildListingUrl', () => {
  it('should append reviews/ after dropping query and hash', () => {
    expect(buildListingUrl('https://shop.example/product/phone-123/?from=main#top')).toBe(
      'https://shop.example/product/phone-123/reviews/'
    );
  });

  it('should add the missing slash', () => {
    expect(buildListingUrl('https://shop.example/product/phone-123')).toBe(
      'https://shop.example/product/phone-123/reviews/'
    );
  });

  it('should keep a URL that already points at the listing', () => {
    expect(buildListingUrl('https://shop.example/product/phone-123/reviews')).toBe(
      'https://shop.example/product/phone-123/reviews/'
    );
  });
});

describe('deriveNextPageUrl', () => {
  it('should treat a URL without page as page 1', () => {
    expect(deriveNextPageUrl('https://shop.example/product/phone-123/reviews/')).toBe(
      'https://shop.example/product/phone-123/reviews/?page=2'
    );
  });

  it('should increment an existing page and keep other parameters', () => {
    expect(deriveNextPageUrl('https://shop.example/product/phone-123/reviews/?sort=new&page=4')).toBe(
      'https://shop.example/product/phone-123/reviews/?sort=new&page=5'
    );
  });

  it('should return null for unusable input', () => {
    expect(deriveNextPageUrl('not a url')).toBeNull();
    expect(deriveNextPageUrl('https://shop.example/reviews/?page=abc')).toBeNull();
  });
});
