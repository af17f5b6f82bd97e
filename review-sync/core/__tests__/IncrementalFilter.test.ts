import { describe, it, expect } from 'vitest';
import { filterNewReviews, isNewReview, resolveEffectiveMode } from '../IncrementalFilter';
import { makeRecord } from './helpers';

const watermark = { lastReviewDate: '2024-01-10', recentReviewIds: ['r1', 'r2'] };

const incoming = [
  makeRecord({ reviewId: 'r1', publishedAt: '2024-01-09' }),
  makeRecord({ reviewId: 'r3', publishedAt: '2024-01-12' }),
  makeRecord({ reviewId: 'r4', publishedAt: '2024-01-05', dateUnreliable: true }),
];

describe('filterNewReviews', () => {
  it('should keep r3 and r4 and drop r1', () => {
    const accepted = filterNewReviews(incoming, watermark, 'incremental');
    expect(accepted.map(record => record.reviewId)).toEqual(['r3', 'r4']);
  });

  it('should pass everything through in full mode', () => {
    expect(filterNewReviews(incoming, watermark, 'full')).toEqual(incoming);
  });

  it('should pass everything through when there is no baseline date', () => {
    expect(filterNewReviews(incoming, null, 'incremental')).toEqual(incoming);
    expect(filterNewReviews(incoming, { lastReviewDate: null, recentReviewIds: ['r1'] }, 'incremental')).toEqual(
      incoming
    );
  });

  it('should return a subset of the full-mode output', () => {
    const records = [
      ...incoming,
      makeRecord({ reviewId: 'r2', publishedAt: '2024-01-11' }),
      makeRecord({ reviewId: 'r5', publishedAt: '2024-01-10' }),
      makeRecord({ reviewId: 'r6', publishedAt: '2023-12-31' }),
    ];
    const full = filterNewReviews(records, watermark, 'full');
    const incremental = filterNewReviews(records, watermark, 'incremental');

    for (const record of incremental) {
      expect(full).toContain(record);
    }
    expect(incremental.map(record => record.reviewId)).toEqual(['r3', 'r4', 'r5']);
  });

  it('should not depend on input order', () => {
    const reversed = [...incoming].reverse();
    const accepted = filterNewReviews(reversed, watermark, 'incremental').map(record => record.reviewId);
    expect(accepted.sort()).toEqual(['r3', 'r4']);
  });

  it('should not mutate its input', () => {
    const input = [...incoming];
    filterNewReviews(input, watermark, 'incremental');
    expect(input).toEqual(incoming);
  });
});

describe('isNewReview', () => {
  const recent = new Set(watermark.recentReviewIds);

  it('should reject a known id even with a newer date', () => {
    expect(isNewReview(makeRecord({ reviewId: 'r2', publishedAt: '2024-02-01' }), watermark, recent)).toBe(false);
  });

  it('should accept a record dated on the watermark day', () => {
    expect(isNewReview(makeRecord({ reviewId: 'r9', publishedAt: '2024-01-10' }), watermark, recent)).toBe(true);
  });

  it('should judge synthetic ids by date only', () => {
    const synthetic = makeRecord({ reviewId: 'r1', idSynthetic: true, publishedAt: '2024-01-11' });
    expect(isNewReview(synthetic, watermark, recent)).toBe(true);

    const oldSynthetic = makeRecord({ reviewId: 'x-syn-1', idSynthetic: true, publishedAt: '2024-01-01' });
    expect(isNewReview(oldSynthetic, watermark, recent)).toBe(false);
  });
});

describe('resolveEffectiveMode', () => {
  it('should force full when there is no baseline', () => {
    expect(resolveEffectiveMode('incremental', null)).toBe('full');
    expect(resolveEffectiveMode('incremental', { lastReviewDate: null, recentReviewIds: [] })).toBe('full');
  });

  it('should keep the requested mode otherwise', () => {
    expect(resolveEffectiveMode('incremental', watermark)).toBe('incremental');
    expect(resolveEffectiveMode('full', watermark)).toBe('full');
  });
});
