/**
 * Traversal state machine against a scripted fake adapter
 */

import { describe, it, expect, vi } from 'vitest';
import { TraversalController } from '../TraversalController';
import { ReviewNormalizer } from '../ReviewNormalizer';
import {
  AdapterTransientError,
  InvalidProductUrlError,
  ListingUnreachableError,
  TraversalTimeoutError,
} from '../errors';
import type { Sleep } from '../../utils/delay';
import { createSilentLogger } from '../../logging/logger';
import { FakeAdapter, LISTING_URL, PRODUCT_ID, PRODUCT_URL, rawReview, reviewPage, type FakeSiteOptions } from './helpers';

function setup(site: FakeSiteOptions, sleep: Sleep = async () => {}) {
  const adapter = new FakeAdapter(site);
  const adapterFactory = vi.fn(async () => adapter);
  const sleepSpy = vi.fn(sleep);
  const controller = new TraversalController({
    adapterFactory,
    logger: createSilentLogger(),
    pageDelay: { minMs: 1000, maxMs: 2000 },
    normalizer: new ReviewNormalizer({ clock: () => new Date('2024-02-01T00:00:00.000Z') }),
    sleep: sleepSpy,
    random: () => 0,
  });
  return { adapter, adapterFactory, controller, sleep: sleepSpy };
}

describe('TraversalController', () => {
  describe('termination', () => {
    it('should stop after P+1 fetches when page P+1 shows the no-reviews notice', async () => {
      const { adapter, controller, sleep } = setup({
        pages: [reviewPage('a', 2), reviewPage('b', 2), reviewPage('c', 2), { fields: [], noReviews: true }],
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.stopReason).toBe('exhausted');
      expect(run.pagesFetched).toBe(4);
      expect(adapter.fetches).toBe(4);
      expect(run.rawCollected).toHaveLength(6);
      expect(sleep).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
    });

    it('should stop as exhausted when there is no next page', async () => {
      const { controller } = setup({ pages: [reviewPage('a', 3), reviewPage('b', 1)] });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'incremental' });

      expect(run.stopReason).toBe('exhausted');
      expect(run.pagesFetched).toBe(2);
      expect(run.rawCollected.map(record => record.reviewId)).toEqual(['a-1', 'a-2', 'a-3', 'b-1']);
    });

    it('should stop with limitReached within one page of the cap', async () => {
      const { controller } = setup({
        pages: [reviewPage('a', 4), reviewPage('b', 4), reviewPage('c', 4), reviewPage('d', 4)],
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full', maxReviews: 6 });

      expect(run.stopReason).toBe('limitReached');
      expect(run.pagesFetched).toBe(2);
      expect(run.rawCollected).toHaveLength(8);
    });

    it('should stop on a page that only repeats earlier records', async () => {
      const page = reviewPage('a', 3);
      const { controller } = setup({ pages: [page, page, reviewPage('b', 2)] });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.stopReason).toBe('noRecordsOnPage');
      expect(run.pagesFetched).toBe(2);
      expect(run.rawCollected).toHaveLength(3);
    });

    it('should stop with noRecordsOnPage when every element is rejected', async () => {
      const { controller } = setup({
        pages: [{ fields: [rawReview('x', '01.01.2024', { text: 'коротко' })] }, reviewPage('b', 2)],
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.stopReason).toBe('noRecordsOnPage');
      expect(run.rawCollected).toEqual([]);
    });

    it('should report navigationFailed when next-page navigation throws', async () => {
      const { adapter, controller } = setup({
        pages: [reviewPage('a', 2), reviewPage('b', 2)],
        nextThrowsOnPage: 1,
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.stopReason).toBe('navigationFailed');
      expect(run.rawCollected).toHaveLength(2);
      expect(adapter.closeCount).toBe(1);
    });

    it('should count duplicate ids within a page once', async () => {
      const { controller } = setup({
        pages: [{ fields: [rawReview('a-1', '01.01.2024'), rawReview('a-1', '01.01.2024'), rawReview('a-2', '01.01.2024')] }],
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.rawCollected.map(record => record.reviewId)).toEqual(['a-1', 'a-2']);
    });
  });

  describe('page failures', () => {
    it('should abort the product when page 1 fails', async () => {
      const { adapter, controller } = setup({ pages: [{ fields: [], error: new Error('selector timeout') }] });

      await expect(controller.traverse(PRODUCT_URL, { mode: 'full' })).rejects.toBeInstanceOf(AdapterTransientError);
      expect(adapter.closeCount).toBe(1);
    });

    it('should treat a failing later page as empty and keep earlier records', async () => {
      const { adapter, controller } = setup({
        pages: [reviewPage('a', 2), { fields: [], error: new Error('detached frame') }, reviewPage('c', 2)],
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(run.stopReason).toBe('noRecordsOnPage');
      expect(run.pagesFetched).toBe(2);
      expect(run.rawCollected.map(record => record.reviewId)).toEqual(['a-1', 'a-2']);
      expect(adapter.closeCount).toBe(1);
    });
  });

  describe('opening the listing', () => {
    it('should open the direct listing URL first', async () => {
      const { adapter, controller } = setup({ pages: [reviewPage('a', 1)] });

      await controller.traverse(`${PRODUCT_URL}?from=search`, { mode: 'full' });

      expect(adapter.opened).toEqual([LISTING_URL]);
      expect(adapter.tabActivations).toBe(0);
    });

    it('should fall back to the product page and its reviews tab', async () => {
      const { adapter, controller } = setup({
        pages: [reviewPage('a', 1)],
        openOutcome: url => (url === LISTING_URL ? { ok: false, reason: 'HTTP 404' } : { ok: true }),
      });

      const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(adapter.opened).toEqual([LISTING_URL, PRODUCT_URL]);
      expect(adapter.tabActivations).toBe(1);
      expect(run.rawCollected).toHaveLength(1);
    });

    it('should treat a throwing open like a failed one', async () => {
      const { adapter, controller } = setup({
        pages: [reviewPage('a', 1)],
        openOutcome: url => (url === LISTING_URL ? new Error('net::ERR_CONNECTION_RESET') : { ok: true }),
      });

      await controller.traverse(PRODUCT_URL, { mode: 'full' });

      expect(adapter.tabActivations).toBe(1);
    });

    it('should fail with ListingUnreachableError when both routes fail', async () => {
      const { adapter, controller } = setup({
        pages: [reviewPage('a', 1)],
        openOutcome: () => ({ ok: false, reason: 'access restricted' }),
      });

      await expect(controller.traverse(PRODUCT_URL, { mode: 'full' })).rejects.toBeInstanceOf(ListingUnreachableError);
      expect(adapter.closeCount).toBe(1);
    });

    it('should fail with ListingUnreachableError when the reviews tab is missing', async () => {
      const { controller } = setup({
        pages: [reviewPage('a', 1)],
        openOutcome: url => (url === LISTING_URL ? { ok: false, reason: 'HTTP 404' } : { ok: true }),
        tabOutcome: { ok: false, reason: 'reviews tab not found' },
      });

      await expect(controller.traverse(PRODUCT_URL, { mode: 'full' })).rejects.toThrow(
        `Review listing unreachable for product ${PRODUCT_ID}: reviews tab: reviews tab not found`
      );
    });
  });

  describe('product id', () => {
    it('should reject a URL without a product id before acquiring an adapter', async () => {
      const { adapterFactory, controller } = setup({ pages: [] });

      await expect(controller.traverse('https://shop.example/category/phones/', { mode: 'full' })).rejects.toBeInstanceOf(
        InvalidProductUrlError
      );
      expect(adapterFactory).not.toHaveBeenCalled();
    });

    it('should resolve ids from both URL shapes', () => {
      const { controller } = setup({ pages: [] });
      expect(controller.resolveProductId(PRODUCT_URL)).toBe(PRODUCT_ID);
      expect(controller.resolveProductId('https://shop.example/item?id=777')).toBe('777');
    });
  });

  describe('abort', () => {
    it('should not start when the signal is already aborted', async () => {
      const { adapterFactory, controller } = setup({ pages: [reviewPage('a', 1)] });
      const abort = new AbortController();
      abort.abort();

      await expect(controller.traverse(PRODUCT_URL, { mode: 'full', signal: abort.signal })).rejects.toBeInstanceOf(
        TraversalTimeoutError
      );
      expect(adapterFactory).not.toHaveBeenCalled();
    });

    it('should stop between pages and close the adapter', async () => {
      const abort = new AbortController();
      const { adapter, controller } = setup({ pages: [reviewPage('a', 1), reviewPage('b', 1)] }, async () => {
        abort.abort();
      });

      await expect(controller.traverse(PRODUCT_URL, { mode: 'full', signal: abort.signal })).rejects.toBeInstanceOf(
        TraversalTimeoutError
      );
      expect(adapter.fetches).toBe(1);
      expect(adapter.closeCount).toBe(1);
    });
  });

  it('should fail when the signal aborts during the last page', async () => {
    const abort = new AbortController();
    const { adapter, controller } = setup({ pages: [reviewPage('a', 2)] });
    vi.spyOn(adapter, 'goToNextPage').mockImplementationOnce(async () => {
      abort.abort();
      return { ok: false, reason: 'last page' };
    });

    await expect(controller.traverse(PRODUCT_URL, { mode: 'full', signal: abort.signal })).rejects.toBeInstanceOf(
      TraversalTimeoutError
    );
    expect(adapter.closeCount).toBe(1);
  });

  it('should still return the run when closing the adapter fails', async () => {
    const { adapter, controller } = setup({ pages: [reviewPage('a', 1)] });
    vi.spyOn(adapter, 'close').mockRejectedValueOnce(new Error('target closed'));

    const run = await controller.traverse(PRODUCT_URL, { mode: 'full' });

    expect(run.stopReason).toBe('exhausted');
  });
});
