import type { ElementHandle, Page } from 'puppeteer-core';
import type { ILogger } from '../core/interfaces';
import type { RawReviewFields } from '../core/types';
import { humanScroll } from '../utils/humanBehavior';
import { delay } from '../utils/delay';
import selectorData from './reviewSelectors.json';

export interface ReviewSelectorSet {
  container: string[];
  author: string[];
  rating: string[];
  date: string[];
  text: string[];
  likes: string[];
  dislikes: string[];
  noReviewsTexts: string[];
}

export const REVIEW_SELECTORS: ReviewSelectorSet = selectorData;

const HYDRATE_SCROLL_PX = 2400;

type ExtractedFields = {
  reviewId: string | null;
  author: string | null;
  rating: number | null;
  date: string | null;
  text: string | null;
  likes: number | null;
  dislikes: number | null;
};

/**
 * DOM review collector
 *
 * Finds review cards on the current listing page and reads their raw fields.
 * Each field tries its selector cascade first, then a structural fallback.
 */
export class ReviewElementCollector {
  readonly name = 'ReviewElementCollector';

  constructor(private readonly logger: ILogger, private readonly selectors: ReviewSelectorSet = REVIEW_SELECTORS) {}

  async listReviewElements(page: Page): Promise<ElementHandle<Element>[]> {
    // lazy-loaded cards only render once scrolled into view
    await this.hydrateCurrentPage(page);

    for (const selector of this.selectors.container) {
      const elements = await page.$$(selector);
      if (elements.length > 0) {
        this.logger.debug('Review cards found', { selector, count: elements.length });
        return elements;
      }
    }
    return [];
  }

  async extractFields(element: ElementHandle<Element>): Promise<RawReviewFields> {
    const fields: ExtractedFields = await element.evaluate((el: Element, sel: ReviewSelectorSet): ExtractedFields => {
      const textOf = (node: Element | null): string => (node?.textContent ?? '').replace(/\s+/g, ' ').trim();

      const firstText = (selectors: string[], minLength = 1): string | null => {
        for (const selector of selectors) {
          const node = el.querySelector(selector);
          if (!node) continue;
          const content = node.getAttribute('content');
          if (content && content.trim()) return content.trim();
          const text = textOf(node);
          if (text.length >= minLength) return text;
        }
        return null;
      };

      const firstCount = (selectors: string[]): number | null => {
        for (const selector of selectors) {
          const text = textOf(el.querySelector(selector)).replace(/\s/g, '');
          if (/^\d+$/.test(text)) return parseInt(text, 10);
        }
        return null;
      };

      let reviewId = el.getAttribute('data-review-uuid') || el.getAttribute('data-review-id');
      if (!reviewId) {
        let parent = el.parentElement;
        for (let i = 0; i < 3 && parent && !reviewId; i++) {
          reviewId = parent.getAttribute('data-review-uuid');
          parent = parent.parentElement;
        }
      }

      let author = firstText(sel.author);
      if (author) {
        // names often carry a trailing badge; keep the first two words
        author = author.split(' ').slice(0, 2).join(' ');
      }

      let rating: number | null = null;
      for (const selector of sel.rating) {
        const node = el.querySelector(selector);
        if (!node) continue;
        const raw = (node.getAttribute('content') ?? textOf(node)).replace(',', '.');
        const value = parseFloat(raw);
        if (Number.isFinite(value) && value > 0) {
          rating = Math.round(value);
          break;
        }
        const stars = node.querySelectorAll('svg[fill="#f9c000"], svg[fill="#ffb800"], svg[fill="#ff9900"], .filled').length;
        if (stars > 0) {
          rating = stars;
          break;
        }
      }
      if (rating === null) {
        let filled = 0;
        el.querySelectorAll('svg').forEach(svg => {
          const fill = (svg.getAttribute('fill') ?? '').toLowerCase();
          if (fill.includes('ff') || fill.includes('f9') || fill === 'gold' || fill === 'yellow') filled++;
        });
        rating = filled > 0 ? filled : null;
      }

      let date = firstText(sel.date);
      if (!date) {
        const datePattern = /\d{1,2}\s+[а-яё]+\s+\d{4}|\d{1,2}\.\d{1,2}\.\d{4}|\d{1,2}\/\d{1,2}\/\d{4}/i;
        for (const node of Array.from(el.querySelectorAll('*'))) {
          if (node.children.length > 0) continue;
          const match = textOf(node).match(datePattern);
          if (match) {
            date = match[0];
            break;
          }
        }
      }

      let text = firstText(sel.text, 6);
      if (!text) {
        let longest = '';
        const walker = document.createTreeWalker(el, NodeFilter.SHOW_TEXT);
        for (let node = walker.nextNode(); node; node = walker.nextNode()) {
          const candidate = (node.textContent ?? '').trim();
          if (candidate.length > 20 && candidate.length > longest.length) longest = candidate;
        }
        text = longest || null;
      }

      return {
        reviewId,
        author,
        rating,
        date,
        text,
        likes: firstCount(sel.likes),
        dislikes: firstCount(sel.dislikes),
      };
    }, this.selectors);

    return fields;
  }

  async hasNoReviewsIndicator(page: Page): Promise<boolean> {
    return page.evaluate((texts: string[]) => {
      const bodyText = document.body?.innerText ?? '';
      return texts.some(text => bodyText.includes(text));
    }, this.selectors.noReviewsTexts);
  }

  private async hydrateCurrentPage(page: Page): Promise<void> {
    await page.evaluate(() => window.scrollTo(0, 0));
    await humanScroll(page, HYDRATE_SCROLL_PX);
    await delay(150);
  }
}
