/**
 * Human-like pointer and scroll movement
 *
 * Best-effort pacing only; it does not defeat bot detection.
 */

import type { Page } from 'puppeteer-core';
import { delay } from './delay';

interface Point {
  x: number;
  y: number;
}

/**
 * Point on a cubic bezier curve
 */
export function bezierPoint(t: number, p0: Point, p1: Point, p2: Point, p3: Point): Point {
  const u = 1 - t;
  return {
    x: u * u * u * p0.x + 3 * u * u * t * p1.x + 3 * u * t * t * p2.x + t * t * t * p3.x,
    y: u * u * u * p0.y + 3 * u * u * t * p1.y + 3 * u * t * t * p2.y + t * t * t * p3.y,
  };
}

/**
 * Moves the mouse along a randomized bezier curve
 */
export async function humanMouseMove(page: Page, from: Point, to: Point, steps = 25): Promise<void> {
  const cp1: Point = {
    x: from.x + (to.x - from.x) * 0.25 + (Math.random() - 0.5) * 100,
    y: from.y + (to.y - from.y) * 0.25 + (Math.random() - 0.5) * 100,
  };
  const cp2: Point = {
    x: from.x + (to.x - from.x) * 0.75 + (Math.random() - 0.5) * 100,
    y: from.y + (to.y - from.y) * 0.75 + (Math.random() - 0.5) * 100,
  };

  for (let i = 0; i <= steps; i++) {
    const pt = bezierPoint(i / steps, from, cp1, cp2, to);
    await page.mouse.move(pt.x, pt.y);
    await delay(10 + Math.random() * 15);
  }
}

/**
 * Scrolls in random 300-600px steps with occasional reading pauses
 */
export async function humanScroll(page: Page, totalDistance: number): Promise<void> {
  let scrolled = 0;

  while (scrolled < totalDistance) {
    const scrollAmount = 300 + Math.random() * 300;
    const actualScroll = Math.min(scrollAmount, totalDistance - scrolled);

    await page.evaluate((y: number) => window.scrollBy(0, y), actualScroll);
    scrolled += actualScroll;

    await delay(50 + Math.random() * 100);

    if (Math.random() < 0.03) {
      await delay(200 + Math.random() * 300);
    }
  }
}

/**
 * Wanders the pointer over the viewport before reading a page
 */
export async function humanGlance(page: Page): Promise<void> {
  const start: Point = { x: Math.random() * 150, y: Math.random() * 150 };
  const target: Point = { x: 350 + Math.random() * 500, y: 250 + Math.random() * 250 };
  await humanMouseMove(page, start, target);
  await delay(400 + Math.random() * 600);
}
