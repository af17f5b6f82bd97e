export const RECENT_ID_CAPACITY = 20;

/**
 * Bounded insertion-ordered id set; the oldest id is evicted first.
 * Re-adding an id moves it to the newest end.
 */
export class RecentIdWindow {
  private readonly ids: string[] = [];

  constructor(initial: Iterable<string> = [], readonly capacity = RECENT_ID_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.addAll(initial);
  }

  add(id: string): void {
    if (!id) return;
    const existing = this.ids.indexOf(id);
    if (existing !== -1) {
      this.ids.splice(existing, 1);
    }
    this.ids.push(id);
    if (this.ids.length > this.capacity) {
      this.ids.splice(0, this.ids.length - this.capacity);
    }
  }

  addAll(ids: Iterable<string>): void {
    for (const id of ids) {
      this.add(id);
    }
  }

  has(id: string): boolean {
    return this.ids.includes(id);
  }

  get size(): number {
    return this.ids.length;
  }

  /** Oldest first */
  toArray(): string[] {
    return [...this.ids];
  }
}
