/**
 * LRU memoisation of text layouts.
 * Keyed on (text, width, policy); a hit returns the same spans computeLines()
 * would produce, so caching never changes results.
 * Uses Map's insertion order for O(1) recency updates.
 */

import { computeLines, type LineSpan, type WrapPolicy } from './text-layout.ts';

export interface LayoutCacheStats {
  hits: number;
  misses: number;
  size: number;
}

export class LayoutCache {
  private readonly _entries = new Map<string, readonly LineSpan[]>();
  private readonly _maxSize: number;
  private _hits = 0;
  private _misses = 0;

  constructor(maxSize: number) {
    if (maxSize < 1) {
      throw new Error('LayoutCache maxSize must be at least 1');
    }
    this._maxSize = maxSize;
  }

  /**
   * Get the lines for a layout, computing and storing them on a miss.
   * Reserved policies throw before anything is stored.
   */
  getLines(text: string, width: number, policy: WrapPolicy): readonly LineSpan[] {
    const key = `${policy}\u0000${width}\u0000${text}`;
    const cached = this._entries.get(key);
    if (cached !== undefined) {
      // Move to end for LRU behavior (delete and re-add)
      this._entries.delete(key);
      this._entries.set(key, cached);
      this._hits++;
      return cached;
    }

    this._misses++;
    const lines = Object.freeze(computeLines(text, width, policy));
    this._entries.set(key, lines);

    while (this._entries.size > this._maxSize) {
      const oldestKey = this._entries.keys().next().value;
      if (oldestKey === undefined) break;
      this._entries.delete(oldestKey);
    }

    return lines;
  }

  clear(): void {
    this._entries.clear();
    this._hits = 0;
    this._misses = 0;
  }

  get size(): number {
    return this._entries.size;
  }

  get maxSize(): number {
    return this._maxSize;
  }

  getStats(): LayoutCacheStats {
    return { hits: this._hits, misses: this._misses, size: this._entries.size };
  }
}
