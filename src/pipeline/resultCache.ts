import type { AnnotationResult } from '../types';

/**
 * Fingerprint → result map. With `maxEntries` of 0 it never evicts; otherwise
 * the least recently used entry goes first.
 *
 * Results are copied on the way in and on the way out; a caller editing its
 * result never changes what later hits return.
 */
export class ResultCache {
  private entries = new Map<string, AnnotationResult>();

  constructor(private readonly maxEntries = 0) {
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): AnnotationResult | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    if (this.maxEntries > 0) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return structuredClone(value);
  }

  set(key: string, value: AnnotationResult): void {
    this.entries.delete(key);
    this.entries.set(key, structuredClone(value));
    if (this.maxEntries > 0) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
