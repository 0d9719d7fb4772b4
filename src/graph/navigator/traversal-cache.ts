import { createComponentLogger } from '../../utils/logger';
import { TraversalResult } from './traversal-result';
import { CacheStats } from './types';

const logger = createComponentLogger('traversal-cache');

/**
 * LRU store of traversal results owned by a single navigator. Traversals are
 * synchronous, so each get/set runs to completion before any other caller
 * can touch the map.
 */
export class TraversalCache {
  private readonly entries = new Map<string, TraversalResult>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  get(key: string): TraversalResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry;
  }

  set(key: string, result: TraversalResult): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        logger.debug('Evicted least recently used traversal', { key: oldest.value });
      }
    }
    this.entries.set(key, result);
  }

  clear(): void {
    const cleared = this.entries.size;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    logger.debug('Traversal cache cleared', { cleared });
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }
}
