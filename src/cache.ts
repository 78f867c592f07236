import { LRUCache } from 'lru-cache';
import { logger } from './logging/index.js';
import type { BoardItem, BoardMetadata, BoardSchema } from './monday-types.js';

// ============================================
// LRU CACHE WITH FRESHNESS WINDOW
// ============================================

/** Entries older than this are refetched. */
export const FRESHNESS_WINDOW_MS = 5 * 60 * 1000;

const MAX_ENTRIES = 100;

interface CacheEntry<T> {
  data: T;
  fetchedAt: number;
}

export interface CacheOptions {
  name: string;
  ttlMs?: number;
  max?: number;
  /** Injectable clock */
  now?: () => number;
}

export interface CacheStoreStats {
  size: number;
  max: number;
  hits: number;
  misses: number;
}

export class TimedCache<T> {
  readonly name: string;
  private store: LRUCache<string, CacheEntry<T>>;
  private ttlMs: number;
  private now: () => number;
  private hits = 0;
  private misses = 0;
  /** Bumped by every invalidation; a fetch started under an older generation is not stored. */
  private generation = 0;

  constructor(options: CacheOptions) {
    this.name = options.name;
    this.ttlMs = options.ttlMs ?? FRESHNESS_WINDOW_MS;
    this.now = options.now ?? Date.now;

    // Freshness is checked against fetchedAt; lru-cache only bounds the size
    this.store = new LRUCache<string, CacheEntry<T>>({ max: options.max ?? MAX_ENTRIES });
  }

  /** A fresh entry, or undefined. Stale entries are evicted on the way. */
  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.store.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: T): void {
    this.store.set(key, { data, fetchedAt: this.now() });
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Serve a fresh entry, or run `fetchFn` and store its result. A rejected
   * fetch stores nothing, and neither does one overtaken by `invalidate()`.
   */
  async getOrFetch(key: string, fetchFn: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.hits++;
      logger.debug('Cache hit', { store: this.name, key }, 'cache');
      return cached;
    }

    this.misses++;
    logger.debug('Cache miss', { store: this.name, key }, 'cache');
    const startedAt = this.generation;
    const data = await fetchFn();
    if (this.generation === startedAt) {
      this.set(key, data);
    } else {
      logger.debug('Discarded fetch overtaken by invalidation', { store: this.name, key }, 'cache');
    }
    return data;
  }

  /** Drop one key, or everything when no key is given. */
  invalidate(key?: string): void {
    this.generation++;
    if (key === undefined) {
      this.store.clear();
    } else {
      this.store.delete(key);
    }
  }

  getStats(): CacheStoreStats {
    return { size: this.store.size, max: this.store.max, hits: this.hits, misses: this.misses };
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.fetchedAt >= this.ttlMs;
  }
}

// ============================================
// BOARD CACHE
// ============================================

export type CacheScope = 'all' | 'schema' | 'items' | 'metadata';

export class BoardCache {
  readonly schema: TimedCache<BoardSchema>;
  readonly items: TimedCache<BoardItem[]>;
  readonly item: TimedCache<BoardItem>;
  readonly metadata: TimedCache<BoardMetadata>;
  private ttlMs: number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? FRESHNESS_WINDOW_MS;
    const shared = { ttlMs: this.ttlMs, now: options.now };

    this.schema = new TimedCache<BoardSchema>({ name: 'schema', ...shared });
    this.items = new TimedCache<BoardItem[]>({ name: 'items', ...shared });
    this.item = new TimedCache<BoardItem>({ name: 'item', ...shared });
    this.metadata = new TimedCache<BoardMetadata>({ name: 'metadata', ...shared });
  }

  /** Everything derived from items; schema and metadata survive item writes. */
  invalidateItems(): void {
    this.items.invalidate();
    this.item.invalidate();
    logger.debug('Invalidated item caches', undefined, 'cache');
  }

  invalidateAll(): void {
    this.schema.invalidate();
    this.items.invalidate();
    this.item.invalidate();
    this.metadata.invalidate();
    logger.info('Invalidated all caches', undefined, 'cache');
  }

  invalidate(scope: CacheScope): void {
    switch (scope) {
      case 'all':
        this.invalidateAll();
        break;
      case 'items':
        this.invalidateItems();
        break;
      case 'schema':
        this.schema.invalidate();
        break;
      case 'metadata':
        this.metadata.invalidate();
        break;
    }
  }

  getStats() {
    const stores = {
      schema: this.schema.getStats(),
      items: this.items.getStats(),
      item: this.item.getStats(),
      metadata: this.metadata.getStats(),
    };
    const totals = Object.values(stores).reduce(
      (acc, s) => ({ hits: acc.hits + s.hits, misses: acc.misses + s.misses }),
      { hits: 0, misses: 0 }
    );

    return {
      ttl_seconds: this.ttlMs / 1000,
      hits: totals.hits,
      misses: totals.misses,
      stores,
    };
  }
}
