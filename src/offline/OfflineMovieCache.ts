import { CACHE_CATEGORIES, CacheCategory, CachedItem, CATEGORY_TTL_MS, CategoryIndex, isExpired } from './CacheCategory';
import { selectOldest } from './FIFOEviction';
import { OfflineCacheStore, OfflineSnapshot } from './OfflineCacheStore';
import { CatalogItem } from '../model/CatalogItem';
import { estimateValueSize, formatBytes } from '../utils/CacheSize';
import LibLogger from '../logger';

const logger = LibLogger.get('OfflineMovieCache');

export interface OfflineMovieCacheOptions {
  maxMemoryEntries: number;
  /** TTL for items cached without a category */
  defaultTtlMs: number;
  now?: () => number;
}

export interface OfflineCacheStats {
  totalItems: number;
  validItems: number;
  expiredItems: number;
  categoryCounts: Partial<Record<CacheCategory, number>>;
  approximateBytes: number;
  formattedSize: string;
}

/**
 * Longer-lived, persisted cache of catalog items indexed by category.
 *
 * Absence is never an error: lookups return null or an empty list. Persistence
 * failures are logged and absorbed, and writes to the store are queued so two saves
 * never interleave.
 */
export class OfflineMovieCache {
  private readonly entries = new Map<number, CachedItem>();
  private readonly index: CategoryIndex = new Map();
  private readonly now: () => number;
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly store: OfflineCacheStore,
    private readonly options: OfflineMovieCacheOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Replace the in-memory state with what the store holds.
   */
  public async load(): Promise<void> {
    let snapshot: OfflineSnapshot;
    try {
      snapshot = await this.store.load();
    } catch (error) {
      logger.error('Failed to load offline cache, starting empty', { error });
      return;
    }

    this.entries.clear();
    this.index.clear();
    for (const entry of snapshot.entries) {
      this.entries.set(entry.item.id, entry);
    }
    for (const category of CACHE_CATEGORIES) {
      const ids = snapshot.index[category];
      if (ids) {
        this.index.set(category, [...ids]);
      }
    }
    this.trimIfNeeded();
    logger.debug('Offline cache loaded', { items: this.entries.size, categories: this.index.size });
  }

  /**
   * Cache one item. The id is appended to the category index when missing.
   * Not persisted until the next save point.
   */
  public cache(item: CatalogItem, category?: CacheCategory): void {
    this.put(item, category);
    if (category) {
      const ids = this.index.get(category) ?? [];
      if (!ids.includes(item.id)) {
        ids.push(item.id);
      }
      this.index.set(category, ids);
    }
    this.trimIfNeeded();
  }

  /**
   * Cache a full result set for a category. The category index becomes exactly these
   * ids, in order, and the cache is persisted.
   */
  public async cacheMany(items: readonly CatalogItem[], category: CacheCategory): Promise<void> {
    logger.default('cacheMany', { category, count: items.length });
    const ids: number[] = [];
    for (const item of items) {
      this.put(item, category);
      if (!ids.includes(item.id)) {
        ids.push(item.id);
      }
    }
    this.index.set(category, ids);
    this.trimIfNeeded();
    await this.persist();
  }

  private put(item: CatalogItem, category?: CacheCategory): void {
    const cachedAt = this.now();
    const ttlMs = category ? CATEGORY_TTL_MS[category] : this.options.defaultTtlMs;
    // Re-inserting moves the entry to the end of the insertion order
    this.entries.delete(item.id);
    this.entries.set(item.id, { item, cachedAt, expiresAt: cachedAt + ttlMs });
  }

  /**
   * The item when present and unexpired; an expired entry is removed.
   */
  public get(id: number): CatalogItem | null {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    if (isExpired(entry, this.now())) {
      logger.trace('Evicting expired item on access', { id });
      this.entries.delete(id);
      return null;
    }
    return entry.item;
  }

  /**
   * Valid items of a category in index order
   */
  public getItems(category: CacheCategory): CatalogItem[] {
    const ids = this.index.get(category) ?? [];
    const items: CatalogItem[] = [];
    for (const id of ids) {
      const item = this.get(id);
      if (item) {
        items.push(item);
      }
    }
    return items;
  }

  /**
   * True only when more than half of the category's indexed ids are still valid.
   */
  public hasCachedData(category: CacheCategory): boolean {
    const ids = this.index.get(category);
    if (!ids || ids.length === 0) {
      return false;
    }
    const now = this.now();
    const validCount = ids.filter(id => {
      const entry = this.entries.get(id);
      return entry !== undefined && !isExpired(entry, now);
    }).length;
    return validCount > Math.floor(ids.length / 2);
  }

  /**
   * Drop expired items, remove them from every category index and persist.
   */
  public async clearExpired(): Promise<number> {
    const now = this.now();
    const expired = new Set<number>();
    for (const [id, entry] of this.entries) {
      if (isExpired(entry, now)) {
        expired.add(id);
      }
    }
    expired.forEach(id => this.entries.delete(id));
    for (const [category, ids] of this.index) {
      this.index.set(category, ids.filter(id => !expired.has(id)));
    }
    logger.debug('Cleared expired offline entries', { removed: expired.size });
    await this.persist();
    return expired.size;
  }

  public async clearAll(): Promise<void> {
    logger.default('clearAll');
    this.entries.clear();
    this.index.clear();
    await this.enqueue('clear', () => this.store.clear());
  }

  /**
   * Persist the current state now.
   */
  public async flush(): Promise<void> {
    await this.persist();
  }

  public getStats(): OfflineCacheStats {
    const now = this.now();
    let expiredItems = 0;
    let approximateBytes = 0;
    for (const entry of this.entries.values()) {
      if (isExpired(entry, now)) {
        expiredItems++;
      }
      approximateBytes += estimateValueSize(entry);
    }
    const categoryCounts: Partial<Record<CacheCategory, number>> = {};
    for (const [category, ids] of this.index) {
      categoryCounts[category] = ids.length;
    }
    return {
      totalItems: this.entries.size,
      validItems: this.entries.size - expiredItems,
      expiredItems,
      categoryCounts,
      approximateBytes,
      formattedSize: formatBytes(approximateBytes)
    };
  }

  public get size(): number {
    return this.entries.size;
  }

  private trimIfNeeded(): void {
    const excess = this.entries.size - this.options.maxMemoryEntries;
    if (excess <= 0) {
      return;
    }
    const evicted = selectOldest(this.entries.entries(), excess);
    evicted.forEach(id => this.entries.delete(id));
    logger.debug('Evicted oldest offline entries', { evicted: evicted.length, maxMemoryEntries: this.options.maxMemoryEntries });
  }

  private snapshot(): OfflineSnapshot {
    const index: OfflineSnapshot['index'] = {};
    for (const [category, ids] of this.index) {
      index[category] = [...ids];
    }
    return { entries: Array.from(this.entries.values()), index };
  }

  private persist(): Promise<void> {
    const snapshot = this.snapshot();
    return this.enqueue('save', () => this.store.save(snapshot));
  }

  private enqueue(operation: string, task: () => Promise<void>): Promise<void> {
    this.writeQueue = this.writeQueue.then(task).catch((error: unknown) => {
      logger.error('Offline cache persistence failed', { operation, error });
    });
    return this.writeQueue;
  }
}
