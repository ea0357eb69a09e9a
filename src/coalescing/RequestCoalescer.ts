import { CacheStats, CacheStatsManager } from '../CacheStats';
import { CancelledError } from '../errors/CatalogError';
import { raceWithSignal } from '../utils/abort';
import LibLogger from '../logger';

const logger = LibLogger.get('RequestCoalescer');

export type Producer<V> = (signal: AbortSignal) => Promise<V>;

export interface CoalesceOptions {
  /** Overrides the coalescer's default TTL for this key */
  ttlMs?: number;
}

export interface RequestCoalescerOptions {
  defaultTtlMs: number;
  /** Name used in logs and statistics */
  name?: string;
  now?: () => number;
}

interface CacheEntry<V> {
  value: V;
  storedAt: number;
  ttlMs: number;
}

interface PendingCycle<V> {
  promise: Promise<V>;
  controller: AbortController;
}

/**
 * Short-lived in-memory cache that shares one in-flight produce cycle between all
 * callers of the same key.
 *
 * The check-cache, check-pending and register-pending steps in coalesce() run without
 * an await between them, so two callers can never both start a producer for one key.
 *
 * Cancelling is per key, not per caller: cancel() aborts the shared producer and every
 * waiter on that cycle receives a CancelledError.
 */
export class RequestCoalescer<K, V> {
  private readonly cache = new Map<K, CacheEntry<V>>();
  private readonly pending = new Map<K, PendingCycle<V>>();
  private readonly statsManager: CacheStatsManager;
  private readonly now: () => number;
  private readonly name: string;

  public constructor(private readonly options: RequestCoalescerOptions) {
    if (!(options.defaultTtlMs > 0)) {
      throw new Error(`defaultTtlMs must be positive, got ${options.defaultTtlMs}`);
    }
    this.name = options.name ?? 'coalescer';
    this.now = options.now ?? Date.now;
    this.statsManager = new CacheStatsManager(this.name);
  }

  public coalesce(key: K, producer: Producer<V>, coalesceOptions: CoalesceOptions = {}): Promise<V> {
    this.statsManager.incrementRequests();

    const entry = this.cache.get(key);
    if (entry) {
      if (this.isValid(entry)) {
        logger.debug('Cache hit', { name: this.name, key });
        this.statsManager.incrementHits();
        return Promise.resolve(entry.value);
      }
      this.cache.delete(key);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      logger.debug('Joining in-flight request', { name: this.name, key });
      this.statsManager.incrementCoalesced();
      return inFlight.promise;
    }

    logger.debug('Cache miss, starting request', { name: this.name, key });
    this.statsManager.incrementMisses();

    const ttlMs = coalesceOptions.ttlMs ?? this.options.defaultTtlMs;
    const controller = new AbortController();
    const promise = this.runCycle(key, producer, controller, ttlMs);
    this.pending.set(key, { promise, controller });

    const release = () => {
      if (this.pending.get(key)?.controller === controller) {
        this.pending.delete(key);
      }
    };
    promise.then(release, release);

    return promise;
  }

  private async runCycle(key: K, producer: Producer<V>, controller: AbortController, ttlMs: number): Promise<V> {
    let value: V;
    try {
      value = await raceWithSignal(producer(controller.signal), controller.signal);
    } catch (error) {
      this.statsManager.incrementFailures();
      if (controller.signal.aborted) {
        logger.debug('Request cancelled', { name: this.name, key });
        throw new CancelledError();
      }
      logger.debug('Request failed', { name: this.name, key, error });
      throw error;
    }

    if (controller.signal.aborted) {
      this.statsManager.incrementFailures();
      throw new CancelledError();
    }

    // An invalidated cycle is no longer registered and must not repopulate the cache
    if (this.pending.get(key)?.controller === controller) {
      this.cache.set(key, { value, storedAt: this.now(), ttlMs });
      logger.trace('Cached value', { name: this.name, key, ttlMs });
    }
    return value;
  }

  private isValid(entry: CacheEntry<V>): boolean {
    return this.now() - entry.storedAt < entry.ttlMs;
  }

  /**
   * Drop the cached value and detach any in-flight cycle for `key`. A detached cycle
   * still settles for its current waiters but its value is not cached.
   */
  public invalidate(key: K): void {
    logger.debug('invalidate', { name: this.name, key });
    this.cache.delete(key);
    this.pending.delete(key);
  }

  public invalidateAll(): void {
    logger.debug('invalidateAll', { name: this.name, cached: this.cache.size, pending: this.pending.size });
    this.cache.clear();
    this.pending.clear();
  }

  /**
   * Remove expired cache entries only; returns how many were removed.
   */
  public clearExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (!this.isValid(entry)) {
        this.cache.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('Cleared expired entries', { name: this.name, removed });
    }
    return removed;
  }

  /**
   * Abort the shared producer for `key`; all of its waiters reject with CancelledError.
   */
  public cancel(key: K): boolean {
    const cycle = this.pending.get(key);
    if (!cycle) {
      return false;
    }
    this.pending.delete(key);
    cycle.controller.abort();
    return true;
  }

  public cancelAll(): void {
    const cycles = Array.from(this.pending.values());
    this.pending.clear();
    cycles.forEach(cycle => cycle.controller.abort());
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public get cacheCount(): number {
    return this.cache.size;
  }

  public getStats(): CacheStats {
    return this.statsManager.getStats();
  }
}
