import { isCancellation } from '../errors/CatalogError';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheFirstFetcher');

export interface CacheFirstSource<T> {
  /** Cached value, or null when there is nothing usable */
  readCache: () => T | null | Promise<T | null>;
  fetchNetwork: () => Promise<T>;
  writeCache: (data: T) => Promise<void>;
  /** Name used in logs */
  name?: string;
}

export interface CacheFirstResult<T> {
  data: T;
  fromCache: boolean;
}

export interface CacheFirstFetchOptions {
  forceRefresh?: boolean;
}

/**
 * Stale-while-revalidate over an arbitrary cache and network source: cached data is
 * returned at once while a background refresh updates the cache. At most one
 * background refresh runs at a time.
 */
export class CacheFirstFetcher<T> {
  private backgroundRefresh: Promise<void> | null = null;
  private readonly name: string;

  public constructor(private readonly source: CacheFirstSource<T>) {
    this.name = source.name ?? 'cache-first';
  }

  public async fetch(options: CacheFirstFetchOptions = {}): Promise<CacheFirstResult<T>> {
    if (!options.forceRefresh) {
      const cached = await this.source.readCache();
      if (cached !== null) {
        logger.debug('Serving cached data, refreshing in background', { name: this.name });
        this.startBackgroundRefresh();
        return { data: cached, fromCache: true };
      }
    }

    try {
      const data = await this.source.fetchNetwork();
      await this.source.writeCache(data);
      return { data, fromCache: false };
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      const cached = await this.source.readCache();
      if (cached !== null) {
        logger.warning('Network failed, serving cached data', { name: this.name, error });
        return { data: cached, fromCache: true };
      }
      throw error;
    }
  }

  /**
   * Resolves once no background refresh is running.
   */
  public async whenIdle(): Promise<void> {
    while (this.backgroundRefresh) {
      await this.backgroundRefresh;
    }
  }

  public get isRefreshing(): boolean {
    return this.backgroundRefresh !== null;
  }

  private startBackgroundRefresh(): void {
    if (this.backgroundRefresh) {
      logger.trace('Background refresh already running', { name: this.name });
      return;
    }
    this.backgroundRefresh = this.refresh().finally(() => {
      this.backgroundRefresh = null;
    });
  }

  private async refresh(): Promise<void> {
    try {
      const fresh = await this.source.fetchNetwork();
      await this.source.writeCache(fresh);
      logger.debug('Background refresh complete', { name: this.name });
    } catch (error) {
      logger.warning('Background refresh failed', { name: this.name, error });
    }
  }
}
