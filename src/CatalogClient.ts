import * as path from 'path';
import { BatchRequestManager } from './batch/BatchRequestManager';
import { CatalogRequestCoalescer, CatalogCoalescerStats } from './coalescing/CatalogRequestCoalescer';
import { CatalogError } from './errors/CatalogError';
import { ApiKeyProvider } from './http/ApiKeyProvider';
import { CatalogApi } from './http/CatalogApi';
import { CatalogHttpClient, FetchFunction, SleepFunction } from './http/CatalogHttpClient';
import { CredentialStore, FileCredentialStore, MemoryCredentialStore } from './http/CredentialStore';
import { MovieListKind, MoviePage } from './http/Endpoint';
import { RandomSource } from './http/RetryPolicy';
import { CatalogItem } from './model/CatalogItem';
import { MovieDetails, VideoResponse } from './model/CatalogDetails';
import { WatchProviders } from './model/WatchProviders';
import { CacheFirstFetcher, CacheFirstResult } from './offline/CacheFirstFetcher';
import { FileCacheStore, MemoryCacheStore, OfflineCacheStore } from './offline/OfflineCacheStore';
import {
  DEFAULT_OFFLINE_LISTS,
  OfflineDownloader,
  OfflineDownloadOptions,
  OfflineDownloadResult,
  OfflineStatus
} from './offline/OfflineDownloader';
import { OfflineCacheStats, OfflineMovieCache } from './offline/OfflineMovieCache';
import { createOptions, Options, OptionsInput } from './Options';
import { InteractionAction } from './recommendation/Interaction';
import { FilePreferenceStore, MemoryPreferenceStore, PreferenceStore } from './recommendation/PreferenceStore';
import { RecommendationScorer } from './recommendation/RecommendationScorer';
import { SearchDebouncer } from './search/SearchDebouncer';
import { raceWithSignal, sleep } from './utils/abort';
import LibLogger from './logger';

const logger = LibLogger.get('CatalogClient');

/**
 * Replaceable collaborators. Anything left out is built from the options: file
 * stores under `storageDirectory` when it is set, in-memory stores otherwise.
 */
export interface CatalogClientDeps {
  fetch?: FetchFunction;
  credentialStore?: CredentialStore;
  offlineStore?: OfflineCacheStore;
  preferenceStore?: PreferenceStore;
  now?: () => number;
  random?: RandomSource;
  sleep?: SleepFunction;
}

export interface CatalogClientStats {
  coalescers: CatalogCoalescerStats;
  offline: OfflineCacheStats;
}

const pageOf = (items: CatalogItem[]): MoviePage => ({
  page: 1,
  results: items,
  totalPages: 1,
  totalResults: items.length
});

/**
 * Everything wired together: coalesced and retried remote access, the offline cache
 * as fallback, debounced search and recommendation scoring.
 */
export class CatalogClient {
  private readonly cacheFirstFetchers = new Map<MovieListKind, CacheFirstFetcher<CatalogItem[]>>();

  public constructor(
    public readonly options: Options,
    public readonly apiKeys: ApiKeyProvider,
    public readonly api: CatalogApi,
    public readonly coalescer: CatalogRequestCoalescer,
    public readonly offline: OfflineMovieCache,
    public readonly debouncer: SearchDebouncer,
    public readonly batch: BatchRequestManager,
    public readonly scorer: RecommendationScorer,
    public readonly downloader: OfflineDownloader
  ) { }

  /**
   * Load persisted state (offline cache and preference profile).
   */
  public async init(): Promise<void> {
    await Promise.all([this.offline.load(), this.scorer.load()]);
  }

  /**
   * A page of a list, shared with concurrent callers. First pages are written to the
   * offline cache; when the remote is unreachable the offline copy is served in place
   * of a first page, provided most of it is still valid. Later pages have no offline
   * copy and fail.
   */
  public async getList(kind: MovieListKind, page = 1): Promise<CacheFirstResult<MoviePage>> {
    logger.default('getList', { kind, page });
    try {
      const response = await this.fetchListPage(kind, page);
      if (page === 1) {
        await this.offline.cacheMany(response.results, kind);
      }
      return { data: response, fromCache: false };
    } catch (error) {
      if (page === 1 && error instanceof CatalogError && error.isRetryable && this.offline.hasCachedData(kind)) {
        logger.warning('Serving offline copy after network failure', { kind, errorKind: error.kind });
        return { data: pageOf(this.offline.getItems(kind)), fromCache: true };
      }
      throw error;
    }
  }

  /**
   * First page of a list from the offline cache when usable, refreshed in the background.
   */
  public getListCacheFirst(kind: MovieListKind, forceRefresh = false): Promise<CacheFirstResult<CatalogItem[]>> {
    return this.cacheFirstFetcher(kind).fetch({ forceRefresh });
  }

  public async search(query: string, page = 1): Promise<MoviePage> {
    const response = await this.debouncer.search(query, page);
    if (page === 1 && response.results.length > 0) {
      await this.offline.cacheMany(response.results, 'search');
    }
    return response;
  }

  public getDetails(id: number): Promise<MovieDetails> {
    return this.coalescer.getDetails(id, signal => this.api.getMovieDetails(id, { signal }));
  }

  public getVideos(id: number): Promise<VideoResponse> {
    return this.coalescer.getVideos(id, signal => this.api.getVideos(id, { signal }));
  }

  /**
   * Details for many ids, fetched in paced chunks. Results follow the order of `ids`.
   * Aborting `signal` rejects at once; the coalesced fetches themselves keep running
   * for other callers.
   */
  public getDetailsBatch(ids: readonly number[], signal?: AbortSignal): Promise<MovieDetails[]> {
    return this.batch.fetchBatch(ids, (id, itemSignal) => raceWithSignal(this.getDetails(id), itemSignal), { signal });
  }

  public getWatchProviders(movieId: number): Promise<WatchProviders> {
    return this.api.getWatchProviders(movieId);
  }

  /**
   * Prefetch the first page of each list into the offline cache.
   */
  public downloadForOffline(
    kinds: readonly MovieListKind[] = DEFAULT_OFFLINE_LISTS,
    options?: OfflineDownloadOptions
  ): Promise<OfflineDownloadResult> {
    return this.downloader.download(kinds, options);
  }

  public getOfflineStatus(): OfflineStatus {
    return this.downloader.getStatus();
  }

  public clearOfflineData(): Promise<void> {
    logger.default('clearOfflineData');
    return this.downloader.clear();
  }

  /**
   * Items related to `movieId`, ranked for the current profile.
   */
  public async getRecommendedFor(movieId: number, limit = 20): Promise<CatalogItem[]> {
    const response = await this.api.getRecommendations(movieId);
    await this.offline.cacheMany(response.results, 'recommendations');
    return this.scorer.getRecommendations(response.results, limit);
  }

  public recommend(items: readonly CatalogItem[], limit = 20): CatalogItem[] {
    return this.scorer.getRecommendations(items, limit);
  }

  public recordInteraction(item: CatalogItem, action: InteractionAction): Promise<void> {
    return this.scorer.recordInteraction(item, action);
  }

  public getStats(): CatalogClientStats {
    return {
      coalescers: this.coalescer.getStats(),
      offline: this.offline.getStats()
    };
  }

  /**
   * Cancel pending work and persist the offline cache and preference profile.
   */
  public async close(): Promise<void> {
    logger.default('close');
    this.debouncer.cancel();
    this.coalescer.cancelAllRequests();
    await Promise.all(Array.from(this.cacheFirstFetchers.values()).map(fetcher => fetcher.whenIdle()));
    await Promise.all([this.offline.flush(), this.scorer.flush()]);
  }

  private fetchListPage(kind: MovieListKind, page: number): Promise<MoviePage> {
    return this.coalescer.getList(kind, page, signal => this.api.getList(kind, page, { signal }));
  }

  private cacheFirstFetcher(kind: MovieListKind): CacheFirstFetcher<CatalogItem[]> {
    const existing = this.cacheFirstFetchers.get(kind);
    if (existing) {
      return existing;
    }
    const fetcher = new CacheFirstFetcher<CatalogItem[]>({
      name: kind,
      readCache: () => (this.offline.hasCachedData(kind) ? this.offline.getItems(kind) : null),
      fetchNetwork: async () => (await this.fetchListPage(kind, 1)).results,
      writeCache: items => this.offline.cacheMany(items, kind)
    });
    this.cacheFirstFetchers.set(kind, fetcher);
    return fetcher;
  }
}

/**
 * Build a client from options and load its persisted state.
 */
export const createCatalogClient = async (
  input: OptionsInput = {},
  deps: CatalogClientDeps = {}
): Promise<CatalogClient> => {
  const options = createOptions(input);
  const { storageDirectory } = options;
  logger.default('createCatalogClient', { baseUrl: options.http.baseUrl, storageDirectory });

  const credentialStore = deps.credentialStore
    ?? (storageDirectory ? FileCredentialStore.inDirectory(storageDirectory) : new MemoryCredentialStore());
  const offlineStore = deps.offlineStore
    ?? (storageDirectory
      ? new FileCacheStore(path.join(storageDirectory, 'offline-cache'), {
        maxDiskAgeMs: options.offline.maxDiskAgeMs,
        now: deps.now
      })
      : new MemoryCacheStore());
  const preferenceStore = deps.preferenceStore
    ?? (storageDirectory ? FilePreferenceStore.inDirectory(storageDirectory) : new MemoryPreferenceStore());
  const sleepFn = deps.sleep ?? sleep;

  const apiKeys = new ApiKeyProvider(credentialStore, options.http.apiKey);
  const httpClient = new CatalogHttpClient(
    {
      baseUrl: options.http.baseUrl,
      timeoutMs: options.http.timeoutMs,
      retry: {
        maxRetries: options.http.maxRetries,
        baseDelayMs: options.http.baseRetryDelayMs,
        maxDelayMs: options.http.maxRetryDelayMs
      }
    },
    { apiKeyProvider: apiKeys, fetch: deps.fetch, random: deps.random, sleep: sleepFn }
  );
  const batch = new BatchRequestManager(options.batch, sleepFn);
  const api = new CatalogApi(httpClient, batch, { searchTimeoutMs: options.http.searchTimeoutMs });
  const coalescer = new CatalogRequestCoalescer(options.coalescer, deps.now);
  const offline = new OfflineMovieCache(offlineStore, {
    maxMemoryEntries: options.offline.maxMemoryEntries,
    defaultTtlMs: options.offline.defaultTtlMs,
    now: deps.now
  });
  const debouncer = new SearchDebouncer(
    (query, page, signal) => api.searchMovies(query, page, { signal }),
    { debounceMs: options.search.debounceMs, sleep: sleepFn }
  );
  const scorer = new RecommendationScorer(options.recommendation, { store: preferenceStore, now: deps.now });
  const downloader = new OfflineDownloader((kind, signal) => api.getList(kind, 1, { signal }), offline, deps.now);

  const client = new CatalogClient(options, apiKeys, api, coalescer, offline, debouncer, batch, scorer, downloader);
  await client.init();
  return client;
};
