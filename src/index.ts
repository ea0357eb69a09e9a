// Composition root
export { CatalogClient, createCatalogClient } from './CatalogClient';
export type { CatalogClientDeps, CatalogClientStats } from './CatalogClient';

// Configuration and options
export { createOptions, validateOptions, optionsFromEnv, DEFAULT_OPTIONS } from './Options';
export type {
  Options,
  OptionsInput,
  HttpOptions,
  CoalescerOptions,
  OfflineOptions,
  SearchOptions,
  BatchOptions,
  RecommendationOptions
} from './Options';

// Errors
export {
  CatalogError,
  InvalidRequestError,
  UnauthorizedError,
  RateLimitedError,
  ServerError,
  HttpStatusError,
  TransportError,
  DecodeError,
  CancelledError,
  errorFromStatus,
  isCancellation,
  toCatalogError
} from './errors/CatalogError';
export type { CatalogErrorKind, DecodeIssue } from './errors/CatalogError';

// Data model
export { catalogItemSchema, isSameItem, uniqueById, releaseYear, posterUrl, backdropUrl } from './model/CatalogItem';
export type { CatalogItem, PosterSize } from './model/CatalogItem';
export { pageSchema, emptyPage } from './model/PageResponse';
export type { PageResponse } from './model/PageResponse';
export { primaryTrailer, directorsOf } from './model/CatalogDetails';
export { summarizeWatchProviders, watchProvidersSchema } from './model/WatchProviders';
export type {
  WatchProvider,
  WatchProviders,
  CountryWatchProviders,
  WatchProviderSummary
} from './model/WatchProviders';
export type {
  Genre,
  MovieDetails,
  Video,
  VideoResponse,
  CastMember,
  CrewMember,
  Credits,
  Person
} from './model/CatalogDetails';

// HTTP
export * as endpoints from './http/Endpoint';
export type { Endpoint, MovieListKind, MoviePage, QueryValue } from './http/Endpoint';
export { CatalogHttpClient } from './http/CatalogHttpClient';
export type { FetchFunction, SleepFunction, RequestOptions } from './http/CatalogHttpClient';
export { CatalogApi } from './http/CatalogApi';
export { computeBackoffDelay, shouldRetry } from './http/RetryPolicy';
export type { RetryPolicy, RandomSource } from './http/RetryPolicy';
export { MemoryCredentialStore, FileCredentialStore } from './http/CredentialStore';
export type { CredentialStore } from './http/CredentialStore';
export { ApiKeyProvider, isValidApiKey, API_KEY_CREDENTIAL } from './http/ApiKeyProvider';

// Request coalescing
export { RequestCoalescer } from './coalescing/RequestCoalescer';
export type { Producer, CoalesceOptions, RequestCoalescerOptions } from './coalescing/RequestCoalescer';
export { CatalogRequestCoalescer, LIST_TTL_MS, DETAIL_TTL_MS, VIDEO_TTL_MS, listKey } from './coalescing/CatalogRequestCoalescer';
export { CacheStatsManager } from './CacheStats';
export type { CacheStats } from './CacheStats';

// Offline cache
export { OfflineMovieCache } from './offline/OfflineMovieCache';
export type { OfflineCacheStats, OfflineMovieCacheOptions } from './offline/OfflineMovieCache';
export { FileCacheStore, MemoryCacheStore } from './offline/OfflineCacheStore';
export type { OfflineCacheStore, OfflineSnapshot } from './offline/OfflineCacheStore';
export { CACHE_CATEGORIES, CATEGORY_TTL_MS, isExpired } from './offline/CacheCategory';
export type { CacheCategory, CachedItem } from './offline/CacheCategory';
export { CacheFirstFetcher } from './offline/CacheFirstFetcher';
export type { CacheFirstResult, CacheFirstSource } from './offline/CacheFirstFetcher';
export { OfflineDownloader, DEFAULT_OFFLINE_LISTS } from './offline/OfflineDownloader';
export type {
  OfflineDownloadOptions,
  OfflineDownloadResult,
  OfflineDownloadFailure,
  OfflineStatus,
  ListPageFetch
} from './offline/OfflineDownloader';

// Search and batching
export { SearchDebouncer } from './search/SearchDebouncer';
export type { SearchFunction } from './search/SearchDebouncer';
export { BatchRequestManager, chunked } from './batch/BatchRequestManager';
export type { BatchFetch, BatchRequestManagerOptions } from './batch/BatchRequestManager';

// Recommendations
export { RecommendationScorer } from './recommendation/RecommendationScorer';
export type { TasteProfile, RatingRange } from './recommendation/RecommendationScorer';
export { ACTION_WEIGHTS, INTERACTION_ACTIONS } from './recommendation/Interaction';
export type { InteractionAction, InteractionEvent } from './recommendation/Interaction';
export { GENRE_NAMES, genreName } from './recommendation/Genres';
export { FilePreferenceStore, MemoryPreferenceStore } from './recommendation/PreferenceStore';
export type { PreferenceStore, PersistedPreferences } from './recommendation/PreferenceStore';

// Utilities
export { estimateValueSize, formatBytes } from './utils/CacheSize';

export { default as LibLogger } from './logger';
