import { RequestCoalescer, Producer } from './RequestCoalescer';
import { CacheStats } from '../CacheStats';
import { MovieListKind, MoviePage } from '../http/Endpoint';
import { MovieDetails, VideoResponse } from '../model/CatalogDetails';
import { CoalescerOptions, DEFAULT_OPTIONS } from '../Options';
import LibLogger from '../logger';

const logger = LibLogger.get('CatalogRequestCoalescer');

/**
 * Default freshness of a fetched page of each list
 */
export const LIST_TTL_MS: Readonly<Record<MovieListKind, number>> = DEFAULT_OPTIONS.coalescer.listTtlMs;

export const DETAIL_TTL_MS = DEFAULT_OPTIONS.coalescer.detailTtlMs;
export const VIDEO_TTL_MS = DEFAULT_OPTIONS.coalescer.videoTtlMs;

export const listKey = (kind: MovieListKind, page: number): string => `${kind}_${page}`;

export interface CatalogCoalescerStats {
  lists: CacheStats;
  details: CacheStats;
  videos: CacheStats;
}

/**
 * One coalescer per resource kind: list pages, movie details and videos.
 */
export class CatalogRequestCoalescer {
  public readonly lists: RequestCoalescer<string, MoviePage>;
  public readonly details: RequestCoalescer<number, MovieDetails>;
  public readonly videos: RequestCoalescer<number, VideoResponse>;

  private readonly listTtlMs: Record<MovieListKind, number>;

  public constructor(options: CoalescerOptions, now?: () => number) {
    this.listTtlMs = { ...options.listTtlMs };
    this.lists = new RequestCoalescer({ name: 'lists', defaultTtlMs: Math.min(...Object.values(this.listTtlMs)), now });
    this.details = new RequestCoalescer({ name: 'details', defaultTtlMs: options.detailTtlMs, now });
    this.videos = new RequestCoalescer({ name: 'videos', defaultTtlMs: options.videoTtlMs, now });
  }

  public getList(kind: MovieListKind, page: number, producer: Producer<MoviePage>): Promise<MoviePage> {
    return this.lists.coalesce(listKey(kind, page), producer, { ttlMs: this.listTtlMs[kind] });
  }

  public getDetails(id: number, producer: Producer<MovieDetails>): Promise<MovieDetails> {
    return this.details.coalesce(id, producer);
  }

  public getVideos(id: number, producer: Producer<VideoResponse>): Promise<VideoResponse> {
    return this.videos.coalesce(id, producer);
  }

  public invalidateList(kind: MovieListKind, page: number): void {
    this.lists.invalidate(listKey(kind, page));
  }

  public clearAllCaches(): void {
    logger.debug('Clearing all coalescer caches');
    this.lists.invalidateAll();
    this.details.invalidateAll();
    this.videos.invalidateAll();
  }

  public clearExpiredCaches(): number {
    return this.lists.clearExpired() + this.details.clearExpired() + this.videos.clearExpired();
  }

  public cancelAllRequests(): void {
    logger.debug('Cancelling all coalesced requests', {
      pending: this.lists.pendingCount + this.details.pendingCount + this.videos.pendingCount
    });
    this.lists.cancelAll();
    this.details.cancelAll();
    this.videos.cancelAll();
  }

  public getStats(): CatalogCoalescerStats {
    return {
      lists: this.lists.getStats(),
      details: this.details.getStats(),
      videos: this.videos.getStats()
    };
  }
}
