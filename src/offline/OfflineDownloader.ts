import { OfflineMovieCache } from './OfflineMovieCache';
import { isCancellation } from '../errors/CatalogError';
import { MovieListKind, MoviePage } from '../http/Endpoint';
import { throwIfAborted } from '../utils/abort';
import LibLogger from '../logger';

const logger = LibLogger.get('OfflineDownloader');

export const DEFAULT_OFFLINE_LISTS: readonly MovieListKind[] = ['trending', 'popular', 'topRated', 'nowPlaying', 'upcoming'];

export type ListPageFetch = (kind: MovieListKind, signal?: AbortSignal) => Promise<MoviePage>;

export interface OfflineDownloadOptions {
  signal?: AbortSignal;
  /** Called after each list with the fraction of lists attempted so far */
  onProgress?: (progress: number) => void;
}

export interface OfflineDownloadFailure {
  kind: MovieListKind;
  error: unknown;
}

export interface OfflineDownloadResult {
  downloaded: MovieListKind[];
  failed: OfflineDownloadFailure[];
  /** Epoch milliseconds */
  syncedAt: number;
}

export interface OfflineStatus {
  /** Lists downloaded at least once since the last clear */
  cachedLists: MovieListKind[];
  lastSyncAt: number | null;
  progress: number;
  isDownloading: boolean;
}

/**
 * Bulk prefetch of first pages into the offline cache, one list at a time. A list
 * that fails is skipped; the run carries on with the next one.
 */
export class OfflineDownloader {
  private readonly cachedLists = new Set<MovieListKind>();
  private lastSyncAt: number | null = null;
  private progress = 0;
  private running: Promise<OfflineDownloadResult> | null = null;

  public constructor(
    private readonly fetchFirstPage: ListPageFetch,
    private readonly cache: OfflineMovieCache,
    private readonly now: () => number = Date.now
  ) { }

  /**
   * Download `kinds`. While a run is in progress further calls share it.
   */
  public download(
    kinds: readonly MovieListKind[] = DEFAULT_OFFLINE_LISTS,
    options: OfflineDownloadOptions = {}
  ): Promise<OfflineDownloadResult> {
    if (this.running) {
      logger.debug('Offline download already running');
      return this.running;
    }
    this.running = this.run(kinds, options).finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async run(kinds: readonly MovieListKind[], options: OfflineDownloadOptions): Promise<OfflineDownloadResult> {
    logger.default('download', { kinds });
    this.progress = 0;
    const downloaded: MovieListKind[] = [];
    const failed: OfflineDownloadFailure[] = [];

    for (let index = 0; index < kinds.length; index++) {
      const kind = kinds[index];
      throwIfAborted(options.signal);
      try {
        const page = await this.fetchFirstPage(kind, options.signal);
        await this.cache.cacheMany(page.results, kind);
        this.cachedLists.add(kind);
        downloaded.push(kind);
      } catch (error) {
        if (isCancellation(error)) {
          throw error;
        }
        logger.error('Failed to download list for offline use', { kind, error });
        failed.push({ kind, error });
      }
      this.progress = (index + 1) / kinds.length;
      options.onProgress?.(this.progress);
    }

    this.lastSyncAt = this.now();
    logger.debug('Offline download finished', { downloaded: downloaded.length, failed: failed.length });
    return { downloaded, failed, syncedAt: this.lastSyncAt };
  }

  public getStatus(): OfflineStatus {
    return {
      cachedLists: Array.from(this.cachedLists),
      lastSyncAt: this.lastSyncAt,
      progress: this.progress,
      isDownloading: this.running !== null
    };
  }

  /**
   * Forget the download status and empty the offline cache.
   */
  public async clear(): Promise<void> {
    this.cachedLists.clear();
    this.lastSyncAt = null;
    this.progress = 0;
    await this.cache.clearAll();
  }
}
