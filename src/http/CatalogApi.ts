import { CatalogHttpClient, RequestOptions } from './CatalogHttpClient';
import * as endpoints from './Endpoint';
import { MovieListKind, MoviePage } from './Endpoint';
import { BatchRequestManager } from '../batch/BatchRequestManager';
import { CatalogItem, uniqueById } from '../model/CatalogItem';
import { emptyPage } from '../model/PageResponse';
import { Credits, Genre, MovieDetails, Person, VideoResponse } from '../model/CatalogDetails';
import { WatchProviders } from '../model/WatchProviders';
import LibLogger from '../logger';

const logger = LibLogger.get('CatalogApi');

export interface CatalogApiOptions {
  /** Per-attempt timeout for search requests */
  searchTimeoutMs?: number;
}

/**
 * Typed operations over the catalog HTTP client, one per endpoint.
 */
export class CatalogApi {
  public constructor(
    private readonly client: CatalogHttpClient,
    private readonly batchManager: BatchRequestManager,
    private readonly options: CatalogApiOptions = {}
  ) { }

  public getList(kind: MovieListKind, page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.client.request(endpoints.movieList(kind, page), options);
  }

  public getTrending(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('trending', page, options);
  }

  public getPopular(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('popular', page, options);
  }

  public getTopRated(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('topRated', page, options);
  }

  public getNowPlaying(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('nowPlaying', page, options);
  }

  public getUpcoming(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('upcoming', page, options);
  }

  public getRecent(page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.getList('recent', page, options);
  }

  /**
   * Blank queries resolve to an empty page without a request.
   */
  public async searchMovies(query: string, page = 1, options?: RequestOptions): Promise<MoviePage> {
    const trimmed = query.trim();
    if (!trimmed) {
      logger.debug('Skipping search for blank query');
      return emptyPage(page);
    }
    return this.client.request(endpoints.searchMovies(trimmed, page, this.options.searchTimeoutMs), options);
  }

  public getMovieDetails(id: number, options?: RequestOptions): Promise<MovieDetails> {
    return this.client.request(endpoints.movieDetails(id), options);
  }

  public getVideos(movieId: number, options?: RequestOptions): Promise<VideoResponse> {
    return this.client.request(endpoints.videos(movieId), options);
  }

  public getCredits(movieId: number, options?: RequestOptions): Promise<Credits> {
    return this.client.request(endpoints.credits(movieId), options);
  }

  public getSimilar(movieId: number, page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.client.request(endpoints.similarMovies(movieId, page), options);
  }

  public getRecommendations(movieId: number, page = 1, options?: RequestOptions): Promise<MoviePage> {
    return this.client.request(endpoints.recommendations(movieId, page), options);
  }

  public getWatchProviders(movieId: number, options?: RequestOptions): Promise<WatchProviders> {
    return this.client.request(endpoints.watchProviders(movieId), options);
  }

  public getPerson(personId: number, options?: RequestOptions): Promise<Person> {
    return this.client.request(endpoints.person(personId), options);
  }

  public getPersonMovieCredits(personId: number, options?: RequestOptions): Promise<CatalogItem[]> {
    return this.client.request(endpoints.personMovieCredits(personId), options);
  }

  public getGenres(options?: RequestOptions): Promise<Genre[]> {
    return this.client.request(endpoints.genres(), options);
  }

  /**
   * Fetch pages `fromPage..toPage` of a list through the batch manager and flatten
   * them, keeping the first occurrence of each id.
   */
  public async fetchMultiplePages(
    kind: MovieListKind,
    fromPage: number,
    toPage: number,
    options: RequestOptions = {}
  ): Promise<CatalogItem[]> {
    if (toPage < fromPage) {
      return [];
    }
    const pages = Array.from({ length: toPage - fromPage + 1 }, (_, i) => fromPage + i);
    logger.default('fetchMultiplePages', { kind, fromPage, toPage });
    const responses = await this.batchManager.fetchBatch(
      pages,
      (page, signal) => this.getList(kind, page, { signal }),
      { signal: options.signal }
    );
    return uniqueById(responses.flatMap(response => response.results));
  }
}
