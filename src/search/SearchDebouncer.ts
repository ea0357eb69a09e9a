import { MoviePage } from '../http/Endpoint';
import { CancelledError } from '../errors/CatalogError';
import { linkSignals, sleep } from '../utils/abort';
import LibLogger from '../logger';

const logger = LibLogger.get('SearchDebouncer');

export type SearchFunction = (query: string, page: number, signal: AbortSignal) => Promise<MoviePage>;

export interface SearchDebouncerOptions {
  debounceMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Holds at most one pending search. A new call cancels the previous one outright, so
 * only the newest query within a debounce window reaches the network.
 */
export class SearchDebouncer {
  private pending: AbortController | null = null;
  private lastQuery: string | null = null;
  private lastResults: MoviePage | null = null;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;

  public constructor(
    private readonly searchFn: SearchFunction,
    private readonly options: SearchDebouncerOptions
  ) {
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Resolves with the results for `query`, or rejects with CancelledError when a newer
   * search (or cancel()) supersedes it. A repeated first-page query is answered from
   * the last result without waiting.
   */
  public async search(query: string, page = 1, signal?: AbortSignal): Promise<MoviePage> {
    this.pending?.abort();
    this.pending = null;

    if (page === 1 && query === this.lastQuery && this.lastResults) {
      logger.debug('Returning cached search results', { query });
      return this.lastResults;
    }

    const controller = new AbortController();
    this.pending = controller;
    const linked = linkSignals([controller.signal, signal]);

    try {
      await this.sleepFn(this.options.debounceMs, linked.signal);
      if (linked.signal.aborted) {
        throw new CancelledError();
      }

      logger.default('search', { query, page });
      const response = await this.searchFn(query, page, linked.signal);
      if (linked.signal.aborted) {
        throw new CancelledError();
      }

      if (page === 1) {
        this.lastQuery = query;
        this.lastResults = response;
      }
      return response;
    } finally {
      linked.dispose();
      if (this.pending === controller) {
        this.pending = null;
      }
    }
  }

  public cancel(): void {
    this.pending?.abort();
    this.pending = null;
  }

  public clearCache(): void {
    this.lastQuery = null;
    this.lastResults = null;
  }

  public get hasPendingSearch(): boolean {
    return this.pending !== null;
  }
}
