import { vi } from 'vitest';
import { CatalogItem } from '../../src/model/CatalogItem';

export const TEST_API_KEY = 'testkey0000000000000000000000000000';

export const makeItem = (id: number, overrides: Partial<CatalogItem> = {}): CatalogItem => ({
  id,
  title: `Movie ${id}`,
  overview: '',
  posterPath: null,
  backdropPath: null,
  releaseDate: null,
  voteAverage: 0,
  voteCount: 0,
  popularity: 0,
  genreIds: [],
  adult: false,
  originalLanguage: 'en',
  originalTitle: `Movie ${id}`,
  video: false,
  ...overrides
});

/** Raw item as the remote API serves it */
export const rawItem = (id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id,
  title: `Movie ${id}`,
  overview: `Overview ${id}`,
  poster_path: `/poster${id}.jpg`,
  backdrop_path: null,
  release_date: '2020-05-01',
  vote_average: 7.1,
  vote_count: 120,
  popularity: 10.5,
  genre_ids: [28],
  adult: false,
  original_language: 'en',
  original_title: `Movie ${id}`,
  video: false,
  ...overrides
});

export const rawPage = (ids: number[], page = 1): Record<string, unknown> => ({
  page,
  results: ids.map(id => rawItem(id)),
  total_pages: 5,
  total_results: 100
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });

export const statusResponse = (status: number): Response => new Response('{}', { status });

/**
 * fetch stand-in answering each call with the next queued response (or error).
 * The last entry repeats once the queue is exhausted.
 */
export const queuedFetch = (...outcomes: (Response | Error | (() => Response))[]) =>
  vi.fn(async (_input: URL, _init: RequestInit): Promise<Response> => {
    const next = outcomes.length > 1 ? outcomes.shift() : outcomes[0];
    if (next === undefined) {
      throw new Error('queuedFetch called without outcomes');
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next() : next;
  });

/** fetch stand-in that never settles until its signal fires */
export const hangingFetch = () =>
  vi.fn((_input: URL, init: RequestInit): Promise<Response> => new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    }, { once: true });
  }));

export const noSleep = async (): Promise<void> => undefined;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/** Clock for code that takes a `now` function */
export const manualClock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (ms: number) => {
      current = ms;
    }
  };
};
