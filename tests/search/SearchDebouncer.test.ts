import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SearchDebouncer } from '../../src/search/SearchDebouncer';
import { CancelledError } from '../../src/errors/CatalogError';
import { MoviePage } from '../../src/http/Endpoint';
import { deferred, makeItem } from '../helpers/fixtures';

const pageFor = (query: string, page = 1): MoviePage => ({
  page,
  results: [makeItem(query.length, { title: query })],
  totalPages: 3,
  totalResults: 30
});

const settle = <T>(promise: Promise<T>): Promise<T | unknown> => promise.catch((error: unknown) => error);

describe('SearchDebouncer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  const makeDebouncer = () => {
    const searchFn = vi.fn(async (query: string, page: number, _signal: AbortSignal) => pageFor(query, page));
    return { debouncer: new SearchDebouncer(searchFn, { debounceMs: 300 }), searchFn };
  };

  it('should only send the last query typed within the debounce window', async () => {
    const { debouncer, searchFn } = makeDebouncer();

    const a = settle(debouncer.search('a'));
    await vi.advanceTimersByTimeAsync(100);
    const ab = settle(debouncer.search('ab'));
    await vi.advanceTimersByTimeAsync(100);
    const abc = settle(debouncer.search('abc'));
    await vi.advanceTimersByTimeAsync(300);

    expect(await a).toBeInstanceOf(CancelledError);
    expect(await ab).toBeInstanceOf(CancelledError);
    expect(await abc).toEqual(pageFor('abc'));
    expect(searchFn).toHaveBeenCalledTimes(1);
    expect(searchFn.mock.calls[0][0]).toBe('abc');
  });

  it('should wait for the debounce interval before searching', async () => {
    const { debouncer, searchFn } = makeDebouncer();

    const result = debouncer.search('dune');
    await vi.advanceTimersByTimeAsync(299);
    expect(searchFn).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toEqual(pageFor('dune'));
  });

  it('should answer a repeated first-page query from the last result', async () => {
    const { debouncer, searchFn } = makeDebouncer();
    const first = debouncer.search('dune');
    await vi.advanceTimersByTimeAsync(300);
    const firstPage = await first;

    const repeated = await debouncer.search('dune');

    expect(repeated).toBe(firstPage);
    expect(searchFn).toHaveBeenCalledTimes(1);
  });

  it('should not cache later pages', async () => {
    const { debouncer, searchFn } = makeDebouncer();

    const first = debouncer.search('dune', 2);
    await vi.advanceTimersByTimeAsync(300);
    await first;
    const second = debouncer.search('dune', 2);
    await vi.advanceTimersByTimeAsync(300);
    await second;

    expect(searchFn).toHaveBeenCalledTimes(2);
  });

  it('should search again after the cache is cleared', async () => {
    const { debouncer, searchFn } = makeDebouncer();
    const first = debouncer.search('dune');
    await vi.advanceTimersByTimeAsync(300);
    await first;

    debouncer.clearCache();
    const second = debouncer.search('dune');
    await vi.advanceTimersByTimeAsync(300);
    await second;

    expect(searchFn).toHaveBeenCalledTimes(2);
  });

  it('should make no request when cancelled during the delay', async () => {
    const { debouncer, searchFn } = makeDebouncer();

    const result = settle(debouncer.search('dune'));
    await vi.advanceTimersByTimeAsync(100);
    debouncer.cancel();
    await vi.advanceTimersByTimeAsync(500);

    expect(await result).toBeInstanceOf(CancelledError);
    expect(searchFn).not.toHaveBeenCalled();
    expect(debouncer.hasPendingSearch).toBe(false);
  });

  it('should discard a response that arrives after a newer search started', async () => {
    const gate = deferred<MoviePage>();
    const { debouncer, searchFn } = makeDebouncer();
    searchFn.mockImplementationOnce(() => gate.promise);

    const stale = settle(debouncer.search('first'));
    await vi.advanceTimersByTimeAsync(300);
    expect(searchFn).toHaveBeenCalledTimes(1);

    const fresh = settle(debouncer.search('second'));
    gate.resolve(pageFor('first'));
    await vi.advanceTimersByTimeAsync(300);

    expect(await stale).toBeInstanceOf(CancelledError);
    expect(await fresh).toEqual(pageFor('second'));
    expect(await debouncer.search('second')).toEqual(pageFor('second'));
    expect(searchFn).toHaveBeenCalledTimes(2);
  });

  it('should honour the caller signal', async () => {
    const { debouncer, searchFn } = makeDebouncer();
    const controller = new AbortController();

    const result = settle(debouncer.search('dune', 1, controller.signal));
    controller.abort();
    await vi.advanceTimersByTimeAsync(300);

    expect(await result).toBeInstanceOf(CancelledError);
    expect(searchFn).not.toHaveBeenCalled();
  });
});
