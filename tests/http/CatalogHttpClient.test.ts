import { describe, expect, it, vi } from 'vitest';
import { CatalogHttpClient, FetchFunction, SleepFunction } from '../../src/http/CatalogHttpClient';
import { ApiKeyProvider } from '../../src/http/ApiKeyProvider';
import { MemoryCredentialStore } from '../../src/http/CredentialStore';
import { movieList } from '../../src/http/Endpoint';
import {
  CancelledError,
  DecodeError,
  HttpStatusError,
  RateLimitedError,
  ServerError,
  TransportError,
  UnauthorizedError
} from '../../src/errors/CatalogError';
import { sleep } from '../../src/utils/abort';
import { hangingFetch, jsonResponse, queuedFetch, rawPage, statusResponse, TEST_API_KEY } from '../helpers/fixtures';

interface ClientSetup {
  fetch: FetchFunction;
  sleep?: SleepFunction;
  apiKey?: string;
  maxRetries?: number;
  timeoutMs?: number;
}

const makeClient = (setup: ClientSetup) => {
  const sleepFn = vi.fn(setup.sleep ?? (async (_ms: number, _signal?: AbortSignal) => undefined));
  const client = new CatalogHttpClient(
    {
      baseUrl: 'https://catalog.test/3',
      timeoutMs: setup.timeoutMs ?? 1000,
      retry: { maxRetries: setup.maxRetries ?? 3, baseDelayMs: 1000, maxDelayMs: 30000 }
    },
    {
      apiKeyProvider: new ApiKeyProvider(new MemoryCredentialStore(), setup.apiKey ?? TEST_API_KEY),
      fetch: setup.fetch,
      random: () => 0,
      sleep: sleepFn
    }
  );
  return { client, sleep: sleepFn };
};

describe('CatalogHttpClient', () => {
  describe('successful requests', () => {
    it('should decode a page of movies', async () => {
      const fetchFn = queuedFetch(() => jsonResponse(rawPage([1, 2])));
      const { client } = makeClient({ fetch: fetchFn });

      const page = await client.request(movieList('popular', 1));

      expect(page.results.map(item => item.id)).toEqual([1, 2]);
      expect(page.totalPages).toBe(5);
      expect(page.results[0].posterPath).toBe('/poster1.jpg');
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should send the api key first and ask for JSON', async () => {
      const fetchFn = queuedFetch(() => jsonResponse(rawPage([1])));
      const { client } = makeClient({ fetch: fetchFn });

      await client.request(movieList('popular', 2));

      const [url, init] = fetchFn.mock.calls[0];
      expect(url.toString()).toBe(`https://catalog.test/3/movie/popular?api_key=${TEST_API_KEY}&page=2`);
      expect(init.method).toBe('GET');
      expect(init.headers).toEqual({ Accept: 'application/json' });
    });
  });

  describe('retries', () => {
    it('should retry server errors and return the eventual success', async () => {
      const fetchFn = queuedFetch(
        statusResponse(503),
        statusResponse(503),
        statusResponse(503),
        () => jsonResponse(rawPage([7]))
      );
      const { client, sleep: sleepFn } = makeClient({ fetch: fetchFn });

      const page = await client.request(movieList('trending', 1));

      expect(page.results[0].id).toBe(7);
      expect(fetchFn).toHaveBeenCalledTimes(4);
      expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
    });

    it('should give up after maxRetries retries', async () => {
      const fetchFn = queuedFetch(statusResponse(500));
      const { client } = makeClient({ fetch: fetchFn });

      const error = await client.request(movieList('trending', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ status: 500, userMessage: 'Server error' });
      expect(fetchFn).toHaveBeenCalledTimes(4);
    });

    it('should retry rate limiting', async () => {
      const fetchFn = queuedFetch(statusResponse(429), () => jsonResponse(rawPage([3])));
      const { client } = makeClient({ fetch: fetchFn });

      await expect(client.request(movieList('upcoming', 1))).resolves.toMatchObject({ page: 1 });
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('should retry connectivity failures', async () => {
      const fetchFn = queuedFetch(new TypeError('fetch failed'), () => jsonResponse(rawPage([3])));
      const { client } = makeClient({ fetch: fetchFn });

      await client.request(movieList('upcoming', 1));

      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('should surface the last rate limit error once retries run out', async () => {
      const fetchFn = queuedFetch(statusResponse(429));
      const { client } = makeClient({ fetch: fetchFn, maxRetries: 1 });

      await expect(client.request(movieList('upcoming', 1))).rejects.toBeInstanceOf(RateLimitedError);
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });
  });

  describe('non-retryable failures', () => {
    it('should not retry a 404', async () => {
      const fetchFn = queuedFetch(statusResponse(404));
      const { client, sleep: sleepFn } = makeClient({ fetch: fetchFn });

      const error = await client.request(movieList('popular', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ status: 404, userMessage: 'Not found', isRetryable: false });
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(sleepFn).not.toHaveBeenCalled();
    });

    it('should discard the body of a failed response', async () => {
      const response = statusResponse(404);
      const { client } = makeClient({ fetch: queuedFetch(response) });

      await expect(client.request(movieList('popular', 1))).rejects.toBeInstanceOf(HttpStatusError);

      expect(response.bodyUsed).toBe(true);
    });

    it('should report a rejected key as requiring user action', async () => {
      const fetchFn = queuedFetch(statusResponse(401));
      const { client } = makeClient({ fetch: fetchFn });

      const error = await client.request(movieList('popular', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error).toMatchObject({ requiresUserAction: true, userMessage: 'Invalid API key' });
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should fail without a request when no key is configured', async () => {
      const fetchFn = queuedFetch(() => jsonResponse(rawPage([1])));
      const { client } = makeClient({ fetch: fetchFn, apiKey: '' });

      await expect(client.request(movieList('popular', 1))).rejects.toBeInstanceOf(UnauthorizedError);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should not retry a response that does not match the schema', async () => {
      const fetchFn = queuedFetch(() => jsonResponse({ page: 1 }));
      const { client } = makeClient({ fetch: fetchFn });

      const error = await client.request(movieList('popular', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ endpoint: 'popular' });
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should treat a body that is not JSON as a decode error', async () => {
      const fetchFn = queuedFetch(() => new Response('<html></html>', { status: 200 }));
      const { client } = makeClient({ fetch: fetchFn });

      const error = await client.request(movieList('popular', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toHaveProperty('message', 'Failed to decode response for popular: Response body is not valid JSON');
    });
  });

  describe('cancellation', () => {
    it('should not start when the signal has already fired', async () => {
      const fetchFn = queuedFetch(() => jsonResponse(rawPage([1])));
      const { client } = makeClient({ fetch: fetchFn });
      const controller = new AbortController();
      controller.abort();

      await expect(client.request(movieList('popular', 1), { signal: controller.signal }))
        .rejects.toBeInstanceOf(CancelledError);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should stop retrying when cancelled during the backoff sleep', async () => {
      const controller = new AbortController();
      const fetchFn = queuedFetch(statusResponse(503));
      const { client } = makeClient({
        fetch: fetchFn,
        sleep: async (ms, signal) => {
          controller.abort();
          return sleep(ms, signal);
        }
      });

      const error = await client.request(movieList('popular', 1), { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CancelledError);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should surface cancellation of an in-flight request', async () => {
      const fetchFn = hangingFetch();
      const { client } = makeClient({ fetch: fetchFn });
      const controller = new AbortController();

      const pending = client.request(movieList('popular', 1), { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should report a timeout as a transport error', async () => {
      const fetchFn = hangingFetch();
      const { client } = makeClient({ fetch: fetchFn, timeoutMs: 20, maxRetries: 0 });

      const error = await client.request(movieList('popular', 1)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('message', 'Network error: Request timed out: Popular Movies (Page 1)');
    });
  });
});
