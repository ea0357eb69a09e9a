import { ApiKeyProvider } from './ApiKeyProvider';
import { buildUrl, Endpoint } from './Endpoint';
import { computeBackoffDelay, RandomSource, RetryPolicy, shouldRetry } from './RetryPolicy';
import {
  CancelledError,
  CatalogError,
  DecodeError,
  errorFromStatus,
  InvalidRequestError,
  isCancellation,
  toCatalogError,
  TransportError,
  UnauthorizedError
} from '../errors/CatalogError';
import { linkSignals, sleep, throwIfAborted } from '../utils/abort';
import LibLogger from '../logger';

const logger = LibLogger.get('CatalogHttpClient');

export type FetchFunction = (input: URL, init: RequestInit) => Promise<Response>;

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface CatalogHttpClientOptions {
  baseUrl: string;
  retry: RetryPolicy;
  /** Default per-attempt timeout; an endpoint may override it */
  timeoutMs: number;
}

export interface CatalogHttpClientDeps {
  apiKeyProvider: ApiKeyProvider;
  fetch?: FetchFunction;
  random?: RandomSource;
  sleep?: SleepFunction;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * GET client for the catalog API. Every failure surfaces as a CatalogError; retryable
 * ones are retried with exponential backoff and jitter.
 */
export class CatalogHttpClient {
  private readonly fetchFn: FetchFunction;
  private readonly random: RandomSource;
  private readonly sleepFn: SleepFunction;

  public constructor(
    private readonly options: CatalogHttpClientOptions,
    private readonly deps: CatalogHttpClientDeps
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.random = deps.random ?? Math.random;
    this.sleepFn = deps.sleep ?? sleep;
  }

  public async request<T>(endpoint: Endpoint<T>, requestOptions: RequestOptions = {}): Promise<T> {
    const { signal } = requestOptions;
    logger.default('request', { endpoint: endpoint.description });

    const apiKey = await this.deps.apiKeyProvider.getApiKey();
    if (!apiKey) {
      logger.error('No API key configured', { endpoint: endpoint.name });
      throw new UnauthorizedError('No API key configured');
    }

    let url: URL;
    try {
      url = buildUrl(this.options.baseUrl, endpoint, apiKey);
    } catch (error) {
      throw new InvalidRequestError(`Invalid URL for ${endpoint.description}`, { cause: error });
    }

    const { retry } = this.options;
    for (let attempt = 0; ; attempt++) {
      throwIfAborted(signal);
      try {
        const value = await this.attempt(url, endpoint, signal);
        if (attempt > 0) {
          logger.debug('Request succeeded after retry', { endpoint: endpoint.name, attempt });
        }
        return value;
      } catch (caught) {
        const error = toCatalogError(caught);
        if (error instanceof CancelledError) {
          logger.debug('Request cancelled', { endpoint: endpoint.name, attempt });
          throw error;
        }
        if (!shouldRetry(error, attempt, retry)) {
          logger.error('Request failed', {
            endpoint: endpoint.name,
            attempt,
            kind: error.kind,
            message: error.message
          });
          throw error;
        }
        const delay = computeBackoffDelay(attempt, retry, this.random);
        logger.warning('Retrying request', {
          endpoint: endpoint.name,
          attempt: attempt + 1,
          maxRetries: retry.maxRetries,
          delayMs: Math.round(delay),
          kind: error.kind
        });
        await this.sleepFn(delay, signal);
        throwIfAborted(signal);
      }
    }
  }

  private async attempt<T>(url: URL, endpoint: Endpoint<T>, signal?: AbortSignal): Promise<T> {
    const linked = linkSignals([signal], endpoint.timeoutMs ?? this.options.timeoutMs);
    let response: Response;
    let body: string;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: linked.signal
      });
      if (!response.ok) {
        await discardBody(response);
        throw errorFromStatus(response.status);
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof CatalogError) {
        throw error;
      }
      if (linked.timedOut()) {
        throw new TransportError(`Request timed out: ${endpoint.description}`, { cause: error });
      }
      if (signal?.aborted || isCancellation(error)) {
        throw new CancelledError();
      }
      throw toCatalogError(error);
    } finally {
      linked.dispose();
    }

    return decodeBody(endpoint, body);
  }
}

/**
 * Release the connection behind a response whose body will not be read.
 */
const discardBody = async (response: Response): Promise<void> => {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.trace('Failed to discard response body', { status: response.status, error });
  }
};

const decodeBody = <T>(endpoint: Endpoint<T>, body: string): T => {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(endpoint.name, [{ path: [], message: 'Response body is not valid JSON' }], { cause: error });
  }

  const parsed = endpoint.decoder.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(
      endpoint.name,
      parsed.error.issues.map(issue => ({ path: issue.path, message: issue.message })),
      { cause: parsed.error }
    );
  }
  return parsed.data;
};
