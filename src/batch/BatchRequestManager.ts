import { isCancellation } from '../errors/CatalogError';
import { linkSignals, sleep, throwIfAborted } from '../utils/abort';
import LibLogger from '../logger';

const logger = LibLogger.get('BatchRequestManager');

export interface BatchRequestManagerOptions {
  /** Items fetched concurrently within one chunk */
  maxConcurrent: number;
  /** Pause between chunks; none after the last */
  delayBetweenBatchesMs: number;
}

export type BatchFetch<I, R> = (item: I, signal: AbortSignal) => Promise<R>;

export interface FetchBatchOptions {
  signal?: AbortSignal;
}

/**
 * Split `items` into consecutive chunks of at most `size` elements.
 */
export const chunked = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Runs many fetches in paced chunks of bounded concurrency.
 *
 * Fail-fast: the first failure aborts the signal shared by its chunk, no later chunk
 * starts, and that first error is rethrown once the chunk has settled.
 */
export class BatchRequestManager {
  public constructor(
    private readonly options: BatchRequestManagerOptions,
    private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void> = sleep
  ) { }

  public async fetchBatch<I, R>(
    items: readonly I[],
    fetchItem: BatchFetch<I, R>,
    batchOptions: FetchBatchOptions = {}
  ): Promise<R[]> {
    const { signal } = batchOptions;
    const chunks = chunked(items, this.options.maxConcurrent);
    logger.default('fetchBatch', { items: items.length, chunks: chunks.length });

    const results: R[] = [];
    for (let index = 0; index < chunks.length; index++) {
      throwIfAborted(signal);
      const chunkResults = await this.runChunk(chunks[index], fetchItem, signal);
      results.push(...chunkResults);

      if (index < chunks.length - 1 && this.options.delayBetweenBatchesMs > 0) {
        await this.sleepFn(this.options.delayBetweenBatchesMs, signal);
      }
    }
    return results;
  }

  private async runChunk<I, R>(chunk: I[], fetchItem: BatchFetch<I, R>, signal?: AbortSignal): Promise<R[]> {
    const controller = new AbortController();
    const chunkSignal = linkSignals([signal, controller.signal]);
    const failure: { failed: boolean; error: unknown } = { failed: false, error: undefined };

    try {
      const settled = await Promise.allSettled(
        chunk.map(async item => {
          try {
            return await fetchItem(item, chunkSignal.signal);
          } catch (error) {
            if (!failure.failed) {
              failure.failed = true;
              failure.error = error;
              controller.abort();
            }
            throw error;
          }
        })
      );

      if (failure.failed) {
        if (isCancellation(failure.error)) {
          logger.debug('Batch cancelled');
        } else {
          logger.error('Batch chunk failed', { chunkSize: chunk.length, error: failure.error });
        }
        throw failure.error;
      }

      return settled.map(outcome => {
        if (outcome.status === 'rejected') {
          throw outcome.reason;
        }
        return outcome.value;
      });
    } finally {
      chunkSignal.dispose();
    }
  }
}
