import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Counters kept by a request coalescer
 */
export interface CacheStats {
  /** Calls to coalesce() */
  numRequests: number;
  /** Served from a non-expired cache entry */
  numHits: number;
  /** Started a new fetch cycle */
  numMisses: number;
  /** Joined a fetch cycle already in flight */
  numCoalesced: number;
  /** Fetch cycles that ended in an error (cancellation included) */
  numFailures: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numHits: 0,
  numMisses: 0,
  numCoalesced: 0,
  numFailures: 0
});

export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100; // Log every 100 requests

  public constructor(private readonly name: string = 'coalescer') { }

  incrementRequests(): void {
    this.stats.numRequests++;
    this.maybeLogStats();
  }

  incrementHits(): void {
    this.stats.numHits++;
  }

  incrementMisses(): void {
    this.stats.numMisses++;
  }

  incrementCoalesced(): void {
    this.stats.numCoalesced++;
  }

  incrementFailures(): void {
    this.stats.numFailures++;
  }

  /**
   * Log statistics periodically for monitoring
   */
  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;
    if (requestsSinceLastLog < this.LOG_THRESHOLD) {
      return;
    }
    const hitRate = ((this.stats.numHits / this.stats.numRequests) * 100).toFixed(2);
    logger.debug('Cache statistics update', {
      name: this.name,
      totalRequests: this.stats.numRequests,
      hits: this.stats.numHits,
      misses: this.stats.numMisses,
      coalesced: this.stats.numCoalesced,
      failures: this.stats.numFailures,
      hitRate: `${hitRate}%`
    });
    this.lastLoggedRequests = this.stats.numRequests;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}
