import { beforeEach, describe, expect, it } from 'vitest';
import { CacheStatsManager } from '../src/CacheStats';

describe('CacheStatsManager', () => {
  let manager: CacheStatsManager;

  beforeEach(() => {
    manager = new CacheStatsManager('test');
  });

  it('should start with all counters at zero', () => {
    expect(manager.getStats()).toEqual({
      numRequests: 0,
      numHits: 0,
      numMisses: 0,
      numCoalesced: 0,
      numFailures: 0
    });
  });

  it('should count each event separately', () => {
    manager.incrementRequests();
    manager.incrementRequests();
    manager.incrementRequests();
    manager.incrementHits();
    manager.incrementMisses();
    manager.incrementCoalesced();
    manager.incrementFailures();

    expect(manager.getStats()).toEqual({
      numRequests: 3,
      numHits: 1,
      numMisses: 1,
      numCoalesced: 1,
      numFailures: 1
    });
  });

  it('should return a snapshot rather than the live counters', () => {
    const snapshot = manager.getStats();
    manager.incrementRequests();

    expect(snapshot.numRequests).toBe(0);
    expect(manager.getStats().numRequests).toBe(1);
  });

  it('should keep counting past the logging threshold', () => {
    for (let i = 0; i < 250; i++) {
      manager.incrementRequests();
      manager.incrementHits();
    }

    expect(manager.getStats().numRequests).toBe(250);
    expect(manager.getStats().numHits).toBe(250);
  });

  it('should reset all counters', () => {
    manager.incrementRequests();
    manager.incrementMisses();
    manager.reset();

    expect(manager.getStats()).toEqual({
      numRequests: 0,
      numHits: 0,
      numMisses: 0,
      numCoalesced: 0,
      numFailures: 0
    });
  });
});
