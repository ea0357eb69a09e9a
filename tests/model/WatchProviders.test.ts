import { describe, expect, it } from 'vitest';
import { summarizeWatchProviders, watchProvidersSchema } from '../../src/model/WatchProviders';

const provider = (id: number, priority: number) => ({
  provider_id: id,
  provider_name: `Provider ${id}`,
  logo_path: null,
  display_priority: priority
});

const providers = watchProvidersSchema.parse({
  id: 7,
  results: {
    US: {
      link: 'https://catalog.test/movie/7/watch?locale=US',
      flatrate: [provider(8, 3)],
      rent: [provider(2, 1), provider(8, 3)],
      buy: [provider(2, 1)],
      ads: [provider(300, 0)],
      free: [provider(73, 5)]
    },
    DE: {
      buy: [provider(2, 1)]
    }
  }
});

describe('WatchProviders', () => {
  it('should decode missing offer kinds as empty lists', () => {
    expect(providers.results.DE).toEqual({
      link: null,
      flatrate: [],
      rent: [],
      buy: [{ id: 2, name: 'Provider 2', logoPath: null, displayPriority: 1 }],
      ads: [],
      free: []
    });
  });

  it('should summarise one country with free and ad-supported offers together', () => {
    const summary = summarizeWatchProviders(providers);

    expect(summary?.streaming.map(entry => entry.id)).toEqual([8]);
    expect(summary?.free.map(entry => entry.id)).toEqual([73, 300]);
    expect(summary?.link).toBe('https://catalog.test/movie/7/watch?locale=US');
  });

  it('should list every provider once by display priority', () => {
    expect(summarizeWatchProviders(providers)?.allProviders.map(entry => entry.id)).toEqual([300, 2, 8, 73]);
  });

  it('should return null for a country without offers', () => {
    expect(summarizeWatchProviders(providers, 'FR')).toBeNull();
  });
});
