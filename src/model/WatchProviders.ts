import { z } from 'zod';

export interface WatchProvider {
  id: number;
  name: string;
  logoPath: string | null;
  /** Lower sorts first */
  displayPriority: number;
}

const watchProviderSchema = z
  .object({
    provider_id: z.number().int(),
    provider_name: z.string(),
    logo_path: z.string().nullish(),
    display_priority: z.number().nullish()
  })
  .transform((raw): WatchProvider => ({
    id: raw.provider_id,
    name: raw.provider_name,
    logoPath: raw.logo_path ?? null,
    displayPriority: raw.display_priority ?? Number.MAX_SAFE_INTEGER
  }));

const providerList = z.array(watchProviderSchema).nullish().transform(list => list ?? []);

export interface CountryWatchProviders {
  /** Landing page listing the offers for this country */
  link: string | null;
  flatrate: WatchProvider[];
  rent: WatchProvider[];
  buy: WatchProvider[];
  ads: WatchProvider[];
  free: WatchProvider[];
}

const countryWatchProvidersSchema = z
  .object({
    link: z.string().nullish(),
    flatrate: providerList,
    rent: providerList,
    buy: providerList,
    ads: providerList,
    free: providerList
  })
  .transform((raw): CountryWatchProviders => ({ ...raw, link: raw.link ?? null }));

/**
 * Where a movie can be watched, keyed by ISO 3166-1 country code.
 */
export interface WatchProviders {
  id: number;
  results: Record<string, CountryWatchProviders>;
}

export const watchProvidersSchema = z.object({
  id: z.number().int(),
  results: z.record(countryWatchProvidersSchema)
});

export interface WatchProviderSummary {
  streaming: WatchProvider[];
  rent: WatchProvider[];
  buy: WatchProvider[];
  /** Free and ad-supported offers */
  free: WatchProvider[];
  link: string | null;
  /** Every provider once, by display priority */
  allProviders: WatchProvider[];
}

/**
 * Offers for one country, or null when the movie has none there.
 */
export const summarizeWatchProviders = (providers: WatchProviders, country = 'US'): WatchProviderSummary | null => {
  const offers = providers.results[country];
  if (!offers) {
    return null;
  }
  const free = [...offers.free, ...offers.ads];
  const seen = new Set<number>();
  const allProviders = [...offers.flatrate, ...offers.rent, ...offers.buy, ...free]
    .filter(provider => {
      if (seen.has(provider.id)) {
        return false;
      }
      seen.add(provider.id);
      return true;
    })
    .sort((a, b) => a.displayPriority - b.displayPriority);

  return {
    streaming: offers.flatrate,
    rent: offers.rent,
    buy: offers.buy,
    free,
    link: offers.link,
    allProviders
  };
};
