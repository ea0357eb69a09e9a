import { z } from 'zod';

const IMAGE_BASE_URL = 'https://image.tmdb.org/t/p';

/**
 * Raw catalog JSON as served by the remote API (snake_case), normalised into the
 * camelCase CatalogItem. Missing optional fields fall back to neutral defaults so a
 * sparse record still decodes.
 */
export const catalogItemSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    overview: z.string().nullish(),
    poster_path: z.string().nullish(),
    backdrop_path: z.string().nullish(),
    release_date: z.string().nullish(),
    vote_average: z.number().nullish(),
    vote_count: z.number().int().nullish(),
    popularity: z.number().nullish(),
    genre_ids: z.array(z.number().int()).nullish(),
    adult: z.boolean().nullish(),
    original_language: z.string().nullish(),
    original_title: z.string().nullish(),
    video: z.boolean().nullish()
  })
  .transform((raw): CatalogItem => ({
    id: raw.id,
    title: raw.title,
    overview: raw.overview ?? '',
    posterPath: raw.poster_path ?? null,
    backdropPath: raw.backdrop_path ?? null,
    releaseDate: raw.release_date ? raw.release_date : null,
    voteAverage: raw.vote_average ?? 0,
    voteCount: raw.vote_count ?? 0,
    popularity: raw.popularity ?? 0,
    genreIds: raw.genre_ids ?? [],
    adult: raw.adult ?? false,
    originalLanguage: raw.original_language ?? '',
    originalTitle: raw.original_title ?? raw.title,
    video: raw.video ?? false
  }));

/**
 * A movie in the catalog. Identity is the `id` alone: two values with the same id
 * are the same item even when other fields differ.
 */
export interface CatalogItem {
  readonly id: number;
  readonly title: string;
  readonly overview: string;
  readonly posterPath: string | null;
  readonly backdropPath: string | null;
  /** `YYYY-MM-DD`, when known */
  readonly releaseDate: string | null;
  /** 0–10 */
  readonly voteAverage: number;
  readonly voteCount: number;
  readonly popularity: number;
  readonly genreIds: readonly number[];
  readonly adult: boolean;
  readonly originalLanguage: string;
  readonly originalTitle: string;
  readonly video: boolean;
}

export const isSameItem = (a: Pick<CatalogItem, 'id'>, b: Pick<CatalogItem, 'id'>): boolean => a.id === b.id;

/**
 * Drop repeated ids, keeping the first occurrence.
 */
export const uniqueById = <T extends Pick<CatalogItem, 'id'>>(items: readonly T[]): T[] => {
  const seen = new Set<number>();
  const unique: T[] = [];
  for (const item of items) {
    if (!seen.has(item.id)) {
      seen.add(item.id);
      unique.push(item);
    }
  }
  return unique;
};

export const releaseYear = (item: Pick<CatalogItem, 'releaseDate'>): number | null => {
  if (!item.releaseDate) {
    return null;
  }
  const year = Number.parseInt(item.releaseDate.split('-')[0], 10);
  return Number.isFinite(year) ? year : null;
};

export type PosterSize = 'w185' | 'w342' | 'w500' | 'original';

export const posterUrl = (item: Pick<CatalogItem, 'posterPath'>, size: PosterSize = 'w500'): string | null =>
  item.posterPath ? `${IMAGE_BASE_URL}/${size}${item.posterPath}` : null;

export const backdropUrl = (item: Pick<CatalogItem, 'backdropPath'>): string | null =>
  item.backdropPath ? `${IMAGE_BASE_URL}/original${item.backdropPath}` : null;
