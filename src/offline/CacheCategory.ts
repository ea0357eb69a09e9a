import { z } from 'zod';
import { CatalogItem } from '../model/CatalogItem';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const CACHE_CATEGORIES = [
  'trending',
  'popular',
  'topRated',
  'nowPlaying',
  'upcoming',
  'recent',
  'search',
  'watchlistRelated',
  'recommendations'
] as const;

export type CacheCategory = typeof CACHE_CATEGORIES[number];

export const cacheCategorySchema = z.enum(CACHE_CATEGORIES);

/**
 * How long an item cached under each category stays valid
 */
export const CATEGORY_TTL_MS: Record<CacheCategory, number> = {
  trending: HOUR,
  popular: 24 * HOUR,
  topRated: 24 * HOUR,
  nowPlaying: HOUR,
  upcoming: 12 * HOUR,
  recent: 6 * HOUR,
  search: 30 * MINUTE,
  watchlistRelated: 2 * HOUR,
  recommendations: 2 * HOUR
};

/**
 * An item in the offline cache. Timestamps are epoch milliseconds.
 */
export interface CachedItem {
  item: CatalogItem;
  cachedAt: number;
  expiresAt: number;
}

export const isExpired = (entry: Pick<CachedItem, 'expiresAt'>, now: number): boolean => now > entry.expiresAt;

/** Ordered item ids per category */
export type CategoryIndex = Map<CacheCategory, number[]>;
