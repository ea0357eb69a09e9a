import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CACHE_CATEGORIES, CacheCategory, cacheCategorySchema, CachedItem } from './CacheCategory';
import { CatalogItem } from '../model/CatalogItem';
import { atomicWriteFile, readFileIfExists } from '../utils/atomicWrite';
import LibLogger from '../logger';

const logger = LibLogger.get('OfflineCacheStore');

/**
 * Everything the offline cache persists: items in insertion order plus the category index.
 */
export interface OfflineSnapshot {
  entries: CachedItem[];
  index: Partial<Record<CacheCategory, number[]>>;
}

export interface OfflineCacheStore {
  load(): Promise<OfflineSnapshot>;
  save(snapshot: OfflineSnapshot): Promise<void>;
  clear(): Promise<void>;
}

const cloneSnapshot = (snapshot: OfflineSnapshot): OfflineSnapshot => {
  const index: Partial<Record<CacheCategory, number[]>> = {};
  for (const category of CACHE_CATEGORIES) {
    const ids = snapshot.index[category];
    if (ids) {
      index[category] = [...ids];
    }
  }
  return { entries: snapshot.entries.map(entry => ({ ...entry })), index };
};

export class MemoryCacheStore implements OfflineCacheStore {
  private snapshot: OfflineSnapshot = { entries: [], index: {} };
  public saveCount = 0;

  public async load(): Promise<OfflineSnapshot> {
    return cloneSnapshot(this.snapshot);
  }

  public async save(snapshot: OfflineSnapshot): Promise<void> {
    this.saveCount++;
    this.snapshot = cloneSnapshot(snapshot);
  }

  public async clear(): Promise<void> {
    this.snapshot = { entries: [], index: {} };
  }
}

// Items are persisted in their normalised camelCase form
const storedItemSchema: z.ZodType<CatalogItem> = z.object({
  id: z.number().int(),
  title: z.string(),
  overview: z.string(),
  posterPath: z.string().nullable(),
  backdropPath: z.string().nullable(),
  releaseDate: z.string().nullable(),
  voteAverage: z.number(),
  voteCount: z.number(),
  popularity: z.number(),
  genreIds: z.array(z.number().int()),
  adult: z.boolean(),
  originalLanguage: z.string(),
  originalTitle: z.string(),
  video: z.boolean()
});

const storedEntrySchema = z.object({
  item: storedItemSchema,
  cachedAt: z.string().datetime(),
  expiresAt: z.string().datetime()
});

const moviesFileSchema = z.array(storedEntrySchema);

const indexFileSchema = z.record(z.string(), z.array(z.number().int()));

export interface FileCacheStoreOptions {
  /** Entries cached longer ago than this are dropped at load time */
  maxDiskAgeMs: number;
  now?: () => number;
}

/**
 * Offline cache on disk: `movies.json` (entries) and `index.json` (category index)
 * in one directory, each replaced atomically.
 */
export class FileCacheStore implements OfflineCacheStore {
  private readonly moviesFile: string;
  private readonly indexFile: string;
  private readonly now: () => number;

  public constructor(
    private readonly directory: string,
    private readonly options: FileCacheStoreOptions
  ) {
    this.moviesFile = path.join(directory, 'movies.json');
    this.indexFile = path.join(directory, 'index.json');
    this.now = options.now ?? Date.now;
  }

  public async load(): Promise<OfflineSnapshot> {
    const [entries, index] = await Promise.all([this.loadEntries(), this.loadIndex()]);
    return { entries, index };
  }

  private async loadEntries(): Promise<CachedItem[]> {
    const raw = await readFileIfExists(this.moviesFile);
    if (raw === null) {
      return [];
    }
    const parsed = safeJson(raw, moviesFileSchema);
    if (!parsed.success) {
      logger.error('Discarding malformed movie cache file', { file: this.moviesFile, reason: parsed.reason });
      return [];
    }

    const cutoff = this.now() - this.options.maxDiskAgeMs;
    const entries = parsed.data
      .map(stored => ({
        item: stored.item,
        cachedAt: Date.parse(stored.cachedAt),
        expiresAt: Date.parse(stored.expiresAt)
      }))
      .filter(entry => entry.cachedAt > cutoff);

    logger.debug('Loaded movie cache from disk', {
      loaded: entries.length,
      droppedAsTooOld: parsed.data.length - entries.length
    });
    return entries;
  }

  private async loadIndex(): Promise<Partial<Record<CacheCategory, number[]>>> {
    const raw = await readFileIfExists(this.indexFile);
    if (raw === null) {
      return {};
    }
    const parsed = safeJson(raw, indexFileSchema);
    if (!parsed.success) {
      logger.error('Discarding malformed category index file', { file: this.indexFile, reason: parsed.reason });
      return {};
    }

    const index: Partial<Record<CacheCategory, number[]>> = {};
    for (const [name, ids] of Object.entries(parsed.data)) {
      const category = cacheCategorySchema.safeParse(name);
      if (category.success) {
        index[category.data] = ids;
      } else {
        logger.warning('Ignoring unknown cache category in index', { category: name });
      }
    }
    return index;
  }

  public async save(snapshot: OfflineSnapshot): Promise<void> {
    const entries = snapshot.entries.map(entry => ({
      item: entry.item,
      cachedAt: new Date(entry.cachedAt).toISOString(),
      expiresAt: new Date(entry.expiresAt).toISOString()
    }));
    await atomicWriteFile(this.moviesFile, JSON.stringify(entries, null, 2));
    await atomicWriteFile(this.indexFile, JSON.stringify(snapshot.index, null, 2));
    logger.trace('Persisted offline cache', { entries: entries.length });
  }

  public async clear(): Promise<void> {
    await fs.rm(this.directory, { recursive: true, force: true });
  }
}

type SafeJsonResult<T> = { success: true; data: T } | { success: false; reason: string };

const safeJson = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): SafeJsonResult<T> => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { success: false, reason: error instanceof Error ? error.message : String(error) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { success: false, reason: parsed.error.message };
  }
  return { success: true, data: parsed.data };
};
