import { MovieListKind } from './http/Endpoint';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Remote catalog API and retry behaviour
 */
export interface HttpOptions {
  /** Base URL of the catalog API (default: https://api.themoviedb.org/3) */
  baseUrl: string;
  /** Plaintext API key used when the credential store holds none; migrated into the store on first use */
  apiKey?: string;
  /** Maximum number of retries after the first attempt */
  maxRetries: number;
  /** Base delay for exponential backoff in milliseconds */
  baseRetryDelayMs: number;
  /** Upper bound for a single backoff delay in milliseconds */
  maxRetryDelayMs: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Per-attempt timeout for search requests in milliseconds */
  searchTimeoutMs: number;
}

/**
 * How long a coalesced result stays fresh in memory
 */
export interface CoalescerOptions {
  /** Per list; a caller may override single lists */
  listTtlMs: Record<MovieListKind, number>;
  detailTtlMs: number;
  videoTtlMs: number;
}

export interface OfflineOptions {
  /** Maximum number of items kept in memory */
  maxMemoryEntries: number;
  /** Disk entries cached longer ago than this are dropped at load time */
  maxDiskAgeMs: number;
  /** TTL for items cached without a category */
  defaultTtlMs: number;
}

export interface SearchOptions {
  debounceMs: number;
}

export interface BatchOptions {
  maxConcurrent: number;
  delayBetweenBatchesMs: number;
}

export interface RecommendationOptions {
  maxHistorySize: number;
  historyRetentionDays: number;
  /** Persist the profile after this many recorded interactions */
  saveEvery: number;
}

/**
 * Options for a catalog client and all of its components
 */
export interface Options {
  http: HttpOptions;
  coalescer: CoalescerOptions;
  offline: OfflineOptions;
  search: SearchOptions;
  batch: BatchOptions;
  recommendation: RecommendationOptions;
  /** Directory for the offline cache, preference profile and credential files; in-memory stores when unset */
  storageDirectory?: string;
}

type SectionInput<T> = {
  [P in keyof T]?: T[P] extends Record<string, number> ? Partial<T[P]> : T[P];
};

/**
 * Partial options as accepted from callers; every section may be partially filled in
 */
export type OptionsInput = {
  [K in keyof Options]?: Options[K] extends object ? SectionInput<Options[K]> : Options[K];
};

export const DEFAULT_OPTIONS: Options = {
  http: {
    baseUrl: 'https://api.themoviedb.org/3',
    maxRetries: 3,
    baseRetryDelayMs: SECOND,
    maxRetryDelayMs: 30 * SECOND,
    timeoutMs: 30 * SECOND,
    searchTimeoutMs: 10 * SECOND
  },
  coalescer: {
    listTtlMs: {
      trending: 5 * MINUTE,
      popular: 10 * MINUTE,
      topRated: HOUR,
      nowPlaying: 10 * MINUTE,
      upcoming: HOUR,
      recent: 30 * MINUTE
    },
    detailTtlMs: DAY,
    videoTtlMs: DAY
  },
  offline: {
    maxMemoryEntries: 200,
    maxDiskAgeMs: 7 * DAY,
    defaultTtlMs: DAY
  },
  search: {
    debounceMs: 300
  },
  batch: {
    maxConcurrent: 3,
    delayBetweenBatchesMs: 100
  },
  recommendation: {
    maxHistorySize: 500,
    historyRetentionDays: 90,
    saveEvery: 10
  }
};

const SECTIONS = ['http', 'coalescer', 'offline', 'search', 'batch', 'recommendation'] as const;

const VALID_PROPERTIES = new Set<string>([...SECTIONS, 'storageDirectory']);

const SECTION_PROPERTIES: Record<typeof SECTIONS[number], readonly string[]> = {
  http: ['baseUrl', 'apiKey', 'maxRetries', 'baseRetryDelayMs', 'maxRetryDelayMs', 'timeoutMs', 'searchTimeoutMs'],
  coalescer: ['listTtlMs', 'detailTtlMs', 'videoTtlMs'],
  offline: ['maxMemoryEntries', 'maxDiskAgeMs', 'defaultTtlMs'],
  search: ['debounceMs'],
  batch: ['maxConcurrent', 'delayBetweenBatchesMs'],
  recommendation: ['maxHistorySize', 'historyRetentionDays', 'saveEvery']
};

const LIST_KINDS: readonly string[] = Object.keys(DEFAULT_OPTIONS.coalescer.listTtlMs);

const PROPERTY_SUGGESTIONS: Record<string, string> = {
  network: 'http',
  retry: 'http',
  coalescing: 'coalescer',
  cache: 'offline',
  offlineCache: 'offline',
  debounce: 'search',
  batching: 'batch',
  recommendations: 'recommendation',
  scorer: 'recommendation',
  storageDir: 'storageDirectory',
  storage_directory: 'storageDirectory',
  directory: 'storageDirectory'
};

/**
 * Create options with defaults. Sections are merged one level deep so a caller can
 * override a single value without restating the rest of its section.
 */
export const createOptions = (input: OptionsInput = {}): Options => {
  const result: Options = {
    http: { ...DEFAULT_OPTIONS.http, ...input.http },
    coalescer: {
      ...DEFAULT_OPTIONS.coalescer,
      ...input.coalescer,
      listTtlMs: { ...DEFAULT_OPTIONS.coalescer.listTtlMs, ...input.coalescer?.listTtlMs }
    },
    offline: { ...DEFAULT_OPTIONS.offline, ...input.offline },
    search: { ...DEFAULT_OPTIONS.search, ...input.search },
    batch: { ...DEFAULT_OPTIONS.batch, ...input.batch },
    recommendation: { ...DEFAULT_OPTIONS.recommendation, ...input.recommendation },
    storageDirectory: input.storageDirectory
  };

  validateOptions(result, Object.keys(input));

  return result;
};

const requirePositive = (section: string, name: string, value: number, allowZero = false): void => {
  const valid = Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
  if (!valid) {
    logger.error('Invalid option value', { section, name, value });
    throw new Error(`${section}.${name} must be a ${allowZero ? 'non-negative' : 'positive'} number, got ${value}`);
  }
};

const requireInteger = (section: string, name: string, value: number, allowZero = false): void => {
  requirePositive(section, name, value, allowZero);
  if (!Number.isInteger(value)) {
    throw new Error(`${section}.${name} must be an integer, got ${value}`);
  }
};

/**
 * Closest valid name for a misspelt one: the shortest valid name that starts with it
 * or that it starts with, ignoring case.
 */
const suggestName = (key: string, valid: readonly string[]): string | undefined => {
  const lower = key.toLowerCase();
  return valid
    .filter(name => {
      const candidate = name.toLowerCase();
      return candidate.startsWith(lower) || lower.startsWith(candidate);
    })
    .sort((a, b) => a.length - b.length)[0];
};

const rejectUnknown = (
  where: string | undefined,
  providedKeys: string[],
  valid: readonly string[],
  suggest: (key: string) => string | undefined
): void => {
  const unknownProperties = providedKeys.filter(key => !valid.includes(key));
  if (unknownProperties.length === 0) {
    return;
  }
  const hints = unknownProperties.map(key => {
    const suggestion = suggest(key);
    return suggestion ? `${key} (did you mean "${suggestion}"?)` : key;
  });
  logger.error('Unknown options', { where, unknownProperties, validProperties: valid });
  const prefix = where ? `Unknown option(s) in ${where}` : 'Unknown option(s)';
  throw new Error(`${prefix}: ${hints.join(', ')}. Valid options: ${valid.join(', ')}`);
};

/**
 * Validate options, rejecting unknown properties at the top level and inside each
 * section, and out-of-range values
 */
export const validateOptions = (options: Options, providedKeys: string[] = Object.keys(options)): void => {
  rejectUnknown(undefined, providedKeys, Array.from(VALID_PROPERTIES), key => PROPERTY_SUGGESTIONS[key]);
  for (const section of SECTIONS) {
    const valid = SECTION_PROPERTIES[section];
    rejectUnknown(section, Object.keys(options[section]), valid, key => suggestName(key, valid));
  }
  rejectUnknown('coalescer.listTtlMs', Object.keys(options.coalescer.listTtlMs), LIST_KINDS, key => suggestName(key, LIST_KINDS));

  const { http, coalescer, offline, search, batch, recommendation } = options;

  try {
    new URL(http.baseUrl);
  } catch {
    throw new Error(`http.baseUrl must be an absolute URL, got "${http.baseUrl}"`);
  }
  requireInteger('http', 'maxRetries', http.maxRetries, true);
  requirePositive('http', 'baseRetryDelayMs', http.baseRetryDelayMs, true);
  requirePositive('http', 'maxRetryDelayMs', http.maxRetryDelayMs, true);
  requirePositive('http', 'timeoutMs', http.timeoutMs);
  requirePositive('http', 'searchTimeoutMs', http.searchTimeoutMs);
  if (http.maxRetryDelayMs < http.baseRetryDelayMs) {
    throw new Error('http.maxRetryDelayMs must not be smaller than http.baseRetryDelayMs');
  }

  for (const [kind, ttlMs] of Object.entries(coalescer.listTtlMs)) {
    requirePositive('coalescer', `listTtlMs.${kind}`, ttlMs);
  }
  requirePositive('coalescer', 'detailTtlMs', coalescer.detailTtlMs);
  requirePositive('coalescer', 'videoTtlMs', coalescer.videoTtlMs);

  requireInteger('offline', 'maxMemoryEntries', offline.maxMemoryEntries);
  requirePositive('offline', 'maxDiskAgeMs', offline.maxDiskAgeMs);
  requirePositive('offline', 'defaultTtlMs', offline.defaultTtlMs);

  requirePositive('search', 'debounceMs', search.debounceMs, true);

  requireInteger('batch', 'maxConcurrent', batch.maxConcurrent);
  requirePositive('batch', 'delayBetweenBatchesMs', batch.delayBetweenBatchesMs, true);

  requireInteger('recommendation', 'maxHistorySize', recommendation.maxHistorySize);
  requirePositive('recommendation', 'historyRetentionDays', recommendation.historyRetentionDays);
  requireInteger('recommendation', 'saveEvery', recommendation.saveEvery);
};

const parseInteger = (name: string, raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
};

/**
 * Read the options that can be configured from the environment.
 *
 * REEL_CACHE_API_KEY (or TMDB_API_KEY), REEL_CACHE_BASE_URL, REEL_CACHE_DIR, REEL_CACHE_MAX_RETRIES
 */
export const optionsFromEnv = (env: NodeJS.ProcessEnv = process.env): OptionsInput => {
  const http: Partial<HttpOptions> = {};
  const apiKey = (env.REEL_CACHE_API_KEY ?? env.TMDB_API_KEY ?? '').trim();
  if (apiKey) {
    http.apiKey = apiKey;
  }
  if (env.REEL_CACHE_BASE_URL) {
    http.baseUrl = env.REEL_CACHE_BASE_URL;
  }
  if (env.REEL_CACHE_MAX_RETRIES) {
    http.maxRetries = parseInteger('REEL_CACHE_MAX_RETRIES', env.REEL_CACHE_MAX_RETRIES);
  }

  const input: OptionsInput = {};
  if (Object.keys(http).length > 0) {
    input.http = http;
  }
  if (env.REEL_CACHE_DIR) {
    input.storageDirectory = env.REEL_CACHE_DIR;
  }
  logger.debug('Options read from environment', {
    sections: Object.keys(input),
    hasApiKey: Boolean(apiKey)
  });
  return input;
};
