import { randomUUID } from 'crypto';
import {
  ACTION_WEIGHTS,
  decadeOf,
  InteractionAction,
  InteractionEvent,
  isPositiveAction
} from './Interaction';
import { genreName } from './Genres';
import { PersistedPreferences, persistedPreferencesSchema, PreferenceStore } from './PreferenceStore';
import { CatalogItem, releaseYear } from '../model/CatalogItem';
import { Credits, directorsOf } from '../model/CatalogDetails';
import { RecommendationOptions } from '../Options';
import LibLogger from '../logger';

const logger = LibLogger.get('RecommendationScorer');

const DAY = 24 * 60 * 60 * 1000;
const INITIAL_RATING_RANGE: RatingRange = { low: 6, high: 10 };
const INITIAL_AVERAGE_RATING = 7;
const TOP_BILLED_CAST = 10;

export interface RatingRange {
  low: number;
  high: number;
}

export interface TasteProfile {
  topGenres: number[];
  topGenreNames: string[];
  /** Mean rating of liked items; 7 when nothing is liked yet */
  averagePreferredRating: number;
  /** Exponentially smoothed rating of liked items */
  smoothedRating: number;
  totalInteractions: number;
  likeRate: number;
  preferredDecades: string[];
  preferredRatingRange: RatingRange;
}

export interface RecordInteractionOptions {
  /** Defaults to now; older timestamps are subject to the retention window */
  timestamp?: number;
}

export interface RecommendationScorerDeps {
  store: PreferenceStore;
  now?: () => number;
  generateId?: () => string;
}

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

const addWeight = <K>(weights: Map<K, number>, key: K, delta: number): void => {
  weights.set(key, (weights.get(key) ?? 0) + delta);
};

const toRecord = <K extends string | number>(weights: Map<K, number>): Record<string, number> => {
  const record: Record<string, number> = {};
  weights.forEach((value, key) => {
    record[String(key)] = value;
  });
  return record;
};

const numericKeyMap = (record: Record<string, number>): Map<number, number> => {
  const map = new Map<number, number>();
  for (const [key, value] of Object.entries(record)) {
    const id = Number(key);
    if (Number.isInteger(id)) {
      map.set(id, value);
    }
  }
  return map;
};

/**
 * Learns a preference profile from interactions and scores catalog items against it.
 *
 * Never throws on bad persisted state: a missing or malformed profile loads as the
 * defaults. Persistence failures are logged.
 */
export class RecommendationScorer {
  private history: InteractionEvent[] = [];
  private genreWeights = new Map<number, number>();
  private actorWeights = new Map<number, number>();
  private directorWeights = new Map<number, number>();
  private decadeWeights = new Map<string, number>();
  private ratingRange: RatingRange = { ...INITIAL_RATING_RANGE };
  private averageRating = INITIAL_AVERAGE_RATING;
  private interactionCount = 0;
  private interacted = new Set<number>();
  private saveQueue: Promise<void> = Promise.resolve();

  private readonly store: PreferenceStore;
  private readonly now: () => number;
  private readonly generateId: () => string;

  public constructor(
    private readonly options: RecommendationOptions,
    deps: RecommendationScorerDeps
  ) {
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
    this.generateId = deps.generateId ?? randomUUID;
  }

  public async recordInteraction(
    item: CatalogItem,
    action: InteractionAction,
    recordOptions: RecordInteractionOptions = {}
  ): Promise<void> {
    logger.default('recordInteraction', { itemId: item.id, action });
    const event: InteractionEvent = {
      id: this.generateId(),
      itemId: item.id,
      action,
      genreIds: [...item.genreIds],
      rating: item.voteAverage,
      releaseYear: releaseYear(item),
      timestamp: recordOptions.timestamp ?? this.now()
    };

    this.history.push(event);
    this.interacted.add(event.itemId);
    this.applyWeights(event);
    this.trimHistory();

    this.interactionCount++;
    if (this.interactionCount % this.options.saveEvery === 0) {
      await this.flush();
    }
  }

  public recordCastInteraction(actorId: number, liked: boolean): void {
    addWeight(this.actorWeights, actorId, liked ? 1.0 : -0.3);
  }

  public recordDirectorInteraction(directorId: number, liked: boolean): void {
    addWeight(this.directorWeights, directorId, liked ? 1.5 : -0.5);
  }

  private applyWeights(event: InteractionEvent): void {
    const weight = ACTION_WEIGHTS[event.action];
    event.genreIds.forEach(genreId => addWeight(this.genreWeights, genreId, weight));

    if (isPositiveAction(event.action)) {
      this.ratingRange = {
        low: Math.max(0, Math.min(this.ratingRange.low, event.rating - 0.5)),
        high: Math.min(10, Math.max(this.ratingRange.high, event.rating + 0.5))
      };
      this.averageRating = this.averageRating * 0.9 + event.rating * 0.1;
    }

    if (event.releaseYear !== null) {
      addWeight(this.decadeWeights, decadeOf(event.releaseYear), weight * 0.3);
    }
  }

  /**
   * Drop events older than the retention window, then keep only the most recent
   * `maxHistorySize`.
   */
  public trimHistory(): void {
    const cutoff = this.now() - this.options.historyRetentionDays * DAY;
    let history = this.history.filter(event => event.timestamp > cutoff);
    if (history.length > this.options.maxHistorySize) {
      history = history.slice(history.length - this.options.maxHistorySize);
    }
    if (history.length !== this.history.length) {
      logger.trace('Trimmed interaction history', { removed: this.history.length - history.length });
      this.history = history;
      this.interacted = new Set(history.map(event => event.itemId));
    }
  }

  /**
   * Score in [0, 100]; higher means a better match for the learned profile.
   * Items already interacted with score 0.
   */
  public score(item: CatalogItem, credits?: Credits): number {
    if (this.interacted.has(item.id)) {
      return 0;
    }

    let score = 50;

    const genreSum = item.genreIds.reduce((sum, genreId) => sum + (this.genreWeights.get(genreId) ?? 0), 0);
    score += clamp(genreSum * 5, -20, 30);

    const rating = item.voteAverage;
    const { low, high } = this.ratingRange;
    if (rating >= low && rating <= high) {
      score += 15;
    } else {
      score -= Math.min(Math.abs(rating - low), Math.abs(rating - high)) * 2;
    }

    if (rating >= 7.5) {
      score += (rating - 7.5) * 4;
    }

    if (item.voteCount > 1000) {
      score += Math.min(5, item.voteCount / 2000);
    }

    const year = releaseYear(item);
    if (year !== null) {
      const currentYear = new Date(this.now()).getUTCFullYear();
      if (year >= currentYear - 1) {
        score += 10;
      } else if (year >= currentYear - 3) {
        score += 5;
      }
      score += clamp((this.decadeWeights.get(decadeOf(year)) ?? 0) * 5, -5, 5);
    }

    if (credits) {
      score += this.creditsBonus(credits);
    }

    return clamp(score, 0, 100);
  }

  private creditsBonus(credits: Credits): number {
    const actorSum = credits.cast
      .slice(0, TOP_BILLED_CAST)
      .reduce((sum, member) => sum + (this.actorWeights.get(member.id) ?? 0), 0);
    const directorSum = directorsOf(credits)
      .reduce((sum, member) => sum + (this.directorWeights.get(member.id) ?? 0), 0);
    return clamp((actorSum + directorSum) * 2, -10, 10);
  }

  /**
   * Unseen items first, then descending by score; equal scores keep their input order.
   */
  public sortByRecommendation<T extends CatalogItem>(items: readonly T[]): T[] {
    return items
      .map(item => ({ item, seen: this.interacted.has(item.id), score: this.score(item) }))
      .sort((a, b) => Number(a.seen) - Number(b.seen) || b.score - a.score)
      .map(({ item }) => item);
  }

  public filterInteracted<T extends CatalogItem>(items: readonly T[]): T[] {
    return items.filter(item => !this.interacted.has(item.id));
  }

  public getRecommendations<T extends CatalogItem>(items: readonly T[], limit = 20): T[] {
    return this.sortByRecommendation(this.filterInteracted(items)).slice(0, limit);
  }

  public hasInteracted(itemId: number): boolean {
    return this.interacted.has(itemId);
  }

  public getTopGenres(limit = 5): number[] {
    return Array.from(this.genreWeights.entries())
      .filter(([, weight]) => weight > 0)
      .sort(([, a], [, b]) => b - a)
      .slice(0, limit)
      .map(([genreId]) => genreId);
  }

  public getDislikedGenres(): number[] {
    return Array.from(this.genreWeights.entries())
      .filter(([, weight]) => weight < -1)
      .sort(([, a], [, b]) => a - b)
      .slice(0, 3)
      .map(([genreId]) => genreId);
  }

  public getTopActors(limit = 10): number[] {
    return Array.from(this.actorWeights.entries())
      .filter(([, weight]) => weight > 0)
      .sort(([, a], [, b]) => b - a)
      .slice(0, limit)
      .map(([actorId]) => actorId);
  }

  public getTasteProfile(): TasteProfile {
    const topGenres = this.getTopGenres(5);
    const liked = this.history.filter(event => isPositiveAction(event.action));
    const averagePreferredRating = liked.length > 0
      ? liked.reduce((sum, event) => sum + event.rating, 0) / liked.length
      : INITIAL_AVERAGE_RATING;

    return {
      topGenres,
      topGenreNames: topGenres.map(genreName).filter((name): name is string => name !== null),
      averagePreferredRating,
      smoothedRating: this.averageRating,
      totalInteractions: this.history.length,
      likeRate: liked.length / Math.max(1, this.history.length),
      preferredDecades: Array.from(this.decadeWeights.entries())
        .filter(([, weight]) => weight > 0.5)
        .map(([decade]) => decade),
      preferredRatingRange: { ...this.ratingRange }
    };
  }

  public getHistory(): InteractionEvent[] {
    return this.history.map(event => ({ ...event, genreIds: [...event.genreIds] }));
  }

  /**
   * Replace the in-memory profile with the stored one. Missing or malformed state
   * leaves the defaults in place.
   */
  public async load(): Promise<void> {
    let raw: unknown;
    try {
      raw = await this.store.load();
    } catch (error) {
      logger.error('Failed to read stored preferences, using defaults', { error });
      this.resetMemory();
      return;
    }

    this.resetMemory();
    if (raw === undefined) {
      logger.debug('No stored preferences');
      return;
    }

    const parsed = persistedPreferencesSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Stored preferences are malformed, using defaults', { issues: parsed.error.issues.length });
      return;
    }

    const state = parsed.data;
    this.history = state.history.map(event => ({ ...event, timestamp: Date.parse(event.timestamp) }));
    this.genreWeights = numericKeyMap(state.genreWeights);
    this.actorWeights = numericKeyMap(state.actorWeights);
    this.directorWeights = numericKeyMap(state.directorWeights);
    this.decadeWeights = new Map(Object.entries(state.decadeWeights));
    this.ratingRange = { ...state.ratingRange };
    this.averageRating = state.averageRating;
    this.interactionCount = state.interactionCount;
    this.interacted = new Set(this.history.map(event => event.itemId));
    this.trimHistory();
    logger.debug('Loaded preferences', { interactions: this.history.length });
  }

  /**
   * Persist the current profile. Writes are queued; failures are logged.
   */
  public flush(): Promise<void> {
    const state = this.toPersisted();
    this.saveQueue = this.saveQueue
      .then(() => this.store.save(state))
      .catch((error: unknown) => {
        logger.error('Failed to save preferences', { error });
      });
    return this.saveQueue;
  }

  /**
   * Forget everything, in memory and in the store.
   */
  public async reset(): Promise<void> {
    logger.default('reset');
    this.resetMemory();
    this.saveQueue = this.saveQueue
      .then(() => this.store.clear())
      .catch((error: unknown) => {
        logger.error('Failed to clear stored preferences', { error });
      });
    await this.saveQueue;
  }

  private resetMemory(): void {
    this.history = [];
    this.genreWeights = new Map();
    this.actorWeights = new Map();
    this.directorWeights = new Map();
    this.decadeWeights = new Map();
    this.ratingRange = { ...INITIAL_RATING_RANGE };
    this.averageRating = INITIAL_AVERAGE_RATING;
    this.interactionCount = 0;
    this.interacted = new Set();
  }

  private toPersisted(): PersistedPreferences {
    return {
      version: 1,
      history: this.history.map(event => ({
        ...event,
        genreIds: [...event.genreIds],
        timestamp: new Date(event.timestamp).toISOString()
      })),
      genreWeights: toRecord(this.genreWeights),
      actorWeights: toRecord(this.actorWeights),
      directorWeights: toRecord(this.directorWeights),
      decadeWeights: toRecord(this.decadeWeights),
      ratingRange: { ...this.ratingRange },
      averageRating: this.averageRating,
      interactionCount: this.interactionCount
    };
  }

  /** Seed genre weights directly, e.g. from an imported profile */
  public setGenreWeight(genreId: number, weight: number): void {
    this.genreWeights.set(genreId, weight);
  }

  public getGenreWeight(genreId: number): number {
    return this.genreWeights.get(genreId) ?? 0;
  }

  public getRatingRange(): RatingRange {
    return { ...this.ratingRange };
  }
}
