import { z } from 'zod';

export const INTERACTION_ACTIONS = ['superLiked', 'liked', 'watchLater', 'viewed', 'skipped'] as const;

export type InteractionAction = typeof INTERACTION_ACTIONS[number];

export const interactionActionSchema = z.enum(INTERACTION_ACTIONS);

/**
 * Genre weight added per genre of an item the user acted on
 */
export const ACTION_WEIGHTS: Record<InteractionAction, number> = {
  superLiked: 2.5,
  liked: 1.5,
  watchLater: 1.0,
  viewed: 0.2,
  skipped: -0.5
};

export const isPositiveAction = (action: InteractionAction): boolean =>
  action === 'liked' || action === 'superLiked';

export interface InteractionEvent {
  id: string;
  itemId: number;
  action: InteractionAction;
  genreIds: number[];
  /** The item's average rating at the time of the interaction */
  rating: number;
  releaseYear: number | null;
  /** Epoch milliseconds */
  timestamp: number;
}

/** `1994` becomes `"1990s"` */
export const decadeOf = (year: number): string => `${Math.floor(year / 10) * 10}s`;
