import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { interactionActionSchema } from './Interaction';
import { atomicWriteFile, readFileIfExists } from '../utils/atomicWrite';

const weightsSchema = z.record(z.string(), z.number());

export const persistedPreferencesSchema = z.object({
  version: z.literal(1),
  history: z.array(
    z.object({
      id: z.string(),
      itemId: z.number().int(),
      action: interactionActionSchema,
      genreIds: z.array(z.number().int()),
      rating: z.number(),
      releaseYear: z.number().int().nullable(),
      timestamp: z.string().datetime()
    })
  ),
  genreWeights: weightsSchema,
  actorWeights: weightsSchema,
  directorWeights: weightsSchema,
  decadeWeights: weightsSchema,
  ratingRange: z.object({ low: z.number(), high: z.number() }),
  averageRating: z.number(),
  interactionCount: z.number().int().nonnegative()
});

export type PersistedPreferences = z.infer<typeof persistedPreferencesSchema>;

/**
 * Raw storage for the preference profile. Validation happens in the scorer, so a
 * store only moves JSON values.
 */
export interface PreferenceStore {
  /** Stored JSON value, or undefined when nothing is stored */
  load(): Promise<unknown>;
  save(state: PersistedPreferences): Promise<void>;
  clear(): Promise<void>;
}

export class MemoryPreferenceStore implements PreferenceStore {
  private stored: string | undefined;
  public saveCount = 0;

  public constructor(initial?: unknown) {
    this.stored = initial === undefined ? undefined : JSON.stringify(initial);
  }

  public async load(): Promise<unknown> {
    return this.stored === undefined ? undefined : JSON.parse(this.stored);
  }

  public async save(state: PersistedPreferences): Promise<void> {
    this.saveCount++;
    this.stored = JSON.stringify(state);
  }

  public async clear(): Promise<void> {
    this.stored = undefined;
  }
}

export class FilePreferenceStore implements PreferenceStore {
  public constructor(private readonly filePath: string) { }

  public static inDirectory(directory: string): FilePreferenceStore {
    return new FilePreferenceStore(path.join(directory, 'recommendation_preferences.json'));
  }

  public async load(): Promise<unknown> {
    const raw = await readFileIfExists(this.filePath);
    return raw === null ? undefined : JSON.parse(raw);
  }

  public async save(state: PersistedPreferences): Promise<void> {
    await atomicWriteFile(this.filePath, JSON.stringify(state, null, 2));
  }

  public async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
