import { z } from 'zod';
import { CatalogItem, catalogItemSchema } from './CatalogItem';

export interface Genre {
  id: number;
  name: string;
}

export const genreSchema = z.object({
  id: z.number().int(),
  name: z.string()
});

export const genreListSchema = z
  .object({ genres: z.array(genreSchema) })
  .transform((raw): Genre[] => raw.genres);

export interface MovieDetails extends CatalogItem {
  runtime: number | null;
  tagline: string | null;
  status: string | null;
  genres: Genre[];
}

/**
 * Detail payloads carry `genres` objects instead of `genre_ids`.
 */
export const movieDetailsSchema = z
  .object({
    runtime: z.number().int().nullish(),
    tagline: z.string().nullish(),
    status: z.string().nullish(),
    genres: z.array(genreSchema).nullish()
  })
  .passthrough()
  .transform((raw, ctx): MovieDetails => {
    const genres = raw.genres ?? [];
    const base = catalogItemSchema.safeParse({
      ...raw,
      genre_ids: raw.genre_ids ?? genres.map(genre => genre.id)
    });
    if (!base.success) {
      for (const issue of base.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    return {
      ...base.data,
      runtime: raw.runtime ?? null,
      tagline: raw.tagline ? raw.tagline : null,
      status: raw.status ?? null,
      genres
    };
  });

export interface Video {
  id: string;
  key: string;
  name: string;
  site: string;
  type: string;
  official: boolean;
}

export const videoResponseSchema = z
  .object({
    id: z.number().int(),
    results: z.array(z.object({
      id: z.string(),
      key: z.string(),
      name: z.string(),
      site: z.string(),
      type: z.string(),
      official: z.boolean().nullish()
    }))
  })
  .transform((raw): VideoResponse => ({
    id: raw.id,
    results: raw.results.map(video => ({ ...video, official: video.official ?? false }))
  }));

export interface VideoResponse {
  id: number;
  results: Video[];
}

/**
 * Pick the video most likely to be the main trailer: an official YouTube trailer,
 * then any YouTube trailer, then any YouTube teaser.
 */
export const primaryTrailer = (videos: Video[]): Video | null => {
  const youtube = videos.filter(video => video.site === 'YouTube');
  return youtube.find(video => video.type === 'Trailer' && video.official)
    ?? youtube.find(video => video.type === 'Trailer')
    ?? youtube.find(video => video.type === 'Teaser')
    ?? null;
};

export interface CastMember {
  id: number;
  name: string;
  character: string;
  order: number;
  profilePath: string | null;
}

export interface CrewMember {
  id: number;
  name: string;
  job: string;
  department: string;
  profilePath: string | null;
}

export interface Credits {
  id: number;
  cast: CastMember[];
  crew: CrewMember[];
}

export const creditsSchema = z
  .object({
    id: z.number().int(),
    cast: z.array(z.object({
      id: z.number().int(),
      name: z.string(),
      character: z.string().nullish(),
      order: z.number().int().nullish(),
      profile_path: z.string().nullish()
    })),
    crew: z.array(z.object({
      id: z.number().int(),
      name: z.string(),
      job: z.string(),
      department: z.string().nullish(),
      profile_path: z.string().nullish()
    }))
  })
  .transform((raw): Credits => ({
    id: raw.id,
    cast: raw.cast.map((member, index) => ({
      id: member.id,
      name: member.name,
      character: member.character ?? '',
      order: member.order ?? index,
      profilePath: member.profile_path ?? null
    })),
    crew: raw.crew.map(member => ({
      id: member.id,
      name: member.name,
      job: member.job,
      department: member.department ?? '',
      profilePath: member.profile_path ?? null
    }))
  }));

export const directorsOf = (credits: Credits): CrewMember[] =>
  credits.crew.filter(member => member.job === 'Director');

export interface Person {
  id: number;
  name: string;
  biography: string;
  birthday: string | null;
  placeOfBirth: string | null;
  knownForDepartment: string;
  profilePath: string | null;
  popularity: number;
}

export const personSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    biography: z.string().nullish(),
    birthday: z.string().nullish(),
    place_of_birth: z.string().nullish(),
    known_for_department: z.string().nullish(),
    profile_path: z.string().nullish(),
    popularity: z.number().nullish()
  })
  .transform((raw): Person => ({
    id: raw.id,
    name: raw.name,
    biography: raw.biography ?? '',
    birthday: raw.birthday ?? null,
    placeOfBirth: raw.place_of_birth ?? null,
    knownForDepartment: raw.known_for_department ?? '',
    profilePath: raw.profile_path ?? null,
    popularity: raw.popularity ?? 0
  }));

export const personMovieCreditsSchema = z
  .object({
    id: z.number().int(),
    cast: z.array(catalogItemSchema)
  })
  .transform((raw): CatalogItem[] => raw.cast);
