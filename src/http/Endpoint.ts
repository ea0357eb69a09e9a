import { z } from 'zod';
import { CatalogItem, catalogItemSchema } from '../model/CatalogItem';
import { PageResponse, pageSchema } from '../model/PageResponse';
import {
  Credits,
  creditsSchema,
  Genre,
  genreListSchema,
  MovieDetails,
  movieDetailsSchema,
  Person,
  personMovieCreditsSchema,
  personSchema,
  VideoResponse,
  videoResponseSchema
} from '../model/CatalogDetails';
import { WatchProviders, watchProvidersSchema } from '../model/WatchProviders';

export type QueryValue = string | number | boolean;

/**
 * Typed description of one GET request against the catalog API.
 */
export interface Endpoint<T> {
  /** Stable identifier of the endpoint kind, used in logs */
  name: string;
  path: string;
  query: Record<string, QueryValue>;
  decoder: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Overrides the client's default per-attempt timeout */
  timeoutMs?: number;
  /** Human-readable form for logs */
  description: string;
}

const moviePage = pageSchema(catalogItemSchema);

export type MoviePage = PageResponse<CatalogItem>;

/** List endpoints that return a page of movies and take only a page number */
export type MovieListKind = 'trending' | 'popular' | 'topRated' | 'nowPlaying' | 'upcoming' | 'recent';

const listPaths: Record<Exclude<MovieListKind, 'recent'>, string> = {
  trending: '/trending/movie/day',
  popular: '/movie/popular',
  topRated: '/movie/top_rated',
  nowPlaying: '/movie/now_playing',
  upcoming: '/movie/upcoming'
};

const listDescriptions: Record<MovieListKind, string> = {
  trending: 'Trending Movies',
  popular: 'Popular Movies',
  topRated: 'Top Rated Movies',
  nowPlaying: 'Now Playing Movies',
  upcoming: 'Upcoming Movies',
  recent: 'Recent Movies'
};

const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Popular releases of the last six months with at least 50 votes.
 */
export const discoverRecent = (page: number, today: Date = new Date()): Endpoint<MoviePage> => {
  const sixMonthsAgo = new Date(today.getTime());
  sixMonthsAgo.setUTCMonth(sixMonthsAgo.getUTCMonth() - 6);
  return {
    name: 'recent',
    path: '/discover/movie',
    query: {
      page,
      sort_by: 'popularity.desc',
      include_adult: false,
      include_video: true,
      'primary_release_date.gte': formatDate(sixMonthsAgo),
      'primary_release_date.lte': formatDate(today),
      'vote_count.gte': 50
    },
    decoder: moviePage,
    description: `${listDescriptions.recent} (Page ${page})`
  };
};

export const movieList = (kind: MovieListKind, page: number): Endpoint<MoviePage> => {
  if (kind === 'recent') {
    return discoverRecent(page);
  }
  return {
    name: kind,
    path: listPaths[kind],
    query: { page },
    decoder: moviePage,
    description: `${listDescriptions[kind]} (Page ${page})`
  };
};

export const searchMovies = (query: string, page: number, timeoutMs?: number): Endpoint<MoviePage> => ({
  name: 'search',
  path: '/search/movie',
  query: { query, page, include_adult: false },
  decoder: moviePage,
  timeoutMs,
  description: `Search: "${query}" (Page ${page})`
});

export const movieDetails = (id: number): Endpoint<MovieDetails> => ({
  name: 'movieDetails',
  path: `/movie/${id}`,
  query: {},
  decoder: movieDetailsSchema,
  description: `Movie Details (ID: ${id})`
});

export const videos = (movieId: number): Endpoint<VideoResponse> => ({
  name: 'videos',
  path: `/movie/${movieId}/videos`,
  query: {},
  decoder: videoResponseSchema,
  description: `Videos for Movie (ID: ${movieId})`
});

export const credits = (movieId: number): Endpoint<Credits> => ({
  name: 'credits',
  path: `/movie/${movieId}/credits`,
  query: {},
  decoder: creditsSchema,
  description: `Credits for Movie (ID: ${movieId})`
});

export const similarMovies = (movieId: number, page: number): Endpoint<MoviePage> => ({
  name: 'similar',
  path: `/movie/${movieId}/similar`,
  query: { page },
  decoder: moviePage,
  description: `Similar Movies (ID: ${movieId}, Page ${page})`
});

export const recommendations = (movieId: number, page: number): Endpoint<MoviePage> => ({
  name: 'recommendations',
  path: `/movie/${movieId}/recommendations`,
  query: { page },
  decoder: moviePage,
  description: `Recommendations (ID: ${movieId}, Page ${page})`
});

export const watchProviders = (movieId: number): Endpoint<WatchProviders> => ({
  name: 'watchProviders',
  path: `/movie/${movieId}/watch/providers`,
  query: {},
  decoder: watchProvidersSchema,
  description: `Watch Providers (ID: ${movieId})`
});

export const person = (personId: number): Endpoint<Person> => ({
  name: 'person',
  path: `/person/${personId}`,
  query: {},
  decoder: personSchema,
  description: `Person (ID: ${personId})`
});

export const personMovieCredits = (personId: number): Endpoint<CatalogItem[]> => ({
  name: 'personMovieCredits',
  path: `/person/${personId}/movie_credits`,
  query: {},
  decoder: personMovieCreditsSchema,
  description: `Movie Credits for Person (ID: ${personId})`
});

export const genres = (): Endpoint<Genre[]> => ({
  name: 'genres',
  path: '/genre/movie/list',
  query: {},
  decoder: genreListSchema,
  description: 'Genre List'
});

/**
 * Build the request URL. `apiKey` is always the first query parameter.
 */
export const buildUrl = (baseUrl: string, endpoint: Endpoint<unknown>, apiKey: string): URL => {
  const url = new URL(baseUrl.replace(/\/+$/, '') + endpoint.path);
  url.searchParams.set('api_key', apiKey);
  for (const [name, value] of Object.entries(endpoint.query)) {
    url.searchParams.set(name, String(value));
  }
  return url;
};
