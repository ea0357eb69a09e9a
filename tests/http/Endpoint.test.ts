import { describe, expect, it } from 'vitest';
import { buildUrl, discoverRecent, movieDetails, movieList, searchMovies, watchProviders } from '../../src/http/Endpoint';

describe('Endpoint', () => {
  it('should map list kinds to their paths', () => {
    expect(movieList('trending', 1).path).toBe('/trending/movie/day');
    expect(movieList('topRated', 3).path).toBe('/movie/top_rated');
    expect(movieList('nowPlaying', 1).query).toEqual({ page: 1 });
    expect(movieList('upcoming', 2).description).toBe('Upcoming Movies (Page 2)');
  });

  it('should build the recent list from the last six months', () => {
    const endpoint = discoverRecent(2, new Date('2024-08-15T12:00:00Z'));

    expect(endpoint.path).toBe('/discover/movie');
    expect(endpoint.query).toEqual({
      page: 2,
      sort_by: 'popularity.desc',
      include_adult: false,
      include_video: true,
      'primary_release_date.gte': '2024-02-15',
      'primary_release_date.lte': '2024-08-15',
      'vote_count.gte': 50
    });
  });

  it('should exclude adult titles from search', () => {
    const endpoint = searchMovies('star wars', 1, 10000);

    expect(endpoint.query).toEqual({ query: 'star wars', page: 1, include_adult: false });
    expect(endpoint.timeoutMs).toBe(10000);
  });

  it('should address watch providers without extra parameters', () => {
    const endpoint = watchProviders(550);

    expect(endpoint.path).toBe('/movie/550/watch/providers');
    expect(endpoint.query).toEqual({});
    expect(endpoint.description).toBe('Watch Providers (ID: 550)');
  });

  describe('buildUrl', () => {
    it('should put the api key first and tolerate a trailing slash', () => {
      const url = buildUrl('https://catalog.test/3/', movieDetails(42), 'test-secret');

      expect(url.toString()).toBe('https://catalog.test/3/movie/42?api_key=test-secret');
    });

    it('should encode query values', () => {
      const url = buildUrl('https://catalog.test/3', searchMovies('star wars', 2), 'test-secret');

      expect(url.toString())
        .toBe('https://catalog.test/3/search/movie?api_key=test-secret&query=star+wars&page=2&include_adult=false');
    });

    it('should reject an unusable base URL', () => {
      expect(() => buildUrl('not a url', movieDetails(1), 'test-secret')).toThrow();
    });
  });
});
