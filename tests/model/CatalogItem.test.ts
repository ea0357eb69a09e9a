import { describe, expect, it } from 'vitest';
import {
  backdropUrl,
  catalogItemSchema,
  isSameItem,
  posterUrl,
  releaseYear,
  uniqueById
} from '../../src/model/CatalogItem';
import { emptyPage, pageSchema } from '../../src/model/PageResponse';
import { makeItem, rawItem, rawPage } from '../helpers/fixtures';

describe('CatalogItem', () => {
  describe('catalogItemSchema', () => {
    it('should convert the remote field names', () => {
      expect(catalogItemSchema.parse(rawItem(7))).toEqual({
        id: 7,
        title: 'Movie 7',
        overview: 'Overview 7',
        posterPath: '/poster7.jpg',
        backdropPath: null,
        releaseDate: '2020-05-01',
        voteAverage: 7.1,
        voteCount: 120,
        popularity: 10.5,
        genreIds: [28],
        adult: false,
        originalLanguage: 'en',
        originalTitle: 'Movie 7',
        video: false
      });
    });

    it('should fill in defaults for a sparse record', () => {
      expect(catalogItemSchema.parse({ id: 3, title: 'Sparse', release_date: '', overview: null })).toEqual({
        id: 3,
        title: 'Sparse',
        overview: '',
        posterPath: null,
        backdropPath: null,
        releaseDate: null,
        voteAverage: 0,
        voteCount: 0,
        popularity: 0,
        genreIds: [],
        adult: false,
        originalLanguage: '',
        originalTitle: 'Sparse',
        video: false
      });
    });

    it('should reject a record without a title', () => {
      const result = catalogItemSchema.safeParse({ id: 3 });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].path).toEqual(['title']);
    });
  });

  it('should compare items by id alone', () => {
    expect(isSameItem(makeItem(1, { title: 'A' }), makeItem(1, { title: 'B' }))).toBe(true);
    expect(isSameItem(makeItem(1), makeItem(2))).toBe(false);
  });

  it('should keep the first occurrence of each id', () => {
    const items = [makeItem(1, { title: 'first' }), makeItem(2), makeItem(1, { title: 'second' }), makeItem(3)];

    const unique = uniqueById(items);

    expect(unique.map(item => item.id)).toEqual([1, 2, 3]);
    expect(unique[0].title).toBe('first');
  });

  it('should read the release year', () => {
    expect(releaseYear({ releaseDate: '1999-12-31' })).toBe(1999);
    expect(releaseYear({ releaseDate: null })).toBeNull();
    expect(releaseYear({ releaseDate: 'unknown' })).toBeNull();
  });

  it('should build image URLs', () => {
    expect(posterUrl({ posterPath: '/p.jpg' })).toBe('https://image.tmdb.org/t/p/w500/p.jpg');
    expect(posterUrl({ posterPath: '/p.jpg' }, 'w185')).toBe('https://image.tmdb.org/t/p/w185/p.jpg');
    expect(posterUrl({ posterPath: null })).toBeNull();
    expect(backdropUrl({ backdropPath: '/b.jpg' })).toBe('https://image.tmdb.org/t/p/original/b.jpg');
    expect(backdropUrl({ backdropPath: null })).toBeNull();
  });
});

describe('PageResponse', () => {
  it('should decode a page of items', () => {
    const page = pageSchema(catalogItemSchema).parse(rawPage([1, 2], 2));

    expect(page.page).toBe(2);
    expect(page.results.map(item => item.id)).toEqual([1, 2]);
    expect(page.results[0].posterPath).toBe('/poster1.jpg');
    expect(page.totalPages).toBe(5);
    expect(page.totalResults).toBe(100);
  });

  it('should report an invalid item by its position', () => {
    const raw = { ...rawPage([1]), results: [rawItem(1), { id: 'two', title: 'Two' }] };
    const result = pageSchema(catalogItemSchema).safeParse(raw);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['results', 1, 'id']);
  });

  it('should build an empty page', () => {
    expect(emptyPage(3)).toEqual({ page: 3, results: [], totalPages: 0, totalResults: 0 });
  });
});
