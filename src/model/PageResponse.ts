import { z } from 'zod';

/**
 * Page wrapper shared by every list endpoint: `{page, results, total_pages, total_results}`.
 */
export interface PageResponse<T> {
  page: number;
  results: T[];
  totalPages: number;
  totalResults: number;
}

export const pageSchema = <S extends z.ZodTypeAny>(itemSchema: S) =>
  z
    .object({
      page: z.number().int(),
      results: z.array(itemSchema),
      total_pages: z.number().int(),
      total_results: z.number().int()
    })
    .transform((raw): PageResponse<z.output<S>> => ({
      page: raw.page,
      results: raw.results,
      totalPages: raw.total_pages,
      totalResults: raw.total_results
    }));

export const emptyPage = <T>(page = 1): PageResponse<T> => ({
  page,
  results: [],
  totalPages: 0,
  totalResults: 0
});
