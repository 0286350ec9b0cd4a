import { Request } from 'express';
import { z } from 'zod';
import { NotFoundError } from './errors';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  page_size: z.coerce.number().int().positive().default(DEFAULT_PAGE_SIZE)
});

export type PageQuery = z.output<typeof pageQuerySchema>;

const pageUrl = (req: Request, page: number): string => {
  const url = new URL(req.originalUrl, `${req.protocol}://${req.get('host') ?? 'localhost'}`);
  if (page === 1) {
    url.searchParams.delete('page');
  } else {
    url.searchParams.set('page', String(page));
  }
  return url.toString();
};

/**
 * Page-based slicing with absolute next/previous links. Page sizes above
 * MAX_PAGE_SIZE are clamped; a page past the end is a 404.
 */
export const paginate = <T, R>(
  req: Request,
  items: T[],
  query: PageQuery,
  serialize: (item: T) => R
): Page<R> => {
  const pageSize = Math.min(query.page_size, MAX_PAGE_SIZE);
  const totalPages = Math.max(1, Math.ceil(items.length / pageSize));

  if (query.page > totalPages) {
    throw new NotFoundError('Invalid page');
  }

  const startIndex = (query.page - 1) * pageSize;
  const endIndex = startIndex + pageSize;

  return {
    count: items.length,
    next: query.page < totalPages ? pageUrl(req, query.page + 1) : null,
    previous: query.page > 1 ? pageUrl(req, query.page - 1) : null,
    results: items.slice(startIndex, endIndex).map(serialize)
  };
};
