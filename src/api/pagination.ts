import { z } from "zod";

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
  // Past 2^53 the echoed offset would lose precision.
  offset: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
});

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

export interface PageBody<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  /** null once offset + limit reaches total */
  next_offset: number | null;
}

export function buildPage<T>(items: T[], total: number, { limit, offset }: PaginationQuery): PageBody<T> {
  return {
    items,
    total,
    limit,
    offset,
    next_offset: offset + limit < total ? offset + limit : null,
  };
}
