import { z } from "zod";

export const PageQuerySchema = z.object({
  page: z.number().int().optional(),
  pageSize: z.number().int().optional()
});

export type PageQuery = z.infer<typeof PageQuerySchema>;

export type Page<T> = {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
};

type PageLimits = {
  defaultPageSize: number;
  maxPageSize: number;
};

// Out-of-range paging input is coerced, never rejected.
export const normalizePage = (query: PageQuery | undefined, limits: PageLimits) => {
  const parsed = PageQuerySchema.safeParse(query ?? {});
  const page = parsed.success && parsed.data.page && parsed.data.page >= 1 ? parsed.data.page : 1;
  const requested = parsed.success ? parsed.data.pageSize : undefined;
  const pageSize =
    requested === undefined || requested < 1
      ? limits.defaultPageSize
      : Math.min(requested, limits.maxPageSize);
  return { page, pageSize, offset: (page - 1) * pageSize };
};
