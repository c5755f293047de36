import { z } from 'zod';
import { MisuseFailure } from './errors';
import type { TraversalDirection } from './pageTypes';

/** Page size used when the caller does not pick one. */
export const DEFAULT_PAGE_SIZE = 64;

/** Largest page the reference store accepts in one request. */
export const DEFAULT_MAX_PAGE_SIZE = 100_000;

export const pagingSettingsSchema = z.object({
  index: z.string().min(1, 'index name must not be empty'),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
  maxPageSize: z.number().int().positive().default(DEFAULT_MAX_PAGE_SIZE),
  direction: z.enum(['forward', 'backward']).default('forward'),
});

export type PagingSettingsInput = z.input<typeof pagingSettingsSchema>;

export interface PagingSettings {
  readonly index: string;
  readonly direction: TraversalDirection;
  /** Requested page size, already capped at `maxPageSize` */
  readonly pageSize: number;
  readonly maxPageSize: number;
  /** True when the requested page size was lowered to `maxPageSize` */
  readonly capped: boolean;
}

/**
 * Validates iterator settings and fills in defaults.
 * @throws MisuseFailure listing every invalid setting
 */
export function resolvePagingSettings(input: PagingSettingsInput): PagingSettings {
  const result = pagingSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new MisuseFailure(`Invalid paging settings (${issues.join('; ')})`);
  }

  const { index, direction, pageSize, maxPageSize } = result.data;
  return {
    index,
    direction,
    pageSize: Math.min(pageSize, maxPageSize),
    maxPageSize,
    capped: pageSize > maxPageSize,
  };
}
