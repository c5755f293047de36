import type { z } from 'zod';
import { indexValueSchema } from '../cursorCodec';
import { FetchFailure, MisuseFailure } from '../errors';
import type { FetchPage, IndexEntry, PageRequest } from '../pageTypes';
import type { IndexSource } from './types';

/**
 * Adapts an index source to the fetch function an iterator takes.
 */
export function fetchFrom<E extends IndexEntry>(source: IndexSource<E>): FetchPage<E> {
  return request => source.paginate(request);
}

/**
 * Checks the parts of a request every index source rejects the same way.
 * @throws FetchFailure (not transient)
 */
export function checkPageRequest(source: { name: string; maxPageSize: number }, request: PageRequest): void {
  if (request.index !== source.name) {
    throw new FetchFailure(`Unknown index "${request.index}", this source serves "${source.name}"`, { request });
  }
  if (!Number.isInteger(request.size) || request.size <= 0) {
    throw new FetchFailure(`Page size must be a positive integer, got ${request.size}`, { request });
  }
  if (request.size > source.maxPageSize) {
    throw new FetchFailure(`Page size ${request.size} exceeds the maximum of ${source.maxPageSize}`, { request });
  }
  if (request.upperBound !== undefined && !indexValueSchema.safeParse(request.upperBound).success) {
    throw new FetchFailure(`Upper bound ${request.upperBound} cannot be compared with stored keys`, { request });
  }
}

/**
 * Checks a whole batch before any of it is written.
 * @throws MisuseFailure naming the first entry the schema rejects
 */
export function checkEntries<E>(entries: readonly unknown[], schema: z.ZodType<E>): void {
  for (let i = 0; i < entries.length; i++) {
    const parsed = schema.safeParse(entries[i]);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MisuseFailure(`Entry ${i} of the batch cannot be stored (${issue.path.join('.')}: ${issue.message})`);
    }
  }
}
