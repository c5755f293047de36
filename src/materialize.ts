import { MaterializationFailure } from './errors';
import type { Materializer } from './pageTypes';

/**
 * Anything with a `parse` method that throws on bad input, e.g. a Zod schema.
 */
export type ParseSchema<T> = {
  parse: (data: unknown) => T;
};

/**
 * Materializes a whole page or nothing. Entries are converted in order;
 * the first failure discards what was converted so far.
 * @throws MaterializationFailure carrying the full raw page
 */
export async function materializePage<R, T>(items: readonly R[], materialize: Materializer<R, T>): Promise<T[]> {
  const records: T[] = [];
  for (let i = 0; i < items.length; i++) {
    try {
      records.push(await materialize(items[i], i));
    } catch (error) {
      throw new MaterializationFailure(items, i, error);
    }
  }
  return records;
}

/**
 * Builds a materializer from a schema, optionally applied to part of the raw entry.
 */
export function fromSchema<T>(schema: ParseSchema<T>): Materializer<unknown, T>;
export function fromSchema<R, T>(schema: ParseSchema<T>, select: (raw: R) => unknown): Materializer<R, T>;
export function fromSchema<R, T>(schema: ParseSchema<T>, select?: (raw: R) => unknown): Materializer<R, T> {
  return raw => schema.parse(select ? select(raw) : raw);
}
