import { PageCursorIterator, type PageCursorIteratorOptions } from './PageCursorIterator';
import type { Materializer } from './pageTypes';

export type PaginateOptions<R> = Omit<PageCursorIteratorOptions<R, R>, 'materialize'>;

function identity<R>(raw: R): R {
  return raw;
}

/**
 * Creates a page cursor iterator. Without `materialize` the raw entries are yielded as they are.
 *
 * @example
 * for await (const customer of paginate({ index: 'customer_id_filter', fetch, pageSize: 8, materialize })) {
 *   console.log(customer);
 * }
 */
export function paginate<R, T>(options: PaginateOptions<R> & { materialize: Materializer<R, T> }): PageCursorIterator<R, T>;
export function paginate<R>(options: PaginateOptions<R>): PageCursorIterator<R, R>;
export function paginate<R, T>(
  options: PaginateOptions<R> & { materialize?: Materializer<R, T> }
): PageCursorIterator<R, T> | PageCursorIterator<R, R> {
  const { materialize, ...rest } = options;
  if (materialize) {
    return new PageCursorIterator<R, T>({ ...rest, materialize });
  }
  return new PageCursorIterator<R, R>({ ...rest, materialize: identity });
}

/**
 * Drains an async iterable into an array, stopping early after `limit` items.
 */
export async function collect<T>(iterable: AsyncIterable<T>, limit = Number.POSITIVE_INFINITY): Promise<T[]> {
  const items: T[] = [];
  if (limit <= 0) return items;
  for await (const item of iterable) {
    items.push(item);
    if (items.length >= limit) break;
  }
  return items;
}
