import { compareEntries, compareIndexValues } from '../compareValues';
import { DEFAULT_MAX_PAGE_SIZE } from '../config';
import { decodeCursor, encodeCursor, indexEntrySchema } from '../cursorCodec';
import type { IndexEntry, IndexValue, Page, PageRequest } from '../pageTypes';
import { checkEntries, checkPageRequest } from './fetchFrom';
import type { IndexSource } from './types';

/**
 * An index kept in a sorted array. Identical entries are stored once.
 */
export class MemoryIndex<E extends IndexEntry = IndexEntry> implements IndexSource<E> {
  readonly name: string;
  readonly maxPageSize: number;
  private entries: E[] = [];

  constructor(name: string, options: { maxPageSize?: number } = {}) {
    this.name = name;
    this.maxPageSize = options.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  }

  get size(): number {
    return this.entries.length;
  }

  async putMany(entries: readonly E[]): Promise<number> {
    checkEntries(entries, indexEntrySchema);
    let added = 0;
    for (const entry of entries) {
      const pos = this.lowerBound(entry);
      if (pos < this.entries.length && compareEntries(this.entries[pos], entry) === 0) continue;
      this.entries.splice(pos, 0, entry);
      added++;
    }
    return added;
  }

  async lookup(key: IndexValue): Promise<E[]> {
    const start = this.lowerBound([key]);
    const found: E[] = [];
    for (let i = start; i < this.entries.length; i++) {
      if (compareIndexValues(this.entries[i][0], key) !== 0) break;
      found.push(this.entries[i]);
    }
    return found;
  }

  async lookupMany(keys: readonly IndexValue[]): Promise<E[]> {
    const unique = [...new Set(keys)].sort(compareIndexValues);
    const found: E[] = [];
    for (const key of unique) {
      found.push(...(await this.lookup(key)));
    }
    return found;
  }

  async paginate(request: PageRequest): Promise<Page<E>> {
    checkPageRequest(this, request);

    const limit = request.upperBound === undefined ? this.entries.length : this.upperLimit(request.upperBound);
    if (request.direction === 'forward') {
      const start = request.after === undefined
        ? 0
        : Math.min(this.lowerBound(decodeCursor(request.after, indexEntrySchema, request)), limit);
      const end = Math.min(start + request.size, limit);
      const items = this.entries.slice(start, end);

      let beforeCursor: string | undefined;
      if (start > 0) beforeCursor = items.length > 0 ? encodeCursor(items[0]) : request.after;
      return {
        items,
        beforeCursor,
        afterCursor: end < limit ? encodeCursor(this.entries[end]) : undefined,
      };
    }

    const end = request.before === undefined
      ? limit
      : Math.min(this.lowerBound(decodeCursor(request.before, indexEntrySchema, request)), limit);
    const start = Math.max(0, end - request.size);
    return {
      items: this.entries.slice(start, end),
      beforeCursor: start > 0 ? encodeCursor(this.entries[start]) : undefined,
      afterCursor: end < limit ? encodeCursor(this.entries[end]) : undefined,
    };
  }

  /** First position whose entry is not less than `entry`. */
  private lowerBound(entry: IndexEntry): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEntries(this.entries[mid], entry) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** First position whose key is greater than `upper`. */
  private upperLimit(upper: IndexValue): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareIndexValues(this.entries[mid][0], upper) <= 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
