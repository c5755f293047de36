import type { IndexEntry, IndexValue, Page, PageRequest } from '../pageTypes';

/**
 * An ordered index that answers page requests with opaque cursors.
 */
export interface IndexSource<E extends IndexEntry = IndexEntry> {
  readonly name: string;
  readonly maxPageSize: number;
  putMany(entries: readonly E[]): Promise<number>; // returns how many were new
  lookup(key: IndexValue): Promise<E[]>;
  lookupMany(keys: readonly IndexValue[]): Promise<E[]>;
  paginate(request: PageRequest): Promise<Page<E>>;
}
