/**
 * Opaque position in an ordered result set. Only the store that issued it
 * knows what is inside; everyone else hands it back unchanged.
 */
export type CursorPosition = string;

// Values an index can order by
export type IndexValue = string | number | boolean | null;

/** An index entry: the first field is the ordering key, e.g. `[id, ref]`. */
export type IndexEntry = readonly IndexValue[];

export type TraversalDirection = 'forward' | 'backward';

/**
 * One response unit from a store.
 * `afterCursor` is present when more data may follow the page, `beforeCursor` when more may precede it.
 */
export interface Page<R> {
  readonly items: readonly R[];
  readonly beforeCursor?: CursorPosition;
  readonly afterCursor?: CursorPosition;
}

type PageCursorParam =
  | { after?: undefined; before?: undefined }
  | { after: CursorPosition; before?: undefined }
  | { before: CursorPosition; after?: undefined };

export type PageRequest = {
  readonly index: string;
  readonly direction: TraversalDirection;
  readonly size: number;
  /** Standing upper limit on the first field of every returned entry (inclusive). */
  readonly upperBound?: IndexValue;
} & Readonly<PageCursorParam>;

export type FetchPage<R> = (request: PageRequest) => Promise<Page<R>>;

/**
 * Converts a raw entry into a domain record.
 * @param position - position of the entry within its page
 */
export type Materializer<R, T> = (raw: R, position: number) => T | Promise<T>;
