import { resolvePagingSettings, type PagingSettings } from './config';
import { FetchFailure, MaterializationFailure, MisuseFailure, type PagingError } from './errors';
import { createConsoleLogger, type PagingLogger } from './logger';
import { materializePage } from './materialize';
import type { RangeFilter } from './RangeFilter';
import type { CursorPosition, FetchPage, IndexValue, Materializer, Page, PageRequest, TraversalDirection } from './pageTypes';

export type IteratorState = 'idle' | 'fetching' | 'buffered' | 'exhausted' | 'failed';

export type PageCursorIteratorOptions<R, T> = {
  /** Name of the index being walked, passed along with every request */
  index: string;
  fetch: FetchPage<R>;
  materialize: Materializer<R, T>;
  pageSize?: number;
  /** Largest page the store accepts; larger page sizes are lowered to it */
  maxPageSize?: number;
  direction?: TraversalDirection;
  /** Client-side filter applied to each fetched page before materialization */
  rangeFilter?: RangeFilter<R>;
  /** Store-side limit sent with every request */
  upperBound?: IndexValue;
  /** Defaults to a console logger; pass `false` to turn logging off */
  logger?: PagingLogger | false;
};

const DONE: IteratorReturnResult<undefined> = Object.freeze({ done: true, value: undefined });

/**
 * Walks an index one page at a time, following the cursor each page returns.
 *
 * Pages are requested lazily, one at a time: the next page is fetched only
 * after the previous page's records have all been handed out. A page that
 * comes back empty, or whose entries are all filtered out, is skipped as
 * long as it carries a continuation cursor.
 *
 * Exhaustion and failure are final. After a failure every `next()` call
 * rejects with the same error and nothing else is fetched.
 */
export class PageCursorIterator<R, T = R> implements AsyncIterableIterator<T> {
  private readonly settings: PagingSettings;
  private readonly fetchPage: FetchPage<R>;
  private readonly materialize: Materializer<R, T>;
  private readonly rangeFilter: RangeFilter<R> | undefined;
  private readonly upperBound: IndexValue | undefined;
  private readonly logger: PagingLogger | undefined;

  private _state: IteratorState = 'idle';
  private _fetchCount = 0;
  private buffer: T[] = [];
  private bufferPos = 0;
  private cursor: CursorPosition | undefined;
  private failure: PagingError | undefined;
  private closed = false;

  constructor(options: PageCursorIteratorOptions<R, T>) {
    this.settings = resolvePagingSettings({
      index: options.index,
      pageSize: options.pageSize,
      maxPageSize: options.maxPageSize,
      direction: options.direction,
    });
    this.fetchPage = options.fetch;
    this.materialize = options.materialize;
    this.rangeFilter = options.rangeFilter;
    this.upperBound = options.upperBound;
    this.logger = options.logger === false ? undefined : options.logger ?? createConsoleLogger();

    if (this.settings.capped) {
      this.logger?.debug(`Page size ${options.pageSize} for "${this.settings.index}" capped at ${this.settings.maxPageSize}`);
    }
  }

  get state(): IteratorState {
    return this._state;
  }

  /** Number of page requests issued so far. */
  get fetchCount(): number {
    return this._fetchCount;
  }

  get pageSize(): number {
    return this.settings.pageSize;
  }

  get direction(): TraversalDirection {
    return this.settings.direction;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.failure) throw this.failure;
    if (this._state === 'fetching') {
      throw new MisuseFailure('next() was called while a page fetch is still in flight');
    }

    while (this.bufferPos >= this.buffer.length) {
      if (this._state === 'exhausted') return DONE;
      if (this._state !== 'idle' && this.cursor === undefined) {
        this.finish();
        return DONE;
      }
      await this.fetchNextPage();
    }

    const value = this.buffer[this.bufferPos++];
    if (this.bufferPos >= this.buffer.length) this.releaseBuffer();
    return { done: false, value };
  }

  /**
   * Stops the traversal and drops records fetched but not consumed yet.
   */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.closed = true;
    this.releaseBuffer();
    if (!this.failure) this._state = 'exhausted';
    return DONE;
  }

  private async fetchNextPage(): Promise<void> {
    const request = this.buildRequest();
    this._state = 'fetching';
    this._fetchCount++;
    this.logger?.debug(`Fetching page ${this._fetchCount} of "${request.index}"`, request);

    let page: Page<R>;
    let records: T[];
    try {
      page = await this.fetchPage(request);
      records = await materializePage(this.filterPage(page.items), this.materialize);
    } catch (error) {
      // return() already ended the traversal
      if (this.closed) return;
      throw this.fail(error instanceof MaterializationFailure ? error : FetchFailure.from(error, request));
    }

    if (this.closed) return;

    const nextCursor = this.settings.direction === 'forward' ? page.afterCursor : page.beforeCursor;
    if (page.items.length === 0 && nextCursor !== undefined && nextCursor === this.cursor) {
      throw this.fail(new FetchFailure(`Store returned an empty page with an unchanged cursor for "${request.index}"`, { request }));
    }

    this.cursor = nextCursor;
    this.buffer = records;
    this.bufferPos = 0;

    if (records.length === 0 && nextCursor === undefined) {
      this.finish();
    } else {
      this._state = 'buffered';
    }
  }

  private filterPage(items: readonly R[]): readonly R[] {
    const filter = this.rangeFilter;
    if (!filter) return items;

    const kept: R[] = [];
    for (let i = 0; i < items.length; i++) {
      let keep: boolean;
      try {
        keep = filter(items[i]);
      } catch (error) {
        throw new MaterializationFailure(items, i, error);
      }
      if (keep) kept.push(items[i]);
    }
    return kept;
  }

  private buildRequest(): PageRequest {
    const { index, direction, pageSize: size } = this.settings;
    const base = { index, direction, size, upperBound: this.upperBound };

    if (this.cursor === undefined) return base;
    return direction === 'forward'
      ? { ...base, after: this.cursor }
      : { ...base, before: this.cursor };
  }

  private releaseBuffer(): void {
    this.buffer = [];
    this.bufferPos = 0;
  }

  private finish(): void {
    this._state = 'exhausted';
    this.releaseBuffer();
  }

  private fail(error: PagingError): PagingError {
    this.failure = error;
    this._state = 'failed';
    this.releaseBuffer();
    this.logger?.warn(`Traversal of "${this.settings.index}" failed: ${error.message}`);
    return error;
  }
}
