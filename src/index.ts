// Main class
export { PageCursorIterator } from './PageCursorIterator';
export type { IteratorState, PageCursorIteratorOptions } from './PageCursorIterator';
export { paginate, collect } from './paginate';
export type { PaginateOptions } from './paginate';

// Types
export * from './pageTypes';
export * from './errors';

// Range filters
export { acceptAll, atLeast, allOf, between, firstField } from './RangeFilter';
export type { RangeFilter, RangeBounds, RangeSplit, KeyOf, Comparator } from './RangeFilter';
export { compareIndexValues, compareEntries } from './compareValues';

// Materialization
export { materializePage, fromSchema } from './materialize';
export type { ParseSchema } from './materialize';

// Configuration and logging
export { DEFAULT_PAGE_SIZE, DEFAULT_MAX_PAGE_SIZE, pagingSettingsSchema, resolvePagingSettings } from './config';
export type { PagingSettings, PagingSettingsInput } from './config';
export { createConsoleLogger, silentLogger } from './logger';
export type { PagingLogger, ConsoleLoggerOptions } from './logger';

// Index sources
export { encodeCursor, decodeCursor, indexEntrySchema, indexValueSchema } from './cursorCodec';
export type { IndexSource } from './storage/types';
export { fetchFrom, checkEntries, checkPageRequest } from './storage/fetchFrom';
export { MemoryIndex } from './storage/memory';
export { SqliteIndex, ensureIndexSchema } from './storage/sqlite';
export type { SqliteIndexEntry } from './storage/sqlite';
