import { compareIndexValues } from './compareValues';
import type { IndexEntry, IndexValue } from './pageTypes';

/** Decides whether a raw entry of a fetched page is kept. */
export type RangeFilter<R> = (raw: R) => boolean;

export type KeyOf<R> = (raw: R) => IndexValue;

export type Comparator = (a: IndexValue, b: IndexValue) => number;

export type RangeBounds = {
  lower?: IndexValue;
  upper?: IndexValue;
};

/**
 * A range split between the store and the client: the upper bound limits which
 * pages the store returns, the lower bound filters entries inside those pages.
 */
export type RangeSplit<R> = {
  rangeFilter?: RangeFilter<R>;
  upperBound?: IndexValue;
};

export function firstField(entry: IndexEntry): IndexValue {
  return entry.length > 0 ? entry[0] : null;
}

export function acceptAll<R>(): RangeFilter<R> {
  return () => true;
}

/**
 * Keeps entries whose key is greater than or equal to `lower`.
 */
export function atLeast<R>(lower: IndexValue, keyOf: KeyOf<R>, compare: Comparator = compareIndexValues): RangeFilter<R> {
  return raw => compare(lower, keyOf(raw)) <= 0;
}

export function allOf<R>(...filters: RangeFilter<R>[]): RangeFilter<R> {
  if (filters.length === 0) return acceptAll();
  if (filters.length === 1) return filters[0];
  return raw => filters.every(filter => filter(raw));
}

/**
 * "between lower and upper", both inclusive.
 * Pass the result's fields straight into the iterator options.
 */
export function between<R>(bounds: RangeBounds, keyOf: KeyOf<R>, compare: Comparator = compareIndexValues): RangeSplit<R> {
  const split: RangeSplit<R> = {};
  if (bounds.lower !== undefined) split.rangeFilter = atLeast(bounds.lower, keyOf, compare);
  if (bounds.upper !== undefined) split.upperBound = bounds.upper;
  return split;
}
