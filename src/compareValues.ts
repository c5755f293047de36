import type { IndexEntry, IndexValue } from './pageTypes';

function typeRank(v: IndexValue): number {
  if (v === null) return 0;
  switch (typeof v) {
    case 'boolean': return 1;
    case 'number': return 2;
    default: return 3;
  }
}

// Surrogate halves (code points above U+FFFF) move above U+E000-U+FFFF
function codePointRank(unit: number): number {
  if (unit < 0xd800) return unit;
  return unit < 0xe000 ? unit + 0x2000 : unit - 0x800;
}

function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const unitA = a.charCodeAt(i);
    const unitB = b.charCodeAt(i);
    if (unitA !== unitB) return codePointRank(unitA) - codePointRank(unitB);
  }
  return a.length - b.length;
}

/**
 * Total order over index values used by filters and index sources.
 * - null < booleans < numbers < strings
 * - strings compare by code point, not locale, which matches SQLite's BINARY collation over UTF-8
 * @returns a negative number, zero or a positive number
 */
export function compareIndexValues(a: IndexValue, b: IndexValue): number {
  if (a === b) return 0;

  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) return rankA - rankB;

  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return compareCodePoints(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;
  return 0;
}

/**
 * Lexicographic order over entries. A shorter entry sorts before a longer one it is a prefix of.
 */
export function compareEntries(a: IndexEntry, b: IndexEntry): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const cmp = compareIndexValues(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}
