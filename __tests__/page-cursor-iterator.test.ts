import { describe, test, expect } from 'vitest';
import {
  MemoryIndex,
  PageCursorIterator,
  between,
  collect,
  fetchFrom,
  firstField,
  paginate,
  silentLogger,
  type SqliteIndexEntry,
} from '../src';
import { customerEntries, recordingFetch, scriptedFetch } from './utils/fixtures';

async function customerIndex(from: number, to: number, maxPageSize?: number) {
  const index = new MemoryIndex<SqliteIndexEntry>('customer_id_filter', { maxPageSize });
  await index.putMany(customerEntries(from, to));
  return index;
}

describe('PageCursorIterator traversal', () => {
  test('reads 20 customers in pages of 8, 8 and 4', async () => {
    const index = await customerIndex(1, 20);
    const { fetch, requests, pages } = recordingFetch(fetchFrom(index));

    const it = paginate({ index: index.name, fetch, pageSize: 8, logger: silentLogger });
    const entries = await collect(it);

    expect(entries.map(e => e[0])).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    expect(it.fetchCount).toBe(3);
    expect(pages.map(p => p.items.length)).toEqual([8, 8, 4]);
    expect(pages.map(p => p.afterCursor !== undefined)).toEqual([true, true, false]);

    expect(requests[0].after).toBeUndefined();
    expect(requests[1].after).toBe(pages[0].afterCursor);
    expect(requests[2].after).toBe(pages[1].afterCursor);
    expect(requests.every(r => r.size === 8 && r.direction === 'forward')).toBe(true);
  });

  test('between 5 and 11 keeps the upper bound at the store and the lower bound in the client', async () => {
    const index = await customerIndex(1, 20);
    const { fetch, requests, pages } = recordingFetch(fetchFrom(index));

    const entries = await collect(paginate({
      index: index.name,
      fetch,
      pageSize: 8,
      logger: silentLogger,
      ...between<SqliteIndexEntry>({ lower: 5, upper: 11 }, firstField),
    }));

    expect(entries.map(e => e[0])).toEqual([5, 6, 7, 8, 9, 10, 11]);
    expect(requests).toHaveLength(2);
    expect(requests.map(r => r.upperBound)).toEqual([11, 11]);
    // The store never sent anything past the bound
    expect(pages.flatMap(p => p.items.map(e => e[0]))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  test('materializes entries into records', async () => {
    const index = await customerIndex(1, 3);
    const it = paginate({
      index: index.name,
      fetch: fetchFrom(index),
      pageSize: 2,
      logger: silentLogger,
      materialize: async ([id, ref]: SqliteIndexEntry) => ({ id: Number(id), ref, balance: Number(id) * 10 }),
    });

    expect(await collect(it)).toEqual([
      { id: 1, ref: 'customers/1', balance: 10 },
      { id: 2, ref: 'customers/2', balance: 20 },
      { id: 3, ref: 'customers/3', balance: 30 },
    ]);
  });

  test('walks backward with before cursors', async () => {
    const index = await customerIndex(1, 20);
    const { fetch, requests, pages } = recordingFetch(fetchFrom(index));

    const it = paginate({ index: index.name, fetch, pageSize: 8, direction: 'backward', logger: silentLogger });
    const keys = (await collect(it)).map(e => e[0]);

    expect(keys).toEqual([
      13, 14, 15, 16, 17, 18, 19, 20,
      5, 6, 7, 8, 9, 10, 11, 12,
      1, 2, 3, 4,
    ]);
    expect(requests[0].before).toBeUndefined();
    expect(requests[1].before).toBe(pages[0].beforeCursor);
    expect(requests[2].before).toBe(pages[1].beforeCursor);
    expect(requests.every(r => r.after === undefined)).toBe(true);
    expect(pages[2].beforeCursor).toBeUndefined();
  });

  test('caps the page size at the store maximum', async () => {
    const index = await customerIndex(1, 20, 5);
    const { fetch, requests } = recordingFetch(fetchFrom(index));

    const it = paginate({ index: index.name, fetch, pageSize: 8, maxPageSize: 5, logger: silentLogger });
    expect(it.pageSize).toBe(5);
    expect(await collect(it)).toHaveLength(20);
    expect(requests.map(r => r.size)).toEqual([5, 5, 5, 5]);
  });

  test('does not assume pages are full', async () => {
    const { fetch } = scriptedFetch<number>([
      { items: [1, 2, 3], afterCursor: 'c1' },
      { items: [4], afterCursor: 'c2' },
      { items: [5, 6] },
    ]);
    const it = paginate({ index: 'numbers', fetch, pageSize: 10, logger: silentLogger });
    expect(await collect(it)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(it.fetchCount).toBe(3);
  });
});

describe('PageCursorIterator termination', () => {
  test('an empty first page ends the traversal at once', async () => {
    const { fetch } = scriptedFetch<number>([{ items: [] }]);
    const it = paginate({ index: 'numbers', fetch, logger: silentLogger });

    expect(await it.next()).toEqual({ done: true, value: undefined });
    expect(it.state).toBe('exhausted');
    expect(it.fetchCount).toBe(1);
  });

  test('skips an empty page that carries a cursor', async () => {
    const { fetch, requests } = scriptedFetch<number>([
      { items: [], afterCursor: 'c1' },
      { items: [7, 8] },
    ]);
    const it = paginate({ index: 'numbers', fetch, logger: silentLogger });

    expect(await collect(it)).toEqual([7, 8]);
    expect(requests[1].after).toBe('c1');
  });

  test('keeps fetching when the filter drops a whole page', async () => {
    const { fetch } = scriptedFetch<number>([
      { items: [1, 2, 3], afterCursor: 'c1' },
      { items: [4], afterCursor: 'c2' },
      { items: [6, 9] },
    ]);
    const it = paginate({ index: 'numbers', fetch, rangeFilter: n => n >= 5, logger: silentLogger });

    expect(await collect(it)).toEqual([6, 9]);
    expect(it.fetchCount).toBe(3);
  });

  test('stays exhausted without fetching again', async () => {
    const { fetch } = scriptedFetch<number>([{ items: [1] }]);
    const it = paginate({ index: 'numbers', fetch, logger: silentLogger });

    expect(await it.next()).toEqual({ done: false, value: 1 });
    expect(await it.next()).toEqual({ done: true, value: undefined });
    expect(await it.next()).toEqual({ done: true, value: undefined });
    expect(await it.next()).toEqual({ done: true, value: undefined });
    expect(it.fetchCount).toBe(1);
    expect(it.state).toBe('exhausted');
  });

  test('moves through idle, buffered and exhausted', async () => {
    const { fetch } = scriptedFetch<number>([{ items: [1, 2], afterCursor: 'c1' }, { items: [3] }]);
    const it = new PageCursorIterator<number>({ index: 'numbers', fetch, materialize: n => n, logger: false });

    expect(it.state).toBe('idle');
    await it.next();
    expect(it.state).toBe('buffered');
    await it.next();
    await it.next();
    expect(it.fetchCount).toBe(2);
    expect(it.state).toBe('buffered');
    await it.next();
    expect(it.state).toBe('exhausted');
  });

  test('breaking out of for await stops the traversal', async () => {
    const { fetch } = scriptedFetch<number>([
      { items: [1, 2, 3], afterCursor: 'c1' },
      { items: [4, 5, 6] },
    ]);
    const it = paginate({ index: 'numbers', fetch, logger: silentLogger });

    const seen: number[] = [];
    for await (const n of it) {
      seen.push(n);
      if (n === 2) break;
    }

    expect(seen).toEqual([1, 2]);
    expect(it.state).toBe('exhausted');
    expect(await it.next()).toEqual({ done: true, value: undefined });
    expect(it.fetchCount).toBe(1);
  });

  test('collect stops at the limit without reading further pages', async () => {
    const { fetch } = scriptedFetch<number>([
      { items: [1, 2, 3], afterCursor: 'c1' },
      { items: [4, 5, 6] },
    ]);
    const it = paginate({ index: 'numbers', fetch, logger: silentLogger });

    expect(await collect(it, 2)).toEqual([1, 2]);
    expect(it.fetchCount).toBe(1);
  });

  test('independent iterators over one index do not share state', async () => {
    const index = await customerIndex(1, 10);
    const a = paginate({ index: index.name, fetch: fetchFrom(index), pageSize: 3, logger: silentLogger });
    const b = paginate({ index: index.name, fetch: fetchFrom(index), pageSize: 4, logger: silentLogger });

    const [fromA, fromB] = await Promise.all([collect(a), collect(b)]);
    expect(fromA).toEqual(fromB);
    expect(a.fetchCount).toBe(4);
    expect(b.fetchCount).toBe(3);
  });
});
