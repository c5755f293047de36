import { bench, describe } from 'vitest';
import { MemoryIndex } from '../src/storage/memory';
import { atLeast, firstField } from '../src/RangeFilter';
import { collect, paginate } from '../src/paginate';
import { silentLogger } from '../src/logger';
import type { FetchPage, IndexEntry } from '../src/pageTypes';

const index = new MemoryIndex('numbers');
const ready = index.putMany(Array.from({ length: 50_000 }, (_, i) => [i, `refs/${i}`]));

const fetch: FetchPage<IndexEntry> = async request => {
  await ready;
  return index.paginate(request);
};

describe('Paginated traversal', () => {
  bench('pages of 64', async () => {
    await collect(paginate({ index: 'numbers', fetch, pageSize: 64, logger: silentLogger }));
  });

  bench('pages of 5000', async () => {
    await collect(paginate({ index: 'numbers', fetch, pageSize: 5_000, logger: silentLogger }));
  });

  bench('lower bound filtered in the client', async () => {
    await collect(paginate({
      index: 'numbers',
      fetch,
      pageSize: 1_000,
      rangeFilter: atLeast(25_000, firstField),
      logger: silentLogger,
    }));
  });
});
