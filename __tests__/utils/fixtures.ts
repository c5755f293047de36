import type { FetchPage, Page, PageRequest, SqliteIndexEntry } from '../../src';

/**
 * A fetch function that answers with the given pages, one per call, and records every request.
 */
export function scriptedFetch<R>(pages: Page<R>[]): { fetch: FetchPage<R>; requests: PageRequest[] } {
  const requests: PageRequest[] = [];
  const fetch: FetchPage<R> = async request => {
    const page = pages[requests.length];
    requests.push(request);
    if (!page) throw new Error(`No page scripted for call ${requests.length}`);
    return page;
  };
  return { fetch, requests };
}

/**
 * Wraps a fetch function, keeping every request and the page it got back.
 */
export function recordingFetch<R>(inner: FetchPage<R>): { fetch: FetchPage<R>; requests: PageRequest[]; pages: Page<R>[] } {
  const requests: PageRequest[] = [];
  const pages: Page<R>[] = [];
  const fetch: FetchPage<R> = async request => {
    requests.push(request);
    const page = await inner(request);
    pages.push(page);
    return page;
  };
  return { fetch, requests, pages };
}

/** `[id, ref]` entries for customers `from..to`. */
export function customerEntries(from: number, to: number): SqliteIndexEntry[] {
  const entries: SqliteIndexEntry[] = [];
  for (let id = from; id <= to; id++) {
    entries.push([id, `customers/${id}`]);
  }
  return entries;
}
