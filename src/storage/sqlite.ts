import type Database from 'better-sqlite3';
import { z } from 'zod';
import { DEFAULT_MAX_PAGE_SIZE } from '../config';
import { decodeCursor, encodeCursor } from '../cursorCodec';
import type { IndexValue, Page, PageRequest } from '../pageTypes';
import { checkEntries, checkPageRequest } from './fetchFrom';
import type { IndexSource } from './types';

/** `[key, ref]`: the key orders the index, the ref points at the indexed document. */
export type SqliteIndexEntry = readonly [key: number | string, ref: string];

type EntryRow = { key: number | string; ref: string };

const sqliteEntrySchema = z.tuple([z.union([z.number().finite(), z.string()]), z.string()]);

export function ensureIndexSchema(db: Database.Database) {
  // No-ops if already there
  db.prepare(
    `CREATE TABLE IF NOT EXISTS pw_index_entries(
       index_name TEXT NOT NULL,
       key NOT NULL,
       ref TEXT NOT NULL,
       PRIMARY KEY (index_name, key, ref)
     ) WITHOUT ROWID;`
  ).run();
}

function toEntry(row: EntryRow): SqliteIndexEntry {
  return [row.key, row.ref];
}

/**
 * An index stored in SQLite. Numbers sort before strings, as SQLite orders storage classes.
 * Call `ensureIndexSchema(db)` once before using it.
 */
export class SqliteIndex implements IndexSource<SqliteIndexEntry> {
  readonly maxPageSize: number;

  constructor(
    private db: Database.Database,
    readonly name: string,
    options: { maxPageSize?: number } = {}
  ) {
    this.maxPageSize = options.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  }

  async putMany(entries: readonly SqliteIndexEntry[]): Promise<number> {
    checkEntries(entries, sqliteEntrySchema);
    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO pw_index_entries (index_name, key, ref) VALUES (?, ?, ?)`
    );
    const insertAll = this.db.transaction((batch: readonly SqliteIndexEntry[]) => {
      let added = 0;
      for (const [key, ref] of batch) {
        added += insert.run(this.name, key, ref).changes;
      }
      return added;
    });
    return insertAll(entries);
  }

  async lookup(key: IndexValue): Promise<SqliteIndexEntry[]> {
    if (typeof key !== 'number' && typeof key !== 'string') return [];
    const rows = this.db.prepare(
      `SELECT key, ref FROM pw_index_entries
       WHERE index_name = ? AND key = ?
       ORDER BY ref ASC`
    ).all(this.name, key) as EntryRow[];
    return rows.map(toEntry);
  }

  async lookupMany(keys: readonly IndexValue[]): Promise<SqliteIndexEntry[]> {
    const usable = [...new Set(keys)].filter((k): k is number | string => typeof k === 'number' || typeof k === 'string');
    if (usable.length === 0) return [];
    const rows = this.db.prepare(
      `SELECT key, ref FROM pw_index_entries
       WHERE index_name = ? AND key IN (${usable.map(() => '?').join(', ')})
       ORDER BY key ASC, ref ASC`
    ).all(this.name, ...usable) as EntryRow[];
    return rows.map(toEntry);
  }

  async paginate(request: PageRequest): Promise<Page<SqliteIndexEntry>> {
    checkPageRequest(this, request);
    if (request.upperBound !== undefined && typeof request.upperBound !== 'number' && typeof request.upperBound !== 'string') {
      // Every stored key is a number or a string, so null and booleans sort below all of them
      return { items: [] };
    }
    const upper = request.upperBound ?? null;

    if (request.direction === 'forward') {
      const after = request.after === undefined ? undefined : decodeCursor(request.after, sqliteEntrySchema, request);
      const rows = this.db.prepare(
        `SELECT key, ref FROM pw_index_entries
         WHERE index_name = @index
           AND (@hasCursor = 0 OR key > @key OR (key = @key AND ref >= @ref))
           AND (@upper IS NULL OR key <= @upper)
         ORDER BY key ASC, ref ASC
         LIMIT @limit`
      ).all({
        index: this.name,
        hasCursor: after ? 1 : 0,
        key: after ? after[0] : null,
        ref: after ? after[1] : null,
        upper,
        limit: request.size + 1,
      }) as EntryRow[];

      const items = rows.slice(0, request.size).map(toEntry);
      const anchor = items.length > 0 ? items[0] : after;
      const hasEarlier = anchor !== undefined && this.existsBefore(anchor);
      return {
        items,
        beforeCursor: hasEarlier && anchor ? encodeCursor(anchor) : undefined,
        afterCursor: rows.length > request.size ? encodeCursor(toEntry(rows[request.size])) : undefined,
      };
    }

    const before = request.before === undefined ? undefined : decodeCursor(request.before, sqliteEntrySchema, request);
    const rows = this.db.prepare(
      `SELECT key, ref FROM pw_index_entries
       WHERE index_name = @index
         AND (@hasCursor = 0 OR key < @key OR (key = @key AND ref < @ref))
         AND (@upper IS NULL OR key <= @upper)
       ORDER BY key DESC, ref DESC
       LIMIT @limit`
    ).all({
      index: this.name,
      hasCursor: before ? 1 : 0,
      key: before ? before[0] : null,
      ref: before ? before[1] : null,
      upper,
      limit: request.size + 1,
    }) as EntryRow[];

    const items = rows.slice(0, request.size).reverse().map(toEntry);
    const following = before ? this.firstAtOrAfter(before, upper) : undefined;
    return {
      items,
      beforeCursor: rows.length > request.size ? encodeCursor(items[0]) : undefined,
      afterCursor: following ? encodeCursor(following) : undefined,
    };
  }

  private existsBefore(entry: SqliteIndexEntry): boolean {
    const row = this.db.prepare(
      `SELECT 1 AS found FROM pw_index_entries
       WHERE index_name = ? AND (key < ? OR (key = ? AND ref < ?))
       LIMIT 1`
    ).get(this.name, entry[0], entry[0], entry[1]);
    return row !== undefined;
  }

  private firstAtOrAfter(entry: SqliteIndexEntry, upper: number | string | null): SqliteIndexEntry | undefined {
    const row = this.db.prepare(
      `SELECT key, ref FROM pw_index_entries
       WHERE index_name = @index
         AND (key > @key OR (key = @key AND ref >= @ref))
         AND (@upper IS NULL OR key <= @upper)
       ORDER BY key ASC, ref ASC
       LIMIT 1`
    ).get({ index: this.name, key: entry[0], ref: entry[1], upper }) as EntryRow | undefined;
    return row ? toEntry(row) : undefined;
  }
}
