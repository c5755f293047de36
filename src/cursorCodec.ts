import { z } from 'zod';
import { FetchFailure } from './errors';
import type { CursorPosition, IndexEntry, PageRequest } from './pageTypes';

// JSON has no Infinity or NaN, so only finite numbers survive a cursor
export const indexValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const indexEntrySchema = z.array(indexValueSchema);

/**
 * Encodes an entry as an opaque cursor (base64url of its JSON form).
 */
export function encodeCursor(entry: IndexEntry): CursorPosition {
  return Buffer.from(JSON.stringify(entry), 'utf-8').toString('base64url');
}

/**
 * Decodes a cursor produced by `encodeCursor` and checks it against `schema`.
 * @param request - the request the cursor came with, kept on the failure
 * @throws FetchFailure (not transient) when the cursor is malformed
 */
export function decodeCursor<E extends IndexEntry>(
  cursor: CursorPosition,
  schema: z.ZodType<E>,
  request?: PageRequest
): E {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf-8'));
  } catch (error) {
    throw new FetchFailure('Invalid cursor format', { request, cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new FetchFailure('Invalid cursor format', { request, cause: parsed.error });
  }
  return parsed.data;
}
