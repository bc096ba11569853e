import { z } from 'zod';

/** Opaque base64url token wrapping the offset of the next page. */
export type PageCursor = string;

export interface Page<T> {
  items: T[];
  offset: number;
  nextCursor?: PageCursor;
}

const CursorPayload = z.object({ offset: z.number().int().nonnegative() });

export function encodeCursor(offset: number): PageCursor {
  return Buffer.from(JSON.stringify({ offset }), 'utf-8').toString('base64url');
}

/** Anything unreadable restarts from the first page. */
export function decodeCursor(cursor?: PageCursor): number {
  if (!cursor) {
    return 0;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf-8'));
  } catch {
    return 0;
  }
  const parsed = CursorPayload.safeParse(payload);
  return parsed.success ? parsed.data.offset : 0;
}

export function paginate<T>(items: readonly T[], cursor?: PageCursor, limit = 50): Page<T> {
  const offset = decodeCursor(cursor);
  const end = offset + limit;
  return {
    items: items.slice(offset, end),
    offset,
    ...(end < items.length ? { nextCursor: encodeCursor(end) } : {}),
  };
}
