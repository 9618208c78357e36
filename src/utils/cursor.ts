import { z } from 'zod';
import { PI_REGEX } from './ulid';
import { InvalidCursorError } from './errors';

/**
 * Cursor-based pagination for entity listing
 *
 * A cursor names the last entity of the previous page by its creation
 * ordinal and its PI. The ordinal locates the resume point in O(1) (log
 * window or snapshot chunk); the PI proves the position still holds the
 * entity the client saw. Encoded as base64url JSON so clients treat it as opaque.
 *
 * Example: { "o": 1042, "pi": "01K78F523TFN01651HDSEV6PVF" }
 */

export interface ListCursor {
  o: number; // creation ordinal of the last entity returned
  pi: string;
}

const ListCursorSchema = z.object({
  o: z.number().int().positive(),
  pi: z.string().regex(PI_REGEX),
});

export function encodeCursor(position: ListCursor): string {
  return Buffer.from(JSON.stringify({ o: position.o, pi: position.pi }), 'utf8').toString(
    'base64url'
  );
}

/**
 * Decode and validate a cursor
 * Throws InvalidCursorError for anything that isn't one of ours
 */
export function decodeCursor(cursor: string): ListCursor {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw new InvalidCursorError('Invalid cursor: not a listing cursor', { cursor });
  }

  const parsed = ListCursorSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidCursorError('Invalid cursor: not a listing cursor', { cursor });
  }
  return parsed.data;
}
