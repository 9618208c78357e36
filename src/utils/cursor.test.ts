import { describe, it, expect } from 'vitest';
import { decodeCursor, encodeCursor } from './cursor';
import { InvalidCursorError } from './errors';

const PI = '01J8ME3H6FZ3KQ5W1P2XY8K7E5';

describe('listing cursor', () => {
  it('decodes what it encodes', () => {
    const cursor = encodeCursor({ o: 42, pi: PI });
    expect(cursor).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(decodeCursor(cursor)).toEqual({ o: 42, pi: PI });
  });

  it('rejects strings that are not cursors', () => {
    expect(() => decodeCursor('not-a-cursor')).toThrow(InvalidCursorError);
  });

  it('rejects well-formed JSON with the wrong shape', () => {
    const zeroOrdinal = Buffer.from(JSON.stringify({ o: 0, pi: PI })).toString('base64url');
    const badPi = Buffer.from(JSON.stringify({ o: 3, pi: 'abc' })).toString('base64url');
    expect(() => decodeCursor(zeroOrdinal)).toThrow(InvalidCursorError);
    expect(() => decodeCursor(badPi)).toThrow(InvalidCursorError);
  });
});
