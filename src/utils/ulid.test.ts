import { afterEach, describe, it, expect, vi } from 'vitest';
import { PI_REGEX, assertValidPi, isValidPi, shard2, ulid } from './ulid';
import { ValidationError } from './errors';

describe('ulid', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('encodes the timestamp in the first 10 characters', () => {
    expect(ulid(0).slice(0, 10)).toBe('0000000000');
    expect(ulid(32).slice(0, 10)).toBe('0000000010');
  });

  it('produces valid PIs', () => {
    for (let i = 0; i < 20; i++) {
      expect(ulid()).toMatch(PI_REGEX);
    }
  });

  it('draws the random part from Web Crypto', () => {
    const getRandomValues = vi.fn((bytes: Uint8Array) => bytes.fill(35));
    vi.stubGlobal('crypto', { getRandomValues });

    // 35 & 0x1f = 3
    expect(ulid(123_456).slice(10)).toBe('3333333333333333');
    expect(getRandomValues).toHaveBeenCalledTimes(1);
  });

  it('sorts ids from the same millisecond in generation order', () => {
    const ids = Array.from({ length: 50 }, () => ulid(5_000));
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(50);
  });
});

describe('PI validation', () => {
  it('accepts Crockford base32 ULIDs', () => {
    expect(isValidPi('01J8ME3H6FZ3KQ5W1P2XY8K7E5')).toBe(true);
  });

  it('rejects excluded letters, lowercase and wrong lengths', () => {
    expect(isValidPi('01J8ME3H6FZ3KQ5W1P2XY8K7EI')).toBe(false);
    expect(isValidPi('01j8me3h6fz3kq5w1p2xy8k7e5')).toBe(false);
    expect(isValidPi('01J8ME3H6FZ3KQ5W1P2XY8K7E')).toBe(false);
  });

  it('assertValidPi throws a ValidationError naming the field', () => {
    expect(() => assertValidPi('nope', 'parent_pi')).toThrow(ValidationError);
    expect(() => assertValidPi('nope', 'parent_pi')).toThrow(
      'Invalid parent_pi: must be 26-character ULID (got: nope)'
    );
  });
});

describe('shard2', () => {
  it('takes the first two characters', () => {
    expect(shard2('01J8ME3H6FZ3KQ5W1P2XY8K7E5')).toEqual(['0', '1']);
    expect(shard2('7ZZZZZZZZZZZZZZZZZZZZZZZZZ')).toEqual(['7', 'Z']);
  });
});
