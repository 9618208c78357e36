import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  parseBooleanParam,
  parseVersionSelector,
  validateBody,
  validatePagination,
} from './validation';
import { ValidationError } from './errors';
import { blobCID } from './cid';

describe('parseVersionSelector', () => {
  it('parses ver:<N>', () => {
    expect(parseVersionSelector('ver:3')).toEqual({ type: 'ver', value: 3 });
  });

  it('parses cid:<CID>', async () => {
    const cid = await blobCID(new Uint8Array([1, 2, 3]));
    expect(parseVersionSelector(`cid:${cid}`)).toEqual({ type: 'cid', value: cid });
  });

  it.each(['ver:0', 'ver:-1', 'ver:1.5', 'ver:abc', 'cid:nope', 'latest'])('rejects %s', (selector) => {
    expect(() => parseVersionSelector(selector)).toThrow(ValidationError);
  });
});

describe('validatePagination', () => {
  it('reads limit and cursor', () => {
    expect(validatePagination(new URL('http://localhost/x?limit=5&cursor=abc'))).toEqual({
      limit: 5,
      cursor: 'abc',
    });
  });

  it('falls back to the default limit', () => {
    expect(validatePagination(new URL('http://localhost/x'))).toEqual({ limit: 50 });
    expect(validatePagination(new URL('http://localhost/x'), 100)).toEqual({ limit: 100 });
  });

  it.each(['0', '1001', 'ten', '2.5'])('rejects limit=%s', (limit) => {
    expect(() => validatePagination(new URL(`http://localhost/x?limit=${limit}`))).toThrow(
      'Invalid limit: must be between 1 and 1000'
    );
  });
});

describe('parseBooleanParam', () => {
  it('accepts true/false and 1/0', () => {
    expect(parseBooleanParam(new URL('http://localhost/x?f=true'), 'f')).toBe(true);
    expect(parseBooleanParam(new URL('http://localhost/x?f=1'), 'f')).toBe(true);
    expect(parseBooleanParam(new URL('http://localhost/x?f=false'), 'f')).toBe(false);
    expect(parseBooleanParam(new URL('http://localhost/x'), 'f')).toBe(false);
    expect(() => parseBooleanParam(new URL('http://localhost/x?f=yes'), 'f')).toThrow(ValidationError);
  });
});

describe('validateBody', () => {
  const schema = z.object({ name: z.string() });

  it('returns the parsed body', async () => {
    const request = new Request('http://localhost/x', {
      method: 'POST',
      body: JSON.stringify({ name: 'a' }),
    });
    await expect(validateBody(request, schema)).resolves.toEqual({ name: 'a' });
  });

  it('reports schema issues by path', async () => {
    const request = new Request('http://localhost/x', {
      method: 'POST',
      body: JSON.stringify({ name: 1 }),
    });
    const error = await validateBody(request, schema).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.message).toBe('Invalid request body');
      expect(error.details).toEqual({
        errors: [{ path: 'name', message: 'Expected string, received number' }],
      });
    }
  });

  it('rejects bodies that are not JSON', async () => {
    const request = new Request('http://localhost/x', { method: 'POST', body: '{oops' });
    await expect(validateBody(request, schema)).rejects.toThrow(
      'Failed to parse request body: expected JSON'
    );
  });
});
