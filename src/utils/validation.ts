import { z, ZodSchema } from 'zod';
import { ValidationError } from './errors';
import { isValidCID } from './cid';

/**
 * Validate request body against Zod schema
 * Throws ValidationError on failure
 */
export async function validateBody<T>(request: Request, schema: ZodSchema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ValidationError('Failed to parse request body: expected JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid request body', {
      errors: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Parse version selector: "cid:<CID>" or "ver:<N>"
 */
export type VersionSelector = { type: 'cid'; value: string } | { type: 'ver'; value: number };

export function parseVersionSelector(selector: string): VersionSelector {
  if (selector.startsWith('cid:')) {
    const cid = selector.slice(4);
    if (!isValidCID(cid)) {
      throw new ValidationError('Invalid version selector: cid must be a valid CID (base32 format)');
    }
    return { type: 'cid', value: cid };
  }
  if (selector.startsWith('ver:')) {
    const raw = selector.slice(4);
    const ver = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(ver) || ver < 1) {
      throw new ValidationError('Invalid version number: must be positive integer');
    }
    return { type: 'ver', value: ver };
  }
  throw new ValidationError('Invalid version selector: must be "cid:<CID>" or "ver:<N>"');
}

/**
 * Validate pagination parameters
 */
export interface PaginationParams {
  limit: number;
  cursor?: string;
}

export function validatePagination(url: URL, defaultLimit: number = 50): PaginationParams {
  const limitParam = url.searchParams.get('limit');
  const cursor = url.searchParams.get('cursor') || undefined;

  const limit = limitParam ? Number(limitParam) : defaultLimit;

  if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
    throw new ValidationError('Invalid limit: must be between 1 and 1000');
  }

  return cursor === undefined ? { limit } : { limit, cursor };
}

/**
 * Parse a boolean flag from the query string ("true"/"1" or "false"/"0")
 */
export function parseBooleanParam(url: URL, name: string): boolean {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '' || raw === 'false' || raw === '0') {
    return false;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  throw new ValidationError(`Invalid ${name}: must be true or false`);
}
