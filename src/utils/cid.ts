import { CID } from 'multiformats/cid';
import * as json from 'multiformats/codecs/json';
import * as raw from 'multiformats/codecs/raw';
import { sha256 } from 'multiformats/hashes/sha2';
import { ValidationError } from './errors';

/**
 * Validate CID format using multiformats library
 */
export function isValidCID(value: string): boolean {
  try {
    CID.parse(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate CID and throw if invalid
 */
export function assertValidCID(value: string, label: string = 'CID'): void {
  if (!isValidCID(value)) {
    throw new ValidationError(`Invalid ${label}: must be a valid CID (got: ${value})`, {
      [label]: value,
    });
  }
}

/**
 * Validate multiple CIDs in a record (e.g., components)
 */
export function validateCIDRecord(
  record: Record<string, string>,
  recordLabel: string = 'record'
): void {
  for (const [key, cid] of Object.entries(record)) {
    assertValidCID(cid, `${recordLabel}["${key}"]`);
  }
}

/**
 * Recursively sort object keys so that equal documents serialize to equal bytes.
 * Array order is preserved; undefined object members are dropped (as JSON does).
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = canonicalize(member);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Encode a JSON document canonically and compute its CIDv1 (json codec, sha2-256)
 */
export async function encodeJSON(doc: unknown): Promise<{ cid: string; bytes: Uint8Array }> {
  const bytes = json.encode(canonicalize(doc));
  const digest = await sha256.digest(bytes);
  return { cid: CID.create(1, json.code, digest).toString(), bytes };
}

/**
 * Compute the CIDv1 (raw codec, sha2-256) of a byte blob
 */
export async function blobCID(bytes: Uint8Array): Promise<string> {
  const digest = await sha256.digest(bytes);
  return CID.create(1, raw.code, digest).toString();
}

/**
 * Decode bytes written by encodeJSON
 */
export function decodeJSON(bytes: Uint8Array): unknown {
  return json.decode(bytes);
}
