import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { resolve } from '../services/entity-ops';
import { assertValidPi } from '../utils/ulid';

/**
 * GET /resolve/:pi
 * Fast PI -> tip CID lookup
 * Does not fetch the manifest, just returns the tip CID
 */
export async function resolveHandler(c: Context<HonoEnv>): Promise<Response> {
  const pi = c.req.param('pi');
  assertValidPi(pi);
  return c.json(await resolve(c.get('ledger'), pi));
}
