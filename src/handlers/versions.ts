import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { appendVersion, getVersion, listVersions } from '../services/entity-ops';
import {
  parseVersionSelector,
  validateBody,
  validatePagination,
} from '../utils/validation';
import { assertValidPi } from '../utils/ulid';
import { AppendVersionRequestSchema } from '../types/manifest';

/**
 * POST /entities/:pi/versions
 * Append new version. A stale expect_tip or a lost race returns 409 with
 * the actual tip; the client rebases and resubmits.
 */
export async function appendVersionHandler(c: Context<HonoEnv>): Promise<Response> {
  const pi = c.req.param('pi');
  assertValidPi(pi);

  const body = await validateBody(c.req.raw, AppendVersionRequestSchema);
  const response = await appendVersion(c.get('ledger'), pi, body);

  return c.json(response, 201);
}

/**
 * GET /entities/:pi/versions
 * List version history (paginated, newest first)
 */
export async function listVersionsHandler(c: Context<HonoEnv>): Promise<Response> {
  const pi = c.req.param('pi');
  assertValidPi(pi);

  const { limit, cursor } = validatePagination(new URL(c.req.url));
  const response = await listVersions(c.get('ledger'), pi, cursor ? { limit, cursor } : { limit });

  return c.json(response);
}

/**
 * GET /entities/:pi/versions/:selector
 * Get specific version by cid:<CID> or ver:<N>
 */
export async function getVersionHandler(c: Context<HonoEnv>): Promise<Response> {
  const pi = c.req.param('pi');
  assertValidPi(pi);

  const selector = parseVersionSelector(c.req.param('selector'));
  return c.json(await getVersion(c.get('ledger'), pi, selector));
}
