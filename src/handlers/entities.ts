import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { createEntity, getEntity, listEntities } from '../services/entity-ops';
import { parseBooleanParam, validateBody, validatePagination } from '../utils/validation';
import { assertValidPi } from '../utils/ulid';
import { CreateEntityRequestSchema } from '../types/manifest';

/**
 * POST /entities
 * Create new entity with v1 manifest
 */
export async function createEntityHandler(c: Context<HonoEnv>): Promise<Response> {
  const body = await validateBody(c.req.raw, CreateEntityRequestSchema);
  const response = await createEntity(c.get('ledger'), body);
  return c.json(response, 201);
}

/**
 * GET /entities/:pi
 * Fetch latest manifest for entity
 */
export async function getEntityHandler(c: Context<HonoEnv>): Promise<Response> {
  const pi = c.req.param('pi');
  assertValidPi(pi);
  return c.json(await getEntity(c.get('ledger'), pi));
}

/**
 * GET /entities
 * List entities newest-first with cursor-based pagination
 * Query params: cursor, limit, include_metadata
 */
export async function listEntitiesHandler(c: Context<HonoEnv>): Promise<Response> {
  const startTime = Date.now();
  const url = new URL(c.req.url);
  const { limit, cursor } = validatePagination(url, 100);
  const includeMetadata = parseBooleanParam(url, 'include_metadata');

  console.log(`[HANDLER] GET /entities?limit=${limit}&cursor=${cursor || 'none'}&include_metadata=${includeMetadata}`);

  const response = await listEntities(c.get('ledger'), {
    limit,
    includeMetadata,
    ...(cursor ? { cursor } : {}),
  });

  console.log(`[HANDLER] Returned ${response.entities.length} entities in ${Date.now() - startTime}ms`);
  return c.json(response);
}
