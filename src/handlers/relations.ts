import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { updateRelations } from '../services/entity-ops';
import { validateBody } from '../utils/validation';
import { UpdateRelationsRequestSchema } from '../types/manifest';

/**
 * POST /relations
 * Add or remove children of a parent. The parent's new version is returned;
 * the children's parent_pi updates run in the background.
 */
export async function updateRelationsHandler(c: Context<HonoEnv>): Promise<Response> {
  const body = await validateBody(c.req.raw, UpdateRelationsRequestSchema);
  const response = await updateRelations(c.get('ledger'), body);
  return c.json(response, 201);
}
