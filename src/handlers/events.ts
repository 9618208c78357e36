import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { listEvents } from '../services/entity-ops';
import { validatePagination } from '../utils/validation';

/**
 * GET /events
 * Index log feed, newest first, for mirrors that follow changes
 * Query params: cursor (event CID), limit
 */
export async function listEventsHandler(c: Context<HonoEnv>): Promise<Response> {
  const { limit, cursor } = validatePagination(new URL(c.req.url), 100);
  const response = await listEvents(c.get('ledger'), cursor ? { limit, cursor } : { limit });
  return c.json(response);
}
