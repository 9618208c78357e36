import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';

/**
 * GET /index
 * Index pointer and snapshot statistics
 */
export async function indexStatsHandler(c: Context<HonoEnv>): Promise<Response> {
  const ledger = c.get('ledger');
  const stats = await ledger.index.stats();
  return c.json({
    ...stats,
    deferred_events: ledger.indexSync.deferred.length,
    relation_failures: ledger.relations.failureCount,
  });
}

/**
 * POST /index/rebuild
 * Force a snapshot rebuild. Deferred index events are replayed first so the
 * snapshot covers every committed write the log can know about.
 */
export async function rebuildIndexHandler(c: Context<HonoEnv>): Promise<Response> {
  const ledger = c.get('ledger');
  await ledger.indexSync.flushDeferred();

  const result = await ledger.index.rebuildSnapshot();
  console.log(`[HANDLER] Snapshot rebuild: ${result.status}`);
  return c.json(result);
}
