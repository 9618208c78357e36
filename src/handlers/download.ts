import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { assertValidCID } from '../utils/cid';

/**
 * GET /dag/:cid
 * Fetch a stored JSON document (manifests, index documents)
 */
export async function dagDownloadHandler(c: Context<HonoEnv>): Promise<Response> {
  const cid = c.req.param('cid');
  assertValidCID(cid, 'CID parameter');

  const doc = await c.get('ledger').store.getJSON(cid);
  return new Response(JSON.stringify(doc), {
    status: 200,
    headers: {
      'Content-Type': 'application/json',
      'Cache-Control': 'public, max-age=31536000, immutable',
      'X-Content-CID': cid,
    },
  });
}

/**
 * GET /cat/:cid
 * Download blob content by CID
 */
export async function downloadHandler(c: Context<HonoEnv>): Promise<Response> {
  const cid = c.req.param('cid');
  assertValidCID(cid, 'CID parameter');

  const bytes = await c.get('ledger').store.getBytes(cid);

  return new Response(bytes, {
    status: 200,
    headers: {
      'Content-Type': 'application/octet-stream',
      'Cache-Control': 'public, max-age=31536000, immutable', // CIDs are immutable
      'X-Content-CID': cid,
    },
  });
}
