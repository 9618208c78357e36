import type { Context } from 'hono';
import type { HonoEnv } from '../types/hono';
import { uploadBlobs } from '../services/entity-ops';
import { ValidationError } from '../utils/errors';

/**
 * POST /upload
 * Store raw bytes from multipart form data
 * Returns CID(s) for use in manifest components
 */
export async function uploadHandler(c: Context<HonoEnv>): Promise<Response> {
  let formData: FormData;
  try {
    formData = await c.req.formData();
  } catch {
    throw new ValidationError('Upload must be multipart/form-data');
  }

  const files: Array<{ name: string; bytes: Uint8Array }> = [];
  for (const [field, value] of formData.entries()) {
    if (typeof value === 'string') {
      continue;
    }
    files.push({
      name: value.name || field,
      bytes: new Uint8Array(await value.arrayBuffer()),
    });
  }

  return c.json(await uploadBlobs(c.get('ledger'), files));
}
