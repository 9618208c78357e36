import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { HonoEnv } from './types/hono';
import type { Ledger } from './services/ledger';
import { errorToResponse } from './utils/errors';

// Handlers
import { uploadHandler } from './handlers/upload';
import {
  createEntityHandler,
  getEntityHandler,
  listEntitiesHandler,
} from './handlers/entities';
import {
  appendVersionHandler,
  listVersionsHandler,
  getVersionHandler,
} from './handlers/versions';
import { updateRelationsHandler } from './handlers/relations';
import { resolveHandler } from './handlers/resolve';
import { downloadHandler, dagDownloadHandler } from './handlers/download';
import { listEventsHandler } from './handlers/events';
import { indexStatsHandler, rebuildIndexHandler } from './handlers/index-admin';

export const SERVICE_NAME = 'entity-ledger-api';
export const SERVICE_VERSION = '0.1.0';

/**
 * Build the HTTP app around one ledger instance
 */
export function createApp(ledger: Ledger): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>();

  // CORS middleware (optional, configure as needed)
  app.use('/*', cors());

  // Inject services
  app.use('*', async (c, next) => {
    c.set('ledger', ledger);
    await next();
  });

  // Global error handler
  app.onError((err) => {
    return errorToResponse(err);
  });

  // Health check
  app.get('/', (c) => {
    return c.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'ok',
    });
  });

  // Routes

  // POST /upload
  app.post('/upload', uploadHandler);

  // GET /cat/:cid - Download blob content
  app.get('/cat/:cid', downloadHandler);

  // GET /dag/:cid - Fetch a stored JSON document
  app.get('/dag/:cid', dagDownloadHandler);

  // GET /entities - List all entities (must come before /:pi route)
  app.get('/entities', listEntitiesHandler);

  // POST /entities
  app.post('/entities', createEntityHandler);

  // GET /entities/:pi
  app.get('/entities/:pi', getEntityHandler);

  // POST /entities/:pi/versions
  app.post('/entities/:pi/versions', appendVersionHandler);

  // GET /entities/:pi/versions
  app.get('/entities/:pi/versions', listVersionsHandler);

  // GET /entities/:pi/versions/:selector
  app.get('/entities/:pi/versions/:selector', getVersionHandler);

  // POST /relations - Update parent-child relationships
  app.post('/relations', updateRelationsHandler);

  // GET /resolve/:pi
  app.get('/resolve/:pi', resolveHandler);

  // GET /events - Index log feed
  app.get('/events', listEventsHandler);

  // GET /index - Index statistics
  app.get('/index', indexStatsHandler);

  // POST /index/rebuild - Force a snapshot rebuild
  app.post('/index/rebuild', rebuildIndexHandler);

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: 'NOT_FOUND',
        message: 'Route not found',
      },
      404
    );
  });

  return app;
}
