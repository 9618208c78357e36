import { serve } from '@hono/node-server';
import { createApp } from './index';
import { createLedgerFromEnv } from './services/ledger';
import { getPort, validateEnv } from './config';
import { describeError } from './utils/errors';
import type { Env } from './types/env';

const env: Env = process.env;
validateEnv(env);

const ledger = createLedgerFromEnv(env);
const app = createApp(ledger);
const port = getPort(env);

const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(`[SERVER] Listening on http://localhost:${info.port}`);
});

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) {
    return;
  }
  stopping = true;
  console.log(`[SERVER] ${signal} received, waiting for ${ledger.tasks.pending} background tasks`);
  server.close();
  await ledger.tasks.settle();
  await ledger.indexSync.flushDeferred();
  if (ledger.indexSync.deferred.length > 0) {
    console.error(`[SERVER] Exiting with ${ledger.indexSync.deferred.length} index events undelivered`);
  }
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error(`[SERVER] Shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  });
}
