/**
 * Shared Hono context types for handlers
 */
import type { Ledger } from '../services/ledger';

/**
 * Variables injected by middleware into the Hono context
 */
export type Variables = {
  ledger: Ledger;
};

/**
 * Full Hono environment type
 * Use this for handler context types: Context<HonoEnv>
 */
export type HonoEnv = {
  Variables: Variables;
};
