import { type ContentStore, MemoryContentStore } from './content-store';
import { IPFSService } from './ipfs';
import { MemoryPointerStore, MfsPointerStore, type PointerStore } from './pointer-store';
import { ManifestChain } from './manifest-chain';
import { TipService } from './tip';
import { IndexEngine } from './index-engine';
import { IndexSync } from './index-sync';
import { VersionAppender } from './versioning';
import { RelationshipMaintainer } from './relationships';
import { BackgroundTasks } from './background';
import type { Env } from '../types/env';
import {
  getIPFSURL,
  getIndexOptions,
  getRelationMaxAttempts,
  getStorageBackend,
} from '../config';

export interface LedgerOptions {
  store: ContentStore;
  pointers: PointerStore;
  index?: { snapshotThreshold?: number; chunkSize?: number };
  relations?: { maxAttempts?: number; baseDelayMs?: number };
  clock?: () => Date;
}

/**
 * Every service of one ledger instance, wired to a single content store and
 * pointer substrate. Entity operations take the ledger as their first argument.
 */
export interface Ledger {
  store: ContentStore;
  chain: ManifestChain;
  tips: TipService;
  index: IndexEngine;
  indexSync: IndexSync;
  appender: VersionAppender;
  relations: RelationshipMaintainer;
  tasks: BackgroundTasks;
  clock: () => Date;
}

export function createLedger(options: LedgerOptions): Ledger {
  const clock = options.clock ?? (() => new Date());
  const tasks = new BackgroundTasks();
  const chain = new ManifestChain(options.store, clock);
  const tips = new TipService(options.pointers);
  const index = new IndexEngine(options.store, options.pointers, chain, {
    ...options.index,
    clock,
  });
  const indexSync = new IndexSync(index, tasks);
  const appender = new VersionAppender(chain, tips, indexSync, tasks);
  const relations = new RelationshipMaintainer(appender, options.relations);

  return {
    store: options.store,
    chain,
    tips,
    index,
    indexSync,
    appender,
    relations,
    tasks,
    clock,
  };
}

/**
 * Build a ledger from environment configuration
 */
export function createLedgerFromEnv(env: Env): Ledger {
  const common = {
    index: getIndexOptions(env),
    relations: { maxAttempts: getRelationMaxAttempts(env) },
  };

  if (getStorageBackend(env) === 'ipfs') {
    const ipfs = new IPFSService(getIPFSURL(env));
    console.log(`[SERVER] Using Kubo at ${getIPFSURL(env)}`);
    return createLedger({ store: ipfs, pointers: new MfsPointerStore(ipfs), ...common });
  }

  console.log('[SERVER] Using in-process storage; data is lost on exit');
  return createLedger({
    store: new MemoryContentStore(),
    pointers: new MemoryPointerStore(),
    ...common,
  });
}
