import { z } from 'zod';
import { PI_REGEX } from '../utils/ulid';
import { type IPLDLink, IPLDLinkSchema } from './manifest';

/**
 * Index documents: the append-only event log, chunked snapshots and the
 * pointer record that ties them together. All three are stored in the
 * content store; only the pointer's CID lives under a mutable key.
 */

export const INDEX_EVENT_SCHEMA = 'ledger/index-event@v1';
export const SNAPSHOT_SCHEMA = 'ledger/snapshot@v1';
export const SNAPSHOT_CHUNK_SCHEMA = 'ledger/snapshot-chunk@v1';
export const SNAPSHOT_MEMBERS_SCHEMA = 'ledger/snapshot-members@v1';
export const INDEX_POINTER_SCHEMA = 'ledger/index-pointer@v1';

export type IndexEventType = 'create' | 'update';

/**
 * One entity lifecycle event. `prev` links the chronologically previous
 * entry, forming a chain independent of any entity's manifests.
 */
export interface IndexLogEntry {
  schema: typeof INDEX_EVENT_SCHEMA;
  type: IndexEventType;
  pi: string;
  ver: number;
  tip: IPLDLink;
  ts: string;
  seq: number; // 1-based position in the log
  ordinal?: number; // create only: 1-based creation ordinal
  prev: IPLDLink | null;
}

export interface SnapshotEntry {
  pi: string;
  ver: number;
  tip: IPLDLink;
  ts: string;
}

/**
 * Fixed-size slice of a snapshot. Entry i of chunk k has ordinal k * chunk_size + i + 1.
 */
export interface SnapshotChunk {
  schema: typeof SNAPSHOT_CHUNK_SCHEMA;
  index: number;
  entries: SnapshotEntry[];
}

export interface IndexSnapshot {
  schema: typeof SNAPSHOT_SCHEMA;
  seq: number;
  ts: string;
  prev: IPLDLink | null; // previous snapshot
  checkpoint: IPLDLink | null; // last log entry consolidated
  checkpoint_seq: number;
  entity_count: number;
  chunk_size: number;
  chunks: IPLDLink[];
  members: Record<string, IPLDLink>; // bucket -> SnapshotMembers
}

/**
 * Versions of the snapshot's entities whose PI ends in `bucket`
 */
export interface SnapshotMembers {
  schema: typeof SNAPSHOT_MEMBERS_SCHEMA;
  bucket: string;
  versions: Record<string, number>;
}

export interface IndexPointer {
  schema: typeof INDEX_POINTER_SCHEMA;
  snapshot_cid: string | null;
  log_head_cid: string | null;
  entity_count: number;
  log_count: number;
}

export const EMPTY_POINTER: IndexPointer = {
  schema: INDEX_POINTER_SCHEMA,
  snapshot_cid: null,
  log_head_cid: null,
  entity_count: 0,
  log_count: 0,
};

const piString = () => z.string().regex(PI_REGEX, 'Invalid PI');

export const IndexLogEntrySchema = z.object({
  schema: z.literal(INDEX_EVENT_SCHEMA),
  type: z.enum(['create', 'update']),
  pi: piString(),
  ver: z.number().int().positive(),
  tip: IPLDLinkSchema,
  ts: z.string().datetime(),
  seq: z.number().int().positive(),
  ordinal: z.number().int().positive().optional(),
  prev: IPLDLinkSchema.nullable(),
});

export const SnapshotEntrySchema = z.object({
  pi: piString(),
  ver: z.number().int().positive(),
  tip: IPLDLinkSchema,
  ts: z.string().datetime(),
});

export const SnapshotChunkSchema = z.object({
  schema: z.literal(SNAPSHOT_CHUNK_SCHEMA),
  index: z.number().int().nonnegative(),
  entries: z.array(SnapshotEntrySchema),
});

export const IndexSnapshotSchema = z.object({
  schema: z.literal(SNAPSHOT_SCHEMA),
  seq: z.number().int().positive(),
  ts: z.string().datetime(),
  prev: IPLDLinkSchema.nullable(),
  checkpoint: IPLDLinkSchema.nullable(),
  checkpoint_seq: z.number().int().nonnegative(),
  entity_count: z.number().int().nonnegative(),
  chunk_size: z.number().int().positive(),
  chunks: z.array(IPLDLinkSchema),
  members: z.record(IPLDLinkSchema),
});

export const SnapshotMembersSchema = z.object({
  schema: z.literal(SNAPSHOT_MEMBERS_SCHEMA),
  bucket: z.string().length(1),
  versions: z.record(z.number().int().positive()),
});

export const IndexPointerSchema = z.object({
  schema: z.literal(INDEX_POINTER_SCHEMA),
  snapshot_cid: z.string().nullable(),
  log_head_cid: z.string().nullable(),
  entity_count: z.number().int().nonnegative(),
  log_count: z.number().int().nonnegative(),
});

// Listing API shapes

export interface ListedEntity {
  pi: string;
  tip: string;
  ver?: number;
  ts?: string;
  note?: string | null;
  component_count?: number;
  children_count?: number;
  parent_pi?: string | null;
}

export interface ListEntitiesResponse {
  entities: ListedEntity[];
  limit: number;
  next_cursor: string | null;
}

export interface IndexEvent {
  event_cid: string;
  type: IndexEventType;
  pi: string;
  ver: number;
  tip_cid: string;
  ts: string;
  seq: number;
}

export interface ListEventsResponse {
  items: IndexEvent[];
  total_events: number;
  total_pis: number;
  has_more: boolean;
  next_cursor: string | null;
}
