import { z } from 'zod';
import type { ContentStore } from './content-store';
import type { PointerStore } from './pointer-store';
import { ManifestChain } from './manifest-chain';
import { type IPLDLink, link } from '../types/manifest';
import {
  EMPTY_POINTER,
  INDEX_EVENT_SCHEMA,
  INDEX_POINTER_SCHEMA,
  SNAPSHOT_CHUNK_SCHEMA,
  SNAPSHOT_MEMBERS_SCHEMA,
  SNAPSHOT_SCHEMA,
  type IndexEvent,
  type IndexLogEntry,
  IndexLogEntrySchema,
  type IndexPointer,
  IndexPointerSchema,
  type IndexSnapshot,
  IndexSnapshotSchema,
  type ListEntitiesResponse,
  type ListEventsResponse,
  type ListedEntity,
  type SnapshotChunk,
  SnapshotChunkSchema,
  type SnapshotEntry,
  type SnapshotMembers,
  SnapshotMembersSchema,
} from '../types/index-log';
import { decodeCursor, encodeCursor } from '../utils/cursor';
import { isValidCID } from '../utils/cid';
import { LruCache } from '../utils/lru';
import { ENCODING, assertValidPi } from '../utils/ulid';
import {
  InvalidCursorError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from '../utils/errors';

/**
 * Well-known pointer key holding the CID of the current IndexPointer document
 */
export const INDEX_POINTER_KEY = '/ledger/index/pointer';

export const DEFAULT_SNAPSHOT_THRESHOLD = 10_000;
export const DEFAULT_CHUNK_SIZE = 1_000;

export interface IndexEngineOptions {
  snapshotThreshold?: number;
  chunkSize?: number;
  maxAppendAttempts?: number;
  clock?: () => Date;
}

export type RecordResult =
  | { status: 'recorded'; entry_cid: string; entry: IndexLogEntry; pointer: IndexPointer }
  | { status: 'duplicate'; pi: string; ver: number; known_ver: number };

export type RebuildResult =
  | { status: 'rebuilt'; snapshot_cid: string; seq: number; entity_count: number; consolidated: number }
  | { status: 'unchanged'; snapshot_cid: string | null }
  | { status: 'superseded'; snapshot_cid: string | null };

export interface ListOptions {
  cursor?: string;
  limit: number;
  includeMetadata?: boolean;
}

export interface IndexStats extends IndexPointer {
  pointer_cid: string | null;
  snapshot_seq: number;
  snapshot_entity_count: number;
  hot_log_count: number;
  snapshot_threshold: number;
}

interface HotWindow {
  latest: Map<string, { tip: string; ver: number; ts: string; seq: number }>; // newest event per PI
  creates: Map<number, string>; // ordinal -> PI for entities created after the checkpoint
}

interface Row {
  pi: string;
  tip: string;
}

/**
 * Listing index: an append-only event log plus periodic chunked snapshots.
 *
 * The log is authoritative and never truncated. A snapshot consolidates every
 * entity up to a checkpoint entry; entries after the checkpoint form the hot
 * window that listing scans directly. Entities are positioned by creation
 * ordinal, dense from 1, so snapshot lookups are O(1):
 *   chunk_index = (ordinal - 1) / chunk_size
 *
 * All mutation goes through compare-and-swap on INDEX_POINTER_KEY, so any
 * process can recover the full index state from the pointer alone.
 */
export class IndexEngine {
  readonly snapshotThreshold: number;
  private readonly chunkSize: number;
  private readonly maxAppendAttempts: number;
  private readonly clock: () => Date;

  private readonly entryCache: LruCache<IndexLogEntry>;
  private readonly chunkCache = new LruCache<SnapshotChunk>(64);
  private readonly snapshotCache = new LruCache<IndexSnapshot>(8);
  private readonly memberCache = new LruCache<SnapshotMembers>(ENCODING.length * 2);
  private hotCache: { snapshotCid: string | null; seq: number; window: HotWindow } | null = null;

  constructor(
    private readonly store: ContentStore,
    private readonly pointers: PointerStore,
    private readonly chain: ManifestChain,
    options: IndexEngineOptions = {}
  ) {
    this.snapshotThreshold = options.snapshotThreshold ?? DEFAULT_SNAPSHOT_THRESHOLD;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.maxAppendAttempts = options.maxAppendAttempts ?? 25;
    this.clock = options.clock ?? (() => new Date());
    // rebuilds re-read the whole hot log; keep it resident
    this.entryCache = new LruCache<IndexLogEntry>(this.snapshotThreshold * 2);
  }

  // ==========================================================================
  // RECORDING
  // ==========================================================================

  recordCreate(pi: string, tip: string, ts: string): Promise<RecordResult> {
    return this.record(pi, tip, 1, ts);
  }

  recordUpdate(pi: string, tip: string, ver: number, ts: string): Promise<RecordResult> {
    return this.record(pi, tip, ver, ts);
  }

  /**
   * Append one log entry and advance the pointer.
   *
   * A notification whose version is not above what the log already holds for
   * the PI is a duplicate and is dropped. What the log holds is read from the
   * log itself: the hot window, then the snapshot's membership buckets. The first sighting of a PI is
   * recorded as a create (with the next ordinal) whatever its version, so an
   * update delivered ahead of its create still lists the entity.
   */
  private async record(pi: string, tip: string, ver: number, ts: string): Promise<RecordResult> {
    assertValidPi(pi);
    if (!Number.isInteger(ver) || ver < 1) {
      throw new ValidationError(`Invalid version ${ver} for ${pi}`);
    }

    for (let attempt = 0; attempt < this.maxAppendAttempts; attempt++) {
      const { cid: pointerCid, pointer } = await this.readPointer();

      const known = await this.knownVersion(pi, pointer);
      if (known !== null && known >= ver) {
        console.log(`[INDEX] Ignoring duplicate event ${pi} v${ver} (already at v${known})`);
        return { status: 'duplicate', pi, ver, known_ver: known };
      }

      const type = known === null ? 'create' : 'update';
      const entry: IndexLogEntry = {
        schema: INDEX_EVENT_SCHEMA,
        type,
        pi,
        ver,
        tip: link(tip),
        ts,
        seq: pointer.log_count + 1,
        ...(type === 'create' ? { ordinal: pointer.entity_count + 1 } : {}),
        prev: pointer.log_head_cid ? link(pointer.log_head_cid) : null,
      };
      const entryCid = await this.store.putJSON(entry);
      this.entryCache.set(entryCid, entry);

      const next: IndexPointer = {
        ...pointer,
        log_head_cid: entryCid,
        log_count: pointer.log_count + 1,
        entity_count: pointer.entity_count + (type === 'create' ? 1 : 0),
      };
      const nextCid = await this.store.putJSON(next);

      const swap = await this.pointers.compareAndSwap(INDEX_POINTER_KEY, pointerCid, nextCid);
      if (swap.ok) {
        console.log(`[INDEX] Recorded ${type} ${pi} v${ver} as #${entry.seq}: ${entryCid}`);
        return { status: 'recorded', entry_cid: entryCid, entry, pointer: next };
      }

      console.log(`[INDEX] Log head moved while recording ${pi} v${ver}, retrying (attempt ${attempt + 2}/${this.maxAppendAttempts})`);
    }

    throw new StorageUnavailableError(
      `Index log append for ${pi} v${ver} did not settle after ${this.maxAppendAttempts} attempts`
    );
  }

  /**
   * Highest version the log holds for a PI, or null if it has never been recorded.
   * Entries after the checkpoint always carry a version above anything before
   * it, so the hot window answers first.
   */
  private async knownVersion(pi: string, pointer: IndexPointer): Promise<number | null> {
    const snapshot = pointer.snapshot_cid ? await this.loadSnapshot(pointer.snapshot_cid) : null;
    const hot = await this.hotWindow(pointer, snapshot);
    const recent = hot.latest.get(pi);
    if (recent) {
      return recent.ver;
    }
    if (!snapshot) {
      return null;
    }
    const bucket = snapshot.members[memberBucket(pi)];
    if (!bucket) {
      return null;
    }
    const members = await this.loadMembers(bucket['/']);
    return members.versions[pi] ?? null;
  }

  // ==========================================================================
  // LISTING
  // ==========================================================================

  /**
   * List entities newest-first by creation order.
   * Entities created after the snapshot checkpoint come from the hot log;
   * older ones come from snapshot chunks, with tips overridden by any newer
   * update still in the hot log.
   */
  async list(options: ListOptions): Promise<ListEntitiesResponse> {
    const { limit } = options;
    const { pointer } = await this.readPointer();
    const snapshot = pointer.snapshot_cid ? await this.loadSnapshot(pointer.snapshot_cid) : null;
    const hot = await this.hotWindow(pointer, snapshot);

    let ordinal = pointer.entity_count;
    if (options.cursor) {
      const position = decodeCursor(options.cursor);
      const row = await this.rowAt(position.o, pointer, snapshot, hot);
      if (!row || row.pi !== position.pi) {
        throw new InvalidCursorError('Cursor no longer resolves to a listed entity', {
          cursor: options.cursor,
        });
      }
      ordinal = position.o - 1;
    }

    const rows: Array<Row & { ordinal: number }> = [];
    while (ordinal >= 1 && rows.length < limit) {
      const row = await this.rowAt(ordinal, pointer, snapshot, hot);
      if (row) {
        rows.push({ ...row, ordinal });
      } else {
        console.warn(`[INDEX] No entity at ordinal ${ordinal}; skipping`);
      }
      ordinal--;
    }

    const last = rows[rows.length - 1];
    const nextCursor = ordinal >= 1 && last ? encodeCursor({ o: last.ordinal, pi: last.pi }) : null;

    const entities: ListedEntity[] = options.includeMetadata
      ? await Promise.all(rows.map((row) => this.describe(row)))
      : rows.map(({ pi, tip }) => ({ pi, tip }));

    console.log(`[INDEX] Listed ${entities.length} entities (hot=${hot.latest.size}, snapshot=${snapshot?.entity_count ?? 0}), next_cursor=${nextCursor ?? 'null'}`);

    return { entities, limit, next_cursor: nextCursor };
  }

  private async describe(row: Row): Promise<ListedEntity> {
    const manifest = await this.chain.read(row.tip);
    return {
      pi: row.pi,
      tip: row.tip,
      ver: manifest.ver,
      ts: manifest.ts,
      note: manifest.note ?? null,
      component_count: Object.keys(manifest.components).length,
      children_count: manifest.children_pi.length,
      parent_pi: manifest.parent_pi ?? null,
    };
  }

  /**
   * Resolve a creation ordinal to its entity and newest known tip
   */
  private async rowAt(
    ordinal: number,
    pointer: IndexPointer,
    snapshot: IndexSnapshot | null,
    hot: HotWindow
  ): Promise<Row | null> {
    if (ordinal < 1 || ordinal > pointer.entity_count) {
      return null;
    }

    const snapshotCount = snapshot?.entity_count ?? 0;
    if (ordinal > snapshotCount) {
      const pi = hot.creates.get(ordinal);
      const newest = pi === undefined ? undefined : hot.latest.get(pi);
      return pi !== undefined && newest ? { pi, tip: newest.tip } : null;
    }

    if (!snapshot) {
      return null;
    }
    const chunkIndex = Math.floor((ordinal - 1) / snapshot.chunk_size);
    const chunkLink = snapshot.chunks[chunkIndex];
    if (!chunkLink) {
      return null;
    }
    const chunk = await this.loadChunk(chunkLink['/']);
    const entry = chunk.entries[(ordinal - 1) % snapshot.chunk_size];
    if (!entry) {
      return null;
    }
    const newest = hot.latest.get(entry.pi);
    return { pi: entry.pi, tip: newest ? newest.tip : entry.tip['/'] };
  }

  /**
   * Log entries after the snapshot checkpoint, folded per PI and per ordinal.
   *
   * The window for the current snapshot is kept between calls and extended
   * with entries newer than the last one folded in, so each entry is read
   * once per snapshot generation. Merges keep the higher seq, which makes
   * concurrent extensions safe.
   */
  private async hotWindow(pointer: IndexPointer, snapshot: IndexSnapshot | null): Promise<HotWindow> {
    let cached = this.hotCache;
    if (!cached || cached.snapshotCid !== pointer.snapshot_cid) {
      cached = {
        snapshotCid: pointer.snapshot_cid,
        seq: snapshot?.checkpoint_seq ?? 0,
        window: { latest: new Map(), creates: new Map() },
      };
      this.hotCache = cached;
    }
    if (pointer.log_count <= cached.seq) {
      return cached.window;
    }

    const floor = cached.seq;
    const { window } = cached;
    for await (const { entry } of this.walkLog(pointer.log_head_cid, null)) {
      if (entry.seq <= floor) {
        break;
      }
      const known = window.latest.get(entry.pi);
      if (!known || known.seq < entry.seq) {
        window.latest.set(entry.pi, { tip: entry.tip['/'], ver: entry.ver, ts: entry.ts, seq: entry.seq });
      }
      if (entry.type === 'create' && entry.ordinal !== undefined) {
        window.creates.set(entry.ordinal, entry.pi);
      }
    }
    cached.seq = Math.max(cached.seq, pointer.log_count);
    return window;
  }

  /**
   * Walk the log newest-first from `from`, stopping before `stopAt`
   */
  private async *walkLog(
    from: string | null,
    stopAt: string | null
  ): AsyncGenerator<{ cid: string; entry: IndexLogEntry }> {
    let cid = from;
    while (cid !== null && cid !== stopAt) {
      const entry = await this.loadEntry(cid);
      yield { cid, entry };
      cid = entry.prev ? entry.prev['/'] : null;
    }
  }

  /**
   * Log entries newest-first, for mirrors consuming changes incrementally.
   * The cursor is the CID of the next entry to return.
   */
  async listEvents(options: { cursor?: string; limit: number }): Promise<ListEventsResponse> {
    const { pointer } = await this.readPointer();
    let start = pointer.log_head_cid;

    if (options.cursor) {
      if (!isValidCID(options.cursor)) {
        throw new InvalidCursorError('cursor must be a valid CID (base32 format)', {
          cursor: options.cursor,
        });
      }
      try {
        await this.loadEntry(options.cursor);
      } catch (error) {
        if (error instanceof NotFoundError || error instanceof ValidationError) {
          throw new InvalidCursorError('Cursor does not name an index event', {
            cursor: options.cursor,
          });
        }
        throw error;
      }
      start = options.cursor;
    }

    const items: IndexEvent[] = [];
    let nextCursor: string | null = null;
    for await (const { cid, entry } of this.walkLog(start, null)) {
      if (items.length === options.limit) {
        nextCursor = cid;
        break;
      }
      items.push({
        event_cid: cid,
        type: entry.type,
        pi: entry.pi,
        ver: entry.ver,
        tip_cid: entry.tip['/'],
        ts: entry.ts,
        seq: entry.seq,
      });
    }

    return {
      items,
      total_events: pointer.log_count,
      total_pis: pointer.entity_count,
      has_more: nextCursor !== null,
      next_cursor: nextCursor,
    };
  }

  // ==========================================================================
  // SNAPSHOTS
  // ==========================================================================

  /**
   * Whether the hot window has reached the rebuild threshold
   */
  async shouldRebuild(pointer?: IndexPointer): Promise<boolean> {
    const current = pointer ?? (await this.readPointer()).pointer;
    const snapshot = current.snapshot_cid ? await this.loadSnapshot(current.snapshot_cid) : null;
    return current.log_count - (snapshot?.checkpoint_seq ?? 0) >= this.snapshotThreshold;
  }

  /**
   * Consolidate the previous snapshot and the log entries after its checkpoint
   * into a new chunked snapshot.
   *
   * The log is read up to a captured head. Appends that land meanwhile stay
   * after the new checkpoint and are picked up by the next rebuild; only the
   * pointer's snapshot_cid is swapped, so they are never lost.
   */
  async rebuildSnapshot(): Promise<RebuildResult> {
    const { pointer: captured } = await this.readPointer();
    const previous = captured.snapshot_cid ? await this.loadSnapshot(captured.snapshot_cid) : null;

    if (!captured.log_head_cid || (previous && previous.checkpoint_seq === captured.log_count)) {
      return { status: 'unchanged', snapshot_cid: captured.snapshot_cid };
    }

    const pending: IndexLogEntry[] = [];
    const stopAt = previous?.checkpoint ? previous.checkpoint['/'] : null;
    for await (const { entry } of this.walkLog(captured.log_head_cid, stopAt)) {
      pending.push(entry);
    }
    pending.reverse();

    const rows = previous ? await this.loadRows(previous) : [];
    const positions = new Map<string, number>();
    rows.forEach((row, i) => positions.set(row.pi, i));

    for (const entry of pending) {
      const row: SnapshotEntry = { pi: entry.pi, ver: entry.ver, tip: entry.tip, ts: entry.ts };
      if (entry.type === 'create') {
        if (entry.ordinal !== rows.length + 1) {
          console.warn(`[INDEX] Create #${entry.seq} for ${entry.pi} has ordinal ${entry.ordinal}, expected ${rows.length + 1}`);
        }
        positions.set(entry.pi, rows.length);
        rows.push(row);
        continue;
      }
      const index = positions.get(entry.pi);
      if (index === undefined) {
        console.warn(`[INDEX] Update #${entry.seq} for unknown entity ${entry.pi}; skipped`);
        continue;
      }
      if (entry.ver > rows[index].ver) {
        rows[index] = row;
      }
    }

    const chunks: IPLDLink[] = [];
    for (let i = 0; i * this.chunkSize < rows.length; i++) {
      const chunk: SnapshotChunk = {
        schema: SNAPSHOT_CHUNK_SCHEMA,
        index: i,
        entries: rows.slice(i * this.chunkSize, (i + 1) * this.chunkSize),
      };
      const chunkCid = await this.store.putJSON(chunk);
      this.chunkCache.set(chunkCid, chunk);
      chunks.push(link(chunkCid));
    }

    const members = await this.writeMembers(rows);

    const snapshot: IndexSnapshot = {
      schema: SNAPSHOT_SCHEMA,
      seq: (previous?.seq ?? 0) + 1,
      ts: this.clock().toISOString(),
      prev: captured.snapshot_cid ? link(captured.snapshot_cid) : null,
      checkpoint: link(captured.log_head_cid),
      checkpoint_seq: captured.log_count,
      entity_count: rows.length,
      chunk_size: this.chunkSize,
      chunks,
      members,
    };
    const snapshotCid = await this.store.putJSON(snapshot);
    this.snapshotCache.set(snapshotCid, snapshot);

    for (let attempt = 0; attempt < this.maxAppendAttempts; attempt++) {
      const { cid: pointerCid, pointer } = await this.readPointer();
      if (pointer.snapshot_cid !== captured.snapshot_cid) {
        console.log(`[INDEX] Snapshot ${snapshotCid} superseded by ${pointer.snapshot_cid}`);
        return { status: 'superseded', snapshot_cid: pointer.snapshot_cid };
      }

      const next: IndexPointer = { ...pointer, snapshot_cid: snapshotCid };
      const nextCid = await this.store.putJSON(next);
      const swap = await this.pointers.compareAndSwap(INDEX_POINTER_KEY, pointerCid, nextCid);
      if (swap.ok) {
        console.log(`[INDEX] Snapshot #${snapshot.seq} ${snapshotCid}: ${rows.length} entities in ${chunks.length} chunks, consolidated ${pending.length} log entries`);
        return {
          status: 'rebuilt',
          snapshot_cid: snapshotCid,
          seq: snapshot.seq,
          entity_count: rows.length,
          consolidated: pending.length,
        };
      }
    }

    throw new StorageUnavailableError(
      `Snapshot ${snapshotCid} could not be published after ${this.maxAppendAttempts} attempts`
    );
  }

  /**
   * Write one membership bucket per PI suffix present in `rows`
   */
  private async writeMembers(rows: SnapshotEntry[]): Promise<Record<string, IPLDLink>> {
    const buckets = new Map<string, Record<string, number>>();
    for (const row of rows) {
      const key = memberBucket(row.pi);
      const versions = buckets.get(key) ?? {};
      versions[row.pi] = row.ver;
      buckets.set(key, versions);
    }

    const members: Record<string, IPLDLink> = {};
    for (const [bucket, versions] of buckets) {
      const doc: SnapshotMembers = { schema: SNAPSHOT_MEMBERS_SCHEMA, bucket, versions };
      const cid = await this.store.putJSON(doc);
      this.memberCache.set(cid, doc);
      members[bucket] = link(cid);
    }
    return members;
  }

  private async loadRows(snapshot: IndexSnapshot): Promise<SnapshotEntry[]> {
    const rows: SnapshotEntry[] = [];
    for (const chunkLink of snapshot.chunks) {
      const chunk = await this.loadChunk(chunkLink['/']);
      rows.push(...chunk.entries);
    }
    return rows;
  }

  // ==========================================================================
  // POINTER & DOCUMENTS
  // ==========================================================================

  async readPointer(): Promise<{ cid: string | null; pointer: IndexPointer }> {
    const cid = await this.pointers.read(INDEX_POINTER_KEY);
    if (cid === null) {
      return { cid: null, pointer: EMPTY_POINTER };
    }
    const pointer = await this.loadDoc(cid, IndexPointerSchema, INDEX_POINTER_SCHEMA);
    return { cid, pointer };
  }

  async stats(): Promise<IndexStats> {
    const { cid, pointer } = await this.readPointer();
    const snapshot = pointer.snapshot_cid ? await this.loadSnapshot(pointer.snapshot_cid) : null;
    return {
      ...pointer,
      pointer_cid: cid,
      snapshot_seq: snapshot?.seq ?? 0,
      snapshot_entity_count: snapshot?.entity_count ?? 0,
      hot_log_count: pointer.log_count - (snapshot?.checkpoint_seq ?? 0),
      snapshot_threshold: this.snapshotThreshold,
    };
  }

  private async loadEntry(cid: string): Promise<IndexLogEntry> {
    const cached = this.entryCache.get(cid);
    if (cached) {
      return cached;
    }
    const entry = await this.loadDoc(cid, IndexLogEntrySchema, INDEX_EVENT_SCHEMA);
    this.entryCache.set(cid, entry);
    return entry;
  }

  private async loadSnapshot(cid: string): Promise<IndexSnapshot> {
    const cached = this.snapshotCache.get(cid);
    if (cached) {
      return cached;
    }
    const snapshot = await this.loadDoc(cid, IndexSnapshotSchema, SNAPSHOT_SCHEMA);
    this.snapshotCache.set(cid, snapshot);
    return snapshot;
  }

  private async loadChunk(cid: string): Promise<SnapshotChunk> {
    const cached = this.chunkCache.get(cid);
    if (cached) {
      return cached;
    }
    const chunk = await this.loadDoc(cid, SnapshotChunkSchema, SNAPSHOT_CHUNK_SCHEMA);
    this.chunkCache.set(cid, chunk);
    return chunk;
  }

  private async loadMembers(cid: string): Promise<SnapshotMembers> {
    const cached = this.memberCache.get(cid);
    if (cached) {
      return cached;
    }
    const members = await this.loadDoc(cid, SnapshotMembersSchema, SNAPSHOT_MEMBERS_SCHEMA);
    this.memberCache.set(cid, members);
    return members;
  }

  private async loadDoc<T>(cid: string, schema: z.ZodType<T>, label: string): Promise<T> {
    const parsed = schema.safeParse(await this.store.getJSON(cid));
    if (!parsed.success) {
      throw new ValidationError(`Document ${cid} is not a ${label} document`, { cid });
    }
    return parsed.data;
  }
}

// last character of a PI is random, so buckets fill evenly
function memberBucket(pi: string): string {
  return pi.slice(-1);
}
