import type { ContentStore } from './content-store';
import { NotFoundError, ValidationError } from '../utils/errors';
import {
  type ManifestV1,
  ManifestV1Schema,
  MANIFEST_SCHEMA,
  type VersionHistoryItem,
  link,
} from '../types/manifest';

export interface AppendManifestInput {
  pi: string;
  ver: number;
  prev: string | null;
  components: Record<string, string>; // label -> CID, full resulting state
  children_pi: string[];
  parent_pi?: string;
  note?: string;
  ts?: string; // defaults to the chain's clock
}

export interface StoredManifest {
  cid: string;
  manifest: ManifestV1;
}

/**
 * Immutable per-entity version history.
 * Each manifest links to its predecessor through `prev`; nothing here ever
 * rewrites a stored manifest.
 */
export class ManifestChain {
  constructor(
    private readonly store: ContentStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Write one manifest. Identical inputs (including ts) give the same CID.
   * Storage failures propagate as-is; retries belong to the caller.
   */
  async append(input: AppendManifestInput): Promise<StoredManifest> {
    if (!Number.isInteger(input.ver) || input.ver < 1) {
      throw new ValidationError(`Invalid version ${input.ver} for ${input.pi}`);
    }
    if ((input.ver === 1) !== (input.prev === null)) {
      throw new ValidationError(
        input.ver === 1
          ? `Version 1 of ${input.pi} cannot have a previous version`
          : `Version ${input.ver} of ${input.pi} requires a previous version`,
        { pi: input.pi, ver: input.ver, prev: input.prev }
      );
    }

    const manifest: ManifestV1 = {
      schema: MANIFEST_SCHEMA,
      pi: input.pi,
      ver: input.ver,
      ts: input.ts ?? this.clock().toISOString(),
      prev: input.prev === null ? null : link(input.prev),
      components: Object.fromEntries(
        Object.entries(input.components).map(([label, cid]) => [label, link(cid)])
      ),
      children_pi: [...input.children_pi],
      ...(input.parent_pi ? { parent_pi: input.parent_pi } : {}),
      ...(input.note ? { note: input.note } : {}),
    };

    const cid = await this.store.putJSON(manifest);
    console.log(`[CHAIN] Stored ${manifest.pi} v${manifest.ver} as ${cid}`);
    return { cid, manifest };
  }

  /**
   * Fetch and validate a manifest
   */
  async read(cid: string): Promise<ManifestV1> {
    const doc = await this.store.getJSON(cid);
    const parsed = ManifestV1Schema.safeParse(doc);
    if (!parsed.success) {
      throw new ValidationError(`Document ${cid} is not a manifest`, {
        cid,
        errors: parsed.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      });
    }
    return parsed.data;
  }

  /**
   * Walk backward through prev links, newest first.
   * Versions must decrease by one and stay on the same PI; the walk ends at v1.
   */
  async *walk(fromCid: string): AsyncGenerator<StoredManifest> {
    let cid: string | null = fromCid;
    let previous: ManifestV1 | null = null;

    while (cid !== null) {
      const manifest = await this.read(cid);
      const broken =
        (previous !== null && (manifest.pi !== previous.pi || manifest.ver !== previous.ver - 1)) ||
        (manifest.prev === null && manifest.ver !== 1);
      if (broken) {
        throw new ValidationError(`Broken version chain at ${cid}`, {
          cid,
          pi: manifest.pi,
          ver: manifest.ver,
          after_ver: previous?.ver ?? null,
        });
      }
      yield { cid, manifest };
      previous = manifest;
      cid = manifest.prev ? manifest.prev['/'] : null;
    }
  }

  /**
   * One page of version history starting at `fromCid` (a tip or a cursor).
   * next_cursor is the CID of the next older manifest, or null at v1.
   */
  async history(
    fromCid: string,
    limit: number
  ): Promise<{ items: VersionHistoryItem[]; next_cursor: string | null }> {
    const items: VersionHistoryItem[] = [];
    let nextCursor: string | null = null;

    for await (const { cid, manifest } of this.walk(fromCid)) {
      if (items.length === limit) {
        nextCursor = cid;
        break;
      }
      items.push({
        ver: manifest.ver,
        cid,
        ts: manifest.ts,
        ...(manifest.note ? { note: manifest.note } : {}),
      });
    }

    return { items, next_cursor: nextCursor };
  }

  /**
   * Find the manifest of a given version by walking back from the tip
   */
  async findVersion(pi: string, tipCid: string, ver: number): Promise<StoredManifest> {
    for await (const stored of this.walk(tipCid)) {
      if (stored.manifest.ver === ver) {
        return stored;
      }
      if (stored.manifest.ver < ver) {
        break;
      }
    }
    throw new NotFoundError('Version', `${pi}@v${ver}`);
  }
}
