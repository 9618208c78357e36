import { ManifestChain, type StoredManifest } from './manifest-chain';
import { TipService } from './tip';
import { IndexSync } from './index-sync';
import { BackgroundTasks } from './background';
import type { ManifestV1 } from '../types/manifest';
import { CASError, ValidationError } from '../utils/errors';

/**
 * Changes applied on top of the current version.
 * `parent_pi`: undefined keeps the current parent, null clears it.
 */
export interface VersionDelta {
  components?: Record<string, string>;
  components_remove?: string[];
  children_pi_add?: string[];
  children_pi_remove?: string[];
  parent_pi?: string | null;
  note?: string;
}

export interface AppendOptions {
  expectTip?: string;
  // return the current tip instead of writing when the delta changes nothing
  skipIfUnchanged?: boolean;
}

export interface AppendResult {
  pi: string;
  ver: number;
  tip: string;
  previous: string | null;
  manifest: ManifestV1;
  changed: boolean;
}

export interface InitialVersion {
  pi: string;
  components: Record<string, string>;
  children_pi?: string[];
  parent_pi?: string;
  note?: string;
}

/**
 * Version append shared by every writer (API appends, relation maintenance).
 *
 * 1. read the tip T0
 * 2. reject a stale expected tip before writing anything
 * 3. read the manifest at T0 and apply the delta
 * 4. store the new manifest with prev = T0
 * 5. CAS the tip from T0 to the new manifest
 * 6. schedule the index notification
 *
 * A lost CAS surfaces as CASError; retrying is the caller's decision.
 * The manifest stored by a losing writer is left unreferenced.
 */
export class VersionAppender {
  constructor(
    private readonly chain: ManifestChain,
    private readonly tips: TipService,
    private readonly indexSync: IndexSync,
    private readonly tasks: BackgroundTasks
  ) {}

  /**
   * Write version 1 and create the tip. Fails with CASError if the PI exists.
   */
  async create(initial: InitialVersion): Promise<AppendResult> {
    const stored = await this.chain.append({
      pi: initial.pi,
      ver: 1,
      prev: null,
      components: initial.components,
      children_pi: dedupe(initial.children_pi ?? []),
      ...(initial.parent_pi ? { parent_pi: initial.parent_pi } : {}),
      ...(initial.note ? { note: initial.note } : {}),
    });

    const swap = await this.tips.compareAndSwap(initial.pi, null, stored.cid);
    if (!swap.ok) {
      throw new CASError({ actual: swap.actual, expect: null });
    }

    this.tasks.waitUntil(
      this.indexSync.notify({
        event: 'created',
        pi: initial.pi,
        tip: stored.cid,
        ts: stored.manifest.ts,
      }),
      `index create ${initial.pi}`
    );

    return {
      pi: initial.pi,
      ver: 1,
      tip: stored.cid,
      previous: null,
      manifest: stored.manifest,
      changed: true,
    };
  }

  /**
   * Current tip and manifest of an entity
   */
  async readCurrent(pi: string): Promise<StoredManifest> {
    const cid = await this.tips.readTip(pi);
    return { cid, manifest: await this.chain.read(cid) };
  }

  async append(pi: string, delta: VersionDelta, options: AppendOptions = {}): Promise<AppendResult> {
    const current = await this.tips.readTip(pi);
    if (options.expectTip !== undefined && options.expectTip !== current) {
      throw new CASError({ actual: current, expect: options.expectTip });
    }

    const base = await this.chain.read(current);
    const next = applyDelta(base, delta);

    if (options.skipIfUnchanged && sameState(base, next)) {
      return { pi, ver: base.ver, tip: current, previous: null, manifest: base, changed: false };
    }

    const stored: StoredManifest = await this.chain.append({
      pi,
      ver: base.ver + 1,
      prev: current,
      components: next.components,
      children_pi: next.children_pi,
      ...(next.parent_pi ? { parent_pi: next.parent_pi } : {}),
      ...(delta.note ? { note: delta.note } : {}),
    });

    const swap = await this.tips.compareAndSwap(pi, current, stored.cid);
    if (!swap.ok) {
      throw new CASError({ actual: swap.actual, expect: current });
    }

    this.tasks.waitUntil(
      this.indexSync.notify({
        event: 'updated',
        pi,
        tip: stored.cid,
        ver: stored.manifest.ver,
        ts: stored.manifest.ts,
      }),
      `index update ${pi}`
    );

    return {
      pi,
      ver: stored.manifest.ver,
      tip: stored.cid,
      previous: current,
      manifest: stored.manifest,
      changed: true,
    };
  }
}

interface EntityState {
  components: Record<string, string>;
  children_pi: string[];
  parent_pi?: string;
}

/**
 * Resulting state after a delta. Component labels and children may not be
 * both added and removed in one delta.
 */
export function applyDelta(base: ManifestV1, delta: VersionDelta): EntityState {
  const removeLabels = delta.components_remove ?? [];
  const setLabels = Object.keys(delta.components ?? {});
  const clash = removeLabels.find((label) => setLabels.includes(label));
  if (clash !== undefined) {
    throw new ValidationError(`Component "${clash}" cannot be both set and removed`, { label: clash });
  }

  const addChildren = delta.children_pi_add ?? [];
  const removeChildren = new Set(delta.children_pi_remove ?? []);
  const childClash = addChildren.find((child) => removeChildren.has(child));
  if (childClash !== undefined) {
    throw new ValidationError(`Child ${childClash} cannot be both added and removed`, { child: childClash });
  }

  const components: Record<string, string> = {};
  for (const [label, componentLink] of Object.entries(base.components)) {
    if (!removeLabels.includes(label)) {
      components[label] = componentLink['/'];
    }
  }
  Object.assign(components, delta.components ?? {});

  const children = dedupe([...base.children_pi, ...addChildren]).filter(
    (child) => !removeChildren.has(child)
  );

  let parent = base.parent_pi;
  if (delta.parent_pi === null) {
    parent = undefined;
  } else if (delta.parent_pi !== undefined) {
    parent = delta.parent_pi;
  }

  return {
    components,
    children_pi: children,
    ...(parent ? { parent_pi: parent } : {}),
  };
}

function sameState(base: ManifestV1, next: EntityState): boolean {
  const baseLabels = Object.keys(base.components);
  return (
    baseLabels.length === Object.keys(next.components).length &&
    baseLabels.every((label) => next.components[label] === base.components[label]['/']) &&
    base.children_pi.length === next.children_pi.length &&
    base.children_pi.every((child, i) => next.children_pi[i] === child) &&
    base.parent_pi === next.parent_pi
  );
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
