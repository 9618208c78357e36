import type { Ledger } from './ledger';
import type { AppendResult } from './versioning';
import { generatePi } from '../utils/ulid';
import { isValidCID, validateCIDRecord } from '../utils/cid';
import {
  CASError,
  ConflictError,
  InvalidCursorError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import type { VersionSelector } from '../utils/validation';
import type {
  ManifestV1,
  CreateEntityRequest,
  CreateEntityResponse,
  AppendVersionRequest,
  AppendVersionResponse,
  GetEntityResponse,
  ListVersionsResponse,
  ResolveResponse,
  UpdateRelationsRequest,
  UpdateRelationsResponse,
  UploadResponse,
} from '../types/manifest';
import type { ListEntitiesResponse, ListEventsResponse } from '../types/index-log';

// Maximum number of children that can be added/removed in a single request
export const MAX_CHILDREN_PER_REQUEST = 100;

/**
 * Create a new entity
 *
 * The entity is committed once its tip exists. Linking it into its parent
 * and pointing its children at it are background side effects; their
 * outcome is logged and never fails the create.
 */
export async function createEntity(
  ledger: Ledger,
  req: CreateEntityRequest
): Promise<CreateEntityResponse> {
  const pi = req.pi ?? generatePi();
  const children = req.children_pi ?? [];

  validateCIDRecord(req.components, 'components');
  assertChildLimit(children, 'children_pi');
  assertNoSelfReference(pi, req.parent_pi, children);

  if (await ledger.tips.tipExists(pi)) {
    throw new ConflictError('Entity', pi);
  }

  let created: AppendResult;
  try {
    created = await ledger.appender.create({
      pi,
      components: req.components,
      children_pi: children,
      ...(req.parent_pi ? { parent_pi: req.parent_pi } : {}),
      ...(req.note ? { note: req.note } : {}),
    });
  } catch (error) {
    // another writer created the same PI between the existence check and the CAS
    if (error instanceof CASError) {
      throw new ConflictError('Entity', pi, { tip: error.actual });
    }
    throw error;
  }

  if (req.parent_pi) {
    ledger.tasks.waitUntil(
      ledger.relations.linkChild(req.parent_pi, pi),
      `link ${pi} into ${req.parent_pi}`
    );
  }
  scheduleChildren(ledger, pi, created.manifest.children_pi, []);

  console.log(`[ENTITY] Created ${pi} v1: ${created.tip}`);

  return {
    pi,
    ver: 1,
    manifest_cid: created.tip,
    tip: created.tip,
  };
}

/**
 * Get the latest version of an entity
 */
export async function getEntity(ledger: Ledger, pi: string): Promise<GetEntityResponse> {
  const tip = await ledger.tips.readTip(pi);
  const manifest = await ledger.chain.read(tip);
  return toEntityResponse(tip, manifest);
}

/**
 * Fast PI -> tip lookup, without fetching the manifest
 */
export async function resolve(ledger: Ledger, pi: string): Promise<ResolveResponse> {
  return { pi, tip: await ledger.tips.readTip(pi) };
}

/**
 * Append a version. CAS failures surface to the caller unchanged; a client
 * retries by re-reading the tip and resubmitting its intent.
 */
export async function appendVersion(
  ledger: Ledger,
  pi: string,
  req: AppendVersionRequest
): Promise<AppendVersionResponse> {
  const added = req.children_pi_add ?? [];
  const removed = req.children_pi_remove ?? [];
  assertChildLimit(added, 'children_pi_add');
  assertChildLimit(removed, 'children_pi_remove');
  assertNoSelfReference(pi, undefined, [...added, ...removed]);
  if (req.components) {
    validateCIDRecord(req.components, 'components');
  }

  const result = await ledger.appender.append(
    pi,
    {
      ...(req.components ? { components: req.components } : {}),
      ...(req.components_remove ? { components_remove: req.components_remove } : {}),
      children_pi_add: added,
      children_pi_remove: removed,
      ...(req.note ? { note: req.note } : {}),
    },
    req.expect_tip !== undefined ? { expectTip: req.expect_tip } : {}
  );

  scheduleChildren(ledger, pi, added, removed);

  return {
    pi,
    ver: result.ver,
    manifest_cid: result.tip,
    tip: result.tip,
  };
}

/**
 * Update a parent's children. The parent's version is appended before
 * returning; each child's parent_pi is updated in the background.
 */
export async function updateRelations(
  ledger: Ledger,
  req: UpdateRelationsRequest
): Promise<UpdateRelationsResponse> {
  const added = req.add_children ?? [];
  const removed = req.remove_children ?? [];
  if (added.length === 0 && removed.length === 0) {
    throw new ValidationError('At least one of add_children or remove_children is required');
  }
  assertChildLimit(added, 'add_children');
  assertChildLimit(removed, 'remove_children');
  assertNoSelfReference(req.parent_pi, undefined, [...added, ...removed]);

  const result = await ledger.appender.append(
    req.parent_pi,
    {
      children_pi_add: added,
      children_pi_remove: removed,
      note: req.note ?? 'Updated relations',
    },
    req.expect_tip !== undefined ? { expectTip: req.expect_tip } : {}
  );

  scheduleChildren(ledger, req.parent_pi, added, removed);

  return {
    parent_pi: req.parent_pi,
    parent_ver: result.ver,
    parent_tip: result.tip,
    children_scheduled: added.length + removed.length,
  };
}

/**
 * Version history, newest first. The cursor is the CID of the next older manifest.
 */
export async function listVersions(
  ledger: Ledger,
  pi: string,
  options: { cursor?: string; limit: number }
): Promise<ListVersionsResponse> {
  if (options.cursor === undefined) {
    return ledger.chain.history(await ledger.tips.readTip(pi), options.limit);
  }

  await ledger.tips.readTip(pi);
  if (!isValidCID(options.cursor)) {
    throw new InvalidCursorError('cursor must be a valid CID (base32 format)', {
      cursor: options.cursor,
    });
  }
  let start: ManifestV1;
  try {
    start = await ledger.chain.read(options.cursor);
  } catch (error) {
    if (error instanceof NotFoundError || error instanceof ValidationError) {
      throw new InvalidCursorError('Cursor does not name a version of this entity', {
        cursor: options.cursor,
      });
    }
    throw error;
  }
  if (start.pi !== pi) {
    throw new InvalidCursorError('Cursor does not name a version of this entity', {
      cursor: options.cursor,
    });
  }
  return ledger.chain.history(options.cursor, options.limit);
}

/**
 * One version, selected by manifest CID or version number
 */
export async function getVersion(
  ledger: Ledger,
  pi: string,
  selector: VersionSelector
): Promise<GetEntityResponse> {
  const tip = await ledger.tips.readTip(pi);

  if (selector.type === 'ver') {
    const { cid, manifest } = await ledger.chain.findVersion(pi, tip, selector.value);
    return toEntityResponse(cid, manifest);
  }

  const manifest = await ledger.chain.read(selector.value);
  if (manifest.pi !== pi) {
    throw new NotFoundError('Version', `${pi}@${selector.value}`);
  }
  return toEntityResponse(selector.value, manifest);
}

export function listEntities(
  ledger: Ledger,
  options: { cursor?: string; limit: number; includeMetadata: boolean }
): Promise<ListEntitiesResponse> {
  return ledger.index.list(options);
}

export function listEvents(
  ledger: Ledger,
  options: { cursor?: string; limit: number }
): Promise<ListEventsResponse> {
  return ledger.index.listEvents(options);
}

/**
 * Store uploaded files as raw blobs
 */
export async function uploadBlobs(
  ledger: Ledger,
  files: Array<{ name: string; bytes: Uint8Array }>
): Promise<UploadResponse[]> {
  if (files.length === 0) {
    throw new ValidationError('No files provided in upload');
  }
  const uploads: UploadResponse[] = [];
  for (const file of files) {
    const { cid, size } = await ledger.store.putBytes(file.bytes, file.name);
    uploads.push({ name: file.name, cid, size });
  }
  return uploads;
}

/**
 * Transform a manifest to the response format
 */
export function toEntityResponse(cid: string, manifest: ManifestV1): GetEntityResponse {
  return {
    pi: manifest.pi,
    ver: manifest.ver,
    ts: manifest.ts,
    manifest_cid: cid,
    prev_cid: manifest.prev ? manifest.prev['/'] : null,
    components: Object.fromEntries(
      Object.entries(manifest.components).map(([label, linkObj]) => [label, linkObj['/']])
    ),
    children_pi: manifest.children_pi,
    ...(manifest.parent_pi ? { parent_pi: manifest.parent_pi } : {}),
    ...(manifest.note ? { note: manifest.note } : {}),
  };
}

function scheduleChildren(ledger: Ledger, parent: string, added: string[], removed: string[]): void {
  if (added.length > 0) {
    ledger.tasks.waitUntil(
      ledger.relations.updateChildren('set_parent', parent, added),
      `set parent ${parent} on ${added.length} children`
    );
  }
  if (removed.length > 0) {
    ledger.tasks.waitUntil(
      ledger.relations.updateChildren('clear_parent', parent, removed),
      `clear parent ${parent} on ${removed.length} children`
    );
  }
}

function assertChildLimit(children: string[], field: string): void {
  if (children.length > MAX_CHILDREN_PER_REQUEST) {
    throw new ValidationError(
      `Cannot change ${children.length} children in one request via ${field}. Maximum is ${MAX_CHILDREN_PER_REQUEST}. Please split into multiple requests.`
    );
  }
}

function assertNoSelfReference(pi: string, parent: string | undefined, children: string[]): void {
  if (parent === pi || children.includes(pi)) {
    throw new ValidationError(`Entity ${pi} cannot be its own parent or child`);
  }
}
