import { z } from 'zod';
import { PI_REGEX } from '../utils/ulid';

/**
 * IPLD link format: { "/": "<cid>" }
 * Used for dag-json encoding to create proper DAG links
 */
export interface IPLDLink {
  '/': string;
}

/**
 * Convert CID string to IPLD link object
 */
export function link(cid: string): IPLDLink {
  return { '/': cid };
}

export const MANIFEST_SCHEMA = 'ledger/manifest@v1';

/**
 * Manifest schema version 1: one immutable version of an entity
 */
export interface ManifestV1 {
  schema: typeof MANIFEST_SCHEMA;
  pi: string; // ULID
  ver: number; // version number (starts at 1)
  ts: string; // ISO 8601 timestamp
  prev: IPLDLink | null; // link to previous version (null for v1)
  components: {
    [label: string]: IPLDLink; // e.g., { metadata: { "/": "bafy..." } }
  };
  children_pi: string[]; // ordered, no duplicates
  parent_pi?: string;
  note?: string;
}

// Zod schemas for runtime validation

const piString = () => z.string().regex(PI_REGEX, 'Invalid PI');

export const IPLDLinkSchema = z.object({
  '/': z.string().min(1),
});

export const ManifestV1Schema = z.object({
  schema: z.literal(MANIFEST_SCHEMA),
  pi: piString(),
  ver: z.number().int().positive(),
  ts: z.string().datetime(),
  prev: IPLDLinkSchema.nullable(),
  components: z.record(IPLDLinkSchema),
  children_pi: z.array(piString()),
  parent_pi: piString().optional(),
  note: z.string().optional(),
});

// API request/response types

export interface CreateEntityRequest {
  pi?: string; // optional; server generates if not provided
  components: Record<string, string>; // label -> CID (will be converted to IPLDLink)
  children_pi?: string[];
  parent_pi?: string; // optional; if provided, parent's children_pi is updated in the background
  note?: string;
}

export interface CreateEntityResponse {
  pi: string;
  ver: number;
  manifest_cid: string;
  tip: string;
}

export interface AppendVersionRequest {
  expect_tip?: string; // CAS guard
  components?: Record<string, string>; // partial updates ok
  components_remove?: string[];
  children_pi_add?: string[];
  children_pi_remove?: string[];
  note?: string;
}

export interface AppendVersionResponse {
  pi: string;
  ver: number;
  manifest_cid: string;
  tip: string;
}

export interface GetEntityResponse {
  pi: string;
  ver: number;
  ts: string;
  manifest_cid: string;
  prev_cid: string | null;
  components: Record<string, string>; // label -> CID
  children_pi: string[];
  parent_pi?: string;
  note?: string;
}

export interface VersionHistoryItem {
  ver: number;
  cid: string;
  ts: string;
  note?: string;
}

export interface ListVersionsResponse {
  items: VersionHistoryItem[];
  next_cursor: string | null;
}

export interface UpdateRelationsRequest {
  parent_pi: string;
  expect_tip?: string; // CAS guard
  add_children?: string[];
  remove_children?: string[];
  note?: string;
}

export interface UpdateRelationsResponse {
  parent_pi: string;
  parent_ver: number;
  parent_tip: string;
  children_scheduled: number;
}

export interface ResolveResponse {
  pi: string;
  tip: string;
}

export interface UploadResponse {
  name: string;
  cid: string;
  size: number;
}

// Validation schemas for API requests

export const CreateEntityRequestSchema = z.object({
  pi: piString().optional(),
  components: z.record(z.string()),
  children_pi: z.array(piString()).optional(),
  parent_pi: piString().optional(),
  note: z.string().optional(),
});

export const AppendVersionRequestSchema = z.object({
  expect_tip: z.string().min(1).optional(),
  components: z.record(z.string()).optional(),
  components_remove: z.array(z.string().min(1)).optional(),
  children_pi_add: z.array(piString()).optional(),
  children_pi_remove: z.array(piString()).optional(),
  note: z.string().optional(),
});

export const UpdateRelationsRequestSchema = z.object({
  parent_pi: piString(),
  expect_tip: z.string().min(1).optional(),
  add_children: z.array(piString()).optional(),
  remove_children: z.array(piString()).optional(),
  note: z.string().optional(),
});
