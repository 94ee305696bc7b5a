/**
 * Resolver Models
 *
 * Identity records for schemas and object types, the serializable snapshot of
 * the resolver tables, and the persisted cache entry that wraps it.
 */

import { z } from "zod";

// =============================================================================
// Entity Identity
// =============================================================================

export type EntityCategory = "schema" | "objectType";

export const EntityInfoSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  /** Parent schema of an object type */
  schemaId: z.string().min(1).optional(),
});

export type EntityInfo = z.infer<typeof EntityInfoSchema>;

// =============================================================================
// Snapshot
// =============================================================================

const EntityTableSchema = z.record(z.string(), EntityInfoSchema);

export const ResolverSnapshotSchema = z.object({
  schemas: EntityTableSchema,
  schemasByName: EntityTableSchema,
  objectTypes: EntityTableSchema,
  typesByName: EntityTableSchema,
});

/**
 * Plain-object copy of the four resolver tables
 */
export type ResolverSnapshot = z.infer<typeof ResolverSnapshotSchema>;

export function emptySnapshot(): ResolverSnapshot {
  return { schemas: {}, schemasByName: {}, objectTypes: {}, typesByName: {} };
}

// =============================================================================
// Persistent Cache Entry
// =============================================================================

export const CACHE_FORMAT_VERSION = 1;

export const PersistentCacheEntrySchema = ResolverSnapshotSchema.extend({
  workspaceId: z.string(),
  siteUrl: z.string(),
  /** ISO-8601 */
  cachedAt: z.string().datetime({ offset: true }),
  /** ISO-8601; cachedAt + ttl */
  expiresAt: z.string().datetime({ offset: true }),
  version: z.number().int().positive(),
});

export type PersistentCacheEntry = z.infer<typeof PersistentCacheEntrySchema>;

/**
 * Summary of one cache file, derived for inspection only
 */
export interface CacheInfo {
  workspaceId: string;
  siteUrl: string;
  schemaCount: number;
  objectTypeCount: number;
  cachedAt: string;
  expiresAt: string;
  isExpired: boolean;
  sizeBytes: number;
  fileName: string;
}

// =============================================================================
// Cache Misses
// =============================================================================

export type CacheMissReason = "not_found" | "expired" | "corrupt" | "mismatch";

/**
 * A load that produced no usable entry. The caller falls back to a live fetch.
 */
export interface CacheMiss {
  reason: CacheMissReason;
  message: string;
  filePath: string;
}

// =============================================================================
// Stats
// =============================================================================

export interface ResolverCacheStats {
  schemas: number;
  objectTypes: number;
}
