/**
 * Resolver
 *
 * Translates schema and object-type names to IDs (and back) for one
 * workspace. Tables are filled from the disk cache when it holds a live entry
 * and from the remote catalog otherwise; a remote refresh is written back to
 * disk for the next process.
 */

import { ErrorCode, ResolutionError } from "../errors.js";
import { Mutex } from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { DiskCache } from "./disk-cache.js";
import type { IAssetsCatalog, RemoteSchema } from "./interfaces/IAssetsCatalog.js";
import type { EntityInfo } from "./models/resolver-models.js";
import { ResolverCache } from "./resolver-cache.js";

const DEFAULT_FRESHNESS_MS = 5 * 60 * 1000;

export interface ResolverOptions {
  diskCache?: DiskCache;
  /** Supply to share tables with another component; a new cache otherwise */
  cache?: ResolverCache;
  logger?: Logger;
  /** How long in-memory tables are trusted before the next refresh */
  freshnessMs?: number;
  now?: () => Date;
}

export type RefreshSource = "disk" | "remote";

export interface ResolverStats {
  schemas: number;
  objectTypes: number;
  lastRefresh: string | null;
  lastSource: RefreshSource | null;
  freshnessMinutes: number;
  needsRefresh: boolean;
}

export interface ObjectTypeName {
  name: string;
  schemaName: string;
}

export class Resolver {
  private readonly cache: ResolverCache;
  private readonly diskCache?: DiskCache;
  private readonly logger: Logger;
  private readonly freshnessMs: number;
  private readonly now: () => Date;
  private readonly refreshLock = new Mutex();
  private lastRefresh: Date | null = null;
  private lastSource: RefreshSource | null = null;

  constructor(
    private readonly catalog: IAssetsCatalog,
    options: ResolverOptions = {}
  ) {
    this.cache = options.cache ?? new ResolverCache();
    this.diskCache = options.diskCache;
    this.logger = options.logger ?? createLogger("resolver");
    this.freshnessMs = options.freshnessMs ?? DEFAULT_FRESHNESS_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reload the tables, preferring a live disk entry over the remote catalog
   */
  async refresh(): Promise<RefreshSource> {
    return this.refreshLock.runExclusive(() => this.refreshUnlocked());
  }

  /**
   * Refresh only when the in-memory tables are older than the freshness window.
   * Concurrent callers wait for one refresh instead of starting their own.
   */
  async ensureFresh(): Promise<void> {
    if (!this.needsRefresh()) return;
    await this.refreshLock.runExclusive(async () => {
      if (this.needsRefresh()) {
        await this.refreshUnlocked();
      }
    });
  }

  async resolveSchemaId(nameOrId: string): Promise<string> {
    return (await this.getSchema(nameOrId)).id;
  }

  async resolveSchemaName(nameOrId: string): Promise<string> {
    return (await this.getSchema(nameOrId)).name;
  }

  /**
   * Object type ID for a type name or ID within a schema
   */
  async resolveObjectTypeId(schemaNameOrId: string, typeNameOrId: string): Promise<string> {
    const schema = await this.getSchema(schemaNameOrId);
    const entity = await this.cache.resolve("objectType", typeNameOrId, schema.id);
    if (!entity) {
      throw new ResolutionError(
        `object type not found: ${typeNameOrId} in schema ${schema.name}`,
        ErrorCode.RESOLUTION_OBJECT_TYPE_NOT_FOUND,
        { reference: typeNameOrId, schemaId: schema.id }
      );
    }
    return entity.id;
  }

  async resolveObjectTypeName(typeId: string): Promise<ObjectTypeName> {
    await this.ensureFresh();

    const entity = await this.cache.resolve("objectType", typeId);
    if (!entity || entity.id !== typeId) {
      throw new ResolutionError(`object type ID not found: ${typeId}`, ErrorCode.RESOLUTION_OBJECT_TYPE_NOT_FOUND, {
        reference: typeId,
      });
    }

    const schema = entity.schemaId ? await this.cache.resolve("schema", entity.schemaId) : undefined;
    return { name: entity.name, schemaName: schema?.name ?? "" };
  }

  async listSchemas(): Promise<EntityInfo[]> {
    await this.ensureFresh();
    return this.cache.list("schema");
  }

  async listObjectTypes(schemaNameOrId: string): Promise<EntityInfo[]> {
    const schema = await this.getSchema(schemaNameOrId);
    return this.cache.list("objectType", schema.id);
  }

  async getStats(): Promise<ResolverStats> {
    const counts = await this.cache.stats();
    return {
      ...counts,
      lastRefresh: this.lastRefresh?.toISOString() ?? null,
      lastSource: this.lastSource,
      freshnessMinutes: this.freshnessMs / 60_000,
      needsRefresh: this.needsRefresh(),
    };
  }

  private async getSchema(nameOrId: string): Promise<EntityInfo> {
    await this.ensureFresh();

    const entity = await this.cache.resolve("schema", nameOrId);
    if (!entity) {
      throw new ResolutionError(`schema not found: ${nameOrId}`, ErrorCode.RESOLUTION_SCHEMA_NOT_FOUND, {
        reference: nameOrId,
      });
    }
    return entity;
  }

  private needsRefresh(): boolean {
    if (!this.lastRefresh) return true;
    return this.now().getTime() - this.lastRefresh.getTime() > this.freshnessMs;
  }

  private async refreshUnlocked(): Promise<RefreshSource> {
    if (await this.loadFromDisk()) {
      this.markRefreshed("disk");
      return "disk";
    }

    await this.loadFromRemote();
    this.markRefreshed("remote");
    return "remote";
  }

  private markRefreshed(source: RefreshSource): void {
    this.lastRefresh = this.now();
    this.lastSource = source;
  }

  private async loadFromDisk(): Promise<boolean> {
    if (!this.diskCache) return false;

    const { workspaceId, siteUrl } = this.catalog;
    try {
      const loaded = await this.diskCache.load(workspaceId, siteUrl);
      if (!loaded.ok) {
        this.logger.debug({ workspaceId, reason: loaded.error.reason }, "Resolver disk cache miss");
        return false;
      }
      await this.cache.replace(loaded.value);
      this.logger.info({ workspaceId, cachedAt: loaded.value.cachedAt }, "Resolver tables loaded from disk cache");
      return true;
    } catch (error) {
      this.logger.warn({ err: error, workspaceId }, "Disk cache unavailable, falling back to remote catalog");
      return false;
    }
  }

  private async loadFromRemote(): Promise<void> {
    const { workspaceId, siteUrl } = this.catalog;

    let schemas: RemoteSchema[];
    try {
      schemas = await this.catalog.listSchemas();
    } catch (error) {
      throw new ResolutionError("failed to load schemas", ErrorCode.RESOLUTION_REFRESH_FAILED, { reference: workspaceId }, { cause: error });
    }

    // Built off to the side, then swapped in with one write
    const staging = new ResolverCache();
    await staging.recordMany(
      "schema",
      schemas.map((schema) => ({ id: schema.id, name: schema.name }))
    );

    this.logger.info({ workspaceId, schemas: schemas.length }, "Loading object types");
    let failedSchemas = 0;
    for (const schema of schemas) {
      try {
        const types = await this.catalog.listObjectTypes(schema.id);
        await staging.recordMany(
          "objectType",
          types.map((type) => ({ id: type.id, name: type.name, schemaId: schema.id }))
        );
      } catch (error) {
        failedSchemas++;
        this.logger.error({ err: error, schemaId: schema.id }, "Failed to load object types for schema");
      }
    }

    const snapshot = await staging.snapshot();
    await this.cache.replace(snapshot);

    // Incomplete tables stay in memory only so the next process refetches
    if (failedSchemas > 0) {
      this.logger.warn({ workspaceId, failedSchemas }, "Skipping disk cache save for incomplete resolver tables");
    } else if (this.diskCache) {
      try {
        await this.diskCache.save(workspaceId, siteUrl, snapshot);
      } catch (error) {
        this.logger.warn({ err: error, workspaceId }, "Failed to save resolver cache to disk");
      }
    }
  }
}
