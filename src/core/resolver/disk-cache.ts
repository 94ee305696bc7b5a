/**
 * Disk Cache
 *
 * Durable, TTL-bounded snapshots of the resolver tables, one JSON file per
 * (workspace, site) pair under `<baseDir>/resolver`. File names are SHA-256
 * fingerprints of the identity, never the human-readable workspace name.
 *
 * Writes go to a temp file in the same directory and are renamed over the
 * target, so a reader sees either the previous entry or the new one. Two
 * instances saving the same workspace race; the last rename wins.
 *
 * Misses (absent, expired, corrupt, mismatched) are returned as values for the
 * caller to fall back on a live fetch. Only filesystem failures throw.
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import { CacheError, ErrorCode, isErrnoException, type CacheOperation } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { calculateContentHash, ensureDirectory, writeFileAtomic } from "../../utils/fs.js";
import { RESOLVER_CACHE_SUBDIR } from "../../utils/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import {
  CACHE_FORMAT_VERSION,
  PersistentCacheEntrySchema,
  type CacheInfo,
  type CacheMiss,
  type EntityInfo,
  type PersistentCacheEntry,
  type ResolverSnapshot,
} from "./models/resolver-models.js";

const HOUR_MS = 60 * 60 * 1000;

export interface DiskCacheOptions {
  /** Cache base directory; entries live in its `resolver` subdirectory */
  baseDir: string;
  /** Entry lifetime in hours. 0 makes every entry expire immediately. */
  ttlHours: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Deterministic cache file name for a workspace identity
 */
export function cacheFileName(workspaceId: string, siteUrl: string): string {
  return `workspace_${calculateContentHash(`${workspaceId}|${siteUrl}`)}.json`;
}

function copyTable(table: Record<string, EntityInfo>): Record<string, EntityInfo> {
  const copy: Record<string, EntityInfo> = {};
  for (const [key, entity] of Object.entries(table)) {
    copy[key] = { ...entity };
  }
  return copy;
}

type ParsedEntry = Result<PersistentCacheEntry, string>;

export class DiskCache {
  readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DiskCacheOptions) {
    if (!Number.isFinite(options.ttlHours) || options.ttlHours < 0) {
      throw new RangeError(`ttlHours must be a non-negative number, got ${options.ttlHours}`);
    }
    this.cacheDir = path.join(options.baseDir, RESOLVER_CACHE_SUBDIR);
    this.ttlMs = options.ttlHours * HOUR_MS;
    this.logger = options.logger ?? createLogger("disk-cache");
    this.now = options.now ?? (() => new Date());
  }

  getCacheFilePath(workspaceId: string, siteUrl: string): string {
    return path.join(this.cacheDir, cacheFileName(workspaceId, siteUrl));
  }

  /**
   * Load the cached entry for a workspace.
   *
   * @throws CacheError when the file exists but cannot be read
   */
  async load(workspaceId: string, siteUrl: string): Promise<Result<PersistentCacheEntry, CacheMiss>> {
    const filePath = this.getCacheFilePath(workspaceId, siteUrl);

    let raw: string;
    try {
      raw = await fsPromises.readFile(filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return err({ reason: "not_found", message: "cache file not found", filePath });
      }
      throw this.fsError("Failed to read cache file", ErrorCode.CACHE_READ_FAILED, filePath, "read", error);
    }

    const parsed = this.parseEntry(raw);
    if (!parsed.ok) {
      return err({ reason: "corrupt", message: `failed to parse cache file: ${parsed.error}`, filePath });
    }

    const entry = parsed.value;
    if (this.isExpired(entry)) {
      return err({ reason: "expired", message: `cache expired at ${entry.expiresAt}`, filePath });
    }

    if (entry.workspaceId !== workspaceId) {
      return err({
        reason: "mismatch",
        message: `workspace ID mismatch in cache: expected ${workspaceId}, found ${entry.workspaceId}`,
        filePath,
      });
    }

    this.logger.debug({ workspaceId, filePath }, "Loaded resolver cache from disk");
    return ok(entry);
  }

  /**
   * Persist a snapshot of the resolver tables. The tables are copied before
   * serialization; the caller may keep mutating its own structures.
   *
   * @returns the entry as written
   */
  async save(workspaceId: string, siteUrl: string, snapshot: ResolverSnapshot): Promise<PersistentCacheEntry> {
    const cachedAt = this.now();
    const entry: PersistentCacheEntry = {
      workspaceId,
      siteUrl,
      schemas: copyTable(snapshot.schemas),
      schemasByName: copyTable(snapshot.schemasByName),
      objectTypes: copyTable(snapshot.objectTypes),
      typesByName: copyTable(snapshot.typesByName),
      cachedAt: cachedAt.toISOString(),
      expiresAt: new Date(cachedAt.getTime() + this.ttlMs).toISOString(),
      version: CACHE_FORMAT_VERSION,
    };

    const data = JSON.stringify(entry, null, 2);
    const filePath = this.getCacheFilePath(workspaceId, siteUrl);

    try {
      await ensureDirectory(this.cacheDir);
    } catch (error) {
      throw this.fsError("Failed to create cache directory", ErrorCode.CACHE_DIRECTORY_FAILED, this.cacheDir, "mkdir", error);
    }

    try {
      await writeFileAtomic(filePath, data);
    } catch (error) {
      throw this.fsError("Failed to write cache file", ErrorCode.CACHE_WRITE_FAILED, filePath, "write", error);
    }

    this.logger.debug(
      {
        workspaceId,
        filePath,
        schemas: Object.keys(entry.schemas).length,
        objectTypes: Object.keys(entry.objectTypes).length,
      },
      "Saved resolver cache to disk"
    );
    return entry;
  }

  /**
   * Summaries of every readable cache file. Unreadable or corrupt files are
   * logged and skipped. A missing cache directory lists as empty.
   */
  async listCachedWorkspaces(): Promise<CacheInfo[]> {
    let fileNames: string[];
    try {
      const dirents = await fsPromises.readdir(this.cacheDir, { withFileTypes: true });
      fileNames = dirents.filter((d) => d.isFile() && d.name.endsWith(".json")).map((d) => d.name);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw this.fsError("Failed to read cache directory", ErrorCode.CACHE_LIST_FAILED, this.cacheDir, "list", error);
    }

    const infos: CacheInfo[] = [];
    for (const fileName of fileNames) {
      const info = await this.readCacheInfo(fileName);
      if (info) infos.push(info);
    }
    return infos;
  }

  /**
   * Remove files whose entries have expired
   *
   * @returns number of files removed
   */
  async clearExpired(): Promise<number> {
    const infos = await this.listCachedWorkspaces();
    let removed = 0;

    for (const info of infos) {
      if (!info.isExpired) continue;
      const filePath = path.join(this.cacheDir, info.fileName);
      try {
        await fsPromises.rm(filePath, { force: true });
        removed++;
      } catch (error) {
        this.logger.warn({ err: error, fileName: info.fileName }, "Failed to remove expired cache file");
      }
    }

    if (removed > 0) {
      this.logger.info({ removed }, "Removed expired cache files");
    }
    return removed;
  }

  /**
   * Remove the whole resolver cache directory
   */
  async clearAll(): Promise<void> {
    try {
      await fsPromises.rm(this.cacheDir, { recursive: true, force: true });
    } catch (error) {
      throw this.fsError("Failed to clear cache directory", ErrorCode.CACHE_DELETE_FAILED, this.cacheDir, "delete", error);
    }
  }

  /**
   * Remove the entry of one workspace
   *
   * @returns whether a file was removed
   */
  async evict(workspaceId: string, siteUrl: string): Promise<boolean> {
    const filePath = this.getCacheFilePath(workspaceId, siteUrl);
    try {
      await fsPromises.unlink(filePath);
      this.logger.debug({ workspaceId, filePath }, "Evicted resolver cache");
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return false;
      }
      throw this.fsError("Failed to evict cache file", ErrorCode.CACHE_DELETE_FAILED, filePath, "delete", error);
    }
  }

  private isExpired(entry: PersistentCacheEntry): boolean {
    return this.now().getTime() >= Date.parse(entry.expiresAt);
  }

  private parseEntry(raw: string): ParsedEntry {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return err(error instanceof Error ? error.message : String(error));
    }

    const result = PersistentCacheEntrySchema.safeParse(json);
    if (!result.success) {
      return err(result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "));
    }
    return ok(result.data);
  }

  private async readCacheInfo(fileName: string): Promise<CacheInfo | null> {
    const filePath = path.join(this.cacheDir, fileName);

    try {
      const [raw, stat] = await Promise.all([fsPromises.readFile(filePath, "utf-8"), fsPromises.stat(filePath)]);
      const parsed = this.parseEntry(raw);
      if (!parsed.ok) {
        this.logger.warn({ fileName, reason: parsed.error }, "Skipping corrupt cache file");
        return null;
      }

      const entry = parsed.value;
      return {
        workspaceId: entry.workspaceId,
        siteUrl: entry.siteUrl,
        schemaCount: Object.keys(entry.schemas).length,
        objectTypeCount: Object.keys(entry.objectTypes).length,
        cachedAt: entry.cachedAt,
        expiresAt: entry.expiresAt,
        isExpired: this.isExpired(entry),
        sizeBytes: stat.size,
        fileName,
      };
    } catch (error) {
      this.logger.warn({ err: error, fileName }, "Skipping unreadable cache file");
      return null;
    }
  }

  private fsError(
    message: string,
    code: ErrorCode,
    filePath: string,
    operation: CacheOperation,
    cause: unknown
  ): CacheError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new CacheError(`${message}: ${detail}`, code, { path: filePath, operation }, { cause });
  }
}
