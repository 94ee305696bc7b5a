/**
 * cache commands - Inspect and clear the resolver disk cache
 */

import chalk from "chalk";
import { DiskCache } from "../../core/resolver/index.js";
import { createCommandContext, formatBytes } from "./shared.js";

export interface CacheListOptions {
  json?: boolean;
}

export interface CacheClearOptions {
  expired?: boolean;
}

function openDiskCache(command: string): DiskCache {
  const { config, logger } = createCommandContext(command);
  return new DiskCache({ baseDir: config.cacheDir, ttlHours: config.cacheTtlHours, logger });
}

/**
 * List cached workspaces
 */
export async function cacheListCommand(options: CacheListOptions): Promise<void> {
  const diskCache = openDiskCache("cache-list");
  const infos = await diskCache.listCachedWorkspaces();

  if (options.json) {
    console.log(JSON.stringify(infos, null, 2));
    return;
  }

  if (infos.length === 0) {
    console.log(chalk.dim(`No cached workspaces in ${diskCache.cacheDir}`));
    return;
  }

  console.log();
  console.log(chalk.cyan.bold("Resolver Cache"));
  console.log(chalk.dim("─".repeat(40)));

  for (const info of infos) {
    const state = info.isExpired ? chalk.yellow("expired") : chalk.green("valid");
    console.log();
    console.log(`  ${chalk.white.bold(info.workspaceId)} ${chalk.dim(info.siteUrl)}`);
    console.log(`  Status:       ${state}`);
    console.log(`  Schemas:      ${info.schemaCount}`);
    console.log(`  Object types: ${info.objectTypeCount}`);
    console.log(`  Cached at:    ${info.cachedAt}`);
    console.log(`  Expires at:   ${info.expiresAt}`);
    console.log(`  Size:         ${formatBytes(info.sizeBytes)}`);
  }
  console.log();
}

/**
 * Clear every cache entry, or only the expired ones
 */
export async function cacheClearCommand(options: CacheClearOptions): Promise<void> {
  const diskCache = openDiskCache("cache-clear");

  if (options.expired) {
    const removed = await diskCache.clearExpired();
    console.log(chalk.green(`Removed ${removed} expired cache ${removed === 1 ? "entry" : "entries"}`));
    return;
  }

  await diskCache.clearAll();
  console.log(chalk.green(`Cleared resolver cache at ${diskCache.cacheDir}`));
}
