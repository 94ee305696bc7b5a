/**
 * Runtime Configuration
 *
 * Reads the cache and workspace settings from the environment and validates
 * them with zod.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_CACHE_DIR, resolveCacheBaseDir } from "./index.js";
import { getLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_CACHE_TTL_HOURS = 24;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Environment variables consumed by the assets core
 */
export const AssetsEnvSchema = z.object({
  ASSETS_CACHE_DIR: optionalString,
  /** Invalid or non-positive values fall back to the default */
  ASSETS_CACHE_TTL_HOURS: z.coerce.number().int().positive().catch(DEFAULT_CACHE_TTL_HOURS),
  ASSETS_WORKSPACE_ID: optionalString,
  ASSETS_SITE_URL: optionalString.pipe(z.string().url().optional()),
});

export interface AssetsConfig {
  /** Absolute cache base directory */
  cacheDir: string;
  cacheTtlHours: number;
  workspaceId?: string;
  siteUrl?: string;
  logLevel: LogLevel;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError when a present value is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AssetsConfig {
  const parsed = AssetsEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }

  const { ASSETS_CACHE_DIR, ASSETS_CACHE_TTL_HOURS, ASSETS_WORKSPACE_ID, ASSETS_SITE_URL } = parsed.data;

  return {
    cacheDir: resolveCacheBaseDir(ASSETS_CACHE_DIR ?? DEFAULT_CACHE_DIR, cwd),
    cacheTtlHours: ASSETS_CACHE_TTL_HOURS,
    workspaceId: ASSETS_WORKSPACE_ID,
    siteUrl: ASSETS_SITE_URL,
    logLevel: getLogLevel(env),
  };
}
