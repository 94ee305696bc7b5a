/**
 * Configuration and logger level tests
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../core/errors.js";
import { loadConfig } from "../config.js";
import { getLogLevel } from "../logger.js";
import { normalizeFieldName, resolveCacheBaseDir } from "../index.js";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    expect(loadConfig({}, "/work")).toEqual({
      cacheDir: "/work/.cache/assets",
      cacheTtlHours: 24,
      workspaceId: undefined,
      siteUrl: undefined,
      logLevel: "debug",
    });
  });

  it("should read every variable", () => {
    const config = loadConfig(
      {
        ASSETS_CACHE_DIR: "/var/cache/assets",
        ASSETS_CACHE_TTL_HOURS: "12",
        ASSETS_WORKSPACE_ID: "ws-1",
        ASSETS_SITE_URL: "https://assets.example.test",
        LOG_LEVEL: "WARN",
      },
      "/work"
    );

    expect(config).toEqual({
      cacheDir: "/var/cache/assets",
      cacheTtlHours: 12,
      workspaceId: "ws-1",
      siteUrl: "https://assets.example.test",
      logLevel: "warn",
    });
  });

  it("should fall back to the default TTL for unusable values", () => {
    for (const value of ["abc", "0", "-3", "1.5"]) {
      expect(loadConfig({ ASSETS_CACHE_TTL_HOURS: value }, "/work").cacheTtlHours).toBe(24);
    }
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ ASSETS_CACHE_DIR: "  ", ASSETS_SITE_URL: "" }, "/work");

    expect(config.cacheDir).toBe("/work/.cache/assets");
    expect(config.siteUrl).toBeUndefined();
  });

  it("should reject a malformed site URL", () => {
    expect(() => loadConfig({ ASSETS_SITE_URL: "not a url" }, "/work")).toThrow(ConfigurationError);
  });
});

describe("getLogLevel", () => {
  it("should stay silent under test unless asked", () => {
    expect(getLogLevel({ NODE_ENV: "test" })).toBe("silent");
    expect(getLogLevel({ VITEST: "true" })).toBe("silent");
    expect(getLogLevel({ VITEST: "true", LOG_LEVEL: "debug" })).toBe("debug");
  });

  it("should default by environment", () => {
    expect(getLogLevel({ NODE_ENV: "production" })).toBe("info");
    expect(getLogLevel({ NODE_ENV: "development" })).toBe("debug");
    expect(getLogLevel({ NODE_ENV: "production", LOG_LEVEL: "verbose" })).toBe("info");
  });
});

describe("path and field helpers", () => {
  it("should resolve relative cache directories against cwd", () => {
    expect(resolveCacheBaseDir("cache", "/work")).toBe("/work/cache");
    expect(resolveCacheBaseDir("/abs/cache", "/work")).toBe("/abs/cache");
  });

  it("should normalize field names", () => {
    expect(normalizeFieldName("  Serial Number ")).toBe("serial_number");
    expect(normalizeFieldName("purchase__date")).toBe("purchase_date");
  });
});
