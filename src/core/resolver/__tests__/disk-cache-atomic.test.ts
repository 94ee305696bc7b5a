/**
 * DiskCache write atomicity: a save that fails before its rename must leave
 * the previous entry readable and no temp file behind.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";

import { CacheError, ErrorCode } from "../../errors.js";
import { DiskCache } from "../disk-cache.js";
import { createTempDir, createTestLogger, removeTempDir } from "../../__tests__/test-helpers.js";

const renameControl = vi.hoisted(() => ({ fail: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rename: async (from: string, to: string) => {
      if (renameControl.fail) {
        throw Object.assign(new Error("ENOSPC: no space left on device, rename"), { code: "ENOSPC" });
      }
      return actual.rename(from, to);
    },
  };
});

const SITE = "https://assets.example.test";

describe("DiskCache atomic writes", () => {
  let baseDir: string;
  let diskCache: DiskCache;

  beforeEach(async () => {
    renameControl.fail = false;
    baseDir = await createTempDir("disk-cache-atomic-test");
    diskCache = new DiskCache({ baseDir, ttlHours: 24, logger: createTestLogger() });
  });

  afterEach(async () => {
    renameControl.fail = false;
    await removeTempDir(baseDir);
  });

  it("should keep the previous entry when a save fails before rename", async () => {
    await diskCache.save("W1", SITE, {
      schemas: { "1": { id: "1", name: "Hardware" } },
      schemasByName: { hardware: { id: "1", name: "Hardware" } },
      objectTypes: {},
      typesByName: {},
    });

    renameControl.fail = true;
    const error = await diskCache
      .save("W1", SITE, {
        schemas: { "2": { id: "2", name: "Software" } },
        schemasByName: { software: { id: "2", name: "Software" } },
        objectTypes: {},
        typesByName: {},
      })
      .catch((e: unknown) => e);
    renameControl.fail = false;

    expect(error).toBeInstanceOf(CacheError);
    expect(error).toMatchObject({ code: ErrorCode.CACHE_WRITE_FAILED, operation: "write" });

    const loaded = await diskCache.load("W1", SITE);
    expect(loaded.ok && Object.keys(loaded.value.schemas)).toEqual(["1"]);
  });

  it("should remove the temp file of a failed save", async () => {
    renameControl.fail = true;
    await expect(
      diskCache.save("W1", SITE, { schemas: {}, schemasByName: {}, objectTypes: {}, typesByName: {} })
    ).rejects.toBeInstanceOf(CacheError);

    expect(await fs.readdir(diskCache.cacheDir)).toEqual([]);
  });
});
