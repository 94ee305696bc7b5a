/**
 * Resolver Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";

import { ErrorCode, ResolutionError } from "../../errors.js";
import { DiskCache } from "../disk-cache.js";
import { Resolver } from "../resolver.js";
import type { RemoteObjectType } from "../interfaces/IAssetsCatalog.js";
import { createTempDir, createTestLogger, removeTempDir } from "../../__tests__/test-helpers.js";

const TYPES_BY_SCHEMA: Record<string, RemoteObjectType[]> = {
  "1": [
    { id: "10", name: "Laptop" },
    { id: "11", name: "Monitor" },
  ],
  "2": [{ id: "20", name: "License" }],
};

function createCatalog() {
  return {
    workspaceId: "ws-1",
    siteUrl: "https://assets.example.test",
    listSchemas: vi.fn().mockResolvedValue([
      { id: "1", name: "Hardware" },
      { id: "2", name: "Software" },
    ]),
    listObjectTypes: vi.fn().mockImplementation(async (schemaId: string) => TYPES_BY_SCHEMA[schemaId] ?? []),
  };
}

describe("Resolver", () => {
  let baseDir: string;
  let diskCache: DiskCache;

  beforeEach(async () => {
    baseDir = await createTempDir("resolver-test");
    diskCache = new DiskCache({ baseDir, ttlHours: 24, logger: createTestLogger() });
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  // ===========================================================================
  // Lookups
  // ===========================================================================

  describe("lookups", () => {
    it("should resolve schema and object type names to IDs", async () => {
      const resolver = new Resolver(createCatalog(), { logger: createTestLogger() });

      expect(await resolver.resolveSchemaId("hardware")).toBe("1");
      expect(await resolver.resolveSchemaId("2")).toBe("2");
      expect(await resolver.resolveSchemaName("1")).toBe("Hardware");
      expect(await resolver.resolveObjectTypeId("Hardware", "laptop")).toBe("10");
      expect(await resolver.resolveObjectTypeId("1", "11")).toBe("11");
    });

    it("should resolve an object type ID back to its names", async () => {
      const resolver = new Resolver(createCatalog(), { logger: createTestLogger() });

      expect(await resolver.resolveObjectTypeName("20")).toEqual({ name: "License", schemaName: "Software" });
    });

    it("should list schemas and the object types of one schema", async () => {
      const resolver = new Resolver(createCatalog(), { logger: createTestLogger() });

      expect((await resolver.listSchemas()).map((s) => s.name).sort()).toEqual(["Hardware", "Software"]);
      expect((await resolver.listObjectTypes("Hardware")).map((t) => t.name).sort()).toEqual(["Laptop", "Monitor"]);
    });

    it("should throw ResolutionError for unknown references", async () => {
      const resolver = new Resolver(createCatalog(), { logger: createTestLogger() });

      await expect(resolver.resolveSchemaId("Facilities")).rejects.toThrow("schema not found: Facilities");
      await expect(resolver.resolveObjectTypeId("Software", "Laptop")).rejects.toThrow(
        "object type not found: Laptop in schema Software"
      );
      await expect(resolver.resolveObjectTypeName("99")).rejects.toBeInstanceOf(ResolutionError);
    });
  });

  // ===========================================================================
  // Refresh
  // ===========================================================================

  describe("refresh", () => {
    it("should load from the remote catalog and save to disk", async () => {
      const catalog = createCatalog();
      const resolver = new Resolver(catalog, { diskCache, logger: createTestLogger() });

      expect(await resolver.refresh()).toBe("remote");

      const loaded = await diskCache.load("ws-1", "https://assets.example.test");
      expect(loaded.ok && Object.keys(loaded.value.objectTypes).sort()).toEqual(["10", "11", "20"]);
    });

    it("should prefer a live disk entry over the remote catalog", async () => {
      await new Resolver(createCatalog(), { diskCache, logger: createTestLogger() }).refresh();

      const offline = createCatalog();
      offline.listSchemas.mockRejectedValue(new Error("offline"));
      const resolver = new Resolver(offline, { diskCache, logger: createTestLogger() });

      expect(await resolver.refresh()).toBe("disk");
      expect(await resolver.resolveObjectTypeId("Hardware", "Monitor")).toBe("11");
      expect(offline.listSchemas).not.toHaveBeenCalled();
    });

    it("should fall back to the remote catalog when the disk cache fails", async () => {
      await fs.mkdir(diskCache.getCacheFilePath("ws-1", "https://assets.example.test"), { recursive: true });
      const logger = createTestLogger();
      const resolver = new Resolver(createCatalog(), { diskCache, logger });

      expect(await resolver.refresh()).toBe("remote");
      expect(await resolver.resolveSchemaId("Software")).toBe("2");
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it("should skip a schema whose object types fail to load", async () => {
      const catalog = createCatalog();
      catalog.listObjectTypes.mockImplementation(async (schemaId: string) => {
        if (schemaId === "2") throw new Error("forbidden");
        return TYPES_BY_SCHEMA[schemaId] ?? [];
      });
      const logger = createTestLogger();
      const resolver = new Resolver(catalog, { logger });

      await resolver.refresh();

      expect(await resolver.resolveObjectTypeId("Hardware", "Laptop")).toBe("10");
      await expect(resolver.resolveObjectTypeId("Software", "License")).rejects.toBeInstanceOf(ResolutionError);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("should not save incomplete tables to disk", async () => {
      const catalog = createCatalog();
      catalog.listObjectTypes.mockImplementation(async (schemaId: string) => {
        if (schemaId === "2") throw new Error("forbidden");
        return TYPES_BY_SCHEMA[schemaId] ?? [];
      });
      const resolver = new Resolver(catalog, { diskCache, logger: createTestLogger() });

      expect(await resolver.refresh()).toBe("remote");
      expect(await resolver.resolveObjectTypeId("Hardware", "Laptop")).toBe("10");

      const loaded = await diskCache.load("ws-1", "https://assets.example.test");
      expect(loaded.ok).toBe(false);
      expect(!loaded.ok && loaded.error.reason).toBe("not_found");
    });

    it("should wrap a failed schema listing", async () => {
      const catalog = createCatalog();
      catalog.listSchemas.mockRejectedValue(new Error("unauthorized"));
      const resolver = new Resolver(catalog, { logger: createTestLogger() });

      await expect(resolver.refresh()).rejects.toMatchObject({
        code: ErrorCode.RESOLUTION_REFRESH_FAILED,
        message: "failed to load schemas",
      });
    });

    it("should refresh once for concurrent lookups", async () => {
      const catalog = createCatalog();
      const resolver = new Resolver(catalog, { logger: createTestLogger() });

      await Promise.all([
        resolver.resolveSchemaId("Hardware"),
        resolver.resolveSchemaId("Software"),
        resolver.resolveObjectTypeId("Hardware", "Laptop"),
      ]);

      expect(catalog.listSchemas).toHaveBeenCalledTimes(1);
    });

    it("should refresh again once the freshness window has passed", async () => {
      let clock = new Date("2024-01-01T00:00:00.000Z");
      const catalog = createCatalog();
      const resolver = new Resolver(catalog, { logger: createTestLogger(), now: () => clock });

      await resolver.resolveSchemaId("Hardware");
      clock = new Date("2024-01-01T00:04:00.000Z");
      await resolver.resolveSchemaId("Hardware");
      expect(catalog.listSchemas).toHaveBeenCalledTimes(1);

      clock = new Date("2024-01-01T00:06:00.000Z");
      await resolver.resolveSchemaId("Hardware");
      expect(catalog.listSchemas).toHaveBeenCalledTimes(2);
    });
  });

  describe("getStats", () => {
    it("should report table sizes and refresh state", async () => {
      const resolver = new Resolver(createCatalog(), {
        logger: createTestLogger(),
        now: () => new Date("2024-01-01T00:00:00.000Z"),
      });

      expect((await resolver.getStats()).needsRefresh).toBe(true);
      await resolver.refresh();

      expect(await resolver.getStats()).toEqual({
        schemas: 2,
        objectTypes: 3,
        lastRefresh: "2024-01-01T00:00:00.000Z",
        lastSource: "remote",
        freshnessMinutes: 5,
        needsRefresh: false,
      });
    });
  });
});
