/**
 * File system utility tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { calculateContentHash, tempPathFor, writeFileAtomic } from "../fs.js";

describe("fs utilities", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fs-utils-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should hash content with SHA-256", () => {
    expect(calculateContentHash("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("should place temp files beside the target", () => {
    const target = path.join(dir, "entry.json");
    const first = tempPathFor(target);

    expect(path.dirname(first)).toBe(dir);
    expect(path.basename(first)).toMatch(/^\.entry\.json\.\d+\.[0-9a-f-]+\.tmp$/);
    expect(tempPathFor(target)).not.toBe(first);
  });

  it("should replace file content", async () => {
    const target = path.join(dir, "entry.json");
    await writeFileAtomic(target, "first");
    await writeFileAtomic(target, "second");

    expect(await fs.readFile(target, "utf-8")).toBe("second");
    expect(await fs.readdir(dir)).toEqual(["entry.json"]);
  });

  it("should clean up when the rename fails", async () => {
    const target = path.join(dir, "occupied");
    await fs.mkdir(target);
    await fs.writeFile(path.join(target, "child"), "x");

    await expect(writeFileAtomic(target, "data")).rejects.toThrow();
    expect(await fs.readdir(dir)).toEqual(["occupied"]);
  });
});
