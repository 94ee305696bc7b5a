/**
 * File Attribute Source
 *
 * Serves attribute definitions from an exported JSON file shaped as
 * `{ "<objectTypeId>": [ ...raw attribute records ] }`. The file is read on
 * every fetch, matching the live-fetch contract of the remote source.
 */

import * as fsPromises from "node:fs/promises";
import { z } from "zod";
import type { IAttributeSource } from "./interfaces/IAttributeSource.js";

const AttributeFileSchema = z.record(z.string(), z.array(z.unknown()));

export class FileAttributeSource implements IAttributeSource {
  constructor(private readonly filePath: string) {}

  async fetchAttributes(objectTypeId: string): Promise<unknown[]> {
    const raw = await fsPromises.readFile(this.filePath, "utf-8");
    const parsed = AttributeFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`attribute file ${this.filePath} must map object type IDs to attribute lists`);
    }

    const attributes = parsed.data[objectTypeId];
    if (!attributes) {
      throw new Error(`no attribute definitions for object type ${objectTypeId} in ${this.filePath}`);
    }
    return attributes;
  }
}
