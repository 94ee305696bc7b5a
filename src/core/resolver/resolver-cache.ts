/**
 * Resolver Cache
 *
 * In-memory name/ID tables for schemas and object types. Each category keeps
 * an ID table and a name table; every entity recorded in one is recorded in
 * the other with the same value. Name keys are lower-cased, and object-type
 * names are scoped by their parent schema ID so that two schemas may each own
 * a type called "Laptop".
 *
 * Writers are serialized and readers share the lock, so lookups from
 * concurrent requests never observe a half-applied replace.
 */

import { ReadWriteLock } from "../../utils/async.js";
import type {
  EntityCategory,
  EntityInfo,
  ResolverCacheStats,
  ResolverSnapshot,
} from "./models/resolver-models.js";

interface CategoryTables {
  byId: Map<string, EntityInfo>;
  byName: Map<string, EntityInfo>;
}

/**
 * Name-table key for an entity or lookup token
 */
export function nameKey(category: EntityCategory, name: string, schemaId?: string): string {
  const lowered = name.trim().toLowerCase();
  if (category === "objectType" && schemaId) {
    return `${schemaId}/${lowered}`;
  }
  return lowered;
}

function copyEntity(entity: EntityInfo): EntityInfo {
  return entity.schemaId === undefined
    ? { id: entity.id, name: entity.name }
    : { id: entity.id, name: entity.name, schemaId: entity.schemaId };
}

function tableToRecord(table: Map<string, EntityInfo>): Record<string, EntityInfo> {
  const record: Record<string, EntityInfo> = {};
  for (const [key, entity] of table) {
    record[key] = copyEntity(entity);
  }
  return record;
}

export class ResolverCache {
  private readonly lock = new ReadWriteLock();
  private schemas: CategoryTables = { byId: new Map(), byName: new Map() };
  private objectTypes: CategoryTables = { byId: new Map(), byName: new Map() };

  /**
   * Look up an entity by ID, then by name.
   *
   * @param scopeSchemaId - parent schema for object-type name lookups
   */
  async resolve(category: EntityCategory, token: string, scopeSchemaId?: string): Promise<EntityInfo | undefined> {
    return this.lock.withRead(() => this.resolveUnlocked(category, token, scopeSchemaId));
  }

  async record(category: EntityCategory, entity: EntityInfo): Promise<void> {
    await this.lock.withWrite(() => this.insert(this.tables(category), category, entity));
  }

  async recordMany(category: EntityCategory, entities: readonly EntityInfo[]): Promise<void> {
    await this.lock.withWrite(() => {
      const tables = this.tables(category);
      for (const entity of entities) {
        this.insert(tables, category, entity);
      }
    });
  }

  /**
   * All entities of a category, optionally only the object types of one schema
   */
  async list(category: EntityCategory, schemaId?: string): Promise<EntityInfo[]> {
    return this.lock.withRead(() => {
      const entities = [...this.tables(category).byId.values()];
      const filtered = schemaId ? entities.filter((e) => e.schemaId === schemaId) : entities;
      return filtered.map(copyEntity);
    });
  }

  /**
   * Deep copy of all four tables. The copy shares nothing with the live
   * cache, which may keep changing while the copy is serialized.
   */
  async snapshot(): Promise<ResolverSnapshot> {
    return this.lock.withRead(() => ({
      schemas: tableToRecord(this.schemas.byId),
      schemasByName: tableToRecord(this.schemas.byName),
      objectTypes: tableToRecord(this.objectTypes.byId),
      typesByName: tableToRecord(this.objectTypes.byName),
    }));
  }

  /**
   * Swap every table for the contents of a snapshot in a single write.
   * ID entries without a paired name entry get one, keeping the tables paired.
   */
  async replace(snapshot: ResolverSnapshot): Promise<void> {
    const schemas = this.buildTables("schema", snapshot.schemas, snapshot.schemasByName);
    const objectTypes = this.buildTables("objectType", snapshot.objectTypes, snapshot.typesByName);

    await this.lock.withWrite(() => {
      this.schemas = schemas;
      this.objectTypes = objectTypes;
    });
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.schemas = { byId: new Map(), byName: new Map() };
      this.objectTypes = { byId: new Map(), byName: new Map() };
    });
  }

  async stats(): Promise<ResolverCacheStats> {
    return this.lock.withRead(() => ({
      schemas: this.schemas.byId.size,
      objectTypes: this.objectTypes.byId.size,
    }));
  }

  private resolveUnlocked(category: EntityCategory, token: string, scopeSchemaId?: string): EntityInfo | undefined {
    const tables = this.tables(category);

    const byId = tables.byId.get(token);
    if (byId && (!scopeSchemaId || byId.schemaId === scopeSchemaId)) {
      return copyEntity(byId);
    }

    const byName = tables.byName.get(nameKey(category, token, scopeSchemaId));
    return byName ? copyEntity(byName) : undefined;
  }

  private insert(tables: CategoryTables, category: EntityCategory, entity: EntityInfo): void {
    const stored = Object.freeze(copyEntity(entity));

    // A renamed entity must not stay reachable under its old name
    const previous = tables.byId.get(stored.id);
    if (previous) {
      const previousKey = nameKey(category, previous.name, previous.schemaId);
      if (tables.byName.get(previousKey)?.id === stored.id) {
        tables.byName.delete(previousKey);
      }
    }

    tables.byId.set(stored.id, stored);
    tables.byName.set(nameKey(category, stored.name, stored.schemaId), stored);
  }

  private buildTables(
    category: EntityCategory,
    byIdRecord: Record<string, EntityInfo>,
    byNameRecord: Record<string, EntityInfo>
  ): CategoryTables {
    const tables: CategoryTables = { byId: new Map(), byName: new Map() };

    for (const [key, entity] of Object.entries(byNameRecord)) {
      const stored = Object.freeze(copyEntity(entity));
      tables.byName.set(key, stored);
      tables.byId.set(stored.id, stored);
    }
    for (const entity of Object.values(byIdRecord)) {
      if (!tables.byId.has(entity.id)) {
        this.insert(tables, category, entity);
      }
    }

    return tables;
  }

  private tables(category: EntityCategory): CategoryTables {
    return category === "schema" ? this.schemas : this.objectTypes;
  }
}
