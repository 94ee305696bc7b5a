/**
 * Attribute Metadata Resolver
 *
 * Fetches the attribute definitions of an object type and shapes them into
 * AttributeMetadata. Always a live fetch: definitions can change between two
 * validations of the same workflow.
 */

import { z } from "zod";
import { ErrorCode, MetadataError } from "../errors.js";
import type { Resolver } from "../resolver/resolver.js";
import { normalizeFieldName } from "../../utils/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { IAttributeSource } from "./interfaces/IAttributeSource.js";
import {
  ATTRIBUTE_TYPE_REFERENCE,
  ATTRIBUTE_TYPE_STATUS,
  RawAttributeDefinitionSchema,
  type AttributeMetadata,
  type RawAttributeDefinition,
} from "./models/attribute-metadata.js";

const RawAttributeListSchema = z.array(RawAttributeDefinitionSchema);

export interface AttributeMetadataResolverOptions {
  /** Needed only for name-based lookups */
  resolver?: Resolver;
  logger?: Logger;
}

export interface ResolvedTypeMetadata {
  objectTypeId: string;
  metadata: AttributeMetadata[];
}

/**
 * Shape one raw attribute record
 */
export function shapeAttribute(attr: RawAttributeDefinition): AttributeMetadata {
  let dataType = "";
  if (attr.defaultType) {
    if (attr.defaultType.name) {
      dataType = attr.defaultType.name;
    } else if (attr.defaultType.id > 0) {
      dataType = `type_${attr.defaultType.id}`;
    }
  }

  const meta: AttributeMetadata = {
    id: attr.id,
    name: attr.name,
    dataType,
    required: attr.minimumCardinality >= 1,
    editable: attr.editable,
    system: attr.system,
    minCardinality: attr.minimumCardinality,
    maxCardinality: attr.maximumCardinality,
    selectOptions: [],
    statusValues: [],
    description: attr.description,
  };

  if (attr.type === ATTRIBUTE_TYPE_REFERENCE && attr.referenceObjectTypeId) {
    meta.dataType = "Reference";
    meta.referenceObjectTypeId = attr.referenceObjectTypeId;
  }

  if (attr.type === ATTRIBUTE_TYPE_STATUS && attr.typeValueMulti && attr.typeValueMulti.length > 0) {
    meta.dataType = "Status";
    meta.statusValues = [...attr.typeValueMulti];
  }

  if (meta.dataType === "Select" && attr.options) {
    meta.selectOptions = attr.options
      .split(",")
      .map((option) => option.trim())
      .filter((option) => option.length > 0);
  }

  return meta;
}

/**
 * Index metadata by normalized field name. Later duplicates do not replace
 * earlier ones.
 */
export function indexByFieldName(metadata: readonly AttributeMetadata[]): Map<string, AttributeMetadata> {
  const index = new Map<string, AttributeMetadata>();
  for (const meta of metadata) {
    const key = normalizeFieldName(meta.name);
    if (!index.has(key)) index.set(key, meta);
  }
  return index;
}

export class AttributeMetadataResolver {
  private readonly logger: Logger;
  private readonly resolver?: Resolver;

  constructor(
    private readonly source: IAttributeSource,
    options: AttributeMetadataResolverOptions = {}
  ) {
    this.resolver = options.resolver;
    this.logger = options.logger ?? createLogger("metadata");
  }

  /**
   * Ordered attribute metadata of an object type
   *
   * @throws MetadataError when the definitions cannot be fetched or are malformed
   */
  async getMetadata(objectTypeId: string): Promise<AttributeMetadata[]> {
    let raw: unknown[];
    try {
      raw = await this.source.fetchAttributes(objectTypeId);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MetadataError(
        `failed to get object type metadata for ${objectTypeId}: ${detail}`,
        ErrorCode.METADATA_FETCH_FAILED,
        { objectTypeId },
        { cause: error }
      );
    }

    const parsed = RawAttributeListSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new MetadataError(
        `failed to get object type metadata for ${objectTypeId}: unexpected attribute format (${issues.join("; ")})`,
        ErrorCode.METADATA_INVALID,
        { objectTypeId, issues }
      );
    }

    const metadata = parsed.data.map(shapeAttribute);
    this.logger.debug({ objectTypeId, attributes: metadata.length }, "Fetched attribute metadata");
    return metadata;
  }

  /**
   * Metadata for an object type given by schema and type name (or IDs)
   */
  async getMetadataForType(schemaNameOrId: string, typeNameOrId: string): Promise<ResolvedTypeMetadata> {
    if (!this.resolver) {
      throw new MetadataError("name-based metadata lookup needs a resolver", ErrorCode.METADATA_FETCH_FAILED, {
        objectTypeId: typeNameOrId,
      });
    }

    const objectTypeId = await this.resolver.resolveObjectTypeId(schemaNameOrId, typeNameOrId);
    return { objectTypeId, metadata: await this.getMetadata(objectTypeId) };
  }
}
