/**
 * Property Resolver Interface
 */

import type { AttributeMetadata } from "../../metadata/models/attribute-metadata.js";
import type { PropertyMap, PropertyResolution } from "../models/property-models.js";

export interface IPropertyResolver {
  /**
   * Resolve a raw property map against an object type's attributes.
   *
   * @param metadata - attributes already fetched for this call; fetched when omitted
   */
  resolve(
    objectTypeId: string,
    properties: PropertyMap,
    metadata?: readonly AttributeMetadata[]
  ): Promise<PropertyResolution>;
}
