/**
 * Attribute Metadata Models
 *
 * Raw attribute records as the remote API returns them, and the shaped
 * descriptors the validator and completion engine work with.
 */

import { z } from "zod";

/** Attribute kind codes used by the remote API */
export const ATTRIBUTE_TYPE_REFERENCE = 1;
export const ATTRIBUTE_TYPE_STATUS = 7;

export const RawAttributeDefinitionSchema = z.object({
  id: z.coerce.string().min(1),
  name: z.string().min(1),
  /** Attribute kind: 0 default, 1 reference, 7 status, ... */
  type: z.number().int().optional(),
  defaultType: z
    .object({
      id: z.number().int(),
      name: z.string().optional(),
    })
    .nullish(),
  minimumCardinality: z.number().int().nonnegative().default(0),
  maximumCardinality: z.number().int().default(1),
  editable: z.boolean().default(true),
  system: z.boolean().default(false),
  /** Comma-separated select options */
  options: z.string().optional(),
  /** Allowed status IDs */
  typeValueMulti: z.array(z.coerce.string()).optional(),
  referenceObjectTypeId: z.coerce.string().optional(),
  description: z.string().optional(),
});

export type RawAttributeDefinition = z.infer<typeof RawAttributeDefinitionSchema>;

/**
 * Per-field descriptor of an object type
 */
export interface AttributeMetadata {
  id: string;
  name: string;
  /** "Text", "Date", "DateTime", "Select", "Status", "Reference", ... or "type_<id>" */
  dataType: string;
  required: boolean;
  editable: boolean;
  system: boolean;
  minCardinality: number;
  maxCardinality: number;
  selectOptions: string[];
  statusValues: string[];
  referenceObjectTypeId?: string;
  description?: string;
}
