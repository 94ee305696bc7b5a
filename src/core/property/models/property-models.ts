/**
 * Property Resolution Models
 */

import { normalizeFieldName } from "../../../utils/index.js";

export type PropertyMap = Record<string, unknown>;

/**
 * Tagged reason a submitted property could not be resolved
 */
export type PropertyIssueKind =
  | "required_missing"
  | "unknown_property"
  | "not_editable"
  | "invalid_date"
  | "invalid_datetime"
  | "invalid_option"
  | "invalid_status"
  | "invalid_reference";

/**
 * One per-property resolution failure.
 *
 * `kind` is the contract the validator classifies on. Resolvers that only
 * produce text may leave it out; the message is then pattern-matched.
 */
export interface PropertyIssue {
  kind?: PropertyIssueKind;
  /** Property or attribute name the issue is about, when known */
  field: string | null;
  message: string;
  /** Accepted values for select and status fields */
  allowedValues?: string[];
}

/**
 * A property value in the shape the remote API accepts
 */
export interface PropertyValue {
  attributeId: string;
  field: string;
  value: string;
  dataType: string;
}

export interface PropertyResolution {
  resolved: PropertyValue[];
  issues: PropertyIssue[];
}

/**
 * Text form of a submitted value
 */
export function formatPropertyValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value) ?? "";
}

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}

/**
 * Key under which a field was submitted, matching names after normalization
 * ("Asset Tag" and "asset_tag" are the same field)
 */
export function findPropertyKey(properties: PropertyMap, field: string): string | undefined {
  const wanted = normalizeFieldName(field);
  return Object.keys(properties).find((key) => normalizeFieldName(key) === wanted);
}
