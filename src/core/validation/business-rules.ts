/**
 * Business Rules
 *
 * Organisation-level checks that run after generic property resolution. Each
 * rule is a predicate over the submitted properties plus the verdict it
 * produces. Add a rule by appending to BUSINESS_RULES.
 */

import {
  findPropertyKey,
  formatPropertyValue,
  isEmptyValue,
  type PropertyMap,
} from "../property/models/property-models.js";
import type {
  ValidationError,
  ValidationErrorCode,
  ValidationWarning,
  ValidationWarningCode,
} from "./models/validation-models.js";

interface RuleVerdict {
  field: string;
  message: string;
  suggestion: string;
}

export type BusinessRule =
  | (RuleVerdict & {
      severity: "error";
      code: ValidationErrorCode;
      applies: (properties: PropertyMap) => boolean;
    })
  | (RuleVerdict & {
      severity: "warning";
      code: ValidationWarningCode;
      applies: (properties: PropertyMap) => boolean;
    });

export interface RuleFindings {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Text of a submitted field, or undefined when it is absent or empty
 */
export function propertyText(properties: PropertyMap, field: string): string | undefined {
  const key = findPropertyKey(properties, field);
  if (key === undefined) return undefined;
  const value = properties[key];
  return isEmptyValue(value) ? undefined : formatPropertyValue(value);
}

const MIN_ASSET_TAG_LENGTH = 3;

export const BUSINESS_RULES: readonly BusinessRule[] = [
  {
    code: "ASSET_TAG_TOO_SHORT",
    severity: "error",
    field: "asset_tag",
    message: "Asset tag should be at least 3 characters long",
    suggestion: "Use a longer, more descriptive asset tag",
    applies: (properties) => {
      const tag = propertyText(properties, "asset_tag");
      return tag !== undefined && [...tag].length < MIN_ASSET_TAG_LENGTH;
    },
  },
  {
    code: "SUSPICIOUS_SERIAL_NUMBER",
    severity: "warning",
    field: "serial_number",
    message: "Serial number contains 'test' - ensure this is a real serial number",
    suggestion: "Use the actual hardware serial number",
    applies: (properties) => propertyText(properties, "serial_number")?.toLowerCase().includes("test") ?? false,
  },
  {
    code: "UNUSUAL_VIRTUAL_BYOD",
    severity: "warning",
    field: "ownership_type",
    message: "Virtual devices are typically not BYOD",
    suggestion: "Consider if this virtual device should be 'Company owned'",
    applies: (properties) =>
      propertyText(properties, "device_type")?.toLowerCase() === "virtual" &&
      propertyText(properties, "ownership_type")?.toLowerCase() === "byod",
  },
];

/**
 * Run every rule against a property map, in registry order
 */
export function evaluateBusinessRules(
  properties: PropertyMap,
  rules: readonly BusinessRule[] = BUSINESS_RULES
): RuleFindings {
  const findings: RuleFindings = { errors: [], warnings: [] };

  for (const rule of rules) {
    if (!rule.applies(properties)) continue;

    const { field, message, suggestion } = rule;
    if (rule.severity === "error") {
      findings.errors.push({ field, message, code: rule.code, severity: "error", suggestion });
    } else {
      findings.warnings.push({ field, message, code: rule.code, suggestion });
    }
  }

  return findings;
}
