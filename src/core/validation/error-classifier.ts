/**
 * Error Classifier
 *
 * Maps property resolution issues onto the validation error taxonomy. Tagged
 * issues are classified by kind. Issues without a recognised kind come from
 * resolvers that only report text, and are matched on their message instead.
 */

import type { PropertyIssue, PropertyIssueKind } from "../property/models/property-models.js";
import type { ValidationError, ValidationErrorCode } from "./models/validation-models.js";

const KIND_CODES: Record<PropertyIssueKind, ValidationErrorCode> = {
  required_missing: "REQUIRED_FIELD_MISSING",
  unknown_property: "UNKNOWN_PROPERTY",
  invalid_date: "INVALID_DATE_FORMAT",
  invalid_datetime: "INVALID_DATETIME_FORMAT",
  invalid_option: "INVALID_SELECT_OPTION",
  invalid_reference: "INVALID_REFERENCE",
  invalid_status: "PROPERTY_ERROR",
  not_editable: "PROPERTY_ERROR",
};

// Order matters: "invalid datetime" must be tested before "invalid date"
const TEXT_PATTERNS: ReadonlyArray<readonly [string, ValidationErrorCode]> = [
  ["required field", "REQUIRED_FIELD_MISSING"],
  ["unknown property", "UNKNOWN_PROPERTY"],
  ["invalid datetime", "INVALID_DATETIME_FORMAT"],
  ["invalid date", "INVALID_DATE_FORMAT"],
  ["invalid option", "INVALID_SELECT_OPTION"],
  ["reference field", "INVALID_REFERENCE"],
];

const ALLOWED_MARKER = "allowed: ";

/**
 * Error code for an issue, by kind when tagged and by message text otherwise
 */
export function classifyIssueCode(issue: PropertyIssue): ValidationErrorCode {
  if (issue.kind && issue.kind in KIND_CODES) {
    return KIND_CODES[issue.kind];
  }

  const message = issue.message.toLowerCase();
  for (const [pattern, code] of TEXT_PATTERNS) {
    if (message.includes(pattern)) return code;
  }
  return "PROPERTY_ERROR";
}

/**
 * Field named in an issue message, for issues that carry no field
 */
export function extractFieldName(message: string): string | null {
  const quoted = /property '([^']+)'/.exec(message);
  if (quoted?.[1]) return quoted[1];

  const unknown = /unknown property: (\S+)/.exec(message);
  if (unknown?.[1]) return unknown[1];

  const validation = /validation error for ([^:]+):/.exec(message);
  if (validation?.[1]) return validation[1].trim();

  return null;
}

function allowedValuesOf(issue: PropertyIssue): string[] {
  if (issue.allowedValues) return [...issue.allowedValues];

  const start = issue.message.indexOf(ALLOWED_MARKER);
  if (start < 0) return [];
  return issue.message
    .slice(start + ALLOWED_MARKER.length)
    .split(",")
    .map((option) => option.trim())
    .filter((option) => option.length > 0);
}

function suggestionFor(code: ValidationErrorCode, issue: PropertyIssue, objectTypeId: string): string {
  switch (code) {
    case "REQUIRED_FIELD_MISSING":
      return "Please provide a value for this required field";
    case "UNKNOWN_PROPERTY":
      return `Check the property name spelling or list the attributes of object type ${objectTypeId} to see available fields`;
    case "INVALID_DATE_FORMAT":
      return "Use date format YYYY-MM-DD (e.g., 2024-01-15)";
    case "INVALID_DATETIME_FORMAT":
      return "Use ISO 8601 format (e.g., 2024-01-15T10:30:00Z)";
    case "INVALID_SELECT_OPTION":
      return `Valid options: ${allowedValuesOf(issue).join(", ")}`;
    case "INVALID_REFERENCE":
      return "Reference fields require valid object IDs";
    default:
      if (issue.kind === "invalid_status") {
        return `Valid status IDs: ${allowedValuesOf(issue).join(", ")}`;
      }
      if (issue.kind === "not_editable") {
        return "Remove this field from the request; it cannot be set";
      }
      return "Check the value against the attribute definition";
  }
}

/**
 * Turn one resolution issue into a user-facing validation error
 */
export function classifyPropertyIssue(issue: PropertyIssue, objectTypeId: string): ValidationError {
  const code = classifyIssueCode(issue);
  const error: ValidationError = {
    field: issue.field ?? extractFieldName(issue.message) ?? "",
    message: issue.message,
    code,
    severity: "error",
    suggestion: suggestionFor(code, issue, objectTypeId),
  };

  if (code === "INVALID_SELECT_OPTION") {
    error.validOptions = allowedValuesOf(issue);
  }
  return error;
}
