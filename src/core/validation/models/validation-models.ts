/**
 * Validation and Completion Models
 *
 * Request-scoped results of validating or completing an asset object. Nothing
 * here is persisted.
 */

import type { PropertyMap, PropertyValue } from "../../property/models/property-models.js";

// =============================================================================
// Validation
// =============================================================================

export type ValidationErrorCode =
  | "REQUIRED_FIELD_MISSING"
  | "UNKNOWN_PROPERTY"
  | "INVALID_DATE_FORMAT"
  | "INVALID_DATETIME_FORMAT"
  | "INVALID_SELECT_OPTION"
  | "INVALID_REFERENCE"
  | "PROPERTY_ERROR"
  | "ASSET_TAG_TOO_SHORT";

export type ValidationWarningCode =
  | "SUSPICIOUS_SERIAL_NUMBER"
  | "UNUSUAL_VIRTUAL_BYOD"
  | "MISSING_RECOMMENDED_FIELD"
  | "GENERIC_NAME";

export interface ValidationError {
  field: string;
  message: string;
  code: ValidationErrorCode;
  severity: "error";
  suggestion?: string;
  /** Accepted values, set for INVALID_SELECT_OPTION */
  validOptions?: string[];
}

export interface ValidationWarning {
  field: string;
  message: string;
  code: ValidationWarningCode;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  objectTypeId: string;
  resolvedProperties: PropertyValue[];
  errors: ValidationError[];
  warnings: ValidationWarning[];
  /** Required, non-system attribute names */
  requiredFields: string[];
  /** Editable, non-required attribute names */
  optionalFields: string[];
}

// =============================================================================
// Completion
// =============================================================================

export type DefaultConfidence = "high" | "medium" | "low";

export interface DefaultApplication {
  field: string;
  value: string;
  reason: string;
  confidence: DefaultConfidence;
}

export type SuggestionPriority = "critical" | "important" | "optional";

export interface CompletionSuggestion {
  field: string;
  message: string;
  /** Enumerated values of select and status fields */
  options?: string[];
  required: boolean;
  priority: SuggestionPriority;
}

export interface CompletionResult {
  success: boolean;
  objectTypeId: string;
  originalProperties: PropertyMap;
  completedProperties: PropertyMap;
  resolvedProperties: PropertyValue[];
  appliedDefaults: DefaultApplication[];
  suggestions: CompletionSuggestion[];
  /** Issues other than missing required fields left after completion */
  warnings: ValidationError[];
  missingCritical: string[];
}
