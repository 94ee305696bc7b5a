/**
 * One-line summaries of validation and completion results, for CLI output and
 * logs
 */

import type { CompletionResult, ValidationResult } from "./models/validation-models.js";

export function getValidationSummary(result: ValidationResult): string {
  const warnings = result.warnings.length;

  if (result.valid) {
    const suffix = warnings > 0 ? ` (with ${warnings} warnings)` : "";
    return `Validation passed for object type ${result.objectTypeId}${suffix}`;
  }

  const suffix = warnings > 0 ? ` and ${warnings} warnings` : "";
  return `Validation failed for object type ${result.objectTypeId} with ${result.errors.length} errors${suffix}`;
}

export function getCompletionSummary(result: CompletionResult): string {
  const defaults = result.appliedDefaults.length;

  if (result.success) {
    const suffix = defaults > 0 ? ` (applied ${defaults} defaults)` : "";
    return `Object completion successful for type ${result.objectTypeId}${suffix}`;
  }

  return (
    `Object completion partially successful for type ${result.objectTypeId} ` +
    `(missing ${result.missingCritical.length} critical fields, applied ${defaults} defaults)`
  );
}
