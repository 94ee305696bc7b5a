/**
 * Object Validator
 *
 * Validates a property map against the live attribute definitions of an
 * object type. Per-property problems are returned in the result, never
 * thrown; only a failed metadata fetch rejects.
 */

import { indexByFieldName, type AttributeMetadataResolver } from "../metadata/metadata-resolver.js";
import type { AttributeMetadata } from "../metadata/models/attribute-metadata.js";
import type { IPropertyResolver } from "../property/interfaces/IPropertyResolver.js";
import { findPropertyKey, type PropertyMap } from "../property/models/property-models.js";
import { PropertyResolver } from "../property/property-resolver.js";
import { normalizeFieldName } from "../../utils/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { BUSINESS_RULES, evaluateBusinessRules, propertyText, type BusinessRule } from "./business-rules.js";
import { classifyPropertyIssue } from "./error-classifier.js";
import type { ValidationError, ValidationResult, ValidationWarning } from "./models/validation-models.js";

const RECOMMENDED_FIELDS = ["asset_tag", "serial_number", "model_name"] as const;
const GENERIC_NAMES = new Set(["test", "laptop", "computer", "device", "asset"]);

export interface ObjectValidatorOptions {
  /** Defaults to a PropertyResolver over the same metadata resolver */
  propertyResolver?: IPropertyResolver;
  rules?: readonly BusinessRule[];
  logger?: Logger;
}

type ValidationMode = "generic" | "create" | "update";

export class ObjectValidator {
  private readonly propertyResolver: IPropertyResolver;
  private readonly rules: readonly BusinessRule[];
  private readonly logger: Logger;

  constructor(
    private readonly metadataResolver: AttributeMetadataResolver,
    options: ObjectValidatorOptions = {}
  ) {
    this.propertyResolver = options.propertyResolver ?? new PropertyResolver(metadataResolver);
    this.rules = options.rules ?? BUSINESS_RULES;
    this.logger = options.logger ?? createLogger("validator");
  }

  async validate(objectTypeId: string, properties: PropertyMap): Promise<ValidationResult> {
    return this.run(objectTypeId, properties, "generic");
  }

  /**
   * Generic validation plus a check that every required, non-system field
   * was submitted
   */
  async validateForCreate(objectTypeId: string, properties: PropertyMap): Promise<ValidationResult> {
    return this.run(objectTypeId, properties, "create");
  }

  /**
   * Generic validation of a partial update. Fields left out are not errors;
   * a required field submitted empty still is.
   */
  async validateForUpdate(objectTypeId: string, properties: PropertyMap): Promise<ValidationResult> {
    return this.run(objectTypeId, properties, "update");
  }

  private async run(objectTypeId: string, properties: PropertyMap, mode: ValidationMode): Promise<ValidationResult> {
    const metadata = await this.metadataResolver.getMetadata(objectTypeId);
    const { resolved, issues } = await this.propertyResolver.resolve(objectTypeId, properties, metadata);

    let errors = issues.map((issue) => classifyPropertyIssue(issue, objectTypeId));
    if (mode === "update") {
      errors = errors.filter(
        (error) => error.code !== "REQUIRED_FIELD_MISSING" || findPropertyKey(properties, error.field) !== undefined
      );
    }

    const findings = evaluateBusinessRules(properties, this.rules);
    errors.push(...findings.errors);
    const warnings = [...findings.warnings, ...this.bestPracticeWarnings(properties, metadata)];

    if (mode === "create") {
      errors.push(...this.missingForCreate(properties, metadata, errors));
    }

    const result: ValidationResult = {
      valid: errors.length === 0,
      objectTypeId,
      resolvedProperties: resolved,
      errors,
      warnings,
      requiredFields: metadata.filter((m) => m.required && !m.system).map((m) => m.name),
      optionalFields: metadata.filter((m) => m.editable && !m.required).map((m) => m.name),
    };

    this.logger.debug(
      { objectTypeId, mode, valid: result.valid, errors: errors.length, warnings: warnings.length },
      "Validated object properties"
    );
    return result;
  }

  private bestPracticeWarnings(properties: PropertyMap, metadata: readonly AttributeMetadata[]): ValidationWarning[] {
    const warnings: ValidationWarning[] = [];
    const index = indexByFieldName(metadata);

    for (const field of RECOMMENDED_FIELDS) {
      if (findPropertyKey(properties, field) !== undefined) continue;
      const meta = index.get(field);
      if (meta && meta.editable && !meta.required) {
        warnings.push({
          field,
          message: `Optional field '${field}' not provided`,
          code: "MISSING_RECOMMENDED_FIELD",
          suggestion: `Consider providing ${field} for better asset tracking`,
        });
      }
    }

    const name = propertyText(properties, "name");
    if (name !== undefined && GENERIC_NAMES.has(name.toLowerCase())) {
      warnings.push({
        field: "name",
        message: "Name is very generic",
        code: "GENERIC_NAME",
        suggestion: "Consider using a more specific name that includes model, user, or location",
      });
    }

    return warnings;
  }

  private missingForCreate(
    properties: PropertyMap,
    metadata: readonly AttributeMetadata[],
    reported: readonly ValidationError[]
  ): ValidationError[] {
    const alreadyReported = new Set(
      reported.filter((e) => e.code === "REQUIRED_FIELD_MISSING").map((e) => normalizeFieldName(e.field))
    );

    const missing: ValidationError[] = [];
    for (const meta of metadata) {
      if (!meta.required || meta.system) continue;
      if (findPropertyKey(properties, meta.name) !== undefined) continue;
      if (alreadyReported.has(normalizeFieldName(meta.name))) continue;

      missing.push({
        field: meta.name,
        message: `Required field '${meta.name}' is missing`,
        code: "REQUIRED_FIELD_MISSING",
        severity: "error",
        suggestion: "This field must be provided when creating new objects",
      });
    }
    return missing;
  }
}
