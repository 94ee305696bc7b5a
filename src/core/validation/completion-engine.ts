/**
 * Completion Engine
 *
 * Fills in sensible defaults for a partial property map, suggests the fields
 * still worth providing, and reports which required fields remain missing.
 * Partial progress is always returned, even when completion falls short.
 */

import { indexByFieldName, type AttributeMetadataResolver } from "../metadata/metadata-resolver.js";
import type { AttributeMetadata } from "../metadata/models/attribute-metadata.js";
import type { IPropertyResolver } from "../property/interfaces/IPropertyResolver.js";
import { findPropertyKey, formatPropertyValue, type PropertyMap } from "../property/models/property-models.js";
import { PropertyResolver } from "../property/property-resolver.js";
import { normalizeFieldName } from "../../utils/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { classifyPropertyIssue, extractFieldName } from "./error-classifier.js";
import type {
  CompletionResult,
  CompletionSuggestion,
  DefaultApplication,
  ValidationError,
} from "./models/validation-models.js";

const IMPORTANT_FIELDS = ["serial_number", "model_name", "purchase_date"] as const;

const FIELD_GUIDANCE: Readonly<Record<string, string>> = {
  serial_number: " (helps with warranty tracking and asset identification)",
  model_name: " (links to hardware specifications and compatibility)",
  purchase_date: " (important for warranty and depreciation tracking)",
};

const MAX_ASSET_TAG_LENGTH = 20;

export interface CompletionEngineOptions {
  propertyResolver?: IPropertyResolver;
  logger?: Logger;
}

/**
 * Asset tag derived from an object name: upper-cased, spaces to hyphens,
 * at most 20 code points
 */
export function deriveAssetTag(name: string): string {
  const tag = name.replace(/ /g, "-").toUpperCase();
  return Array.from(tag).slice(0, MAX_ASSET_TAG_LENGTH).join("");
}

export class CompletionEngine {
  private readonly propertyResolver: IPropertyResolver;
  private readonly logger: Logger;

  constructor(
    private readonly metadataResolver: AttributeMetadataResolver,
    options: CompletionEngineOptions = {}
  ) {
    this.propertyResolver = options.propertyResolver ?? new PropertyResolver(metadataResolver);
    this.logger = options.logger ?? createLogger("completion");
  }

  async complete(objectTypeId: string, partialProperties: PropertyMap): Promise<CompletionResult> {
    const completed: PropertyMap = { ...partialProperties };
    const metadata = await this.metadataResolver.getMetadata(objectTypeId);

    const appliedDefaults = this.applyDefaults(completed, metadata);
    const suggestions = this.buildSuggestions(completed, metadata);

    const { resolved, issues } = await this.propertyResolver.resolve(objectTypeId, completed, metadata);

    const missingCritical: string[] = [];
    const warnings: ValidationError[] = [];
    for (const issue of issues) {
      const error = classifyPropertyIssue(issue, objectTypeId);
      if (error.code === "REQUIRED_FIELD_MISSING") {
        const field = issue.field ?? extractFieldName(issue.message);
        if (field && !missingCritical.includes(field)) missingCritical.push(field);
      } else {
        warnings.push(error);
      }
    }

    const result: CompletionResult = {
      success: missingCritical.length === 0,
      objectTypeId,
      originalProperties: { ...partialProperties },
      completedProperties: completed,
      resolvedProperties: resolved,
      appliedDefaults,
      suggestions,
      warnings,
      missingCritical,
    };

    this.logger.debug(
      {
        objectTypeId,
        success: result.success,
        defaults: appliedDefaults.length,
        suggestions: suggestions.length,
        missing: missingCritical.length,
      },
      "Completed object properties"
    );
    return result;
  }

  /**
   * Apply the default rules in order, writing into `completed`
   */
  private applyDefaults(completed: PropertyMap, metadata: readonly AttributeMetadata[]): DefaultApplication[] {
    const index = indexByFieldName(metadata);
    const applied: DefaultApplication[] = [];
    const absent = (field: string): boolean => findPropertyKey(completed, field) === undefined;
    const apply = (entry: DefaultApplication): void => {
      completed[entry.field] = entry.value;
      applied.push(entry);
    };

    const status = index.get("asset_status");
    const firstStatus = status?.statusValues[0];
    if (absent("asset_status") && firstStatus !== undefined) {
      apply({
        field: "asset_status",
        value: firstStatus,
        reason: "Applied default status value",
        confidence: "medium",
      });
    }

    const deviceOptions = index.get("device_type")?.selectOptions ?? [];
    const firstDevice = deviceOptions[0];
    if (absent("device_type") && firstDevice !== undefined) {
      const physical = deviceOptions.find((option) => option.toLowerCase() === "physical");
      apply({
        field: "device_type",
        value: physical ?? firstDevice,
        reason: "Applied default device type",
        confidence: "high",
      });
    }

    const ownershipOptions = index.get("ownership_type")?.selectOptions ?? [];
    const firstOwnership = ownershipOptions[0];
    if (absent("ownership_type") && firstOwnership !== undefined) {
      const company = ownershipOptions.find((option) => option.toLowerCase().includes("company"));
      apply({
        field: "ownership_type",
        value: company ?? firstOwnership,
        reason: "Applied default ownership type",
        confidence: "medium",
      });
    }

    const nameKey = findPropertyKey(completed, "name");
    if (nameKey !== undefined && absent("asset_tag")) {
      const name = formatPropertyValue(completed[nameKey]);
      if (name.length > 0) {
        apply({
          field: "asset_tag",
          value: deriveAssetTag(name),
          reason: "Generated asset tag from name",
          confidence: "low",
        });
      }
    }

    return applied;
  }

  private buildSuggestions(completed: PropertyMap, metadata: readonly AttributeMetadata[]): CompletionSuggestion[] {
    const suggestions: CompletionSuggestion[] = [];

    for (const meta of metadata) {
      if (meta.system || findPropertyKey(completed, meta.name) !== undefined) continue;

      const key = normalizeFieldName(meta.name);
      const suggestion: CompletionSuggestion = {
        field: meta.name,
        message: "",
        required: meta.required,
        priority: "optional",
      };

      if (meta.required) {
        suggestion.priority = "critical";
        suggestion.message = `Required field '${meta.name}' is missing`;
      } else if (IMPORTANT_FIELDS.some((important) => key.includes(important))) {
        suggestion.priority = "important";
        suggestion.message = `Important field '${meta.name}' would improve asset tracking`;
      } else {
        suggestion.message = `Optional field '${meta.name}' can be provided`;
      }

      if (meta.dataType === "Select" && meta.selectOptions.length > 0) {
        suggestion.options = [...meta.selectOptions];
      } else if (meta.dataType === "Status" && meta.statusValues.length > 0) {
        suggestion.options = [...meta.statusValues];
      }

      suggestion.message += FIELD_GUIDANCE[key] ?? "";
      suggestions.push(suggestion);
    }

    return suggestions;
  }
}
