/**
 * Property Resolver
 *
 * Checks each submitted property against its attribute and converts it to the
 * value format the remote API accepts. Every failure carries a tagged kind and
 * a message whose wording downstream tooling matches on; keep both stable.
 */

import { indexByFieldName, type AttributeMetadataResolver } from "../metadata/metadata-resolver.js";
import type { AttributeMetadata } from "../metadata/models/attribute-metadata.js";
import { normalizeFieldName } from "../../utils/index.js";
import type { IPropertyResolver } from "./interfaces/IPropertyResolver.js";
import {
  formatPropertyValue,
  isEmptyValue,
  type PropertyIssue,
  type PropertyIssueKind,
  type PropertyMap,
  type PropertyResolution,
  type PropertyValue,
} from "./models/property-models.js";

type Outcome =
  | { ok: true; value: PropertyValue | null }
  | { ok: false; kind: PropertyIssueKind; message: string; allowedValues?: string[] };

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/;
const OBJECT_ID_PATTERN = /^\d+$/;

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * `YYYY-MM-DD`, or null when the text is not a real calendar date
 */
export function parseDate(value: string): string | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  if (!isValidCalendarDate(Number(y), Number(m), Number(d))) return null;
  return value;
}

/**
 * RFC 3339 or `YYYY-MM-DD[T ]HH:mm:ss` (read as UTC), normalized to
 * `YYYY-MM-DDTHH:mm:ssZ`; null when unparseable
 */
export function parseDateTime(value: string): string | null {
  const match = DATETIME_PATTERN.exec(value);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, , zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  // Offsets belong to RFC 3339 only, which uses the T separator
  if (zone && value.charAt(10) !== "T") return null;
  if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  if (zone && zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const [oh, om] = zone.slice(1).split(":");
    offsetMinutes = sign * (Number(oh) * 60 + Number(om));
  }

  const utcMs = Date.UTC(year, month - 1, day, hour, minute, second) - offsetMinutes * 60_000;
  return new Date(utcMs).toISOString().replace(/\.\d{3}Z$/, "Z");
}

export class PropertyResolver implements IPropertyResolver {
  constructor(private readonly metadataResolver: AttributeMetadataResolver) {}

  async resolve(
    objectTypeId: string,
    properties: PropertyMap,
    metadata?: readonly AttributeMetadata[]
  ): Promise<PropertyResolution> {
    const attributes = metadata ?? (await this.metadataResolver.getMetadata(objectTypeId));
    const index = indexByFieldName(attributes);

    const resolved: PropertyValue[] = [];
    const issues: PropertyIssue[] = [];
    const provided = new Set<string>();

    for (const [propName, propValue] of Object.entries(properties)) {
      const key = normalizeFieldName(propName);
      provided.add(key);

      const meta = index.get(key);
      if (!meta) {
        issues.push({ kind: "unknown_property", field: propName, message: `unknown property: ${propName}` });
        continue;
      }

      const outcome = this.resolveProperty(meta, propValue);
      if (!outcome.ok) {
        issues.push({
          kind: outcome.kind,
          field: propName,
          message: `failed to resolve property '${propName}': ${outcome.message}`,
          allowedValues: outcome.allowedValues,
        });
        continue;
      }
      if (outcome.value) {
        resolved.push(outcome.value);
      }
    }

    for (const meta of attributes) {
      if (meta.required && !meta.system && !provided.has(normalizeFieldName(meta.name))) {
        issues.push({
          kind: "required_missing",
          field: meta.name,
          message: `validation error for ${meta.name}: required field is missing`,
        });
      }
    }

    return { resolved, issues };
  }

  /**
   * Validate one value and convert it; null value means nothing to submit
   */
  resolveProperty(meta: AttributeMetadata, value: unknown): Outcome {
    const fail = (kind: PropertyIssueKind, detail: string, allowedValues?: string[]): Outcome => ({
      ok: false,
      kind,
      message: `validation error for ${meta.name}: ${detail}`,
      allowedValues,
    });

    if (isEmptyValue(value)) {
      return meta.required ? fail("required_missing", "required field is missing") : { ok: true, value: null };
    }

    if (!meta.editable && !meta.system) {
      return fail("not_editable", "field is not editable");
    }

    const text = formatPropertyValue(value);
    const accept = (normalized: string): Outcome => ({
      ok: true,
      value: { attributeId: meta.id, field: meta.name, value: normalized, dataType: meta.dataType },
    });

    switch (meta.dataType) {
      case "Date": {
        const date = parseDate(text);
        return date ? accept(date) : fail("invalid_date", `invalid date format: ${text}`);
      }

      case "DateTime":
      case "type_6": {
        const dateTime = parseDateTime(text);
        return dateTime ? accept(dateTime) : fail("invalid_datetime", `invalid datetime format: ${text}`);
      }

      case "Select": {
        const option = meta.selectOptions.find((o) => o.toLowerCase() === text.toLowerCase());
        return option !== undefined
          ? accept(option)
          : fail(
              "invalid_option",
              `invalid option '${text}', allowed: ${meta.selectOptions.join(", ")}`,
              [...meta.selectOptions]
            );
      }

      case "Status":
        return meta.statusValues.includes(text)
          ? accept(text)
          : fail(
              "invalid_status",
              `invalid status value '${text}', allowed IDs: ${meta.statusValues.join(", ")}`,
              [...meta.statusValues]
            );

      case "Reference":
        return OBJECT_ID_PATTERN.test(text)
          ? accept(text)
          : {
              ok: false,
              kind: "invalid_reference",
              message: `reference field '${meta.name}' requires object ID, got: ${text}`,
            };

      default:
        return accept(text);
    }
  }
}
