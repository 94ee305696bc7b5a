/**
 * Error Classifier Tests
 */

import { describe, it, expect } from "vitest";
import { classifyIssueCode, classifyPropertyIssue, extractFieldName } from "../error-classifier.js";

describe("classifyIssueCode", () => {
  it("should classify tagged issues by kind", () => {
    expect(classifyIssueCode({ kind: "invalid_date", field: "x", message: "anything" })).toBe("INVALID_DATE_FORMAT");
    expect(classifyIssueCode({ kind: "not_editable", field: "x", message: "required field" })).toBe("PROPERTY_ERROR");
  });

  it("should fall back to the message text for untagged issues", () => {
    const code = (message: string) => classifyIssueCode({ field: null, message });

    expect(code("validation error for Name: required field is missing")).toBe("REQUIRED_FIELD_MISSING");
    expect(code("unknown property: colour")).toBe("UNKNOWN_PROPERTY");
    expect(code("validation error for Seen: invalid datetime format: x")).toBe("INVALID_DATETIME_FORMAT");
    expect(code("validation error for Bought: invalid date format: x")).toBe("INVALID_DATE_FORMAT");
    expect(code("invalid option 'x', allowed: A, B")).toBe("INVALID_SELECT_OPTION");
    expect(code("reference field 'Owner' requires object ID, got: x")).toBe("INVALID_REFERENCE");
    expect(code("quota exceeded")).toBe("PROPERTY_ERROR");
  });
});

describe("extractFieldName", () => {
  it("should find the field in each message form", () => {
    expect(extractFieldName("failed to resolve property 'Bought': validation error for Bought: x")).toBe("Bought");
    expect(extractFieldName("unknown property: colour")).toBe("colour");
    expect(extractFieldName("validation error for Name: required field is missing")).toBe("Name");
    expect(extractFieldName("quota exceeded")).toBeNull();
  });
});

describe("classifyPropertyIssue", () => {
  it("should surface the valid options of a select field", () => {
    const error = classifyPropertyIssue(
      {
        kind: "invalid_option",
        field: "device_type",
        message: "failed to resolve property 'device_type': validation error for Device Type: invalid option 'Cloud', allowed: Physical, Virtual",
        allowedValues: ["Physical", "Virtual"],
      },
      "42"
    );

    expect(error).toEqual({
      field: "device_type",
      message:
        "failed to resolve property 'device_type': validation error for Device Type: invalid option 'Cloud', allowed: Physical, Virtual",
      code: "INVALID_SELECT_OPTION",
      severity: "error",
      suggestion: "Valid options: Physical, Virtual",
      validOptions: ["Physical", "Virtual"],
    });
  });

  it("should extract options from the text when none are attached", () => {
    const error = classifyPropertyIssue({ field: "Size", message: "invalid option 'XL', allowed: S, M, L" }, "42");

    expect(error.validOptions).toEqual(["S", "M", "L"]);
    expect(error.suggestion).toBe("Valid options: S, M, L");
  });

  it("should name the field from the message when the issue has none", () => {
    const error = classifyPropertyIssue(
      { field: null, message: "failed to resolve property 'Bought': validation error for Bought: invalid date format: x" },
      "42"
    );

    expect(error.field).toBe("Bought");
    expect(error.code).toBe("INVALID_DATE_FORMAT");
    expect(error.suggestion).toBe("Use date format YYYY-MM-DD (e.g., 2024-01-15)");
  });

  it("should point unknown properties at the attribute list", () => {
    const error = classifyPropertyIssue({ kind: "unknown_property", field: "colour", message: "unknown property: colour" }, "42");

    expect(error.suggestion).toBe(
      "Check the property name spelling or list the attributes of object type 42 to see available fields"
    );
  });

  it("should suggest status IDs for invalid status values", () => {
    const error = classifyPropertyIssue(
      { kind: "invalid_status", field: "asset_status", message: "invalid status value '9'", allowedValues: ["100", "101"] },
      "42"
    );

    expect(error.code).toBe("PROPERTY_ERROR");
    expect(error.suggestion).toBe("Valid status IDs: 100, 101");
    expect(error.validOptions).toBeUndefined();
  });

  it("should fall back to a generic entry for unrecognised failures", () => {
    expect(classifyPropertyIssue({ field: null, message: "quota exceeded" }, "42")).toEqual({
      field: "",
      message: "quota exceeded",
      code: "PROPERTY_ERROR",
      severity: "error",
      suggestion: "Check the value against the attribute definition",
    });
  });
});
