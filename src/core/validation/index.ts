/**
 * Validation Module
 *
 * Object validation, business rules, and completion of partial objects.
 */

// Models
export * from "./models/validation-models.js";

// Implementation
export * from "./error-classifier.js";
export * from "./business-rules.js";
export * from "./object-validator.js";
export * from "./completion-engine.js";
export * from "./summary.js";
