/**
 * Metadata Module
 *
 * Attribute definitions per object type, shaped for validation and completion.
 */

// Models
export * from "./models/attribute-metadata.js";

// Interfaces
export * from "./interfaces/IAttributeSource.js";

// Implementation
export * from "./metadata-resolver.js";
export * from "./file-attribute-source.js";
