/**
 * Resolver Module
 *
 * Name/ID translation for schemas and object types, backed by an in-memory
 * cache and a TTL-bounded disk cache.
 */

// Models
export * from "./models/resolver-models.js";

// Interfaces
export * from "./interfaces/IAssetsCatalog.js";

// Implementation
export * from "./resolver-cache.js";
export * from "./disk-cache.js";
export * from "./resolver.js";
