/**
 * Core module - Resolver cache, attribute metadata, property resolution and
 * validation for asset inventory tooling
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./resolver/index.js";
export * from "./metadata/index.js";
export * from "./property/index.js";
export * from "./validation/index.js";

// Re-export shared types and configuration
export * from "../types/result.js";
export { loadConfig, AssetsEnvSchema, DEFAULT_CACHE_TTL_HOURS, type AssetsConfig } from "../utils/config.js";
export { createLogger, type Logger, type LogLevel, type LoggerOptions } from "../utils/logger.js";
