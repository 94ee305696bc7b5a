/**
 * Property Module
 *
 * Resolution of raw property maps into API-ready values.
 */

export * from "./models/property-models.js";
export * from "./interfaces/IPropertyResolver.js";
export * from "./property-resolver.js";
