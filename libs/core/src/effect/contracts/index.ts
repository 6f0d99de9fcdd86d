export * from "./catalog.js";
export * from "./identifiers.js";
export * from "./schema-changes.js";
export * from "./validators.js";
