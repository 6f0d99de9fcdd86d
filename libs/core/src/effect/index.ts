export * from "./contracts/index.js";
export * from "./errors.js";
export * from "./catalog/catalog-rows.js";
export * from "./catalog/conditions.js";
export * from "./catalog/in-memory-catalog.js";
export * from "./catalog/sql-catalog-fetch.js";
export * from "./models/model-descriptor.js";
export * from "./schema-changes/index.js";
export * from "./services/catalog-fetch-service.js";
export * from "./services/catalog-reader-service.js";
export * from "./services/clock-service.js";
export * from "./services/config-service.js";
export * from "./services/logger-service.js";
export * from "./services/model-service.js";
export * from "./services/schema-admin-service.js";
export * from "./services/schema-change-service.js";
export * from "./service-boundaries.js";
export * from "./runtime-layer.js";
