export * from "./column-types.js";
export * from "./column-updates.js";
export * from "./create-table.js";
export * from "./from-document.js";
export * from "./index-updates.js";
export type {
  ColumnUpdate,
  CreateTableUpdate,
  IndexUpdate,
  SchemaChange,
} from "./types.js";
