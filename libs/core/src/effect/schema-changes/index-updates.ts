import { PRIMARY_KEY_INDEX, isIdentifier } from "../contracts/index.js";
import { findDuplicate, runChecks, type IndexUpdate } from "./types.js";

export interface CreateIndexOptions {
  readonly unique?: boolean;
  readonly nullFiltered?: boolean;
  /** Non-key columns copied into the index. */
  readonly storing?: readonly string[];
}

export const createIndex = (
  table: string,
  index: string,
  columns: readonly string[],
  options: CreateIndexOptions = {},
): IndexUpdate => {
  const storing = options.storing ?? [];

  return {
    kind: "index",
    change: "CreateIndex",
    table,
    validate: (model) =>
      runChecks("CreateIndex", table, [
        () => (isIdentifier(index) ? undefined : `Index name ${index} is not a valid identifier`),
        () =>
          index === PRIMARY_KEY_INDEX
            ? `${PRIMARY_KEY_INDEX} is reserved for the primary key`
            : undefined,
        () => (model.indexes.has(index) ? `Index ${index} already exists on ${table}` : undefined),
        () => (columns.length === 0 ? `Index ${index} must include at least one column` : undefined),
        () => {
          const duplicate = findDuplicate(columns);
          return duplicate === undefined
            ? undefined
            : `Column ${duplicate} is listed more than once in index ${index}`;
        },
        () => {
          const missing = [...columns, ...storing].find((column) => !model.columnSchema.has(column));
          return missing === undefined ? undefined : `Column ${missing} does not exist on ${table}`;
        },
        () => {
          const keyColumn = storing.find((column) => columns.includes(column));
          return keyColumn === undefined
            ? undefined
            : `Column ${keyColumn} is already an index key and cannot be stored`;
        },
        () => {
          const primaryKeyColumn = storing.find((column) => model.primaryIndexKeys.includes(column));
          return primaryKeyColumn === undefined
            ? undefined
            : `Primary key column ${primaryKeyColumn} cannot be stored in index ${index}`;
        },
      ]),
    ddl: () => {
      const modifiers = [options.unique ? "UNIQUE " : "", options.nullFiltered ? "NULL_FILTERED " : ""];
      const storingClause = storing.length > 0 ? ` STORING (${storing.join(", ")})` : "";
      return [
        `CREATE ${modifiers.join("")}INDEX ${index} ON ${table} (${columns.join(", ")})${storingClause}`,
      ];
    },
  };
};

export const dropIndex = (table: string, index: string): IndexUpdate => ({
  kind: "index",
  change: "DropIndex",
  table,
  validate: (model) =>
    runChecks("DropIndex", table, [
      () => (index === PRIMARY_KEY_INDEX ? `${PRIMARY_KEY_INDEX} cannot be dropped` : undefined),
      () => (model.indexes.has(index) ? undefined : `Index ${index} does not exist on ${table}`),
    ]),
  ddl: () => [`DROP INDEX ${index}`],
});
