import { PRIMARY_KEY_INDEX, isIdentifier, type ColumnType } from "../contracts/index.js";
import type { ModelDescriptor } from "../models/model-descriptor.js";
import { baseColumnType, isValidColumnType, renderColumnDefinition } from "./column-types.js";
import { runChecks, type ColumnUpdate } from "./types.js";

const missingColumn = (model: ModelDescriptor, column: string): string | undefined =>
  model.columnSchema.has(column) ? undefined : `Column ${column} does not exist on ${model.table}`;

const primaryKeyColumn = (model: ModelDescriptor, column: string): string | undefined =>
  model.primaryIndexKeys.includes(column)
    ? `Column ${column} is part of the primary key of ${model.table}`
    : undefined;

const unsupportedType = (type: string): string | undefined =>
  isValidColumnType(type) ? undefined : `Unsupported column type ${type}`;

export const addColumn = (table: string, column: string, type: ColumnType): ColumnUpdate => ({
  kind: "column",
  change: "AddColumn",
  table,
  validate: (model) =>
    runChecks("AddColumn", table, [
      () => (isIdentifier(column) ? undefined : `Column name ${column} is not a valid identifier`),
      () =>
        model.columnSchema.has(column) ? `Column ${column} already exists on ${table}` : undefined,
      () => unsupportedType(type.type),
      // Existing rows have no value for the new column.
      () =>
        type.nullable
          ? undefined
          : `Column ${column} must be nullable to be added to an existing table`,
    ]),
  ddl: () => [`ALTER TABLE ${table} ADD COLUMN ${renderColumnDefinition(column, type)}`],
});

export const alterColumn = (table: string, column: string, type: ColumnType): ColumnUpdate => ({
  kind: "column",
  change: "AlterColumn",
  table,
  validate: (model) =>
    runChecks("AlterColumn", table, [
      () => missingColumn(model, column),
      () => primaryKeyColumn(model, column),
      () => unsupportedType(type.type),
      () => {
        const current = model.columnSchema.get(column);
        if (current === undefined || baseColumnType(current.type) === baseColumnType(type.type)) {
          return undefined;
        }
        return `Column ${column} cannot change type from ${current.type} to ${type.type}`;
      },
    ]),
  ddl: () => [`ALTER TABLE ${table} ALTER COLUMN ${renderColumnDefinition(column, type)}`],
});

export const dropColumn = (table: string, column: string): ColumnUpdate => ({
  kind: "column",
  change: "DropColumn",
  table,
  validate: (model) =>
    runChecks("DropColumn", table, [
      () => missingColumn(model, column),
      () => primaryKeyColumn(model, column),
      () => {
        for (const [indexName, index] of model.indexes) {
          if (indexName !== PRIMARY_KEY_INDEX && index.columns.includes(column)) {
            return `Column ${column} is used by index ${indexName}`;
          }
        }
        return undefined;
      },
    ]),
  ddl: () => [`ALTER TABLE ${table} DROP COLUMN ${column}`],
});
