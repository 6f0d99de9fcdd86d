import { isIdentifier, type ColumnType } from "../contracts/index.js";
import { isValidColumnType, renderColumnDefinition } from "./column-types.js";
import { findDuplicate, runChecks, type CreateTableUpdate, type SchemaChangeCheck } from "./types.js";

export interface ColumnDefinition extends ColumnType {
  readonly name: string;
}

export const createTable = (
  table: string,
  columns: readonly ColumnDefinition[],
  primaryKeys: readonly string[],
): CreateTableUpdate => {
  const columnNames = columns.map((column) => column.name);

  const columnChecks: SchemaChangeCheck[] = columns.flatMap((column) => [
    () =>
      isIdentifier(column.name) ? undefined : `Column name ${column.name} is not a valid identifier`,
    () => (isValidColumnType(column.type) ? undefined : `Unsupported column type ${column.type}`),
  ]);

  return {
    kind: "create_table",
    change: "CreateTable",
    table,
    validate: () =>
      runChecks("CreateTable", table, [
        () => (isIdentifier(table) ? undefined : `Table name ${table} is not a valid identifier`),
        () => (columns.length === 0 ? `Table ${table} must define at least one column` : undefined),
        ...columnChecks,
        () => {
          const duplicate = findDuplicate(columnNames);
          return duplicate === undefined ? undefined : `Column ${duplicate} is defined more than once`;
        },
        () => (primaryKeys.length === 0 ? `Table ${table} must define a primary key` : undefined),
        () => {
          const duplicate = findDuplicate(primaryKeys);
          return duplicate === undefined
            ? undefined
            : `Primary key column ${duplicate} is listed more than once`;
        },
        () => {
          const undefinedKey = primaryKeys.find((key) => !columnNames.includes(key));
          return undefinedKey === undefined
            ? undefined
            : `Primary key column ${undefinedKey} is not defined on ${table}`;
        },
      ]),
    ddl: () => [
      `CREATE TABLE ${table} (${columns
        .map((column) => renderColumnDefinition(column.name, column))
        .join(", ")}) PRIMARY KEY (${primaryKeys.join(", ")})`,
    ],
  };
};
