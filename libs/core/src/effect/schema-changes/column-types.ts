import type { ColumnType } from "../contracts/index.js";

const SCALAR_TYPES: ReadonlySet<string> = new Set([
  "BOOL",
  "INT64",
  "FLOAT64",
  "NUMERIC",
  "JSON",
  "DATE",
  "TIMESTAMP",
]);
const SIZED_TYPE_PATTERN = /^(?:STRING|BYTES)\((?:MAX|[1-9][0-9]*)\)$/;
const ARRAY_TYPE_PATTERN = /^ARRAY<(.+)>$/;
const TYPE_LENGTH_PATTERN = /\((?:MAX|[0-9]+)\)/g;

// Arrays may not nest.
export const isValidColumnType = (type: string): boolean => {
  const element = ARRAY_TYPE_PATTERN.exec(type)?.[1];
  if (element !== undefined) {
    return !ARRAY_TYPE_PATTERN.test(element) && isValidColumnType(element);
  }
  return SCALAR_TYPES.has(type) || SIZED_TYPE_PATTERN.test(type);
};

/** `STRING(10)` -> `STRING`, `ARRAY<BYTES(MAX)>` -> `ARRAY<BYTES>` */
export const baseColumnType = (type: string): string => type.replace(TYPE_LENGTH_PATTERN, "");

export const renderColumnDefinition = (name: string, columnType: ColumnType): string =>
  `${name} ${columnType.type}${columnType.nullable ? "" : " NOT NULL"}`;
