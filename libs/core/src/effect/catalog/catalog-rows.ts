import {
  DEFAULT_CATALOG_NAMESPACE,
  PRIMARY_KEY_INDEX,
  type ColumnSchemaRow,
  type IndexColumnSchemaRow,
  type IndexSchemaRow,
} from "../contracts/index.js";

interface NamespaceInput {
  readonly catalogName?: string;
  readonly schemaName?: string;
}

export interface ColumnRowInput extends NamespaceInput {
  readonly table: string;
  readonly column: string;
  readonly type: string;
  readonly nullable?: boolean;
  readonly position?: number;
}

export interface IndexColumnRowInput extends NamespaceInput {
  readonly table: string;
  readonly index: string;
  readonly column: string;
  readonly position: number | null;
  readonly ordering?: "ASC" | "DESC";
}

export interface IndexRowInput extends NamespaceInput {
  readonly table: string;
  readonly index: string;
  readonly unique?: boolean;
  readonly nullFiltered?: boolean;
  readonly state?: string | null;
}

export const columnRow = (input: ColumnRowInput): ColumnSchemaRow => ({
  table_catalog: input.catalogName ?? DEFAULT_CATALOG_NAMESPACE,
  table_schema: input.schemaName ?? DEFAULT_CATALOG_NAMESPACE,
  table_name: input.table,
  column_name: input.column,
  ordinal_position: input.position ?? 1,
  spanner_type: input.type,
  is_nullable: input.nullable === false ? "NO" : "YES",
});

export const indexColumnRow = (input: IndexColumnRowInput): IndexColumnSchemaRow => ({
  table_catalog: input.catalogName ?? DEFAULT_CATALOG_NAMESPACE,
  table_schema: input.schemaName ?? DEFAULT_CATALOG_NAMESPACE,
  table_name: input.table,
  index_name: input.index,
  column_name: input.column,
  ordinal_position: input.position,
  column_ordering: input.position === null ? null : (input.ordering ?? "ASC"),
});

// Primary keys report no index_state; secondary indexes default to fully built.
export const indexRow = (input: IndexRowInput): IndexSchemaRow => {
  const isPrimaryKey = input.index === PRIMARY_KEY_INDEX;

  return {
    table_catalog: input.catalogName ?? DEFAULT_CATALOG_NAMESPACE,
    table_schema: input.schemaName ?? DEFAULT_CATALOG_NAMESPACE,
    table_name: input.table,
    index_name: input.index,
    index_type: isPrimaryKey ? PRIMARY_KEY_INDEX : "INDEX",
    is_unique: input.unique ?? isPrimaryKey,
    is_null_filtered: input.nullFiltered ?? false,
    index_state: input.state === undefined ? (isPrimaryKey ? null : "READ_WRITE") : input.state,
  };
};
