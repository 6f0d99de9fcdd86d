import { Schema } from "effect";

/**
 * Namespace value the catalog uses for objects that live in the default,
 * unqualified catalog and schema.
 */
export const DEFAULT_CATALOG_NAMESPACE = "";

export const PRIMARY_KEY_INDEX = "PRIMARY_KEY";

export const NullableFlagSchema = Schema.Literal("YES", "NO");

export const ColumnSchemaRowSchema = Schema.Struct({
  table_catalog: Schema.String,
  table_schema: Schema.String,
  table_name: Schema.String,
  column_name: Schema.String,
  ordinal_position: Schema.Int,
  spanner_type: Schema.String,
  is_nullable: NullableFlagSchema,
});

// ordinal_position is null for columns that are stored alongside the index
// but are not part of its key.
export const IndexColumnSchemaRowSchema = Schema.Struct({
  table_catalog: Schema.String,
  table_schema: Schema.String,
  table_name: Schema.String,
  index_name: Schema.String,
  column_name: Schema.String,
  ordinal_position: Schema.NullOr(Schema.Int),
  column_ordering: Schema.NullOr(Schema.String),
});

export const IndexSchemaRowSchema = Schema.Struct({
  table_catalog: Schema.String,
  table_schema: Schema.String,
  table_name: Schema.String,
  index_name: Schema.String,
  index_type: Schema.String,
  is_unique: Schema.Boolean,
  is_null_filtered: Schema.Boolean,
  index_state: Schema.NullOr(Schema.String),
});

export type NullableFlag = Schema.Schema.Type<typeof NullableFlagSchema>;
export type ColumnSchemaRow = Schema.Schema.Type<typeof ColumnSchemaRowSchema>;
export type IndexColumnSchemaRow = Schema.Schema.Type<typeof IndexColumnSchemaRowSchema>;
export type IndexSchemaRow = Schema.Schema.Type<typeof IndexSchemaRowSchema>;

export interface CatalogRelation<Row, Encoded = Row> {
  readonly name: string;
  readonly columns: readonly string[];
  readonly schema: Schema.Schema<Row, Encoded>;
}

const defineCatalogRelation = <Row, Encoded>(
  name: string,
  schema: Schema.Schema<Row, Encoded> & { readonly fields: Schema.Struct.Fields },
): CatalogRelation<Row, Encoded> => ({
  name,
  columns: Object.keys(schema.fields),
  schema,
});

export const ColumnSchemaRelation = defineCatalogRelation(
  "information_schema.columns",
  ColumnSchemaRowSchema,
);

export const IndexColumnSchemaRelation = defineCatalogRelation(
  "information_schema.index_columns",
  IndexColumnSchemaRowSchema,
);

export const IndexSchemaRelation = defineCatalogRelation(
  "information_schema.indexes",
  IndexSchemaRowSchema,
);

/** Handle for a read-only snapshot shared by several catalog reads. */
export interface CatalogTransaction {
  readonly id: string;
}

export interface CatalogNamespace {
  readonly catalogName: string;
  readonly schemaName: string;
}

export interface ColumnType {
  readonly type: string;
  readonly nullable: boolean;
}

export type TableColumns = ReadonlyMap<string, ColumnType>;

/** table name -> column name -> column type */
export type TableSchema = ReadonlyMap<string, TableColumns>;

export interface IndexDefinition {
  /** Key columns in ascending ordinal position. */
  readonly columns: readonly string[];
  readonly type: string;
  readonly unique: boolean;
  readonly state: string | null;
}

export type TableIndexes = ReadonlyMap<string, IndexDefinition>;

/** table name -> index name -> index definition */
export type IndexMap = ReadonlyMap<string, TableIndexes>;

export const columnTypeFromRow = (row: ColumnSchemaRow): ColumnType => ({
  type: row.spanner_type,
  nullable: row.is_nullable === "YES",
});
