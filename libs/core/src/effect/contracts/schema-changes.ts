import { Schema } from "effect";

export const SchemaChangeKindSchema = Schema.Literal("column", "create_table", "index");

export const ColumnTypeDocumentSchema = Schema.Struct({
  type: Schema.String,
  nullable: Schema.optionalWith(Schema.Boolean, { default: () => true }),
});

export const ColumnDefinitionDocumentSchema = Schema.Struct({
  name: Schema.String,
  type: Schema.String,
  nullable: Schema.optionalWith(Schema.Boolean, { default: () => true }),
});

export const AddColumnDocumentSchema = Schema.TaggedStruct("AddColumn", {
  table: Schema.String,
  column: Schema.String,
  type: ColumnTypeDocumentSchema,
});

export const AlterColumnDocumentSchema = Schema.TaggedStruct("AlterColumn", {
  table: Schema.String,
  column: Schema.String,
  type: ColumnTypeDocumentSchema,
});

export const DropColumnDocumentSchema = Schema.TaggedStruct("DropColumn", {
  table: Schema.String,
  column: Schema.String,
});

export const CreateTableDocumentSchema = Schema.TaggedStruct("CreateTable", {
  table: Schema.String,
  columns: Schema.Array(ColumnDefinitionDocumentSchema),
  primaryKeys: Schema.Array(Schema.String),
});

export const CreateIndexDocumentSchema = Schema.TaggedStruct("CreateIndex", {
  table: Schema.String,
  index: Schema.String,
  columns: Schema.Array(Schema.String),
  unique: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  nullFiltered: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  storing: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
});

export const DropIndexDocumentSchema = Schema.TaggedStruct("DropIndex", {
  table: Schema.String,
  index: Schema.String,
});

export const SchemaChangeDocumentSchema = Schema.Union(
  AddColumnDocumentSchema,
  AlterColumnDocumentSchema,
  DropColumnDocumentSchema,
  CreateTableDocumentSchema,
  CreateIndexDocumentSchema,
  DropIndexDocumentSchema,
);

export type SchemaChangeKind = Schema.Schema.Type<typeof SchemaChangeKindSchema>;
export type SchemaChangeDocument = Schema.Schema.Type<typeof SchemaChangeDocumentSchema>;
