import { Schema } from "effect";

import { SchemaChangeKindSchema } from "./contracts/schema-changes.js";

export class ContractValidationError extends Schema.TaggedError<ContractValidationError>()(
  "ContractValidationError",
  {
    contract: Schema.String,
    message: Schema.String,
    details: Schema.String,
  },
) {}

export class CatalogReadError extends Schema.TaggedError<CatalogReadError>()(
  "CatalogReadError",
  {
    relation: Schema.String,
    message: Schema.String,
    details: Schema.String,
  },
) {}

export class MissingPrimaryKeyError extends Schema.TaggedError<MissingPrimaryKeyError>()(
  "MissingPrimaryKeyError",
  {
    table: Schema.String,
    message: Schema.String,
  },
) {}

export class UnknownTableError extends Schema.TaggedError<UnknownTableError>()(
  "UnknownTableError",
  {
    table: Schema.String,
    operation: SchemaChangeKindSchema,
    message: Schema.String,
  },
) {}

export class TableAlreadyExistsError extends Schema.TaggedError<TableAlreadyExistsError>()(
  "TableAlreadyExistsError",
  {
    table: Schema.String,
    message: Schema.String,
  },
) {}

export class InvalidSchemaChangeError extends Schema.TaggedError<InvalidSchemaChangeError>()(
  "InvalidSchemaChangeError",
  {
    table: Schema.String,
    change: Schema.String,
    reason: Schema.String,
    message: Schema.String,
  },
) {}

export class SchemaChangeTypeMismatchError extends Schema.TaggedError<SchemaChangeTypeMismatchError>()(
  "SchemaChangeTypeMismatchError",
  {
    expected: SchemaChangeKindSchema,
    received: Schema.String,
    table: Schema.String,
    message: Schema.String,
  },
) {}

export class SchemaSubmissionError extends Schema.TaggedError<SchemaSubmissionError>()(
  "SchemaSubmissionError",
  {
    statements: Schema.Array(Schema.String),
    message: Schema.String,
    details: Schema.String,
  },
) {}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : `Unknown failure: ${String(cause)}`;

export type CatalogReaderServiceError = CatalogReadError;

export type ModelServiceError = CatalogReadError | MissingPrimaryKeyError;

export type SchemaAdminServiceError = SchemaSubmissionError;

export type SchemaChangeServiceError =
  | ModelServiceError
  | SchemaChangeTypeMismatchError
  | UnknownTableError
  | TableAlreadyExistsError
  | InvalidSchemaChangeError
  | SchemaSubmissionError;
