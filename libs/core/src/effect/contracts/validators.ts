import { Effect, ParseResult, Schema } from "effect";

import type { CatalogRelation } from "./catalog.js";
import { SchemaChangeDocumentSchema, type SchemaChangeDocument } from "./schema-changes.js";
import { CatalogReadError, ContractValidationError } from "../errors.js";

type SchemaWithoutContext<A, I = A> = Schema.Schema<A, I, never>;

export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

export const decodeUnknownEffect = <A, I>(schema: SchemaWithoutContext<A, I>, contract: string) => {
  const decode = Schema.decodeUnknown(schema);

  return (input: unknown): Effect.Effect<A, ContractValidationError> =>
    decode(input).pipe(
      Effect.mapError(
        (error) =>
          new ContractValidationError({
            contract,
            message: `Contract validation failed for ${contract}`,
            details: formatParseError(error),
          }),
      ),
    );
};

export const decodeSchemaChangeDocumentEffect: (
  input: unknown,
) => Effect.Effect<SchemaChangeDocument, ContractValidationError> = decodeUnknownEffect(
  SchemaChangeDocumentSchema,
  "SchemaChangeDocument",
);

export const decodeCatalogRows = <Row, Encoded>(
  relation: CatalogRelation<Row, Encoded>,
  rows: readonly unknown[],
): Effect.Effect<readonly Row[], CatalogReadError> =>
  Schema.decodeUnknown(Schema.Array(relation.schema))(rows).pipe(
    Effect.mapError(
      (error) =>
        new CatalogReadError({
          relation: relation.name,
          message: `Catalog rows from ${relation.name} did not match the expected shape`,
          details: formatParseError(error),
        }),
    ),
  );
