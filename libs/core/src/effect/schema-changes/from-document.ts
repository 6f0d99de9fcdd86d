import { Effect } from "effect";

import { decodeSchemaChangeDocumentEffect, type SchemaChangeDocument } from "../contracts/index.js";
import type { ContractValidationError } from "../errors.js";
import { addColumn, alterColumn, dropColumn } from "./column-updates.js";
import { createTable } from "./create-table.js";
import { createIndex, dropIndex } from "./index-updates.js";
import type { SchemaChange } from "./types.js";

export const schemaChangeFromDocument = (document: SchemaChangeDocument): SchemaChange => {
  switch (document._tag) {
    case "AddColumn":
      return addColumn(document.table, document.column, document.type);
    case "AlterColumn":
      return alterColumn(document.table, document.column, document.type);
    case "DropColumn":
      return dropColumn(document.table, document.column);
    case "CreateTable":
      return createTable(document.table, document.columns, document.primaryKeys);
    case "CreateIndex":
      return createIndex(document.table, document.index, document.columns, {
        unique: document.unique,
        nullFiltered: document.nullFiltered,
        storing: document.storing,
      });
    case "DropIndex":
      return dropIndex(document.table, document.index);
  }
};

export const decodeSchemaChange = (
  input: unknown,
): Effect.Effect<SchemaChange, ContractValidationError> =>
  decodeSchemaChangeDocumentEffect(input).pipe(Effect.map(schemaChangeFromDocument));
