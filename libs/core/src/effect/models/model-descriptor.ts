import { Effect } from "effect";

import {
  PRIMARY_KEY_INDEX,
  type IndexMap,
  type TableColumns,
  type TableIndexes,
  type TableSchema,
} from "../contracts/index.js";
import { MissingPrimaryKeyError } from "../errors.js";

/**
 * Read-only handle for one table. All tables share this shape; callers that
 * need per-table behavior dispatch on `table`. The catalog maps are held by
 * reference, so compare descriptors field by field.
 */
export interface ModelDescriptor<TableName extends string = string> {
  readonly table: TableName;
  readonly columnSchema: TableColumns;
  /** Primary key columns in key order. */
  readonly primaryIndexKeys: readonly string[];
  /** Every index on the table, including PRIMARY_KEY. */
  readonly indexes: TableIndexes;
}

export type ModelMap = ReadonlyMap<string, ModelDescriptor>;

export const makeModelDescriptor = <TableName extends string>(
  fields: ModelDescriptor<TableName>,
): ModelDescriptor<TableName> => ({
  table: fields.table,
  columnSchema: fields.columnSchema,
  primaryIndexKeys: fields.primaryIndexKeys,
  indexes: fields.indexes,
});

export const synthesizeModels = (
  tables: TableSchema,
  indexes: IndexMap,
): Effect.Effect<ModelMap, MissingPrimaryKeyError> =>
  Effect.gen(function* () {
    const models = new Map<string, ModelDescriptor>();

    for (const [table, columnSchema] of tables) {
      const tableIndexes = indexes.get(table);
      const primaryKey = tableIndexes?.get(PRIMARY_KEY_INDEX);
      if (tableIndexes === undefined || primaryKey === undefined) {
        return yield* Effect.fail(
          new MissingPrimaryKeyError({
            table,
            message: `Table ${table} has no ${PRIMARY_KEY_INDEX} index in the catalog`,
          }),
        );
      }

      models.set(
        table,
        makeModelDescriptor({
          table,
          columnSchema,
          primaryIndexKeys: primaryKey.columns,
          indexes: tableIndexes,
        }),
      );
    }

    return models;
  });
