import { Context, Effect, Layer } from "effect";

import {
  ColumnSchemaRelation,
  IndexColumnSchemaRelation,
  IndexSchemaRelation,
  columnTypeFromRow,
  type CatalogNamespace,
  type CatalogTransaction,
  type ColumnSchemaRow,
  type ColumnType,
  type IndexColumnSchemaRow,
  type IndexDefinition,
  type IndexMap,
  type IndexSchemaRow,
  type TableSchema,
} from "../contracts/index.js";
import type { CatalogReaderServiceError } from "../errors.js";
import { equalTo, notEqualTo, orderBy } from "../catalog/conditions.js";
import { CatalogFetchServiceTag, type CatalogFetchService } from "./catalog-fetch-service.js";
import { ConfigServiceTag, type ConfigService } from "./config-service.js";
import { LoggerServiceTag, type LoggerService } from "./logger-service.js";

export interface CatalogReaderService {
  readonly readColumns: (
    transaction?: CatalogTransaction,
  ) => Effect.Effect<TableSchema, CatalogReaderServiceError>;
  readonly readIndexes: (
    transaction?: CatalogTransaction,
  ) => Effect.Effect<IndexMap, CatalogReaderServiceError>;
}

export const CatalogReaderServiceTag = Context.GenericTag<CatalogReaderService>(
  "@schema-catalog/effect/CatalogReaderService",
);

const getOrCreate = <K, V>(map: Map<K, V>, key: K, create: () => V): V => {
  const existing = map.get(key);
  if (existing !== undefined) {
    return existing;
  }

  const created = create();
  map.set(key, created);
  return created;
};

export const foldColumnRows = (rows: readonly ColumnSchemaRow[]): TableSchema => {
  const tables = new Map<string, Map<string, ColumnType>>();
  for (const row of rows) {
    getOrCreate(tables, row.table_name, () => new Map()).set(row.column_name, columnTypeFromRow(row));
  }
  return tables;
};

/**
 * Appends key columns in the order the rows arrive. Rows must already be
 * filtered to non-null ordinal positions and sorted ascending by them.
 */
export const foldIndexColumnRows = (
  rows: readonly IndexColumnSchemaRow[],
): ReadonlyMap<string, ReadonlyMap<string, readonly string[]>> => {
  const columnsByTable = new Map<string, Map<string, string[]>>();
  for (const row of rows) {
    const byIndex = getOrCreate(columnsByTable, row.table_name, () => new Map());
    getOrCreate(byIndex, row.index_name, () => []).push(row.column_name);
  }
  return columnsByTable;
};

export const foldIndexRows = (
  rows: readonly IndexSchemaRow[],
  indexColumns: ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>,
): IndexMap => {
  const indexes = new Map<string, Map<string, IndexDefinition>>();
  for (const row of rows) {
    getOrCreate(indexes, row.table_name, () => new Map()).set(row.index_name, {
      columns: indexColumns.get(row.table_name)?.get(row.index_name) ?? [],
      type: row.index_type,
      unique: row.is_unique,
      state: row.index_state,
    });
  }
  return indexes;
};

export const makeCatalogReaderService = (
  catalog: CatalogFetchService,
  namespace: CatalogNamespace,
  logger: LoggerService,
): CatalogReaderService => ({
  readColumns: (transaction) =>
    Effect.gen(function* () {
      const rows = yield* catalog.fetch(ColumnSchemaRelation, transaction, [
        equalTo<ColumnSchemaRow>("table_catalog", namespace.catalogName),
        equalTo<ColumnSchemaRow>("table_schema", namespace.schemaName),
      ]);
      const tables = foldColumnRows(rows);

      yield* logger.debug("Read catalog columns", {
        relation: ColumnSchemaRelation.name,
        rows: rows.length,
        tables: tables.size,
        transactionId: transaction?.id ?? null,
      });
      return tables;
    }),
  readIndexes: (transaction) =>
    Effect.gen(function* () {
      const indexColumnRows = yield* catalog.fetch(IndexColumnSchemaRelation, transaction, [
        equalTo<IndexColumnSchemaRow>("table_catalog", namespace.catalogName),
        equalTo<IndexColumnSchemaRow>("table_schema", namespace.schemaName),
        notEqualTo<IndexColumnSchemaRow>("ordinal_position", null),
        orderBy<IndexColumnSchemaRow>(["ordinal_position", "ASC"]),
      ]);
      const indexRows = yield* catalog.fetch(IndexSchemaRelation, transaction, [
        equalTo<IndexSchemaRow>("table_catalog", namespace.catalogName),
        equalTo<IndexSchemaRow>("table_schema", namespace.schemaName),
      ]);
      const indexes = foldIndexRows(indexRows, foldIndexColumnRows(indexColumnRows));

      yield* logger.debug("Read catalog indexes", {
        relation: IndexSchemaRelation.name,
        indexColumnRows: indexColumnRows.length,
        indexRows: indexRows.length,
        transactionId: transaction?.id ?? null,
      });
      return indexes;
    }),
});

export const catalogReaderLayer: Layer.Layer<
  CatalogReaderService,
  never,
  CatalogFetchService | ConfigService | LoggerService
> = Layer.effect(
  CatalogReaderServiceTag,
  Effect.gen(function* () {
    const catalog = yield* CatalogFetchServiceTag;
    const config = yield* ConfigServiceTag;
    const logger = yield* LoggerServiceTag;
    return makeCatalogReaderService(catalog, config.namespace(), logger);
  }),
);
