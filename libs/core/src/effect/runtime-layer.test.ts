import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";

import { columnRow, indexColumnRow, indexRow } from "./catalog/catalog-rows.js";
import type { CatalogQueryExecutor } from "./catalog/sql-catalog-fetch.js";
import { addColumn } from "./schema-changes/index.js";
import { ConfigServiceTag } from "./services/config-service.js";
import { ModelServiceTag } from "./services/model-service.js";
import type { SchemaDdlExecutor } from "./services/schema-admin-service.js";
import { SchemaChangeServiceTag } from "./services/schema-change-service.js";
import { runtimeLayerFromEnv } from "./runtime-layer.js";

const rowsByRelation: Readonly<Record<string, readonly unknown[]>> = {
  "information_schema.columns": [
    columnRow({ table: "Users", column: "id", type: "INT64", nullable: false, schemaName: "app" }),
  ],
  "information_schema.index_columns": [
    indexColumnRow({ table: "Users", index: "PRIMARY_KEY", column: "id", position: 1, schemaName: "app" }),
  ],
  "information_schema.indexes": [indexRow({ table: "Users", index: "PRIMARY_KEY", schemaName: "app" })],
};

const relationOf = (sql: string): string => /FROM (\S+)/.exec(sql)?.[1] ?? "";

describe("runtimeLayerFromEnv", () => {
  it("should read through the query executor and submit through the DDL executor", async () => {
    const queryExecutor = vi.fn<CatalogQueryExecutor>(async (query) => rowsByRelation[relationOf(query.sql)] ?? []);
    const ddlExecutor = vi.fn<SchemaDdlExecutor>(async () => undefined);
    const layer = runtimeLayerFromEnv(
      { queryExecutor, ddlExecutor },
      { SCHEMA_CATALOG_SCHEMA_NAME: "app", SCHEMA_CATALOG_LOG_LEVEL: "error" },
    );

    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const config = yield* ConfigServiceTag;
        const models = yield* (yield* ModelServiceTag).models();
        const receipt = yield* (yield* SchemaChangeServiceTag).applyColumnUpdate(
          addColumn("Users", "email", { type: "STRING(MAX)", nullable: true }),
        );
        return { namespace: config.namespace(), tables: [...models.keys()], receipt };
      }).pipe(Effect.provide(layer)),
    );

    expect(result.namespace).toEqual({ catalogName: "", schemaName: "app" });
    expect(result.tables).toEqual(["Users"]);
    expect(queryExecutor.mock.calls[0]?.[0].params).toEqual({ p0: "", p1: "app" });
    expect(ddlExecutor).toHaveBeenCalledWith(
      ["ALTER TABLE Users ADD COLUMN email STRING(MAX)"],
      undefined,
    );
    expect(result.receipt.operationId).toBeNull();
  });
});
