import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { columnRow, indexColumnRow, indexRow } from "../catalog/catalog-rows.js";
import { makeInMemoryCatalog, type InMemoryCatalog } from "../catalog/in-memory-catalog.js";
import { ColumnSchemaRelation, IndexColumnSchemaRelation, IndexSchemaRelation } from "../contracts/index.js";
import { deterministicRuntimeLayer } from "../runtime-layer.js";
import { addColumn, createIndex, createTable, dropColumn, dropIndex } from "../schema-changes/index.js";
import { makeRecordingLogger, type RecordingLogger } from "./logger-service.js";
import { makeRecordingSchemaAdmin, type RecordingSchemaAdmin } from "./schema-admin-service.js";
import {
  SchemaChangeServiceTag,
  type SchemaChangeReceipt,
  type SchemaChangeService,
} from "./schema-change-service.js";

const seedUsers = () =>
  makeInMemoryCatalog({
    columns: [
      columnRow({ table: "Users", column: "id", type: "INT64", nullable: false, position: 1 }),
      columnRow({ table: "Users", column: "name", type: "STRING(64)", position: 2 }),
    ],
    indexColumns: [indexColumnRow({ table: "Users", index: "PRIMARY_KEY", column: "id", position: 1 })],
    indexes: [indexRow({ table: "Users", index: "PRIMARY_KEY" })],
  });

interface Harness {
  readonly catalog: InMemoryCatalog;
  readonly admin: RecordingSchemaAdmin;
  readonly logger: RecordingLogger;
  readonly run: <A, E>(
    use: (service: SchemaChangeService) => Effect.Effect<A, E>,
  ) => Promise<A>;
}

const makeHarness = (adminFailure?: string): Harness => {
  const catalog = seedUsers();
  const admin = makeRecordingSchemaAdmin(
    adminFailure === undefined ? { nowMillis: 42 } : { nowMillis: 42, failure: adminFailure },
  );
  const logger = makeRecordingLogger();
  const layer = deterministicRuntimeLayer({
    catalog,
    admin: admin.service,
    logger: logger.service,
  });

  return {
    catalog,
    admin,
    logger,
    run: (use) =>
      Effect.runPromise(
        Effect.gen(function* () {
          const service = yield* SchemaChangeServiceTag;
          return yield* use(service);
        }).pipe(Effect.provide(layer)),
      ),
  };
};

describe("SchemaChangeService", () => {
  describe("applyColumnUpdate", () => {
    it("should validate and submit the column DDL", async () => {
      const harness = makeHarness();

      const receipt = await harness.run((service) =>
        service.applyColumnUpdate(
          addColumn("Users", "email", { type: "STRING(MAX)", nullable: true }),
          { operationId: "op-1" },
        ),
      );

      const expected: SchemaChangeReceipt = {
        table: "Users",
        kind: "column",
        change: "AddColumn",
        statements: ["ALTER TABLE Users ADD COLUMN email STRING(MAX)"],
        operationId: "op-1",
        submittedAtMillis: 42,
      };
      expect(receipt).toEqual(expected);
      expect(harness.admin.submissions()).toEqual([
        {
          statements: ["ALTER TABLE Users ADD COLUMN email STRING(MAX)"],
          operationId: "op-1",
          submittedAtMillis: 42,
        },
      ]);
      expect(harness.logger.entries().at(-1)).toEqual({
        level: "info",
        message: "Schema change submitted",
        context: { table: "Users", change: "AddColumn", statements: 1, operationId: "op-1" },
      });
    });

    it("should fail with UnknownTableError without submitting", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(service.applyColumnUpdate(dropColumn("Orders", "total"))),
      );

      expect(error._tag).toBe("UnknownTableError");
      expect(error.message).toBe("Table Orders does not exist");
      expect(harness.admin.submissions()).toEqual([]);
    });

    it("should reject a request of another kind before reading the catalog", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(service.applyColumnUpdate(dropIndex("Users", "ByName"))),
      );

      expect(error).toMatchObject({
        _tag: "SchemaChangeTypeMismatchError",
        expected: "column",
        received: "index",
        table: "Users",
        message: "Expected a schema change of kind column but received index (DropIndex)",
      });
      expect(harness.catalog.reads()).toEqual([]);
      expect(harness.admin.submissions()).toEqual([]);
    });

    it("should log and return validation failures without submitting", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(service.applyColumnUpdate(dropColumn("Users", "id"))),
      );

      expect(error).toMatchObject({
        _tag: "InvalidSchemaChangeError",
        table: "Users",
        change: "DropColumn",
        reason: "Column id is part of the primary key of Users",
      });
      expect(harness.admin.submissions()).toEqual([]);
      expect(harness.logger.entries().at(-1)).toEqual({
        level: "warn",
        message: "Schema change rejected",
        context: {
          table: "Users",
          change: "DropColumn",
          error: "InvalidSchemaChangeError",
          reason: "DropColumn on Users rejected: Column id is part of the primary key of Users",
        },
      });
    });
  });

  describe("applyCreateTableUpdate", () => {
    const orders = createTable(
      "Orders",
      [
        { name: "id", type: "INT64", nullable: false },
        { name: "user_id", type: "INT64", nullable: false },
      ],
      ["user_id", "id"],
    );

    it("should submit CREATE TABLE for an absent table", async () => {
      const harness = makeHarness();

      const receipt = await harness.run((service) => service.applyCreateTableUpdate(orders));

      expect(receipt).toEqual({
        table: "Orders",
        kind: "create_table",
        change: "CreateTable",
        statements: [
          "CREATE TABLE Orders (id INT64 NOT NULL, user_id INT64 NOT NULL) PRIMARY KEY (user_id, id)",
        ],
        operationId: null,
        submittedAtMillis: 42,
      });
    });

    it("should fail with TableAlreadyExistsError for an existing table", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(
          service.applyCreateTableUpdate(
            createTable("Users", [{ name: "id", type: "INT64", nullable: false }], ["id"]),
          ),
        ),
      );

      expect(error._tag).toBe("TableAlreadyExistsError");
      expect(error.message).toBe("Table Users already exists");
      expect(harness.admin.submissions()).toEqual([]);
    });

    it("should reject a column update", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(
          service.applyCreateTableUpdate(addColumn("Users", "email", { type: "BOOL", nullable: true })),
        ),
      );

      expect(error).toMatchObject({
        _tag: "SchemaChangeTypeMismatchError",
        expected: "create_table",
        received: "column",
      });
      expect(harness.catalog.reads()).toEqual([]);
    });
  });

  describe("applyIndexUpdate", () => {
    it("should submit CREATE INDEX for an existing table", async () => {
      const harness = makeHarness();

      const receipt = await harness.run((service) =>
        service.applyIndexUpdate(createIndex("Users", "ByName", ["name"], { nullFiltered: true })),
      );

      expect(receipt.statements).toEqual(["CREATE NULL_FILTERED INDEX ByName ON Users (name)"]);
      expect(receipt.kind).toBe("index");
    });

    it("should fail with UnknownTableError naming the index operation", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(service.applyIndexUpdate(createIndex("Orders", "ByUser", ["user_id"]))),
      );

      expect(error).toMatchObject({
        _tag: "UnknownTableError",
        table: "Orders",
        operation: "index",
      });
    });

    it("should reject a create table request", async () => {
      const harness = makeHarness();

      const error = await harness.run((service) =>
        Effect.flip(
          service.applyIndexUpdate(
            createTable("Orders", [{ name: "id", type: "INT64", nullable: false }], ["id"]),
          ),
        ),
      );

      expect(error).toMatchObject({
        _tag: "SchemaChangeTypeMismatchError",
        expected: "index",
        received: "create_table",
        message: "Expected a schema change of kind index but received create_table (CreateTable)",
      });
    });
  });

  it("should dispatch on the request kind", async () => {
    const harness = makeHarness();

    const receipts = await harness.run((service) =>
      Effect.all([
        service.apply(addColumn("Users", "email", { type: "STRING(MAX)", nullable: true })),
        service.apply(
          createTable("Orders", [{ name: "id", type: "INT64", nullable: false }], ["id"]),
        ),
        service.apply(createIndex("Users", "ByName", ["name"])),
      ]),
    );

    expect(receipts.map((receipt) => receipt.change)).toEqual([
      "AddColumn",
      "CreateTable",
      "CreateIndex",
    ]);
    expect(harness.admin.submissions()).toHaveLength(3);
  });

  it("should surface admin failures as SchemaSubmissionError", async () => {
    const harness = makeHarness("deadline exceeded");

    const error = await harness.run((service) =>
      Effect.flip(service.applyIndexUpdate(dropIndex("Users", "PRIMARY_KEY"))),
    );
    const submissionError = await harness.run((service) =>
      Effect.flip(service.applyIndexUpdate(createIndex("Users", "ByName", ["name"]))),
    );

    expect(error._tag).toBe("InvalidSchemaChangeError");
    expect(submissionError).toMatchObject({
      _tag: "SchemaSubmissionError",
      statements: ["CREATE INDEX ByName ON Users (name)"],
      message: "Schema update was rejected by the admin endpoint",
      details: "deadline exceeded",
    });
  });

  it("should validate against the snapshot when a transaction is given", async () => {
    const harness = makeHarness();
    const transaction = harness.catalog.beginSnapshot();
    const isUsers = (row: Readonly<Record<string, unknown>>) => row["table_name"] === "Users";
    harness.catalog.deleteWhere(ColumnSchemaRelation, isUsers);
    harness.catalog.deleteWhere(IndexColumnSchemaRelation, isUsers);
    harness.catalog.deleteWhere(IndexSchemaRelation, isUsers);

    const receipt = await harness.run((service) =>
      service.applyColumnUpdate(addColumn("Users", "email", { type: "BOOL", nullable: true }), {
        transaction,
      }),
    );
    const liveError = await harness.run((service) =>
      Effect.flip(service.applyColumnUpdate(addColumn("Users", "email", { type: "BOOL", nullable: true }))),
    );

    expect(receipt.statements).toEqual(["ALTER TABLE Users ADD COLUMN email BOOL"]);
    expect(liveError._tag).toBe("UnknownTableError");
  });
});
