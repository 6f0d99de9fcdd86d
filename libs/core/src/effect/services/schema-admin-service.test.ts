import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";

import { SchemaSubmissionError } from "../errors.js";
import { makeExecutorSchemaAdminService, type SchemaDdlExecutor } from "./schema-admin-service.js";

const fixedClock = { nowMillis: Effect.succeed(1_000) };

describe("makeExecutorSchemaAdminService", () => {
  it("should forward statements and stamp the submission", async () => {
    const executor = vi.fn<SchemaDdlExecutor>(async () => undefined);
    const admin = makeExecutorSchemaAdminService(executor, fixedClock);

    const submission = await Effect.runPromise(
      admin.updateSchema(["DROP INDEX ByName"], "op-7"),
    );

    expect(executor).toHaveBeenCalledWith(["DROP INDEX ByName"], "op-7");
    expect(submission).toEqual({
      statements: ["DROP INDEX ByName"],
      operationId: "op-7",
      submittedAtMillis: 1_000,
    });
  });

  it("should refuse an empty statement list without calling the executor", async () => {
    const executor = vi.fn<SchemaDdlExecutor>(async () => undefined);
    const admin = makeExecutorSchemaAdminService(executor, fixedClock);

    const error = await Effect.runPromise(Effect.flip(admin.updateSchema([])));

    expect(error.message).toBe("Schema update requires at least one DDL statement");
    expect(executor).not.toHaveBeenCalled();
  });

  it("should wrap executor rejections", async () => {
    const executor = vi.fn<SchemaDdlExecutor>(async () => {
      throw new Error("permission denied");
    });
    const admin = makeExecutorSchemaAdminService(executor, fixedClock);

    const error = await Effect.runPromise(Effect.flip(admin.updateSchema(["DROP INDEX ByName"])));

    expect(error).toBeInstanceOf(SchemaSubmissionError);
    expect(error.statements).toEqual(["DROP INDEX ByName"]);
    expect(error.details).toBe("permission denied");
  });
});
