import { Context, Effect, Layer } from "effect";

import { SchemaSubmissionError, describeCause, type SchemaAdminServiceError } from "../errors.js";
import { ClockServiceTag, type ClockService } from "./clock-service.js";

export interface SchemaSubmission {
  readonly statements: readonly string[];
  readonly operationId: string | null;
  readonly submittedAtMillis: number;
}

/**
 * Sends DDL to the database's administrative endpoint. Resolves once the
 * request is accepted; long-running schema operations are not awaited.
 */
export type SchemaDdlExecutor = (
  statements: readonly string[],
  operationId?: string,
) => Promise<void>;

export interface SchemaAdminService {
  readonly updateSchema: (
    statements: readonly string[],
    operationId?: string,
  ) => Effect.Effect<SchemaSubmission, SchemaAdminServiceError>;
}

export const SchemaAdminServiceTag = Context.GenericTag<SchemaAdminService>(
  "@schema-catalog/effect/SchemaAdminService",
);

const requireStatements = (
  statements: readonly string[],
): Effect.Effect<readonly string[], SchemaSubmissionError> =>
  statements.length === 0
    ? Effect.fail(
        new SchemaSubmissionError({
          statements: [],
          message: "Schema update requires at least one DDL statement",
          details: "No statements were provided.",
        }),
      )
    : Effect.succeed(statements);

export const makeExecutorSchemaAdminService = (
  executor: SchemaDdlExecutor,
  clock: ClockService,
): SchemaAdminService => ({
  updateSchema: (statements, operationId) =>
    Effect.gen(function* () {
      yield* requireStatements(statements);
      yield* Effect.tryPromise({
        try: () => executor(statements, operationId),
        catch: (cause) =>
          new SchemaSubmissionError({
            statements: [...statements],
            message: "Schema update was rejected by the admin endpoint",
            details: describeCause(cause),
          }),
      });

      return {
        statements,
        operationId: operationId ?? null,
        submittedAtMillis: yield* clock.nowMillis,
      };
    }),
});

export const makeExecutorSchemaAdminLayer = (
  executor: SchemaDdlExecutor,
): Layer.Layer<SchemaAdminService, never, ClockService> =>
  Layer.effect(
    SchemaAdminServiceTag,
    Effect.gen(function* () {
      const clock = yield* ClockServiceTag;
      return makeExecutorSchemaAdminService(executor, clock);
    }),
  );

export interface RecordingSchemaAdminOptions {
  /** When set, every submission fails with this detail. */
  readonly failure?: string;
  readonly nowMillis?: number;
}

export interface RecordingSchemaAdmin {
  readonly service: SchemaAdminService;
  readonly submissions: () => readonly SchemaSubmission[];
}

export const makeRecordingSchemaAdmin = (
  options: RecordingSchemaAdminOptions = {},
): RecordingSchemaAdmin => {
  const submissions: SchemaSubmission[] = [];
  const failure = options.failure;

  const executor: SchemaDdlExecutor = (statements, operationId) => {
    if (failure !== undefined) {
      return Promise.reject(new Error(failure));
    }
    submissions.push({
      statements,
      operationId: operationId ?? null,
      submittedAtMillis: options.nowMillis ?? 0,
    });
    return Promise.resolve();
  };

  return {
    service: makeExecutorSchemaAdminService(executor, {
      nowMillis: Effect.succeed(options.nowMillis ?? 0),
    }),
    submissions: () => [...submissions],
  };
};
