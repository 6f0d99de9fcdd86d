import { Context, Effect, Layer } from "effect";

import type { CatalogTransaction, SchemaChangeKind } from "../contracts/index.js";
import {
  SchemaChangeTypeMismatchError,
  TableAlreadyExistsError,
  UnknownTableError,
  type SchemaChangeServiceError,
} from "../errors.js";
import type { SchemaChange } from "../schema-changes/index.js";
import { LoggerServiceTag, type LoggerService } from "./logger-service.js";
import { ModelServiceTag, type ModelService } from "./model-service.js";
import { SchemaAdminServiceTag, type SchemaAdminService } from "./schema-admin-service.js";

export interface ApplySchemaChangeOptions {
  /** Snapshot used for the existence check and validation reads. */
  readonly transaction?: CatalogTransaction;
  /** Forwarded to the admin endpoint to track the submitted operation. */
  readonly operationId?: string;
}

export interface SchemaChangeReceipt {
  readonly table: string;
  readonly kind: SchemaChangeKind;
  readonly change: string;
  readonly statements: readonly string[];
  readonly operationId: string | null;
  readonly submittedAtMillis: number;
}

type ApplySchemaChange = (
  request: SchemaChange,
  options?: ApplySchemaChangeOptions,
) => Effect.Effect<SchemaChangeReceipt, SchemaChangeServiceError>;

/**
 * Validates one schema change against the current catalog and submits its
 * DDL. Each `apply*` method accepts only its own request kind; a request of
 * another kind fails before the catalog is read. Nothing is retried and no
 * lock is taken, so concurrent changes to one table race at the database.
 */
export interface SchemaChangeService {
  readonly applyColumnUpdate: ApplySchemaChange;
  readonly applyCreateTableUpdate: ApplySchemaChange;
  readonly applyIndexUpdate: ApplySchemaChange;
  /** Dispatches on the request's kind. */
  readonly apply: ApplySchemaChange;
}

export const SchemaChangeServiceTag = Context.GenericTag<SchemaChangeService>(
  "@schema-catalog/effect/SchemaChangeService",
);

const typeMismatch = (expected: SchemaChangeKind, request: SchemaChange) =>
  new SchemaChangeTypeMismatchError({
    expected,
    received: String(request.kind),
    table: request.table,
    message: `Expected a schema change of kind ${expected} but received ${String(request.kind)} (${request.change})`,
  });

const unknownTable = (request: SchemaChange) =>
  new UnknownTableError({
    table: request.table,
    operation: request.kind,
    message: `Table ${request.table} does not exist`,
  });

export const makeSchemaChangeService = (
  modelService: ModelService,
  admin: SchemaAdminService,
  logger: LoggerService,
): SchemaChangeService => {
  const submit = (
    request: SchemaChange,
    statements: readonly string[],
    options: ApplySchemaChangeOptions,
  ): Effect.Effect<SchemaChangeReceipt, SchemaChangeServiceError> =>
    Effect.gen(function* () {
      const submission = yield* admin.updateSchema(statements, options.operationId);
      yield* logger.info("Schema change submitted", {
        table: request.table,
        change: request.change,
        statements: submission.statements.length,
        operationId: submission.operationId,
      });

      return {
        table: request.table,
        kind: request.kind,
        change: request.change,
        statements: submission.statements,
        operationId: submission.operationId,
        submittedAtMillis: submission.submittedAtMillis,
      };
    });

  const logRejection =
    (request: SchemaChange) =>
    <A, R>(
      effect: Effect.Effect<A, SchemaChangeServiceError, R>,
    ): Effect.Effect<A, SchemaChangeServiceError, R> =>
      effect.pipe(
        Effect.tapError((error) =>
          logger.warn("Schema change rejected", {
            table: request.table,
            change: request.change,
            error: error._tag,
            reason: error.message,
          }),
        ),
      );

  const applyColumnUpdate: ApplySchemaChange = (request, options = {}) =>
    Effect.gen(function* () {
      if (request.kind !== "column") {
        return yield* Effect.fail(typeMismatch("column", request));
      }

      const models = yield* modelService.models(options.transaction);
      const model = models.get(request.table);
      if (model === undefined) {
        return yield* Effect.fail(unknownTable(request));
      }

      yield* request.validate(model);
      return yield* submit(request, request.ddl(model), options);
    }).pipe(logRejection(request));

  const applyCreateTableUpdate: ApplySchemaChange = (request, options = {}) =>
    Effect.gen(function* () {
      if (request.kind !== "create_table") {
        return yield* Effect.fail(typeMismatch("create_table", request));
      }

      const models = yield* modelService.models(options.transaction);
      if (models.has(request.table)) {
        return yield* Effect.fail(
          new TableAlreadyExistsError({
            table: request.table,
            message: `Table ${request.table} already exists`,
          }),
        );
      }

      yield* request.validate();
      return yield* submit(request, request.ddl(), options);
    }).pipe(logRejection(request));

  const applyIndexUpdate: ApplySchemaChange = (request, options = {}) =>
    Effect.gen(function* () {
      if (request.kind !== "index") {
        return yield* Effect.fail(typeMismatch("index", request));
      }

      const models = yield* modelService.models(options.transaction);
      const model = models.get(request.table);
      if (model === undefined) {
        return yield* Effect.fail(unknownTable(request));
      }

      yield* request.validate(model);
      return yield* submit(request, request.ddl(model), options);
    }).pipe(logRejection(request));

  return {
    applyColumnUpdate,
    applyCreateTableUpdate,
    applyIndexUpdate,
    apply: (request, options) => {
      switch (request.kind) {
        case "column":
          return applyColumnUpdate(request, options);
        case "create_table":
          return applyCreateTableUpdate(request, options);
        case "index":
          return applyIndexUpdate(request, options);
      }
    },
  };
};

export const schemaChangeLayer: Layer.Layer<
  SchemaChangeService,
  never,
  ModelService | SchemaAdminService | LoggerService
> = Layer.effect(
  SchemaChangeServiceTag,
  Effect.gen(function* () {
    const modelService = yield* ModelServiceTag;
    const admin = yield* SchemaAdminServiceTag;
    const logger = yield* LoggerServiceTag;
    return makeSchemaChangeService(modelService, admin, logger);
  }),
);
