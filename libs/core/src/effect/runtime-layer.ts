import { Layer } from "effect";

import { makeInMemoryCatalog } from "./catalog/in-memory-catalog.js";
import { makeSqlCatalogFetch, type CatalogQueryExecutor } from "./catalog/sql-catalog-fetch.js";
import { catalogServicesLayer } from "./service-boundaries.js";
import {
  makeCatalogFetchLayer,
  type CatalogFetchService,
} from "./services/catalog-fetch-service.js";
import { makeDeterministicClockLayer, systemClockLayer } from "./services/clock-service.js";
import {
  decodeRuntimeConfigFromEnvSync,
  decodeRuntimeConfigSync,
  makeConfigLayer,
  runtimeConfigDefaults,
  type RuntimeConfig,
  type RuntimeConfigEnvRecord,
  type RuntimeConfigFromEnvOptions,
} from "./services/config-service.js";
import {
  deterministicTestLoggerLayer,
  LoggerServiceTag,
  makeLoggerLayer,
  type LoggerService,
} from "./services/logger-service.js";
import {
  makeExecutorSchemaAdminLayer,
  makeRecordingSchemaAdmin,
  SchemaAdminServiceTag,
  type SchemaAdminService,
  type SchemaDdlExecutor,
} from "./services/schema-admin-service.js";

export const defaultRuntimeConfig: RuntimeConfig = decodeRuntimeConfigSync(runtimeConfigDefaults);

export const deterministicTestConfig: RuntimeConfig = {
  ...runtimeConfigDefaults,
  environment: "test",
  serviceName: "schema-catalog-test",
  logLevel: "debug",
};

export const deterministicTestNowMillis = 1_704_067_200_000;

export interface CatalogRuntimeOptions {
  /** Runs catalog SELECTs, inside the given transaction when there is one. */
  readonly queryExecutor: CatalogQueryExecutor;
  /** Submits DDL to the administrative endpoint. */
  readonly ddlExecutor: SchemaDdlExecutor;
}

export const runtimeLayerFromConfig = (config: RuntimeConfig, options: CatalogRuntimeOptions) =>
  catalogServicesLayer.pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        makeCatalogFetchLayer(makeSqlCatalogFetch(options.queryExecutor)),
        makeExecutorSchemaAdminLayer(options.ddlExecutor),
      ),
    ),
    Layer.provideMerge(
      Layer.mergeAll(makeConfigLayer(config), makeLoggerLayer(config.logLevel), systemClockLayer),
    ),
  );

export const runtimeLayerFromEnv = (
  options: CatalogRuntimeOptions,
  env: RuntimeConfigEnvRecord = process.env,
  envOptions: RuntimeConfigFromEnvOptions = {},
) => runtimeLayerFromConfig(decodeRuntimeConfigFromEnvSync(env, envOptions), options);

export interface DeterministicRuntimeLayerOptions {
  readonly config?: RuntimeConfig;
  readonly fixedNowMillis?: number;
  readonly catalog?: CatalogFetchService;
  readonly admin?: SchemaAdminService;
  readonly logger?: LoggerService;
}

export const deterministicRuntimeLayer = (options: DeterministicRuntimeLayerOptions = {}) => {
  const config = options.config ?? deterministicTestConfig;
  const fixedNowMillis = options.fixedNowMillis ?? deterministicTestNowMillis;
  const admin =
    options.admin ?? makeRecordingSchemaAdmin({ nowMillis: fixedNowMillis }).service;

  return catalogServicesLayer.pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        makeCatalogFetchLayer(options.catalog ?? makeInMemoryCatalog()),
        Layer.succeed(SchemaAdminServiceTag, admin),
      ),
    ),
    Layer.provideMerge(
      Layer.mergeAll(
        makeConfigLayer(config),
        options.logger === undefined
          ? deterministicTestLoggerLayer
          : Layer.succeed(LoggerServiceTag, options.logger),
        makeDeterministicClockLayer(fixedNowMillis),
      ),
    ),
  );
};
