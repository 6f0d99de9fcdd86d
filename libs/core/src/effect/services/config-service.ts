import { Context, Layer, Schema } from "effect";

import { DEFAULT_CATALOG_NAMESPACE, type CatalogNamespace } from "../contracts/index.js";

export const RuntimeEnvironmentSchema = Schema.Literal("development", "test", "production");
export type RuntimeEnvironment = Schema.Schema.Type<typeof RuntimeEnvironmentSchema>;

export const RuntimeLogLevelSchema = Schema.Literal("debug", "info", "warn", "error");
export type RuntimeLogLevel = Schema.Schema.Type<typeof RuntimeLogLevelSchema>;

export const RuntimeConfigSchema = Schema.Struct({
  environment: RuntimeEnvironmentSchema,
  serviceName: Schema.NonEmptyTrimmedString,
  logLevel: RuntimeLogLevelSchema,
  catalogName: Schema.String,
  schemaName: Schema.String,
});

export type RuntimeConfig = Schema.Schema.Type<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = Schema.Schema.Encoded<typeof RuntimeConfigSchema>;

export const runtimeConfigDefaults: RuntimeConfig = {
  environment: "development",
  serviceName: "schema-catalog",
  logLevel: "info",
  catalogName: DEFAULT_CATALOG_NAMESPACE,
  schemaName: DEFAULT_CATALOG_NAMESPACE,
};

export const decodeRuntimeConfigSync = Schema.decodeUnknownSync(RuntimeConfigSchema);
export const decodeRuntimeConfigEither = Schema.decodeUnknownEither(RuntimeConfigSchema);

export interface RuntimeConfigEnvRecord {
  readonly [key: string]: string | undefined;
}

export interface RuntimeConfigEnvKeys {
  readonly environment: string;
  readonly fallbackEnvironment: string;
  readonly serviceName: string;
  readonly logLevel: string;
  readonly catalogName: string;
  readonly schemaName: string;
}

export const defaultRuntimeConfigEnvKeys: RuntimeConfigEnvKeys = {
  environment: "SCHEMA_CATALOG_ENVIRONMENT",
  fallbackEnvironment: "NODE_ENV",
  serviceName: "SCHEMA_CATALOG_SERVICE_NAME",
  logLevel: "SCHEMA_CATALOG_LOG_LEVEL",
  catalogName: "SCHEMA_CATALOG_CATALOG_NAME",
  schemaName: "SCHEMA_CATALOG_SCHEMA_NAME",
};

export interface RuntimeConfigFromEnvOptions {
  readonly defaults?: Partial<RuntimeConfigInput>;
  readonly keys?: Partial<RuntimeConfigEnvKeys>;
}

export interface RuntimeConfigEnvInput {
  readonly environment: string;
  readonly serviceName: string;
  readonly logLevel: string;
  readonly catalogName: string;
  readonly schemaName: string;
}

const normalizeEnvValue = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
};

const readEnvValue = (env: RuntimeConfigEnvRecord, key: string): string | undefined =>
  normalizeEnvValue(env[key]);

export const runtimeConfigInputFromEnv = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
): RuntimeConfigEnvInput => {
  const keys: RuntimeConfigEnvKeys = { ...defaultRuntimeConfigEnvKeys, ...options.keys };
  const base: RuntimeConfigInput = { ...runtimeConfigDefaults, ...options.defaults };

  return {
    environment:
      readEnvValue(env, keys.environment) ??
      readEnvValue(env, keys.fallbackEnvironment) ??
      base.environment,
    serviceName: readEnvValue(env, keys.serviceName) ?? base.serviceName,
    logLevel: readEnvValue(env, keys.logLevel) ?? base.logLevel,
    catalogName: readEnvValue(env, keys.catalogName) ?? base.catalogName,
    schemaName: readEnvValue(env, keys.schemaName) ?? base.schemaName,
  };
};

export const decodeRuntimeConfigFromEnvSync = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
): RuntimeConfig => decodeRuntimeConfigSync(runtimeConfigInputFromEnv(env, options));

export const decodeRuntimeConfigFromEnvEither = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
) => decodeRuntimeConfigEither(runtimeConfigInputFromEnv(env, options));

export interface ConfigService {
  readonly get: <K extends keyof RuntimeConfig>(key: K) => RuntimeConfig[K];
  readonly getAll: () => RuntimeConfig;
  readonly namespace: () => CatalogNamespace;
}

export const ConfigServiceTag = Context.GenericTag<ConfigService>(
  "@schema-catalog/effect/ConfigService",
);

export const makeConfigService = (config: RuntimeConfig): ConfigService => ({
  get: (key) => config[key],
  getAll: () => config,
  namespace: () => ({ catalogName: config.catalogName, schemaName: config.schemaName }),
});

export const makeConfigLayer = (config: RuntimeConfig): Layer.Layer<ConfigService> =>
  Layer.succeed(ConfigServiceTag, makeConfigService(config));
