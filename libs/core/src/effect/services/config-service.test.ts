import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
  decodeRuntimeConfigFromEnvEither,
  decodeRuntimeConfigFromEnvSync,
  makeConfigService,
  runtimeConfigDefaults,
  runtimeConfigInputFromEnv,
} from "./config-service.js";

describe("runtime config", () => {
  it("should fall back to defaults for an empty environment", () => {
    expect(decodeRuntimeConfigFromEnvSync({})).toEqual({
      environment: "development",
      serviceName: "schema-catalog",
      logLevel: "info",
      catalogName: "",
      schemaName: "",
    });
  });

  it("should read trimmed values and treat blanks as unset", () => {
    const config = decodeRuntimeConfigFromEnvSync({
      NODE_ENV: "test",
      SCHEMA_CATALOG_SERVICE_NAME: "  migrator  ",
      SCHEMA_CATALOG_LOG_LEVEL: "   ",
      SCHEMA_CATALOG_SCHEMA_NAME: "analytics",
    });

    expect(config).toEqual({
      environment: "test",
      serviceName: "migrator",
      logLevel: "info",
      catalogName: "",
      schemaName: "analytics",
    });
  });

  it("should prefer the dedicated environment key over NODE_ENV", () => {
    const input = runtimeConfigInputFromEnv({
      NODE_ENV: "test",
      SCHEMA_CATALOG_ENVIRONMENT: "production",
    });

    expect(input.environment).toBe("production");
  });

  it("should honour custom keys and defaults", () => {
    const config = decodeRuntimeConfigFromEnvSync(
      { APP_LOG_LEVEL: "warn" },
      { keys: { logLevel: "APP_LOG_LEVEL" }, defaults: { serviceName: "catalog-admin" } },
    );

    expect(config.logLevel).toBe("warn");
    expect(config.serviceName).toBe("catalog-admin");
  });

  it("should pass raw environment strings through to the decoder", () => {
    const input = runtimeConfigInputFromEnv({
      SCHEMA_CATALOG_ENVIRONMENT: "staging",
      SCHEMA_CATALOG_LOG_LEVEL: "verbose",
    });

    expect(input.environment).toBe("staging");
    expect(input.logLevel).toBe("verbose");
  });

  it("should reject an unknown log level", () => {
    const result = decodeRuntimeConfigFromEnvEither({ SCHEMA_CATALOG_LOG_LEVEL: "verbose" });

    expect(Either.isLeft(result)).toBe(true);
  });

  it("should expose the catalog namespace", () => {
    const service = makeConfigService({
      ...runtimeConfigDefaults,
      catalogName: "main",
      schemaName: "analytics",
    });

    expect(service.namespace()).toEqual({ catalogName: "main", schemaName: "analytics" });
    expect(service.get("logLevel")).toBe("info");
  });
});
