import { Context, Effect, Layer } from "effect";

import type { RuntimeLogLevel } from "./config-service.js";

export interface LogContext {
  readonly [key: string]: unknown;
}

export interface LoggerService {
  readonly debug: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly info: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly warn: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly error: (message: string, context?: LogContext) => Effect.Effect<void>;
}

export const LoggerServiceTag = Context.GenericTag<LoggerService>(
  "@schema-catalog/effect/LoggerService",
);

const LOG_SEVERITY: Readonly<Record<RuntimeLogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const shouldLog = (level: RuntimeLogLevel, minimumLevel: RuntimeLogLevel) =>
  LOG_SEVERITY[level] >= LOG_SEVERITY[minimumLevel];

const logWithLevel = (
  level: RuntimeLogLevel,
  minimumLevel: RuntimeLogLevel,
  message: string,
  context: LogContext = {},
): Effect.Effect<void> => {
  if (!shouldLog(level, minimumLevel)) {
    return Effect.void;
  }

  return Effect.log(message, {
    level,
    ...context,
  });
};

const makeLevelledLogger = (
  write: (level: RuntimeLogLevel, message: string, context?: LogContext) => Effect.Effect<void>,
): LoggerService => ({
  debug: (message, context) => write("debug", message, context),
  info: (message, context) => write("info", message, context),
  warn: (message, context) => write("warn", message, context),
  error: (message, context) => write("error", message, context),
});

export const makeLoggerService = (minimumLevel: RuntimeLogLevel): LoggerService =>
  makeLevelledLogger((level, message, context) =>
    logWithLevel(level, minimumLevel, message, context),
  );

export const makeLoggerLayer = (minimumLevel: RuntimeLogLevel): Layer.Layer<LoggerService> =>
  Layer.sync(LoggerServiceTag, () => makeLoggerService(minimumLevel));

export const deterministicTestLoggerLayer: Layer.Layer<LoggerService> = Layer.sync(
  LoggerServiceTag,
  () => makeLevelledLogger(() => Effect.void),
);

export interface RecordedLogEntry {
  readonly level: RuntimeLogLevel;
  readonly message: string;
  readonly context: LogContext;
}

export interface RecordingLogger {
  readonly service: LoggerService;
  readonly entries: () => readonly RecordedLogEntry[];
}

export const makeRecordingLogger = (): RecordingLogger => {
  const entries: RecordedLogEntry[] = [];

  return {
    service: makeLevelledLogger((level, message, context = {}) =>
      Effect.sync(() => {
        entries.push({ level, message, context });
      }),
    ),
    entries: () => [...entries],
  };
};
