/**
 * Logger Factory
 *
 * Root Pino logger plus component-scoped child loggers.
 * Entries go to stderr; secrets are redacted (see redactors.ts).
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger, set once by initializeLogger()
 */
let rootLogger: pino.Logger | null = null;

/**
 * Used until initializeLogger() runs, so the middleware can be mounted by a
 * host that never configures logging
 */
let defaultLogger: pino.Logger | null = null;

const DEFAULT_LOG_LEVEL = "info";

function baseOptions(config: Pick<LoggerConfig, "level">): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config);

  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Call once at startup, before any component logger is requested; until
 * then entries go to the default logger (see getRootLogger()).
 *
 * @throws Error if the logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({
 *   level: parseLogLevel(process.env["LOG_LEVEL"]),
 *   format: parseLogFormat(process.env["LOG_FORMAT"]),
 * });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty transport can fail to start; plain JSON to stderr still works
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger
 *
 * Before initializeLogger() this is a JSON logger on stderr at `info`.
 * Component loggers taken from it keep writing there after initialization.
 *
 * @internal - application code should use getComponentLogger()
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger !== null) {
    return rootLogger;
  }
  if (defaultLogger === null) {
    defaultLogger = pino(baseOptions({ level: DEFAULT_LOG_LEVEL }), pino.destination(2));
  }
  return defaultLogger;
}

/**
 * Get a component-scoped logger
 *
 * Every entry carries `component` and, when given, `requestId`.
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("auth:oauth");
 * logger.info({ providerType: "github" }, "Redirecting to provider");
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return getRootLogger().child(context);
}

/**
 * Clear the root logger so it can be initialized again
 *
 * @internal - tests only
 */
export function resetLogger(): void {
  rootLogger = null;
  defaultLogger = null;
}
