/**
 * Logging Types
 *
 * @module logging/types
 */

/**
 * Log levels accepted by the logger, most to least severe
 *
 * `silent` suppresses everything and is mostly used by tests.
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Output format for the root logger
 */
export type LogFormat = "json" | "pretty";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;

  /**
   * - json: one JSON object per line
   * - pretty: colorized output through pino-pretty
   */
  format: LogFormat;

  /**
   * Custom destination, used by tests to capture entries
   * @internal
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Bindings added to every entry of a component logger
 */
export interface ComponentContext {
  /** Component name, colon separated for hierarchy ("auth:oauth", "http:request") */
  component: string;

  /** Request correlation ID */
  requestId?: string;
}

/**
 * Valid log levels, used to validate LOG_LEVEL
 */
export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

/**
 * Narrow an arbitrary string to a LogLevel
 *
 * @param value - Raw value (usually from the environment)
 * @param fallback - Level used when value is missing or unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Narrow an arbitrary string to a LogFormat
 */
export function parseLogFormat(value: string | undefined, fallback: LogFormat = "pretty"): LogFormat {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "json" || normalized === "pretty") {
    return normalized;
  }
  return fallback;
}
