/**
 * Logging Module
 *
 * Structured logging on Pino with secret redaction and component context.
 *
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 *
 * const logger = getComponentLogger("auth:oauth");
 * logger.info({ providerType }, "Redirecting to provider");
 * logger.error({ err }, "Token exchange failed");
 * ```
 *
 * Environment variables read by the entry point:
 * - `LOG_LEVEL`: fatal|error|warn|info|debug|trace|silent (default: info)
 * - `LOG_FORMAT`: json|pretty (default: pretty)
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS } from "./redactors.js";
