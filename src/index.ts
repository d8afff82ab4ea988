/**
 * OAuth Gateway Middleware - Public API
 *
 * Express middleware adding third-party OAuth2 sign-in to an existing HTTP
 * application. See `server.ts` for a runnable host.
 */

export * from "./auth/index.js";

export {
  createHttpApp,
  startHttpServer,
  loadHttpConfig,
  errorHandler,
  notFoundHandler,
  HttpError,
  type HttpServerDependencies,
  type HttpConfig,
  type HttpServerInstance,
  type ErrorResponse,
} from "./http/index.js";

export {
  initializeLogger,
  getComponentLogger,
  resetLogger,
  parseLogLevel,
  parseLogFormat,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
} from "./logging/index.js";
