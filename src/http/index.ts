/**
 * HTTP Module
 *
 * Express host for the OAuth gateway middleware, with health and
 * current-user routes.
 */

// Server setup
export {
  createHttpApp,
  startHttpServer,
  loadHttpConfig,
  type HttpServerDependencies,
} from "./server.js";

// Types
export type {
  HealthResponse,
  ProviderStatus,
  CurrentUserResponse,
  HttpConfig,
  HttpServerInstance,
} from "./types.js";

// Routes
export { createHealthRouter, createUserRouter, type HealthCheckDependencies } from "./routes/index.js";

// Middleware
export {
  requestLogging,
  errorHandler,
  notFoundHandler,
  HttpError,
  unauthorized,
  type ErrorResponse,
} from "./middleware/index.js";
