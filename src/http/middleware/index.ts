/**
 * HTTP Middleware Exports
 */

export { requestLogging } from "./request-logging.js";
export {
  errorHandler,
  notFoundHandler,
  HttpError,
  unauthorized,
  type ErrorResponse,
} from "./error-handler.js";
