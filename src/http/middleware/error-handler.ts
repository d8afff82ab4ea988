/**
 * Error Handler Middleware
 *
 * Turns errors forwarded by the OAuth middleware and route handlers into
 * JSON error responses. Details of server-side failures are logged but not
 * sent to the client.
 */

import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { AuthError, OAuthError } from "../../auth/errors.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:error");
  }
  return logger;
}

/**
 * HTTP error with status code
 */
export class HttpError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function unauthorized(message: string, code?: string): HttpError {
  return new HttpError(401, message, code);
}

/**
 * Error response structure
 */
export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}

/**
 * Check if error is a JSON parsing error from express.json() middleware
 */
function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

interface ErrorClassification {
  statusCode: number;
  code: string | undefined;
  message: string;
}

function classifyError(err: Error): ErrorClassification {
  if (err instanceof HttpError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message };
  }
  if (err instanceof OAuthError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message };
  }
  if (isJsonParseError(err)) {
    return { statusCode: 400, code: "INVALID_JSON", message: "Invalid JSON in request body" };
  }
  if (err instanceof AuthError) {
    return { statusCode: 500, code: err.code, message: err.message };
  }
  return { statusCode: 500, code: "INTERNAL_ERROR", message: err.message };
}

/**
 * Client-facing message for 5xx responses; provider error text stays in the log
 */
function publicServerMessage(statusCode: number): string {
  return statusCode === 502 ? "Identity provider request failed" : "Internal server error";
}

/**
 * Express error handling middleware
 *
 * Must have 4 parameters to be recognized as error middleware by Express.
 * Non-Error values passed to `next()` are wrapped first.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const error = err instanceof Error ? err : new Error(String(err));
  const requestId = req.get("x-request-id");
  const { statusCode, code, message } = classifyError(error);

  const logData = {
    requestId,
    err: error,
    method: req.method,
    path: req.path,
    statusCode,
  };

  if (statusCode >= 500) {
    getLogger().error(logData, `Request failed: ${error.message}`);
  } else {
    getLogger().warn(logData, `Request rejected: ${error.message}`);
  }

  const response: ErrorResponse = {
    error: {
      message: statusCode >= 500 ? publicServerMessage(statusCode) : message,
      code,
      statusCode,
    },
  };

  res.status(statusCode).json(response);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: "NOT_FOUND",
      statusCode: 404,
    },
  };

  res.status(404).json(response);
}
