/**
 * Request Logging Middleware
 *
 * Logs each request once it finishes, with status and timing. Query strings
 * are not logged since the OAuth callback carries the authorization code in
 * one.
 */

import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:request");
  }
  return logger;
}

/**
 * Request logging middleware
 *
 * Reuses an incoming `X-Request-Id` or assigns a new one, and echoes it on
 * the response.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = req.get("x-request-id") ?? `req_${randomUUID()}`;

  req.headers["x-request-id"] = requestId;
  res.setHeader("X-Request-Id", requestId);

  getLogger().debug(
    {
      requestId,
      method: req.method,
      path: req.path,
      userAgent: req.get("User-Agent"),
    },
    "Incoming request"
  );

  res.on("finish", () => {
    const logData = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      authenticated: Boolean(req.user?.token),
      durationMs: Date.now() - startTime,
    };

    if (res.statusCode >= 500) {
      getLogger().error(logData, "Request completed with server error");
    } else if (res.statusCode >= 400) {
      getLogger().warn(logData, "Request completed with client error");
    } else {
      getLogger().info(logData, "Request completed");
    }
  });

  next();
}
