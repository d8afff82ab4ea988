/**
 * HTTP Server Setup
 *
 * Creates and configures the Express application hosting the OAuth gateway
 * middleware. Provides factory functions for creating the server and
 * managing its lifecycle.
 */

import express from "express";
import type { Express } from "express";
import cookieParser from "cookie-parser";
import type { Server as HttpServer } from "node:http";
import type { Logger } from "pino";
import { requestLogging, errorHandler, notFoundHandler } from "./middleware/index.js";
import { createHealthRouter, createUserRouter } from "./routes/index.js";
import type { HttpConfig, HttpServerInstance } from "./types.js";
import { getComponentLogger } from "../logging/index.js";
import { createOAuthMiddleware } from "../auth/oauth/oauth-middleware.js";
import type { OAuthClientFactory } from "../auth/oauth/provider-factory.js";
import type { ReturnUrlStore, UserService } from "../auth/oauth/oauth-types.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:server");
  }
  return logger;
}

/**
 * Dependencies required to create the HTTP server
 */
export interface HttpServerDependencies {
  /** Provider client factory, carrying the gateway configuration */
  factory: OAuthClientFactory;

  /** User lookup */
  userService: UserService;

  /** Return URL storage for the sign-in flow */
  returnUrlStore: ReturnUrlStore;
}

/**
 * Create and configure the Express application
 *
 * @param deps - Server dependencies
 * @returns Configured Express application
 */
export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();

  // Provider callbacks may POST the code as a form
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());

  // Request logging (must be early in middleware chain)
  app.use(requestLogging);

  // Health check endpoint (UNAUTHENTICATED - before the OAuth middleware)
  app.use(createHealthRouter({ config: deps.factory.getConfig() }));

  // Handles /auth/{type} and /auth/{type}/callback, and sets req.user elsewhere
  app.use(
    createOAuthMiddleware({
      factory: deps.factory,
      userService: deps.userService,
      returnUrlStore: deps.returnUrlStore,
    })
  );

  app.use(createUserRouter());

  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Start the HTTP server
 *
 * Port 0 binds an ephemeral port; the returned instance reports the port
 * actually bound.
 *
 * @param app - Express application
 * @param config - Listener configuration
 * @returns Server instance with control methods
 */
export async function startHttpServer(app: Express, config: HttpConfig): Promise<HttpServerInstance> {
  return new Promise((resolve, reject) => {
    let httpServer: HttpServer;

    try {
      httpServer = app.listen(config.port, config.host, () => {
        const address = httpServer.address();
        const port = address !== null && typeof address === "object" ? address.port : config.port;

        getLogger().info({ host: config.host, port }, "HTTP server listening");

        resolve({
          port,
          host: config.host,
          close: async (): Promise<void> => {
            getLogger().info("Closing HTTP server");

            return new Promise((resolveClose, rejectClose) => {
              httpServer.close((err) => {
                if (err) {
                  getLogger().error({ err }, "Error closing HTTP server");
                  rejectClose(err);
                } else {
                  getLogger().info("HTTP server closed");
                  resolveClose();
                }
              });
              httpServer.closeIdleConnections();
            });
          },
        });
      });

      httpServer.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          getLogger().error({ port: config.port, host: config.host }, "Port already in use");
          reject(new Error(`Port ${config.port} is already in use`));
        } else if (error.code === "EACCES") {
          getLogger().error({ port: config.port }, "Permission denied to bind to port");
          reject(new Error(`Permission denied to bind to port ${config.port}`));
        } else {
          getLogger().error({ err: error }, "HTTP server error");
          reject(error);
        }
      });
    } catch (error) {
      getLogger().error({ err: error }, "Failed to create HTTP server");
      reject(error);
    }
  });
}

/**
 * Load HTTP listener configuration from environment
 *
 * Environment variables:
 * - HTTP_PORT: Port to listen on (default: 3001)
 * - HTTP_HOST: Interface to bind (default: 127.0.0.1)
 *
 * @throws Error if HTTP_PORT is not a valid port
 */
export function loadHttpConfig(env: NodeJS.ProcessEnv = process.env): HttpConfig {
  const portStr = env["HTTP_PORT"] || "3001";
  const port = Number(portStr);

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid HTTP_PORT: "${portStr}". Must be a number between 0 and 65535.`);
  }

  const host = env["HTTP_HOST"] || "127.0.0.1";

  if (host === "0.0.0.0") {
    getLogger().warn(
      { host },
      "HTTP server binding to all interfaces (0.0.0.0). Serve it behind TLS so tokens are not sent in clear text."
    );
  }

  return { port, host };
}
