/**
 * OAuth Gateway - Server Entry Point
 *
 * Runs the gateway middleware in a small Express host with in-memory users
 * and sessions. Configuration comes from the environment (and `.env`).
 */

import "dotenv/config";
import { initializeLogger, getComponentLogger, parseLogLevel, parseLogFormat } from "./logging/index.js";
import {
  loadOAuthConfig,
  MemorySessionStore,
  InMemoryUserService,
  OAuthClientFactory,
  createReturnUrlStore,
} from "./auth/index.js";
import { createHttpApp, startHttpServer, loadHttpConfig } from "./http/index.js";

initializeLogger({
  level: parseLogLevel(process.env["LOG_LEVEL"]),
  format: parseLogFormat(process.env["LOG_FORMAT"]),
});

const logger = getComponentLogger("main");

/**
 * Initialization order:
 * 1. OAuth and HTTP configuration (environment variables)
 * 2. Session store with expiry sweep
 * 3. User service and provider client factory
 * 4. Express app and listener
 */
async function main(): Promise<void> {
  logger.info("Initializing OAuth gateway");

  try {
    const oauthConfig = loadOAuthConfig();
    const httpConfig = loadHttpConfig();

    const sessionStore = new MemorySessionStore({ ttlSeconds: oauthConfig.sessionTtlSeconds });
    sessionStore.startAutoCleanup();

    const app = createHttpApp({
      factory: new OAuthClientFactory(oauthConfig),
      userService: new InMemoryUserService(),
      returnUrlStore: createReturnUrlStore(oauthConfig, sessionStore),
    });

    const server = await startHttpServer(app, httpConfig);
    logger.info({ host: server.host, port: server.port }, "OAuth gateway is running");

    const shutdown = (signal: string): void => {
      logger.info({ signal }, "Shutting down");
      sessionStore.stopAutoCleanup();
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        }
      );
    };

    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start OAuth gateway");
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Unhandled error in main():", error);
  process.exit(1);
});
