/**
 * Health Check Route
 *
 * Reports whether every allow-listed OAuth provider has credentials and
 * endpoints. This endpoint is unauthenticated and always accessible.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { HealthResponse, ProviderStatus } from "../types.js";
import { getComponentLogger } from "../../logging/index.js";
import type { OAuthConfig } from "../../auth/oauth/oauth-types.js";
import { resolveProviderEndpoints } from "../../auth/oauth/provider-presets.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:health");
  }
  return logger;
}

const VERSION = "1.0.0";

/**
 * Health check dependencies
 */
export interface HealthCheckDependencies {
  /** Gateway configuration to report on */
  config: OAuthConfig;
}

function providerStatus(config: OAuthConfig, providerType: string): ProviderStatus {
  const credentials = config.credentials[providerType.toLowerCase()];
  if (!credentials) {
    return "unconfigured";
  }
  return resolveProviderEndpoints(providerType.toLowerCase(), credentials) ? "configured" : "unconfigured";
}

/**
 * Create health check router
 *
 * Status codes:
 * - 200: Every allow-listed provider is usable
 * - 503: At least one provider lacks credentials or endpoints
 */
export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response): void => {
    const providers: Record<string, ProviderStatus> = {};
    for (const providerType of deps.config.providers) {
      providers[providerType] = providerStatus(deps.config, providerType);
    }

    const healthy = Object.values(providers).every((status) => status === "configured");

    const response: HealthResponse = {
      status: healthy ? "healthy" : "degraded",
      version: VERSION,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks: { providers },
    };

    getLogger().debug({ status: response.status, providers }, "Health check completed");

    res.status(healthy ? 200 : 503).json(response);
  });

  return router;
}
