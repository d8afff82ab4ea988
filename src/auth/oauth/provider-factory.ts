/**
 * OAuth Client Factory
 *
 * Builds provider clients bound to this application's credentials and
 * callback URL, and caches one client per provider type.
 *
 * @module auth/oauth/provider-factory
 */

import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { createOpenIdOAuthClient } from "./oauth-client.js";
import type { OAuthClientBuilder } from "./oauth-client.js";
import { resolveProviderEndpoints } from "./provider-presets.js";
import type { OAuthClient, OAuthConfig, ProviderType } from "./oauth-types.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("auth:oauth-factory");
  }
  return logger;
}

/**
 * Outcome of {@link OAuthClientFactory.createService}
 *
 * Missing configuration is reported as a value, not thrown; callers decide
 * how to surface it.
 */
export type CreateServiceResult =
  | { ok: true; client: OAuthClient }
  | { ok: false; reason: "unknown_provider_config" | "missing_endpoints"; providerType: ProviderType };

/**
 * Derive the callback URL from the URL of the current request
 *
 * The query is dropped and `/callback` appended; a URL that already ends in
 * `/callback` (the callback leg itself) maps to the same value as its
 * initiate counterpart.
 *
 * @example
 * deriveCallbackUri("https://app.example/auth/github?return=x")
 * // "https://app.example/auth/github/callback"
 */
export function deriveCallbackUri(currentUrl: string): string {
  const url = new URL(currentUrl);
  url.search = "";
  url.hash = "";
  const base = url.href.replace(/\/callback$/, "");
  return `${base}/callback`;
}

export class OAuthClientFactory {
  private readonly services = new Map<ProviderType, OAuthClient>();

  constructor(
    private readonly config: OAuthConfig,
    private readonly buildClient: OAuthClientBuilder = createOpenIdOAuthClient
  ) {}

  /**
   * Create a client for a provider type and register it in the cache
   *
   * Lookup is case-insensitive. Replaces any cached client for the type.
   *
   * @param providerType - Provider type from the request path
   * @param currentUrl - Absolute URL of the current request
   */
  createService(providerType: ProviderType, currentUrl: string): CreateServiceResult {
    const typeLower = providerType.toLowerCase();
    const credentials = this.config.credentials[typeLower];

    if (!credentials) {
      getLogger().warn({ providerType }, "No credentials configured for provider");
      return { ok: false, reason: "unknown_provider_config", providerType };
    }

    const endpoints = resolveProviderEndpoints(typeLower, credentials);
    if (!endpoints) {
      getLogger().warn({ providerType }, "No endpoints known for provider");
      return { ok: false, reason: "missing_endpoints", providerType };
    }

    const callbackUri = deriveCallbackUri(currentUrl);
    const client = this.buildClient({
      providerType: typeLower,
      clientId: credentials.key,
      clientSecret: credentials.secret,
      callbackUri,
      scopes: credentials.scopes,
      endpoints,
    });

    this.services.set(typeLower, client);
    getLogger().debug({ providerType: typeLower, callbackUri }, "OAuth client created");

    return { ok: true, client };
  }

  /**
   * Return the cached client for a provider type, creating it if needed
   */
  getOrCreateByType(providerType: ProviderType, currentUrl: string): CreateServiceResult {
    const cached = this.getService(providerType);
    if (cached) {
      return { ok: true, client: cached };
    }
    return this.createService(providerType, currentUrl);
  }

  /**
   * Cached client for a provider type, if one was created
   */
  getService(providerType: ProviderType): OAuthClient | undefined {
    return this.services.get(providerType.toLowerCase());
  }

  getConfig(): OAuthConfig {
    return this.config;
  }
}
