/**
 * OAuth Configuration Module
 *
 * Loads and validates the gateway configuration from environment variables.
 *
 * @module auth/oauth/config
 */

import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type { OAuthConfig, ProviderCredentials, TokenDelivery } from "./oauth-types.js";
import { RawOAuthConfigSchema } from "./oauth-validation.js";
import type { ValidatedRawOAuthConfig } from "./oauth-validation.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("auth:oauth-config");
  }
  return logger;
}

/**
 * Environment variable names for global settings
 */
const ENV_KEYS = {
  PROVIDERS: "OAUTH_PROVIDERS",
  RETURN_URL_STORAGE: "OAUTH_RETURN_URL_STORAGE",
  TOKEN_COOKIE: "OAUTH_TOKEN_COOKIE",
  TOKEN_URLPARAM: "OAUTH_TOKEN_URLPARAM",
  COOKIE_SECURE: "OAUTH_COOKIE_SECURE",
  SESSION_COOKIE: "OAUTH_SESSION_COOKIE",
  SESSION_TTL: "OAUTH_SESSION_TTL_SECONDS",
} as const;

const DEFAULT_PROVIDERS = ["github"];

/**
 * Environment variable name for a per-provider setting
 *
 * @example providerEnvKey("github", "KEY") // "OAUTH_GITHUB_KEY"
 */
export function providerEnvKey(providerType: string, setting: string): string {
  return `OAUTH_${providerType.toUpperCase()}_${setting}`;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[,\s]+/)
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse optional boolean environment variable
 *
 * @returns true, false, or undefined for auto-detection
 */
function parseOptionalBoolean(value: string | undefined, envKey: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }

  getLogger().warn({ envKey, value }, `Invalid ${envKey} value (expected 'true' or 'false'), using auto-detection`);
  return undefined;
}

/**
 * Parse integer environment variable
 *
 * Invalid values are passed through as NaN so validation reports them.
 */
function parseOptionalInt(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Number.NaN;
}

/**
 * Read provider credentials for every allow-listed type
 *
 * Types without both key and secret are left out; the factory then reports
 * them as unknown configuration.
 */
function readProviderCredentials(
  providers: string[],
  env: NodeJS.ProcessEnv
): Record<string, Partial<ProviderCredentials>> {
  const credentials: Record<string, Partial<ProviderCredentials>> = {};

  for (const providerType of providers) {
    const key = emptyToUndefined(env[providerEnvKey(providerType, "KEY")]);
    const secret = emptyToUndefined(env[providerEnvKey(providerType, "SECRET")]);

    if (!key || !secret) {
      getLogger().warn(
        { providerType },
        `${providerEnvKey(providerType, "KEY")} or ${providerEnvKey(providerType, "SECRET")} not set, provider will be unavailable`
      );
      continue;
    }

    credentials[providerType.toLowerCase()] = {
      key,
      secret,
      scopes: parseList(env[providerEnvKey(providerType, "SCOPES")]),
      authorizationEndpoint: emptyToUndefined(env[providerEnvKey(providerType, "AUTHORIZATION_ENDPOINT")]),
      tokenEndpoint: emptyToUndefined(env[providerEnvKey(providerType, "TOKEN_ENDPOINT")]),
      userInfoEndpoint: emptyToUndefined(env[providerEnvKey(providerType, "USERINFO_ENDPOINT")]),
    };
  }

  return credentials;
}

function toTokenDelivery(data: ValidatedRawOAuthConfig): TokenDelivery {
  if (data.tokenCookie) {
    return { kind: "cookie", name: data.tokenCookie };
  }
  if (data.tokenUrlParam) {
    return { kind: "urlparam", name: data.tokenUrlParam };
  }
  return { kind: "header" };
}

/**
 * Validate a raw configuration object
 *
 * Credential keys are lower-cased so lookups by provider type are
 * case-insensitive.
 *
 * @throws Error if the configuration is invalid
 */
export function parseOAuthConfig(raw: unknown): OAuthConfig {
  const result = RawOAuthConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues;
    const errorMessage = issues.map((e) => e.message).join("; ");
    getLogger().error({ issues }, "OAuth configuration validation failed");
    throw new Error(`Invalid OAuth configuration: ${errorMessage}`);
  }

  const data = result.data;
  const credentials: Record<string, ProviderCredentials> = {};
  for (const [providerType, providerCredentials] of Object.entries(data.credentials)) {
    credentials[providerType.toLowerCase()] = providerCredentials;
  }

  return {
    providers: data.providers,
    credentials,
    returnUrlStorage: data.returnUrlStorage,
    tokenDelivery: toTokenDelivery(data),
    cookieSecure: data.cookieSecure,
    sessionCookieName: data.sessionCookieName,
    sessionTtlSeconds: data.sessionTtlSeconds,
  };
}

/**
 * Load OAuth configuration from environment variables
 *
 * Environment variables:
 * - OAUTH_PROVIDERS: Allow-listed provider types, comma separated (default: "github")
 * - OAUTH_<TYPE>_KEY / OAUTH_<TYPE>_SECRET: Client credentials per provider
 * - OAUTH_<TYPE>_SCOPES: Requested scopes, comma or space separated (default: none)
 * - OAUTH_<TYPE>_AUTHORIZATION_ENDPOINT, _TOKEN_ENDPOINT, _USERINFO_ENDPOINT:
 *   endpoint overrides, required for providers without a preset
 * - OAUTH_RETURN_URL_STORAGE: "session" or "cookie" (default: "session")
 * - OAUTH_TOKEN_COOKIE: Deliver the token in a cookie with this name
 * - OAUTH_TOKEN_URLPARAM: Deliver the token as this query parameter on the return URL
 * - OAUTH_COOKIE_SECURE: Cookie secure flag (true/false/unset for auto-detect)
 * - OAUTH_SESSION_COOKIE: Session cookie name (default: "oauth_session")
 * - OAUTH_SESSION_TTL_SECONDS: Session lifetime (default: 3600)
 *
 * @param env - Environment to read (default: process.env)
 * @throws Error if configuration is invalid
 */
export function loadOAuthConfig(env: NodeJS.ProcessEnv = process.env): OAuthConfig {
  const listed = parseList(env[ENV_KEYS.PROVIDERS]);
  const providers = listed.length > 0 ? listed : DEFAULT_PROVIDERS;

  const config = parseOAuthConfig({
    providers,
    credentials: readProviderCredentials(providers, env),
    returnUrlStorage: emptyToUndefined(env[ENV_KEYS.RETURN_URL_STORAGE])?.toLowerCase(),
    tokenCookie: emptyToUndefined(env[ENV_KEYS.TOKEN_COOKIE]),
    tokenUrlParam: emptyToUndefined(env[ENV_KEYS.TOKEN_URLPARAM]),
    cookieSecure: parseOptionalBoolean(env[ENV_KEYS.COOKIE_SECURE], ENV_KEYS.COOKIE_SECURE),
    sessionCookieName: emptyToUndefined(env[ENV_KEYS.SESSION_COOKIE]),
    sessionTtlSeconds: parseOptionalInt(env[ENV_KEYS.SESSION_TTL]),
  });

  // Never log secrets
  getLogger().info(
    {
      providers: config.providers,
      configured: Object.keys(config.credentials),
      returnUrlStorage: config.returnUrlStorage,
      tokenDelivery: config.tokenDelivery.kind,
      cookieSecure: config.cookieSecure ?? "auto",
    },
    "OAuth configuration loaded"
  );

  return config;
}
