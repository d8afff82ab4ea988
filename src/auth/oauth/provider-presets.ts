/**
 * Built-in provider endpoints
 *
 * Providers not listed here can still be used by configuring their endpoints
 * explicitly (see ProviderCredentials).
 *
 * @module auth/oauth/provider-presets
 */

import type { ProviderCredentials, ProviderType } from "./oauth-types.js";

/**
 * Static metadata for one provider
 */
export interface ProviderEndpoints {
  /** Issuer identifier passed to openid-client */
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userInfoEndpoint?: string;
}

export const PROVIDER_PRESETS: Readonly<Record<ProviderType, ProviderEndpoints>> = {
  github: {
    issuer: "https://github.com",
    authorizationEndpoint: "https://github.com/login/oauth/authorize",
    tokenEndpoint: "https://github.com/login/oauth/access_token",
    userInfoEndpoint: "https://api.github.com/user",
  },
  google: {
    issuer: "https://accounts.google.com",
    authorizationEndpoint: "https://accounts.google.com/o/oauth2/v2/auth",
    tokenEndpoint: "https://oauth2.googleapis.com/token",
    userInfoEndpoint: "https://openidconnect.googleapis.com/v1/userinfo",
  },
  gitlab: {
    issuer: "https://gitlab.com",
    authorizationEndpoint: "https://gitlab.com/oauth/authorize",
    tokenEndpoint: "https://gitlab.com/oauth/token",
    userInfoEndpoint: "https://gitlab.com/api/v4/user",
  },
  bitbucket: {
    issuer: "https://bitbucket.org",
    authorizationEndpoint: "https://bitbucket.org/site/oauth2/authorize",
    tokenEndpoint: "https://bitbucket.org/site/oauth2/access_token",
    userInfoEndpoint: "https://api.bitbucket.org/2.0/user",
  },
};

/**
 * Resolve the endpoints for a provider, configuration overriding presets
 *
 * @param providerType - Lower-cased provider type
 * @param credentials - Configured credentials (may carry endpoint overrides)
 * @returns Endpoints, or null when neither a preset nor overrides supply
 *   both the authorization and token endpoints
 */
export function resolveProviderEndpoints(
  providerType: ProviderType,
  credentials: ProviderCredentials
): ProviderEndpoints | null {
  const preset = PROVIDER_PRESETS[providerType];

  const authorizationEndpoint =
    credentials.authorizationEndpoint ?? preset?.authorizationEndpoint;
  const tokenEndpoint = credentials.tokenEndpoint ?? preset?.tokenEndpoint;

  if (!authorizationEndpoint || !tokenEndpoint) {
    return null;
  }

  return {
    issuer: preset?.issuer ?? new URL(authorizationEndpoint).origin,
    authorizationEndpoint,
    tokenEndpoint,
    userInfoEndpoint: credentials.userInfoEndpoint ?? preset?.userInfoEndpoint,
  };
}
