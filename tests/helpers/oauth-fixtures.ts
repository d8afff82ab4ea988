/**
 * OAuth Test Fixtures
 *
 * @module tests/helpers/oauth-fixtures
 */

import type { OAuthConfig } from "../../src/auth/oauth/oauth-types.js";

/**
 * Gateway configuration with GitHub allow-listed and configured
 */
export function createTestConfig(overrides: Partial<OAuthConfig> = {}): OAuthConfig {
  return {
    providers: ["github"],
    credentials: {
      github: { key: "test-client-id", secret: "test-secret", scopes: ["read:user"] },
    },
    returnUrlStorage: "session",
    tokenDelivery: { kind: "header" },
    cookieSecure: false,
    sessionCookieName: "oauth_session",
    sessionTtlSeconds: 3600,
    ...overrides,
  };
}
