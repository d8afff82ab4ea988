/**
 * OAuth Configuration Unit Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  loadOAuthConfig,
  parseOAuthConfig,
  providerEnvKey,
} from "../../../../src/auth/oauth/oauth-config.js";
import { initializeLogger, resetLogger } from "../../../../src/logging/index.js";

describe("OAuth configuration", () => {
  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterAll(() => {
    resetLogger();
  });

  describe("providerEnvKey", () => {
    it("upper-cases the provider type", () => {
      expect(providerEnvKey("github", "KEY")).toBe("OAUTH_GITHUB_KEY");
    });
  });

  describe("loadOAuthConfig", () => {
    it("applies defaults", () => {
      const config = loadOAuthConfig({
        OAUTH_GITHUB_KEY: "test-client-id",
        OAUTH_GITHUB_SECRET: "test-secret",
      });

      expect(config).toEqual({
        providers: ["github"],
        credentials: {
          github: {
            key: "test-client-id",
            secret: "test-secret",
            scopes: [],
            authorizationEndpoint: undefined,
            tokenEndpoint: undefined,
            userInfoEndpoint: undefined,
          },
        },
        returnUrlStorage: "session",
        tokenDelivery: { kind: "header" },
        cookieSecure: undefined,
        sessionCookieName: "oauth_session",
        sessionTtlSeconds: 3600,
      });
    });

    it("reads every setting", () => {
      const config = loadOAuthConfig({
        OAUTH_PROVIDERS: "github, gitlab",
        OAUTH_GITHUB_KEY: "gh-id",
        OAUTH_GITHUB_SECRET: "test-secret",
        OAUTH_GITHUB_SCOPES: "read:user user:email",
        OAUTH_GITLAB_KEY: "gl-id",
        OAUTH_GITLAB_SECRET: "test-secret",
        OAUTH_GITLAB_AUTHORIZATION_ENDPOINT: "https://gitlab.internal/oauth/authorize",
        OAUTH_RETURN_URL_STORAGE: "Cookie",
        OAUTH_TOKEN_URLPARAM: "access_token",
        OAUTH_COOKIE_SECURE: "true",
        OAUTH_SESSION_COOKIE: "sid",
        OAUTH_SESSION_TTL_SECONDS: "600",
      });

      expect(config.providers).toEqual(["github", "gitlab"]);
      expect(config.credentials["github"]?.scopes).toEqual(["read:user", "user:email"]);
      expect(config.credentials["gitlab"]?.authorizationEndpoint).toBe(
        "https://gitlab.internal/oauth/authorize"
      );
      expect(config.returnUrlStorage).toBe("cookie");
      expect(config.tokenDelivery).toEqual({ kind: "urlparam", name: "access_token" });
      expect(config.cookieSecure).toBe(true);
      expect(config.sessionCookieName).toBe("sid");
      expect(config.sessionTtlSeconds).toBe(600);
    });

    it("configures cookie token delivery", () => {
      const config = loadOAuthConfig({ OAUTH_TOKEN_COOKIE: "app_token" });

      expect(config.tokenDelivery).toEqual({ kind: "cookie", name: "app_token" });
    });

    it("leaves out providers without both key and secret", () => {
      const config = loadOAuthConfig({
        OAUTH_PROVIDERS: "github,google",
        OAUTH_GITHUB_KEY: "gh-id",
        OAUTH_GITHUB_SECRET: "test-secret",
        OAUTH_GOOGLE_KEY: "google-id",
      });

      expect(config.providers).toEqual(["github", "google"]);
      expect(Object.keys(config.credentials)).toEqual(["github"]);
    });

    it("falls back to auto-detection for an invalid secure flag", () => {
      const config = loadOAuthConfig({ OAUTH_COOKIE_SECURE: "yes" });

      expect(config.cookieSecure).toBeUndefined();
    });

    it("rejects an unknown return url storage", () => {
      expect(() => loadOAuthConfig({ OAUTH_RETURN_URL_STORAGE: "redis" })).toThrow(
        "Invalid OAuth configuration: Return url storage must be 'session' or 'cookie'"
      );
    });

    it("rejects both token cookie and token url parameter", () => {
      expect(() =>
        loadOAuthConfig({ OAUTH_TOKEN_COOKIE: "app_token", OAUTH_TOKEN_URLPARAM: "access_token" })
      ).toThrow("Invalid OAuth configuration: Configure at most one of token cookie and token url parameter");
    });

    it("rejects a non-numeric session TTL", () => {
      expect(() => loadOAuthConfig({ OAUTH_SESSION_TTL_SECONDS: "soon" })).toThrow(
        "Invalid OAuth configuration"
      );
    });

    it("rejects a provider type with non-word characters", () => {
      expect(() => loadOAuthConfig({ OAUTH_PROVIDERS: "git-hub" })).toThrow(
        "Invalid OAuth configuration: Provider type must only contain word characters"
      );
    });
  });

  describe("parseOAuthConfig", () => {
    it("lower-cases credential keys", () => {
      const config = parseOAuthConfig({
        providers: ["GitHub"],
        credentials: { GitHub: { key: "gh-id", secret: "test-secret" } },
      });

      expect(config.credentials["github"]?.key).toBe("gh-id");
      expect(config.credentials["GitHub"]).toBeUndefined();
    });

    it("rejects an empty provider list", () => {
      expect(() => parseOAuthConfig({ providers: [] })).toThrow(
        "Invalid OAuth configuration: At least one provider must be allowed"
      );
    });

    it("rejects endpoint overrides that are not absolute URLs", () => {
      expect(() =>
        parseOAuthConfig({
          providers: ["corp"],
          credentials: { corp: { key: "id", secret: "test-secret", tokenEndpoint: "/token" } },
        })
      ).toThrow("Invalid OAuth configuration: Must be an absolute http(s) URL");
    });
  });
});
