/**
 * OAuth Client Factory Unit Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { OAuthClientFactory, deriveCallbackUri } from "../../../../src/auth/oauth/provider-factory.js";
import { resolveProviderEndpoints } from "../../../../src/auth/oauth/provider-presets.js";
import { initializeLogger, resetLogger } from "../../../../src/logging/index.js";
import { createFakeClientBuilder } from "../../../helpers/fake-oauth-client.js";
import { createTestConfig } from "../../../helpers/oauth-fixtures.js";

describe("deriveCallbackUri", () => {
  it("appends /callback and drops the query", () => {
    expect(deriveCallbackUri("https://app.example/auth/github?return=https%3A%2F%2Fapp.example%2Fdone")).toBe(
      "https://app.example/auth/github/callback"
    );
  });

  it("maps the callback URL onto itself", () => {
    expect(deriveCallbackUri("http://127.0.0.1:3001/auth/github/callback?code=abc")).toBe(
      "http://127.0.0.1:3001/auth/github/callback"
    );
  });
});

describe("resolveProviderEndpoints", () => {
  it("uses the preset for known providers", () => {
    expect(resolveProviderEndpoints("github", { key: "id", secret: "test-secret", scopes: [] })).toEqual({
      issuer: "https://github.com",
      authorizationEndpoint: "https://github.com/login/oauth/authorize",
      tokenEndpoint: "https://github.com/login/oauth/access_token",
      userInfoEndpoint: "https://api.github.com/user",
    });
  });

  it("lets configured endpoints override the preset", () => {
    const endpoints = resolveProviderEndpoints("gitlab", {
      key: "id",
      secret: "test-secret",
      scopes: [],
      authorizationEndpoint: "https://gitlab.internal/oauth/authorize",
      tokenEndpoint: "https://gitlab.internal/oauth/token",
    });

    expect(endpoints).toEqual({
      issuer: "https://gitlab.com",
      authorizationEndpoint: "https://gitlab.internal/oauth/authorize",
      tokenEndpoint: "https://gitlab.internal/oauth/token",
      userInfoEndpoint: "https://gitlab.com/api/v4/user",
    });
  });

  it("derives the issuer for providers without a preset", () => {
    const endpoints = resolveProviderEndpoints("corp", {
      key: "id",
      secret: "test-secret",
      scopes: [],
      authorizationEndpoint: "https://sso.corp.example/oauth/authorize",
      tokenEndpoint: "https://sso.corp.example/oauth/token",
    });

    expect(endpoints?.issuer).toBe("https://sso.corp.example");
    expect(endpoints?.userInfoEndpoint).toBeUndefined();
  });

  it("returns null when no endpoints are known", () => {
    expect(resolveProviderEndpoints("corp", { key: "id", secret: "test-secret", scopes: [] })).toBeNull();
  });
});

describe("OAuthClientFactory", () => {
  const currentUrl = "https://app.example/auth/github?return=https%3A%2F%2Fapp.example%2Fdone";

  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterAll(() => {
    resetLogger();
  });

  it("builds a client from credentials and presets", () => {
    const { build, clients } = createFakeClientBuilder();
    const factory = new OAuthClientFactory(createTestConfig(), build);

    const result = factory.createService("github", currentUrl);

    expect(result.ok).toBe(true);
    expect(clients).toHaveLength(1);
    expect(clients[0]?.options).toEqual({
      providerType: "github",
      clientId: "test-client-id",
      clientSecret: "test-secret",
      callbackUri: "https://app.example/auth/github/callback",
      scopes: ["read:user"],
      endpoints: {
        issuer: "https://github.com",
        authorizationEndpoint: "https://github.com/login/oauth/authorize",
        tokenEndpoint: "https://github.com/login/oauth/access_token",
        userInfoEndpoint: "https://api.github.com/user",
      },
    });
  });

  it("looks up provider types case-insensitively", () => {
    const { build } = createFakeClientBuilder();
    const factory = new OAuthClientFactory(createTestConfig(), build);

    const result = factory.createService("GitHub", currentUrl);

    expect(result.ok && result.client.providerType).toBe("github");
  });

  it("reports providers without credentials", () => {
    const { build, clients } = createFakeClientBuilder();
    const factory = new OAuthClientFactory(createTestConfig(), build);

    expect(factory.createService("google", currentUrl)).toEqual({
      ok: false,
      reason: "unknown_provider_config",
      providerType: "google",
    });
    expect(clients).toHaveLength(0);
  });

  it("reports providers without endpoints", () => {
    const { build } = createFakeClientBuilder();
    const config = createTestConfig({
      providers: ["corp"],
      credentials: { corp: { key: "id", secret: "test-secret", scopes: [] } },
    });
    const factory = new OAuthClientFactory(config, build);

    expect(factory.createService("corp", currentUrl)).toEqual({
      ok: false,
      reason: "missing_endpoints",
      providerType: "corp",
    });
  });

  it("reuses the cached client for the same provider type", () => {
    const { build, clients } = createFakeClientBuilder();
    const factory = new OAuthClientFactory(createTestConfig(), build);

    const first = factory.getOrCreateByType("github", currentUrl);
    const second = factory.getOrCreateByType("github", "https://app.example/auth/github/callback?code=abc");

    expect(clients).toHaveLength(1);
    expect(first.ok && second.ok && first.client === second.client).toBe(true);
  });

  it("keeps one client per provider type", () => {
    const { build, clients } = createFakeClientBuilder();
    const config = createTestConfig({
      providers: ["github", "gitlab"],
      credentials: {
        github: { key: "gh-id", secret: "test-secret", scopes: [] },
        gitlab: { key: "gl-id", secret: "test-secret", scopes: [] },
      },
    });
    const factory = new OAuthClientFactory(config, build);

    factory.getOrCreateByType("github", "https://app.example/auth/github");
    const gitlab = factory.getOrCreateByType("gitlab", "https://app.example/auth/gitlab");

    expect(clients).toHaveLength(2);
    expect(gitlab.ok && gitlab.client.providerType).toBe("gitlab");
    expect(factory.getService("github")?.providerType).toBe("github");
  });

  it("returns nothing from getService before a client is created", () => {
    const factory = new OAuthClientFactory(createTestConfig(), createFakeClientBuilder().build);

    expect(factory.getService("github")).toBeUndefined();
  });
});
