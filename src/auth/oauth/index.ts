/**
 * OAuth Gateway Module - Public API
 *
 * Sign-in through third-party OAuth providers, plus per-request user
 * resolution from the `Authorization` header.
 *
 * @module auth/oauth
 *
 * @example
 * ```typescript
 * import {
 *   loadOAuthConfig,
 *   MemorySessionStore,
 *   InMemoryUserService,
 *   OAuthClientFactory,
 *   createReturnUrlStore,
 *   createOAuthMiddleware,
 * } from "./auth/oauth/index.js";
 * import { initializeLogger } from "./logging/index.js";
 *
 * // Optional; without it entries go to stderr as JSON at `info`
 * initializeLogger({ level: "debug", format: "json" });
 *
 * const config = loadOAuthConfig();
 * const sessionStore = new MemorySessionStore({ ttlSeconds: config.sessionTtlSeconds });
 *
 * app.use(cookieParser());
 * app.use(
 *   createOAuthMiddleware({
 *     factory: new OAuthClientFactory(config),
 *     userService: new InMemoryUserService(),
 *     returnUrlStore: createReturnUrlStore(config, sessionStore),
 *   })
 * );
 * ```
 */

// Types
export type {
  ProviderType,
  ReturnUrlStorageKind,
  ProviderCredentials,
  TokenDelivery,
  OAuthConfig,
  OAuthClient,
  ProviderProfile,
  User,
  UserService,
  ReturnUrlStore,
  SessionStore,
} from "./oauth-types.js";

export {
  RETURN_URL_COOKIE,
  RETURN_URL_SESSION_KEY,
  DEFAULT_SESSION_COOKIE,
  RETURN_URL_COOKIE_MAX_AGE_MS,
  TOKEN_COOKIE_MAX_AGE_MS,
} from "./oauth-types.js";

// Configuration
export { loadOAuthConfig, parseOAuthConfig, providerEnvKey } from "./oauth-config.js";
export {
  RawOAuthConfigSchema,
  ProviderCredentialsSchema,
  ProviderTypeSchema,
  AbsoluteUrlSchema,
  isValidReturnUrl,
  type RawOAuthConfig,
  type ValidatedRawOAuthConfig,
} from "./oauth-validation.js";

// Request parsing
export { matchAuthRoute, type AuthRouteMatch } from "./route-matcher.js";
export { parseAuthorizationHeaders } from "./auth-header.js";
export { getCookieOptions, readCookie } from "./cookies.js";

// Storage
export { MemorySessionStore, type MemorySessionStoreOptions } from "./session-store.js";
export {
  CookieReturnUrlStore,
  SessionReturnUrlStore,
  createReturnUrlStore,
  type SessionReturnUrlStoreOptions,
} from "./return-url-store.js";

// Provider clients
export {
  OpenIdOAuthClient,
  createOpenIdOAuthClient,
  type OAuthClientOptions,
  type OAuthClientBuilder,
} from "./oauth-client.js";
export { PROVIDER_PRESETS, resolveProviderEndpoints, type ProviderEndpoints } from "./provider-presets.js";
export { OAuthClientFactory, deriveCallbackUri, type CreateServiceResult } from "./provider-factory.js";

// Users
export { InMemoryUserService, createGuestUser, type InMemoryUserServiceOptions } from "./user-service.js";

// Middleware
export { createOAuthMiddleware, appendQueryParam, type OAuthMiddlewareDeps } from "./oauth-middleware.js";
