/**
 * OAuth Module Type Definitions
 *
 * Types for the provider sign-in flow: configuration, the provider client
 * capability, users, and the storage used across the redirect round trip.
 *
 * @module auth/oauth/types
 */

import type { Request, Response } from "express";

/**
 * Identifier of an external identity provider (e.g. "github")
 */
export type ProviderType = string;

/**
 * Where the return URL is kept between the initiate and callback legs
 */
export type ReturnUrlStorageKind = "session" | "cookie";

/**
 * Credentials and endpoints for one provider
 */
export interface ProviderCredentials {
  /** OAuth2 client ID */
  key: string;

  /** OAuth2 client secret */
  secret: string;

  /** Scopes requested from the provider (default: none) */
  scopes: string[];

  /** Overrides the preset authorization endpoint (required for custom providers) */
  authorizationEndpoint?: string;

  /** Overrides the preset token endpoint (required for custom providers) */
  tokenEndpoint?: string;

  /** Overrides the preset user info endpoint */
  userInfoEndpoint?: string;
}

/**
 * How the issued token reaches the client after the callback
 *
 * - header: only the `Authorization` response header
 * - cookie: additionally a cookie with this name
 * - urlparam: additionally a query parameter with this name on the return URL
 */
export type TokenDelivery =
  | { kind: "header" }
  | { kind: "cookie"; name: string }
  | { kind: "urlparam"; name: string };

/**
 * OAuth gateway configuration
 */
export interface OAuthConfig {
  /** Allow-list of provider types accepted on the auth routes */
  providers: ProviderType[];

  /** Credentials keyed by lower-cased provider type */
  credentials: Record<ProviderType, ProviderCredentials>;

  /** Return URL storage backend (default: session) */
  returnUrlStorage: ReturnUrlStorageKind;

  /** Token delivery mechanism (default: header only) */
  tokenDelivery: TokenDelivery;

  /**
   * Secure flag on cookies set by the gateway.
   * undefined: secure when NODE_ENV is "production"
   */
  cookieSecure?: boolean;

  /** Name of the cookie holding the server-side session ID */
  sessionCookieName: string;

  /** Server-side session lifetime in seconds */
  sessionTtlSeconds: number;
}

/**
 * Provider client capability used by the middleware
 *
 * One instance is bound to a provider, this application's credentials and
 * its callback URL.
 */
export interface OAuthClient {
  /** Provider this client talks to */
  readonly providerType: ProviderType;

  /** Callback URL registered with the provider for this client */
  readonly callbackUri: string;

  /**
   * Build the provider URL the user is redirected to
   */
  getAuthorizationUri(): string;

  /**
   * Exchange an authorization code for an access token
   *
   * @throws TokenExchangeError when the provider rejects the exchange
   */
  requestAccessToken(code: string): Promise<string>;

  /**
   * Fetch the signed-in user's profile from the provider
   *
   * @throws UserInfoError when the provider request fails
   */
  fetchUserInfo(accessToken: string): Promise<ProviderProfile>;
}

/**
 * Profile fields read from a provider's user info response
 */
export interface ProviderProfile {
  /** Provider-side user ID (GitHub `id`, OIDC `sub`, ...) */
  id: string;

  /** Login or display name, when the provider returns one */
  name?: string;

  /** Email address, when the provider returns one */
  email?: string;
}

/**
 * Application user resolved for a request
 *
 * The middleware only reads `token`; an empty token means a guest.
 */
export interface User {
  /** Application user ID (empty for guests) */
  id: string;

  /** Token issued to this user by the application (empty for guests) */
  token: string;

  /** Provider the user signed in with */
  provider?: ProviderType;

  /** Display name */
  name?: string;

  /** Email address */
  email?: string;
}

/**
 * User lookup and creation, owned by the host application
 */
export interface UserService {
  /**
   * Find the user owning a credential, or return a new (guest) user
   *
   * @param credential - Token from the Authorization header, or false if none
   */
  findOrNew(credential: string | false): Promise<User>;

  /**
   * Resolve or create the user who just signed in
   *
   * @param client - Provider client that performed the exchange
   * @param accessToken - Provider access token from the exchange
   */
  createUser(client: OAuthClient, accessToken: string): Promise<User>;
}

/**
 * Persists the post-login redirect target across the provider round trip
 */
export interface ReturnUrlStore {
  /** Backend kind, for diagnostics */
  readonly kind: ReturnUrlStorageKind;

  /**
   * Save the URL for the client making this request
   */
  store(req: Request, res: Response, url: string): Promise<void>;

  /**
   * Read the URL saved for the client making this request
   *
   * @returns The stored URL, or undefined if none
   */
  retrieve(req: Request): Promise<string | undefined>;

  /**
   * Remove the stored URL once the flow completes
   */
  clear(req: Request, res: Response): Promise<void>;
}

/**
 * Server-side session storage
 *
 * Sessions hold string values by key and expire after a TTL.
 */
export interface SessionStore {
  /**
   * Create an empty session
   *
   * @returns New session ID
   */
  createSession(): Promise<string>;

  /**
   * Check whether a session exists and has not expired
   */
  hasSession(sessionId: string): Promise<boolean>;

  /**
   * Read a value from a session
   *
   * @returns The value, or undefined if the session or key is absent
   */
  getValue(sessionId: string, key: string): Promise<string | undefined>;

  /**
   * Write a value into an existing session
   *
   * @throws SessionNotFoundError if the session does not exist
   */
  setValue(sessionId: string, key: string, value: string): Promise<void>;

  /**
   * Remove a value from a session (no-op if absent)
   */
  deleteValue(sessionId: string, key: string): Promise<void>;

  /**
   * Remove a session entirely
   */
  destroySession(sessionId: string): Promise<void>;

  /**
   * Drop expired sessions
   *
   * @returns Number of sessions removed
   */
  cleanExpiredSessions(): Promise<number>;

  /**
   * Schedule periodic cleanup of expired sessions
   *
   * @param intervalMs - Cleanup interval (default: 300000 = 5 minutes)
   */
  startAutoCleanup(intervalMs?: number): void;

  /** Cancel periodic cleanup */
  stopAutoCleanup(): void;

  /** True while periodic cleanup is scheduled */
  isAutoCleanupRunning(): boolean;
}

/**
 * Cookie holding the return URL when the cookie backend is used
 */
export const RETURN_URL_COOKIE = "oauth_return_url";

/**
 * Session key holding the return URL when the session backend is used
 */
export const RETURN_URL_SESSION_KEY = "oauth_return_url";

/**
 * Default name of the server-side session cookie
 */
export const DEFAULT_SESSION_COOKIE = "oauth_session";

/**
 * Lifetime of the return URL cookie (10 minutes)
 */
export const RETURN_URL_COOKIE_MAX_AGE_MS = 10 * 60 * 1000;

/**
 * Lifetime of the token cookie (1 hour)
 */
export const TOKEN_COOKIE_MAX_AGE_MS = 60 * 60 * 1000;
