/**
 * OAuth Route Matching
 *
 * Classifies request paths as the start of a sign-in flow, the provider
 * callback, or anything else.
 *
 * @module auth/oauth/route-matcher
 */

import type { ProviderType } from "./oauth-types.js";

const AUTH_ROUTE = /^\/auth\/(?<providerType>\w+)$/;
const CALLBACK_ROUTE = /^\/auth\/(?<providerType>\w+)\/callback$/;

/**
 * Result of matching a path against the OAuth routes
 */
export interface AuthRouteMatch {
  kind: "initiate" | "callback";
  providerType: ProviderType;
}

/**
 * Match a request path against `/auth/{type}` and `/auth/{type}/callback`
 *
 * Both patterns are anchored, so `/auth/github/callback` can only match the
 * callback route.
 *
 * @param path - Request path without query string
 * @returns The match, or null when the request should pass through
 */
export function matchAuthRoute(path: unknown): AuthRouteMatch | null {
  if (typeof path !== "string") {
    return null;
  }

  const callback = CALLBACK_ROUTE.exec(path)?.groups?.["providerType"];
  if (callback) {
    return { kind: "callback", providerType: callback };
  }

  const initiate = AUTH_ROUTE.exec(path)?.groups?.["providerType"];
  if (initiate) {
    return { kind: "initiate", providerType: initiate };
  }

  return null;
}
