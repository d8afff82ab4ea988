/**
 * Cookie helpers shared by the return URL store and token delivery
 *
 * @module auth/oauth/cookies
 */

import type { CookieOptions, Request } from "express";

/**
 * Base options for cookies set by the gateway
 *
 * The secure flag follows `cookieSecure` when set, otherwise NODE_ENV.
 *
 * @param cookieSecure - Explicit secure flag from configuration
 * @param httpOnly - Hide the cookie from client-side scripts
 */
export function getCookieOptions(cookieSecure: boolean | undefined, httpOnly: boolean = true): CookieOptions {
  return {
    httpOnly,
    secure: cookieSecure ?? process.env["NODE_ENV"] === "production",
    sameSite: "lax",
    path: "/",
  };
}

/**
 * Read a cookie parsed by cookie-parser
 *
 * @returns The cookie value, or undefined when absent or not a string
 */
export function readCookie(req: Request, name: string): string | undefined {
  const value: unknown = req.cookies?.[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}
