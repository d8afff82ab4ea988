/**
 * Return URL Storage
 *
 * Keeps the client-supplied post-login destination between the initiate and
 * callback requests. Two backends exist: a short-lived cookie, or a value in
 * a server-side session identified by a session cookie. The backend is chosen
 * once from configuration by {@link createReturnUrlStore}.
 *
 * Stored values are not signed or re-validated; the middleware validates the
 * URL before storing it.
 *
 * @module auth/oauth/return-url-store
 */

import type { Request, Response } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { getCookieOptions, readCookie } from "./cookies.js";
import type { OAuthConfig, ReturnUrlStore, SessionStore } from "./oauth-types.js";
import {
  RETURN_URL_COOKIE,
  RETURN_URL_COOKIE_MAX_AGE_MS,
  RETURN_URL_SESSION_KEY,
} from "./oauth-types.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("auth:return-url");
  }
  return logger;
}

/**
 * Cookie backend: `oauth_return_url`, 10 minutes, path `/`
 */
export class CookieReturnUrlStore implements ReturnUrlStore {
  readonly kind = "cookie";

  constructor(private readonly cookieSecure?: boolean) {}

  async store(_req: Request, res: Response, url: string): Promise<void> {
    res.cookie(RETURN_URL_COOKIE, url, {
      ...getCookieOptions(this.cookieSecure),
      maxAge: RETURN_URL_COOKIE_MAX_AGE_MS,
    });
  }

  async retrieve(req: Request): Promise<string | undefined> {
    return readCookie(req, RETURN_URL_COOKIE);
  }

  async clear(_req: Request, res: Response): Promise<void> {
    res.clearCookie(RETURN_URL_COOKIE, getCookieOptions(this.cookieSecure));
  }
}

/**
 * Options for {@link SessionReturnUrlStore}
 */
export interface SessionReturnUrlStoreOptions {
  /** Name of the cookie carrying the session ID */
  sessionCookieName: string;

  /** Session lifetime, also used as the session cookie max age */
  sessionTtlSeconds: number;

  /** Secure flag for the session cookie */
  cookieSecure?: boolean;
}

/**
 * Session backend: value `oauth_return_url` in the caller's server-side session
 *
 * A session is created (and its cookie set) on the first store when the
 * request does not carry a live one.
 */
export class SessionReturnUrlStore implements ReturnUrlStore {
  readonly kind = "session";

  constructor(
    private readonly sessionStore: SessionStore,
    private readonly options: SessionReturnUrlStoreOptions
  ) {}

  async store(req: Request, res: Response, url: string): Promise<void> {
    let sessionId = readCookie(req, this.options.sessionCookieName);

    if (!sessionId || !(await this.sessionStore.hasSession(sessionId))) {
      sessionId = await this.sessionStore.createSession();
      res.cookie(this.options.sessionCookieName, sessionId, {
        ...getCookieOptions(this.options.cookieSecure),
        maxAge: this.options.sessionTtlSeconds * 1000,
      });
      getLogger().debug("Started session for return url");
    }

    await this.sessionStore.setValue(sessionId, RETURN_URL_SESSION_KEY, url);
  }

  async retrieve(req: Request): Promise<string | undefined> {
    const sessionId = readCookie(req, this.options.sessionCookieName);
    if (!sessionId) {
      return undefined;
    }
    return this.sessionStore.getValue(sessionId, RETURN_URL_SESSION_KEY);
  }

  async clear(req: Request, _res: Response): Promise<void> {
    const sessionId = readCookie(req, this.options.sessionCookieName);
    if (sessionId) {
      await this.sessionStore.deleteValue(sessionId, RETURN_URL_SESSION_KEY);
    }
  }
}

/**
 * Resolve the configured storage kind into a concrete store
 */
export function createReturnUrlStore(config: OAuthConfig, sessionStore: SessionStore): ReturnUrlStore {
  switch (config.returnUrlStorage) {
    case "cookie":
      return new CookieReturnUrlStore(config.cookieSecure);
    case "session":
      return new SessionReturnUrlStore(sessionStore, {
        sessionCookieName: config.sessionCookieName,
        sessionTtlSeconds: config.sessionTtlSeconds,
        cookieSecure: config.cookieSecure,
      });
  }
}
