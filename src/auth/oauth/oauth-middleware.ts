/**
 * OAuth Gateway Middleware
 *
 * Express middleware that intercepts the sign-in routes and resolves the
 * acting user for every other request:
 *
 * - `GET /auth/{type}?return=<url>` stores the return URL and redirects to
 *   the provider (302).
 * - `GET /auth/{type}/callback?code=<code>` exchanges the code, resolves the
 *   user and answers 200 with `Authorization: token <t>` and `Location` set
 *   to the return URL.
 * - Anything else: the Authorization header is parsed, the user attached as
 *   `req.user`, and the request passed on.
 *
 * Failures on the sign-in routes are passed to `next(error)`; no response is
 * written for them here.
 *
 * @module auth/oauth/middleware
 */

import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import {
  InvalidReturnUrlError,
  MissingAuthorizationCodeError,
  OAuthCallbackError,
  ProviderNotConfiguredError,
  ReturnUrlNotFoundError,
  UnknownProviderTypeError,
} from "../errors.js";
import type { AuthMiddleware } from "../middleware-types.js";
import { parseAuthorizationHeaders } from "./auth-header.js";
import { getCookieOptions } from "./cookies.js";
import type { OAuthClientFactory } from "./provider-factory.js";
import { matchAuthRoute } from "./route-matcher.js";
import { isValidReturnUrl } from "./oauth-validation.js";
import type { OAuthClient, ProviderType, ReturnUrlStore, UserService } from "./oauth-types.js";
import { TOKEN_COOKIE_MAX_AGE_MS } from "./oauth-types.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:oauth");
  }
  return logger;
}

/**
 * OAuth middleware dependencies
 */
export interface OAuthMiddlewareDeps {
  /** Provider client factory (also supplies the configuration) */
  factory: OAuthClientFactory;

  /** Host application's user lookup */
  userService: UserService;

  /** Storage for the return URL between the two legs of the flow */
  returnUrlStore: ReturnUrlStore;

  /** Allow-listed provider types (default: the configured providers) */
  providers?: ProviderType[];
}

/**
 * Append `name=value` to a URL's query string
 *
 * @example
 * appendQueryParam("https://app.example/done", "access_token", "t1")
 * // "https://app.example/done?access_token=t1"
 */
export function appendQueryParam(url: string, name: string, value: string): string {
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}${encodeURIComponent(name)}=${encodeURIComponent(value)}`;
}

/**
 * Absolute URL of the current request, query included
 */
function currentRequestUrl(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? "localhost"}${req.originalUrl}`;
}

/**
 * Read a string parameter from the query string or, failing that, the body
 */
function readParam(req: Request, name: string): string | undefined {
  const fromQuery = req.query[name];
  if (typeof fromQuery === "string" && fromQuery !== "") {
    return fromQuery;
  }
  const fromBody: unknown = req.body?.[name];
  if (typeof fromBody === "string" && fromBody !== "") {
    return fromBody;
  }
  return undefined;
}

/**
 * Create the OAuth gateway middleware
 *
 * @param deps - Middleware dependencies
 * @returns Express middleware function
 */
export function createOAuthMiddleware(deps: OAuthMiddlewareDeps): AuthMiddleware {
  const { factory, userService, returnUrlStore } = deps;
  const config = factory.getConfig();
  const providers = deps.providers ?? config.providers;

  function assertAllowed(providerType: ProviderType): void {
    if (!providers.includes(providerType)) {
      getLogger().info({ providerType }, "Rejected unknown provider type");
      throw new UnknownProviderTypeError(providerType);
    }
  }

  function resolveClient(req: Request, providerType: ProviderType): OAuthClient {
    const result = factory.getOrCreateByType(providerType, currentRequestUrl(req));
    if (!result.ok) {
      throw new ProviderNotConfiguredError(providerType);
    }
    return result.client;
  }

  async function handleInitiate(req: Request, res: Response, providerType: ProviderType): Promise<void> {
    assertAllowed(providerType);

    const returnUrl: unknown = req.query["return"];
    if (returnUrl === undefined) {
      throw new InvalidReturnUrlError();
    }
    if (!isValidReturnUrl(returnUrl)) {
      throw new InvalidReturnUrlError(String(returnUrl));
    }

    await returnUrlStore.store(req, res, returnUrl);

    const location = resolveClient(req, providerType).getAuthorizationUri();

    getLogger().info(
      { providerType, returnUrlStorage: returnUrlStore.kind },
      "Starting OAuth authorization flow"
    );

    res.status(302).location(location).end();
  }

  async function handleCallback(req: Request, res: Response, providerType: ProviderType): Promise<void> {
    assertAllowed(providerType);

    const providerError = req.query["error"];
    if (typeof providerError === "string" && providerError !== "") {
      const description = req.query["error_description"];
      getLogger().warn({ providerType, error: providerError }, "Provider returned an authorization error");
      throw new OAuthCallbackError(
        providerError,
        typeof description === "string" ? description : undefined
      );
    }

    const code = readParam(req, "code");
    if (!code) {
      throw new MissingAuthorizationCodeError();
    }

    // Checked before the exchange so a stray callback does not use up the code
    let returnUrl = await returnUrlStore.retrieve(req);
    if (!returnUrl) {
      throw new ReturnUrlNotFoundError();
    }

    const client = resolveClient(req, providerType);
    const accessToken = await client.requestAccessToken(code);
    const user = await userService.createUser(client, accessToken);

    await returnUrlStore.clear(req, res);

    const delivery = config.tokenDelivery;
    if (delivery.kind === "cookie") {
      res.cookie(delivery.name, user.token, {
        ...getCookieOptions(config.cookieSecure, false),
        maxAge: TOKEN_COOKIE_MAX_AGE_MS,
      });
    } else if (delivery.kind === "urlparam") {
      returnUrl = appendQueryParam(returnUrl, delivery.name, user.token);
    }

    getLogger().info(
      { providerType, userId: user.id, tokenDelivery: delivery.kind },
      "OAuth authentication successful"
    );

    res.status(200).set("Authorization", `token ${user.token}`).location(returnUrl).end();
  }

  async function attachUser(req: Request, res: Response): Promise<void> {
    const credential = parseAuthorizationHeaders(req.headersDistinct["authorization"]);
    const user = await userService.findOrNew(credential);

    req.user = user;
    if (user.token) {
      res.setHeader("Authorization", `token ${user.token}`);
    }

    getLogger().debug(
      { path: req.path, hasCredential: credential !== false, authenticated: user.token !== "" },
      "Resolved request user"
    );
  }

  return async function oauthMiddleware(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const match = matchAuthRoute(req.path);

      if (match?.kind === "initiate") {
        await handleInitiate(req, res, match.providerType);
        return;
      }
      if (match?.kind === "callback") {
        await handleCallback(req, res, match.providerType);
        return;
      }

      await attachUser(req, res);
    } catch (error) {
      next(error);
      return;
    }

    next();
  };
}
