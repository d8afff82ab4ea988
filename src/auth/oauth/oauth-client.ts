/**
 * OAuth Provider Client
 *
 * Implements the OAuthClient capability on top of openid-client, using
 * static provider metadata instead of discovery (GitHub and others publish
 * no discovery document).
 *
 * @module auth/oauth/oauth-client
 */

import * as client from "openid-client";
import { z } from "zod";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { TokenExchangeError, UserInfoError } from "../errors.js";
import type { ProviderEndpoints } from "./provider-presets.js";
import type { OAuthClient, ProviderProfile, ProviderType } from "./oauth-types.js";

/**
 * Everything needed to talk to one provider
 */
export interface OAuthClientOptions {
  providerType: ProviderType;
  clientId: string;
  clientSecret: string;
  callbackUri: string;
  scopes: string[];
  endpoints: ProviderEndpoints;
}

/**
 * Builds an OAuthClient; swapped out in tests
 */
export type OAuthClientBuilder = (options: OAuthClientOptions) => OAuthClient;

/**
 * Fields read from user info responses across providers
 */
const ProviderProfileResponseSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    sub: z.string().optional(),
    account_id: z.string().optional(),
    login: z.string().optional(),
    username: z.string().optional(),
    name: z.string().nullable().optional(),
    display_name: z.string().optional(),
    email: z.string().nullable().optional(),
  })
  .passthrough();

export class OpenIdOAuthClient implements OAuthClient {
  readonly providerType: ProviderType;
  readonly callbackUri: string;

  private readonly configuration: client.Configuration;
  private readonly scopes: string[];
  private readonly userInfoEndpoint?: string;
  private _logger: Logger | null = null;

  constructor(options: OAuthClientOptions) {
    this.providerType = options.providerType;
    this.callbackUri = options.callbackUri;
    this.scopes = options.scopes;
    this.userInfoEndpoint = options.endpoints.userInfoEndpoint;

    this.configuration = new client.Configuration(
      {
        issuer: options.endpoints.issuer,
        authorization_endpoint: options.endpoints.authorizationEndpoint,
        token_endpoint: options.endpoints.tokenEndpoint,
        userinfo_endpoint: options.endpoints.userInfoEndpoint,
      },
      options.clientId,
      options.clientSecret
    );
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:oauth-client");
    }
    return this._logger;
  }

  getAuthorizationUri(): string {
    const parameters: Record<string, string> = {
      redirect_uri: this.callbackUri,
      response_type: "code",
    };
    if (this.scopes.length > 0) {
      parameters["scope"] = this.scopes.join(" ");
    }

    return client.buildAuthorizationUrl(this.configuration, parameters).href;
  }

  async requestAccessToken(code: string): Promise<string> {
    const startTime = performance.now();

    // openid-client reads the code from the URL the provider redirected to
    const currentUrl = new URL(this.callbackUri);
    currentUrl.searchParams.set("code", code);

    try {
      const tokens = await client.authorizationCodeGrant(this.configuration, currentUrl);

      this.logger.info(
        {
          providerType: this.providerType,
          metric: "oauth.token_exchange_ms",
          value: Math.round(performance.now() - startTime),
        },
        "Authorization code exchanged"
      );

      return tokens.access_token;
    } catch (error) {
      this.logger.warn(
        {
          providerType: this.providerType,
          err: error,
          metric: "oauth.token_exchange_ms",
          value: Math.round(performance.now() - startTime),
        },
        "Authorization code exchange failed"
      );

      const message = error instanceof Error ? error.message : String(error);
      throw new TokenExchangeError(
        this.providerType,
        message,
        error instanceof Error ? error : undefined
      );
    }
  }

  async fetchUserInfo(accessToken: string): Promise<ProviderProfile> {
    if (!this.userInfoEndpoint) {
      throw new UserInfoError(this.providerType, "no user info endpoint configured");
    }

    let body: unknown;
    try {
      const response = await client.fetchProtectedResource(
        this.configuration,
        accessToken,
        new URL(this.userInfoEndpoint),
        "GET"
      );
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UserInfoError(this.providerType, message, error instanceof Error ? error : undefined);
    }

    const parsed = ProviderProfileResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UserInfoError(this.providerType, "unexpected response format", parsed.error);
    }

    const data = parsed.data;
    const id = data.id ?? data.sub ?? data.account_id;
    if (id === undefined) {
      throw new UserInfoError(this.providerType, "response carries no user id");
    }

    return {
      id: String(id),
      name: data.login ?? data.username ?? data.name ?? data.display_name ?? undefined,
      email: data.email ?? undefined,
    };
  }
}

/**
 * Default builder backed by openid-client
 */
export const createOpenIdOAuthClient: OAuthClientBuilder = (options) =>
  new OpenIdOAuthClient(options);
