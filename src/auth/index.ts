/**
 * Authentication Module - Public API
 *
 * @module auth
 */

export {
  AuthError,
  OAuthError,
  UnknownProviderTypeError,
  InvalidReturnUrlError,
  ProviderNotConfiguredError,
  TokenExchangeError,
  UserInfoError,
  MissingAuthorizationCodeError,
  OAuthCallbackError,
  ReturnUrlNotFoundError,
  SessionNotFoundError,
} from "./errors.js";

export type { AuthMiddleware } from "./middleware-types.js";

export * from "./oauth/index.js";
