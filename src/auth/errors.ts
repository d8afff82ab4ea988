/**
 * Authentication Module Error Classes
 *
 * Domain-specific error types for the OAuth sign-in flow.
 * All errors include a retryable flag to guide error handling logic, and
 * OAuth errors carry the HTTP status the error handler responds with.
 *
 * @module auth/errors
 */

/**
 * Base class for all authentication-related errors
 */
export abstract class AuthError extends Error {
  /** Whether the operation can be retried */
  public readonly retryable: boolean;

  /** Error code for programmatic handling */
  public readonly code: string;

  constructor(message: string, code: string, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Base class for errors raised while handling the OAuth routes
 */
export abstract class OAuthError extends AuthError {
  /** HTTP status code reported to the client */
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, retryable: boolean = false) {
    super(message, code, retryable);
    this.statusCode = statusCode;
  }
}

/**
 * Provider type is not in the configured allow-list
 *
 * Not retryable - the path names a provider this application does not accept.
 */
export class UnknownProviderTypeError extends OAuthError {
  constructor(public readonly providerType: string) {
    super(`Unknown OAuth provider type: ${providerType}`, "UNKNOWN_PROVIDER_TYPE", 400);
  }
}

/**
 * `return` parameter is missing or not an absolute URL
 *
 * Not retryable - the client must supply a valid return URL.
 */
export class InvalidReturnUrlError extends OAuthError {
  constructor(public readonly returnUrl?: string) {
    super(
      returnUrl === undefined
        ? "Missing return url"
        : "Invalid return url: must be an absolute URL",
      "INVALID_RETURN_URL",
      400
    );
  }
}

/**
 * Provider is allow-listed but has no credentials configured
 *
 * Not retryable - administrator must configure the provider.
 */
export class ProviderNotConfiguredError extends OAuthError {
  constructor(public readonly providerType: string) {
    super(
      `OAuth provider is not configured: ${providerType}`,
      "PROVIDER_NOT_CONFIGURED",
      500
    );
  }
}

/**
 * Exchanging the authorization code for an access token failed
 *
 * Retryable - the provider may be temporarily unavailable. A used or expired
 * code still requires restarting the flow.
 */
export class TokenExchangeError extends OAuthError {
  /** Underlying error that caused the exchange failure */
  public override readonly cause?: Error;

  constructor(
    public readonly providerType: string,
    message: string,
    cause?: Error
  ) {
    super(`Token exchange with ${providerType} failed: ${message}`, "TOKEN_EXCHANGE_FAILED", 502, true);
    this.cause = cause;
  }
}

/**
 * Fetching the user profile from the provider failed
 *
 * Retryable - the provider may be temporarily unavailable.
 */
export class UserInfoError extends OAuthError {
  /** Underlying error that caused the failure */
  public override readonly cause?: Error;

  constructor(
    public readonly providerType: string,
    message: string,
    cause?: Error
  ) {
    super(`Failed to fetch ${providerType} user info: ${message}`, "USERINFO_FAILED", 502, true);
    this.cause = cause;
  }
}

/**
 * Callback request carried no authorization code
 *
 * Not retryable - user must restart the flow.
 */
export class MissingAuthorizationCodeError extends OAuthError {
  constructor() {
    super("Missing authorization code", "MISSING_CODE", 400);
  }
}

/**
 * Provider redirected back with an error instead of a code
 *
 * Not retryable - typically the user denied access.
 */
export class OAuthCallbackError extends OAuthError {
  constructor(
    public readonly providerError: string,
    public readonly description?: string
  ) {
    super(`Authorization failed: ${description || providerError}`, "OAUTH_CALLBACK_ERROR", 400);
  }
}

/**
 * Callback arrived but no return URL was stored for this client
 *
 * Not retryable - the flow was not started here, or its storage expired.
 */
export class ReturnUrlNotFoundError extends OAuthError {
  constructor() {
    super(
      "No return url stored - please start the authorization flow again",
      "RETURN_URL_NOT_FOUND",
      400
    );
  }
}

/**
 * Server-side session not found or expired
 *
 * Not retryable - a new session must be created.
 */
export class SessionNotFoundError extends AuthError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId.substring(0, 8)}...`, "SESSION_NOT_FOUND", false);
  }
}
