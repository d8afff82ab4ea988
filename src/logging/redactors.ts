/**
 * Secret Redaction Configuration
 *
 * Paths that Pino replaces with [REDACTED] before an entry is written.
 * Access tokens, client secrets and Authorization headers pass through
 * this service constantly, so they are never logged verbatim.
 *
 * @module logging/redactors
 */

/**
 * Paths to redact from log objects
 *
 * Pino path syntax: dot notation for nesting, `*` for any key at one level.
 */
export const REDACT_PATHS = [
  // Provider credentials
  "env.OAUTH_GITHUB_SECRET",
  "env.OAUTH_GOOGLE_SECRET",
  "env.OAUTH_GITLAB_SECRET",
  "env.OAUTH_BITBUCKET_SECRET",

  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",
  "res.headers.authorization",
  "res.headers['set-cookie']",

  // Field names that carry secrets anywhere one level down
  "*.secret",
  "*.clientSecret",
  "*.token",
  "*.accessToken",
  "*.access_token",
  "*.refreshToken",
  "*.refresh_token",

  // Authorization codes; `err.code` is an error code and stays readable
  "query.code",
  "body.code",
  "req.query.code",
  "req.body.code",

  // Query parameters
  "query.access_token",
  "query.token",
];

/**
 * Pino redaction options
 *
 * See: https://getpino.io/#/docs/redaction
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
} as const;
