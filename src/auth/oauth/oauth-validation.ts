/**
 * OAuth Module Validation Schemas
 *
 * Zod schemas for the gateway configuration and request parameters.
 *
 * @module auth/oauth/validation
 */

import { z } from "zod";
import { DEFAULT_SESSION_COOKIE } from "./oauth-types.js";

/**
 * Provider type as it appears in `/auth/{providerType}`
 */
export const ProviderTypeSchema = z
  .string()
  .min(1, "Provider type must not be empty")
  .regex(/^\w+$/, "Provider type must only contain word characters");

/**
 * Cookie and query parameter names set by the gateway
 */
const NameSchema = z
  .string()
  .min(1, "Name must not be empty")
  .max(64, "Name must not exceed 64 characters")
  .regex(/^[a-zA-Z0-9_-]+$/, "Name must only contain alphanumeric characters, hyphens, and underscores");

/**
 * Absolute http(s) URL
 */
export const AbsoluteUrlSchema = z.string().refine((value) => {
  try {
    const url = new URL(value);
    return (url.protocol === "https:" || url.protocol === "http:") && url.host !== "";
  } catch {
    return false;
  }
}, "Must be an absolute http(s) URL");

/**
 * Check the `return` parameter of the initiate route
 */
export function isValidReturnUrl(value: unknown): value is string {
  return AbsoluteUrlSchema.safeParse(value).success;
}

/**
 * Credentials for one provider
 */
export const ProviderCredentialsSchema = z.object({
  key: z.string().min(1, "Provider key is required"),
  secret: z.string().min(1, "Provider secret is required"),
  scopes: z.array(z.string().min(1)).default([]),
  authorizationEndpoint: AbsoluteUrlSchema.optional(),
  tokenEndpoint: AbsoluteUrlSchema.optional(),
  userInfoEndpoint: AbsoluteUrlSchema.optional(),
});

/**
 * Gateway configuration as loaded from the environment or passed in code
 *
 * Token cookie and token URL parameter are mutually exclusive.
 */
export const RawOAuthConfigSchema = z
  .object({
    providers: z.array(ProviderTypeSchema).min(1, "At least one provider must be allowed"),

    credentials: z.record(z.string(), ProviderCredentialsSchema).default({}),

    returnUrlStorage: z
      .enum(["session", "cookie"], {
        errorMap: () => ({ message: "Return url storage must be 'session' or 'cookie'" }),
      })
      .default("session"),

    tokenCookie: NameSchema.optional(),

    tokenUrlParam: NameSchema.optional(),

    cookieSecure: z.boolean().optional(),

    sessionCookieName: NameSchema.default(DEFAULT_SESSION_COOKIE),

    sessionTtlSeconds: z
      .number()
      .int("Session TTL must be a whole number")
      .positive("Session TTL must be positive")
      .max(86400 * 30, "Session TTL cannot exceed 30 days")
      .default(3600),
  })
  .refine((data) => !(data.tokenCookie && data.tokenUrlParam), {
    message: "Configure at most one of token cookie and token url parameter",
  });

export type RawOAuthConfig = z.input<typeof RawOAuthConfigSchema>;
export type ValidatedRawOAuthConfig = z.output<typeof RawOAuthConfigSchema>;
