/**
 * HTTP Layer Type Definitions
 */

/**
 * Whether an allow-listed provider can be used
 */
export type ProviderStatus = "configured" | "unconfigured";

/**
 * Health check response structure
 */
export interface HealthResponse {
  /** Overall health status */
  status: "healthy" | "degraded";

  version: string;

  /** Server uptime in seconds */
  uptime: number;

  /** Current timestamp in ISO 8601 format */
  timestamp: string;

  checks: {
    /** Status per allow-listed provider type */
    providers: Record<string, ProviderStatus>;
  };
}

/**
 * `GET /me` response body
 */
export interface CurrentUserResponse {
  id: string;
  provider?: string;
  name?: string;
  email?: string;
}

/**
 * HTTP listener settings
 */
export interface HttpConfig {
  port: number;
  host: string;
}

/**
 * HTTP server instance with additional metadata
 */
export interface HttpServerInstance {
  /** Stop accepting connections and close the server */
  close: () => Promise<void>;

  /** The port the server is listening on */
  port: number;

  /** The host the server is bound to */
  host: string;
}
