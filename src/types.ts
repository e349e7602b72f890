import type { ExperimentDataProvider } from "./experiments/types";

export type { ExperimentDataProvider };

/**
 * Configuration options for the content experiments client
 */
export interface ContentExperimentsConfig {
  /**
   * Domain name also used by the tracking client for its cookies.
   * "auto" takes the host of the current request.
   * @default "auto"
   */
  domainName?: string;

  /**
   * Path the experiment cookies are written for
   * @default "/"
   */
  cookiePath?: string;

  /**
   * Cookie lifetime in seconds
   * @default 48211200
   */
  cookieExpirationSeconds?: number;

  /**
   * Timeout for experiment data requests in milliseconds
   * @default 2000
   */
  timeout?: number;

  /**
   * URL of the experiments script that embeds the variation weights
   * @default "http://www.google-analytics.com/cx/api.js"
   */
  endpoint?: string;

  /**
   * Directory used to cache experiment data responses.
   * Caching is disabled when unset.
   */
  cacheDir?: string;

  /**
   * How long cached responses stay fresh, in seconds
   * @default 60
   */
  cacheTtl?: number;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;

  /**
   * Uniform random source in [0, 1)
   * @default Math.random
   */
  random?: () => number;

  /**
   * Millisecond clock
   * @default Date.now
   */
  clock?: () => number;

  /**
   * Supplies variation weights. Defaults to the HTTP provider built from
   * `endpoint`, `timeout` and the cache options.
   */
  provider?: ExperimentDataProvider;
}

/**
 * Error thrown by the content experiments client
 */
export class CxError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: ErrorCode,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CxError";
    this.code = code;
    this.statusCode = options?.statusCode;
  }
}

/**
 * The domain name (or another setting) needed for a decision is missing or invalid
 */
export class ConfigurationError extends CxError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR);
    this.name = "ConfigurationError";
  }
}

/**
 * Variation weights could not be retrieved or understood
 */
export class ProviderError extends CxError {
  constructor(
    message: string,
    code: ProviderErrorCode,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, code, options);
    this.name = "ProviderError";
  }
}

/**
 * Error codes
 */
export const ErrorCodes = {
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  NETWORK_ERROR: "NETWORK_ERROR",
  TIMEOUT: "TIMEOUT",
  HTTP_ERROR: "HTTP_ERROR",
  INVALID_RESPONSE: "INVALID_RESPONSE",
  EXPERIMENT_ERROR: "EXPERIMENT_ERROR",
  EXPERIMENT_NOT_FOUND: "EXPERIMENT_NOT_FOUND",
  CACHE_ERROR: "CACHE_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ProviderErrorCode = Exclude<ErrorCode, "CONFIGURATION_ERROR">;
