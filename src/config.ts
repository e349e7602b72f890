import { ConfigurationError, type ContentExperimentsConfig } from "./types";
import { DEFAULT_CACHE_TTL } from "./experiments/cache";
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT } from "./experiments/provider";
import type { ExperimentDataProvider } from "./experiments/types";

export const AUTO_DOMAIN_NAME = "auto";
export const DEFAULT_COOKIE_PATH = "/";
export const DEFAULT_COOKIE_EXPIRATION_SECONDS = 48211200;

export interface ResolvedConfig {
  domainName: string;
  cookiePath: string;
  cookieExpirationSeconds: number;
  timeout: number;
  endpoint: string;
  cacheDir: string | undefined;
  cacheTtl: number;
  debug: boolean;
  random: () => number;
  clock: () => number;
  provider: ExperimentDataProvider | undefined;
}

function requireNonNegative(name: string, value: number, integer: boolean): number {
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(
      `Invalid ${name} "${value}". Must be a non-negative ${integer ? "integer" : "number"}`
    );
  }
  return value;
}

/**
 * Fills in defaults and validates the client options
 */
export function resolveConfig(options: ContentExperimentsConfig = {}): ResolvedConfig {
  const domainName = (options.domainName ?? AUTO_DOMAIN_NAME).trim().toLowerCase();
  if (!domainName) {
    throw new ConfigurationError(
      "Unable to determine domain name, please provide one via the domainName option"
    );
  }

  const cacheDir = options.cacheDir?.replace(/[\\/]+$/, "");

  return {
    domainName,
    cookiePath: options.cookiePath || DEFAULT_COOKIE_PATH,
    cookieExpirationSeconds: requireNonNegative(
      "cookieExpirationSeconds",
      options.cookieExpirationSeconds ?? DEFAULT_COOKIE_EXPIRATION_SECONDS,
      true
    ),
    timeout: requireNonNegative("timeout", options.timeout ?? DEFAULT_TIMEOUT, true),
    endpoint: options.endpoint?.trim() || DEFAULT_ENDPOINT,
    cacheDir: cacheDir || undefined,
    cacheTtl: requireNonNegative("cacheTtl", options.cacheTtl ?? DEFAULT_CACHE_TTL, true),
    debug: options.debug ?? false,
    random: options.random ?? Math.random,
    clock: options.clock ?? Date.now,
    provider: options.provider,
  };
}

/**
 * Domain name the cookies are written for. With "auto" the request host is
 * used, minus any port.
 */
export function resolveDomainName(config: ResolvedConfig, host?: string): string {
  if (config.domainName !== AUTO_DOMAIN_NAME) {
    return config.domainName;
  }

  const hostname = host?.trim().toLowerCase().replace(/:\d+$/, "");
  if (!hostname) {
    throw new ConfigurationError(
      "Unable to determine domain name, please provide one via the domainName option"
    );
  }
  return hostname;
}
