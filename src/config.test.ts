import { describe, it, expect } from "vitest";
import { resolveConfig, resolveDomainName } from "./config";
import { ConfigurationError } from "./types";

describe("resolveConfig()", () => {
  it("applies defaults", () => {
    const config = resolveConfig();

    expect(config).toMatchObject({
      domainName: "auto",
      cookiePath: "/",
      cookieExpirationSeconds: 48211200,
      timeout: 2000,
      endpoint: "http://www.google-analytics.com/cx/api.js",
      cacheDir: undefined,
      cacheTtl: 60,
      debug: false,
    });
    expect(config.random).toBe(Math.random);
    expect(config.provider).toBeUndefined();
  });

  it("lower-cases the domain name and trims the cache directory", () => {
    const config = resolveConfig({ domainName: "Example.COM", cacheDir: "/tmp/cx//" });

    expect(config.domainName).toBe("example.com");
    expect(config.cacheDir).toBe("/tmp/cx");
  });

  it("rejects an empty domain name", () => {
    expect(() => resolveConfig({ domainName: "" })).toThrow(ConfigurationError);
  });

  it("rejects invalid numbers", () => {
    expect(() => resolveConfig({ timeout: -1 })).toThrow('Invalid timeout "-1"');
    expect(() => resolveConfig({ cacheTtl: 1.5 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ cookieExpirationSeconds: Number.NaN })).toThrow(
      ConfigurationError
    );
  });
});

describe("resolveDomainName()", () => {
  it("prefers the configured domain", () => {
    expect(resolveDomainName(resolveConfig({ domainName: "example.com" }), "other.test")).toBe(
      "example.com"
    );
  });

  it("uses the request host without port in auto mode", () => {
    expect(resolveDomainName(resolveConfig(), "Shop.Example.com:8080")).toBe("shop.example.com");
  });

  it("throws a configuration error when no domain can be determined", () => {
    const error = (() => {
      try {
        resolveDomainName(resolveConfig());
      } catch (caught) {
        return caught;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "CONFIGURATION_ERROR" });
  });
});
