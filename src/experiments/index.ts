import { resolveDomainName, type ResolvedConfig } from "../config";
import { updateAssignmentCookie, updateTimestampCookie, decodeChosenVariation } from "./cookie-codec";
import { buildExperimentCookies } from "./cookies";
import { FileResponseCache } from "./cache";
import { HttpExperimentDataProvider } from "./provider";
import { selectVariation } from "./selector";
import { ExperimentSession } from "./session";
import type {
  ChosenVariation,
  CookieDescriptor,
  ExperimentDataProvider,
  ExperimentId,
  ExperimentRequestOptions,
  VariationDecision,
  VariationRecord,
} from "./types";

export * from "./types";
export * from "./hash";
export * from "./selector";
export * from "./cookie-codec";
export * from "./cookies";
export * from "./session";
export * from "./provider";
export * from "./cache";

/**
 * Provider built from the configuration when none was injected
 */
export function createDefaultProvider(config: ResolvedConfig): ExperimentDataProvider {
  if (config.provider) return config.provider;

  return new HttpExperimentDataProvider({
    endpoint: config.endpoint,
    timeout: config.timeout,
    debug: config.debug,
    cache: config.cacheDir
      ? new FileResponseCache(config.cacheDir, {
          ttl: config.cacheTtl,
          clock: config.clock,
          debug: config.debug,
        })
      : undefined,
  });
}

/**
 * Server-side counterpart of the tracking client's chooseVariation() for one experiment
 *
 * @example
 * ```typescript
 * const experiment = new Experiment("ft-5xaLPSturFXCPgoFrKg", resolveConfig({
 *   domainName: "example.com",
 * }));
 *
 * const { variation, cookies } = await experiment.chooseVariation({
 *   assignmentCookie: req.cookies.__utmx,
 *   timestampCookie: req.cookies.__utmxx,
 * });
 * for (const cookie of cookies) {
 *   res.append("Set-Cookie", cookieHeader(cookie));
 * }
 * ```
 */
export class Experiment {
  private records: Promise<VariationRecord[]> | null = null;
  private recordsTime: number = 0;
  private readonly provider: ExperimentDataProvider;
  private readonly session: ExperimentSession;

  constructor(
    private readonly id: ExperimentId,
    private readonly config: ResolvedConfig,
    provider: ExperimentDataProvider = createDefaultProvider(config)
  ) {
    this.provider = provider;
    this.session = new ExperimentSession({ fetch: () => this.getRecords() });
  }

  getId(): ExperimentId {
    return this.id;
  }

  /**
   * Variation stored in the assignment cookie, or null
   */
  getChosenVariation(assignmentCookie?: string | null): number | null {
    return decodeChosenVariation(assignmentCookie, this.id);
  }

  /**
   * Returns the stored variation, or draws a new one and the cookies to set for it
   */
  async chooseVariation(options: ExperimentRequestOptions = {}): Promise<VariationDecision> {
    const nowMs = this.config.clock();
    const result = await this.session.chooseVariation({
      experimentId: this.id,
      assignmentCookie: options.assignmentCookie,
      timestampCookie: options.timestampCookie,
      draw: this.config.random(),
      now: Math.floor(nowMs / 1000),
      domainName: () => resolveDomainName(this.config, options.host),
    });

    if (!result.isNewAssignment) {
      this.log(`Using prior assignment for ${this.id}:`, result.variation);
      return { variation: result.variation, isNewAssignment: false, cookies: [] };
    }

    this.log(`New assignment for ${this.id}:`, result.variation);

    return {
      variation: result.variation,
      isNewAssignment: true,
      cookies: buildExperimentCookies({
        assignmentCookie: result.assignmentCookie,
        timestampCookie: result.timestampCookie,
        domainName: resolveDomainName(this.config, options.host),
        path: this.config.cookiePath,
        expirationSeconds: this.config.cookieExpirationSeconds,
        nowMs,
      }),
    };
  }

  /**
   * Draws a variation from the current weights, ignoring any stored assignment
   */
  async chooseNewVariation(): Promise<ChosenVariation> {
    const records = await this.getRecords();
    return selectVariation(records, this.config.random());
  }

  /**
   * Cookies recording `variation` for this experiment
   */
  setChosenVariation(
    variation: ChosenVariation,
    options: ExperimentRequestOptions = {}
  ): CookieDescriptor[] {
    const nowMs = this.config.clock();
    const domainName = resolveDomainName(this.config, options.host);

    return buildExperimentCookies({
      assignmentCookie: updateAssignmentCookie(
        options.assignmentCookie,
        this.id,
        variation,
        domainName
      ),
      timestampCookie: updateTimestampCookie(
        options.timestampCookie,
        this.id,
        Math.floor(nowMs / 1000),
        domainName
      ),
      domainName,
      path: this.config.cookiePath,
      expirationSeconds: this.config.cookieExpirationSeconds,
      nowMs,
    });
  }

  /**
   * Variation records, refetched once they are older than `cacheTtl` seconds.
   * A failed fetch is not remembered.
   */
  private getRecords(): Promise<VariationRecord[]> {
    const now = this.config.clock();
    if (this.records && now - this.recordsTime <= this.config.cacheTtl * 1000) {
      return this.records;
    }

    this.recordsTime = now;
    const records = this.provider.fetch(this.id).catch((error: unknown) => {
      if (this.records === records) {
        this.records = null;
      }
      throw error;
    });
    this.records = records;
    return records;
  }

  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.log("[server-cx]", ...args);
    }
  }
}
