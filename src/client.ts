import { resolveConfig, type ResolvedConfig } from "./config";
import {
  Experiment,
  createDefaultProvider,
  ASSIGNMENT_COOKIE_NAME,
  TIMESTAMP_COOKIE_NAME,
  type ExperimentDataProvider,
  type ExperimentId,
  type RequestCookies,
  type VariationDecision,
} from "./experiments";
import type { ContentExperimentsConfig } from "./types";

/**
 * Server-side content experiments client
 *
 * @example
 * ```typescript
 * import { ContentExperiments, cookieHeader } from "server-cx";
 *
 * const cx = new ContentExperiments({
 *   domainName: "example.com",
 *   cacheDir: "/tmp/cx-cache",
 * });
 *
 * const { variation, cookies } = await cx.chooseVariation(
 *   "ft-5xaLPSturFXCPgoFrKg",
 *   req.cookies,
 * );
 * cookies.forEach((cookie) => res.append("Set-Cookie", cookieHeader(cookie)));
 * ```
 */
export class ContentExperiments {
  private readonly config: ResolvedConfig;
  private readonly provider: ExperimentDataProvider;
  private experiments = new Map<ExperimentId, Experiment>();

  constructor(config: ContentExperimentsConfig = {}) {
    this.config = resolveConfig(config);
    this.provider = createDefaultProvider(this.config);

    this.log("Content experiments client initialized", {
      domainName: this.config.domainName,
      cacheDir: this.config.cacheDir,
    });
  }

  /**
   * Experiment handle for `id`; one instance per id and client
   */
  experiment(id: ExperimentId): Experiment {
    let experiment = this.experiments.get(id);
    if (!experiment) {
      experiment = new Experiment(id, this.config, this.provider);
      this.experiments.set(id, experiment);
    }
    return experiment;
  }

  /**
   * Chooses a variation from the request's cookies
   *
   * @param cookies - cookie values of the incoming request
   * @param host - request host, needed when the domain name is "auto"
   */
  async chooseVariation(
    id: ExperimentId,
    cookies: RequestCookies = {},
    host?: string
  ): Promise<VariationDecision> {
    return this.experiment(id).chooseVariation({
      assignmentCookie: cookies[ASSIGNMENT_COOKIE_NAME],
      timestampCookie: cookies[TIMESTAMP_COOKIE_NAME],
      host,
    });
  }

  /**
   * Resolved configuration of this client
   */
  getConfig(): Readonly<ResolvedConfig> {
    return this.config;
  }

  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.log("[server-cx]", ...args);
    }
  }
}

/**
 * Create a ContentExperiments client instance
 */
export function createContentExperiments(
  config: ContentExperimentsConfig = {}
): ContentExperiments {
  return new ContentExperiments(config);
}
