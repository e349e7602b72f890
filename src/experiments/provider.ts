import { z } from "zod";
import { ErrorCodes, ProviderError } from "../types";
import { parseLeadingInt } from "./cookie-codec";
import type { FileResponseCache } from "./cache";
import type { ExperimentDataProvider, ExperimentId, VariationRecord } from "./types";

export const DEFAULT_ENDPOINT = "http://www.google-analytics.com/cx/api.js";
export const DEFAULT_TIMEOUT = 2000;

const EXPERIMENTS_MARKER = /\.experiments_\s*=\s*\{/;

const ItemSchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]),
  weight: z.number().nullish(),
  disabled: z.union([z.boolean(), z.number()]).nullish(),
});

const ExperimentEntrySchema = z.object({
  data: z.object({ items: z.array(ItemSchema) }).optional(),
  error: z
    .object({
      code: z.union([z.number(), z.string()]),
      message: z.string(),
    })
    .optional(),
});

// Entries are validated one at a time, so a malformed entry only fails its own experiment
export const ExperimentsPayloadSchema = z.record(z.unknown());

/**
 * Options for HttpExperimentDataProvider
 */
export interface HttpProviderOptions {
  endpoint?: string;
  timeout?: number;
  cache?: FileResponseCache;
  debug?: boolean;
}

/**
 * Cuts the object literal assigned to `.experiments_` out of the script.
 * Braces are balanced by counting; string values never contain braces.
 */
export function extractExperimentsJson(body: string): string | null {
  const marker = EXPERIMENTS_MARKER.exec(body);
  if (!marker) return null;

  const start = marker.index + marker[0].length - 1;
  let depth = 0;

  for (let i = start; i < body.length; i++) {
    const char = body[i];
    if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) {
        return body.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Turns a raw experiments script into the variation records of one experiment
 */
export function parseExperimentResponse(
  body: string,
  experimentId: ExperimentId
): VariationRecord[] {
  const json = extractExperimentsJson(body);
  if (json === null) {
    throw new ProviderError(
      "Unable to find experiments in the experiments API response",
      ErrorCodes.INVALID_RESPONSE
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ProviderError(
      "Unable to parse JSON from the experiments API response",
      ErrorCodes.INVALID_RESPONSE,
      { cause: error }
    );
  }

  const payload = ExperimentsPayloadSchema.safeParse(raw);
  if (!payload.success) {
    throw new ProviderError(
      "Unexpected experiments API payload: expected an object",
      ErrorCodes.INVALID_RESPONSE,
      { cause: payload.error }
    );
  }

  if (!Object.prototype.hasOwnProperty.call(payload.data, experimentId)) {
    throw new ProviderError(
      `Unable to find data for experiment "${experimentId}" in the experiments API response`,
      ErrorCodes.EXPERIMENT_NOT_FOUND
    );
  }

  const parsed = ExperimentEntrySchema.safeParse(payload.data[experimentId]);
  if (!parsed.success) {
    throw new ProviderError(
      `Unexpected experiments API payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      ErrorCodes.INVALID_RESPONSE,
      { cause: parsed.error }
    );
  }
  const experiment = parsed.data;

  if (experiment.data) {
    return experiment.data.items.flatMap((item): VariationRecord[] =>
      item.weight === undefined || item.weight === null
        ? []
        : [
            {
              variationId:
                item.id === null
                  ? null
                  : typeof item.id === "number"
                    ? Math.trunc(item.id)
                    : parseLeadingInt(item.id),
              weight: item.weight,
              disabled: Boolean(item.disabled),
            },
          ]
    );
  }

  if (experiment.error) {
    throw new ProviderError(
      `Error from the experiments API: ${experiment.error.code} - ${experiment.error.message}`,
      ErrorCodes.EXPERIMENT_ERROR
    );
  }

  throw new ProviderError(
    `Unable to find data for experiment "${experimentId}" in the experiments API response`,
    ErrorCodes.EXPERIMENT_NOT_FOUND
  );
}

/**
 * Reads variation weights from the remote experiments script.
 *
 * @example
 * ```typescript
 * const provider = new HttpExperimentDataProvider({ timeout: 1000 });
 * const records = await provider.fetch("ft-5xaLPSturFXCPgoFrKg");
 * ```
 */
export class HttpExperimentDataProvider implements ExperimentDataProvider {
  private endpoint: string;
  private timeout: number;
  private cache: FileResponseCache | undefined;
  private debug: boolean;

  constructor(options: HttpProviderOptions = {}) {
    this.endpoint = options.endpoint || DEFAULT_ENDPOINT;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.cache = options.cache;
    this.debug = options.debug ?? false;
  }

  async fetch(experimentId: ExperimentId): Promise<VariationRecord[]> {
    const body = this.cache
      ? await this.cache.getOrLoad(experimentId, () => this.request(experimentId))
      : await this.request(experimentId);

    return parseExperimentResponse(body, experimentId);
  }

  /**
   * Fetch the raw experiments script for one experiment
   */
  async request(experimentId: ExperimentId): Promise<string> {
    const url = `${this.endpoint}?experiment=${encodeURIComponent(experimentId)}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    this.log("Fetching experiment data:", url);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": "" },
        redirect: "follow",
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ProviderError(
          `Unable to retrieve the experiments API response: HTTP ${response.status}`,
          ErrorCodes.HTTP_ERROR,
          { statusCode: response.status }
        );
      }

      const body = await response.text();
      if (!body) {
        throw new ProviderError(
          "Unable to retrieve the experiments API response: empty body",
          ErrorCodes.INVALID_RESPONSE,
          { statusCode: response.status }
        );
      }

      return body;
    } catch (error) {
      if (error instanceof ProviderError) throw error;

      if (error instanceof Error && error.name === "AbortError") {
        throw new ProviderError(
          `Request timed out after ${this.timeout}ms`,
          ErrorCodes.TIMEOUT,
          { cause: error }
        );
      }

      throw new ProviderError(
        error instanceof Error ? error.message : "Network error occurred",
        ErrorCodes.NETWORK_ERROR,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private log(...args: unknown[]): void {
    if (this.debug) {
      console.log("[server-cx]", ...args);
    }
  }
}
