/**
 * Externally assigned experiment identifier
 */
export type ExperimentId = string;

/**
 * One row of experiment configuration
 */
export interface VariationRecord {
  /** null excludes the visitor from the experiment */
  variationId: number | null;
  weight: number;
  disabled: boolean;
}

/**
 * Chosen variation number, or one of the reserved sentinels below
 */
export type ChosenVariation = number;

export const ORIGINAL_VARIATION = 0;
export const NO_CHOSEN_VARIATION = -1;
export const NOT_PARTICIPATING = -2;

/**
 * One `.`-delimited field of a cookie value after the domain hash.
 * `entry` is null when the field does not match the expected grammar;
 * such fields are carried through updates verbatim.
 */
export interface CookieField<T> {
  raw: string;
  entry: T | null;
}

/**
 * `<experimentId>$<tag>:<variation>`
 */
export interface AssignmentEntry {
  experimentId: ExperimentId;
  tag: string;
  /** Raw variation spec, possibly holding legacy `-`-separated values */
  variation: string;
}

/**
 * `<experimentId>$<tag>:<timestamp>:<ttl>[:<trailing>]`
 */
export interface TimestampEntry {
  experimentId: ExperimentId;
  tag: string;
  timestamp: string;
  ttl: string;
  trailing?: string;
}

/**
 * Decoded assignment cookie (`__utmx`)
 */
export interface AssignmentCookieState {
  domainHash: string;
  fields: CookieField<AssignmentEntry>[];
}

/**
 * Decoded timestamp cookie (`__utmxx`)
 */
export interface TimestampCookieState {
  domainHash: string;
  fields: CookieField<TimestampEntry>[];
}

/**
 * Source of variation weights for an experiment
 */
export interface ExperimentDataProvider {
  fetch(experimentId: ExperimentId): Promise<VariationRecord[]>;
}

/**
 * Input of a single variation decision
 */
export interface ChooseVariationInput {
  experimentId: ExperimentId;
  assignmentCookie?: string | null;
  timestampCookie?: string | null;
  /** Uniform draw in [0, 1) */
  draw: number;
  /** Seconds since epoch */
  now: number;
  /** Only consulted when cookies are rewritten */
  domainName: () => string;
}

/**
 * Outcome of a single variation decision
 */
export interface ChooseVariationResult {
  variation: ChosenVariation;
  isNewAssignment: boolean;
  assignmentCookie: string;
  timestampCookie: string;
}

/**
 * Cookie to set on the outgoing response
 */
export interface CookieDescriptor {
  name: string;
  value: string;
  expires: Date;
  path: string;
  domain: string;
  secure: boolean;
  httpOnly: boolean;
}

/**
 * Cookie values read from the incoming request
 */
export interface RequestCookies {
  __utmx?: string | null;
  __utmxx?: string | null;
}

/**
 * Options for per-request experiment calls
 */
export interface ExperimentRequestOptions {
  assignmentCookie?: string | null;
  timestampCookie?: string | null;
  /** Request host, used when the domain name is "auto" */
  host?: string;
}

/**
 * Result of Experiment.chooseVariation
 */
export interface VariationDecision {
  variation: ChosenVariation;
  isNewAssignment: boolean;
  /** Empty when the prior assignment was reused */
  cookies: CookieDescriptor[];
}
