/**
 * Codec for the two experiment cookies written by the tracking client.
 *
 * Assignment cookie (`__utmx`):
 *   159991919.ft-5xaLPSturFXCPgoFrKg$0:1.ft-6uzLPSelrFQsPgouIkD$0:2
 *   [DOMAIN_HASH].[EXPERIMENT_ID]$[TAG]:[VARIATION].…
 *
 * Timestamp cookie (`__utmxx`):
 *   159991919.ft-5xaLPSturFXCPgoFrKg$0:1380888455:8035200
 *   [DOMAIN_HASH].[EXPERIMENT_ID]$[TAG]:[TIMESTAMP]:[TTL][:TRAILING].…
 *
 * Fields that do not match the grammar are skipped when reading and kept
 * verbatim when rewriting. Nothing here throws on cookie input.
 */

import { generateHash } from "./hash";
import type {
  AssignmentCookieState,
  AssignmentEntry,
  CookieField,
  ExperimentId,
  TimestampCookieState,
  TimestampEntry,
} from "./types";

const FIELD_SEPARATOR = ".";
const TAG_SEPARATOR = "$";
const VALUE_SEPARATOR = ":";
const LEGACY_VARIATION_SEPARATOR = "-";

/** Hardcoded in the tracking client; not configurable */
export const TIMESTAMP_COOKIE_TTL = "8035200";

/** Tag written for newly added experiments */
export const DEFAULT_TAG = "0";

/**
 * Leading integer of a string: optional whitespace, optional sign, digits.
 * Anything else yields 0. Exponent and decimal notation stop the digits, so
 * "1e2" reads as 1, the way the tracking client reads the cookie.
 */
export function parseLeadingInt(value: string): number {
  const match = /^\s*([+-]?\d+)/.exec(value);
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Splits `<id>$<tag>:<rest>`. The id runs up to the first `$`, the tag up to
 * the next `:`; both must be non-empty.
 */
function splitHead(
  raw: string
): { experimentId: string; tag: string; rest: string } | null {
  const dollar = raw.indexOf(TAG_SEPARATOR);
  if (dollar <= 0) return null;

  const colon = raw.indexOf(VALUE_SEPARATOR, dollar + 1);
  if (colon <= dollar + 1) return null;

  return {
    experimentId: raw.slice(0, dollar),
    tag: raw.slice(dollar + 1, colon),
    rest: raw.slice(colon + 1),
  };
}

export function parseAssignmentField(raw: string): AssignmentEntry | null {
  const head = splitHead(raw);
  if (!head) return null;

  return { experimentId: head.experimentId, tag: head.tag, variation: head.rest };
}

export function parseTimestampField(raw: string): TimestampEntry | null {
  const head = splitHead(raw);
  if (!head) return null;

  const { rest } = head;
  const timestampEnd = rest.indexOf(VALUE_SEPARATOR);
  if (timestampEnd <= 0) return null;

  const afterTimestamp = rest.slice(timestampEnd + 1);
  const ttlEnd = afterTimestamp.indexOf(VALUE_SEPARATOR);
  const ttl = ttlEnd === -1 ? afterTimestamp : afterTimestamp.slice(0, ttlEnd);
  if (ttl === "") return null;

  const entry: TimestampEntry = {
    experimentId: head.experimentId,
    tag: head.tag,
    timestamp: rest.slice(0, timestampEnd),
    ttl,
  };

  const trailing = ttlEnd === -1 ? "" : afterTimestamp.slice(ttlEnd + 1);
  if (trailing !== "") {
    entry.trailing = trailing;
  }

  return entry;
}

function parseCookie<T>(
  value: string | null | undefined,
  parseField: (raw: string) => T | null
): { domainHash: string; fields: CookieField<T>[] } | null {
  const parts = (value ?? "").split(FIELD_SEPARATOR);
  if (parts.length < 2) return null;

  const [domainHash, ...rest] = parts;
  return {
    domainHash,
    fields: rest.map((raw) => ({ raw, entry: parseField(raw) })),
  };
}

/**
 * Decodes an assignment cookie, or returns null when it holds no fields
 */
export function parseAssignmentCookie(
  value: string | null | undefined
): AssignmentCookieState | null {
  return parseCookie(value, parseAssignmentField);
}

/**
 * Decodes a timestamp cookie, or returns null when it holds no fields
 */
export function parseTimestampCookie(
  value: string | null | undefined
): TimestampCookieState | null {
  return parseCookie(value, parseTimestampField);
}

export function formatAssignmentEntry(entry: AssignmentEntry): string {
  return `${entry.experimentId}${TAG_SEPARATOR}${entry.tag}${VALUE_SEPARATOR}${entry.variation}`;
}

export function formatTimestampEntry(entry: TimestampEntry): string {
  const trailing = entry.trailing ? `${VALUE_SEPARATOR}${entry.trailing}` : "";
  return [
    `${entry.experimentId}${TAG_SEPARATOR}${entry.tag}`,
    entry.timestamp,
    entry.ttl,
  ].join(VALUE_SEPARATOR) + trailing;
}

function serializeCookie(domainHash: string, fields: readonly CookieField<unknown>[]): string {
  return [domainHash, ...fields.map((field) => field.raw)].join(FIELD_SEPARATOR);
}

export function serializeAssignmentCookie(state: AssignmentCookieState): string {
  return serializeCookie(state.domainHash, state.fields);
}

export function serializeTimestampCookie(state: TimestampCookieState): string {
  return serializeCookie(state.domainHash, state.fields);
}

/**
 * Variation stored for an experiment, or null when the cookie has none.
 * Only the first `-`-separated value counts; the rest is a deprecated format.
 */
export function decodeChosenVariation(
  value: string | null | undefined,
  experimentId: ExperimentId
): number | null {
  const state = parseAssignmentCookie(value);
  if (!state) return null;

  for (const { entry } of state.fields) {
    if (entry && entry.experimentId === experimentId) {
      const [first] = entry.variation.split(LEGACY_VARIATION_SEPARATOR);
      return parseLeadingInt(first);
    }
  }

  return null;
}

/**
 * Rewrites matching fields with `update`, or appends `created` when none
 * matches. A missing or field-less cookie gets a fresh domain hash.
 */
function upsert<T extends { experimentId: ExperimentId }>(
  state: { domainHash: string; fields: CookieField<T>[] } | null,
  experimentId: ExperimentId,
  domainName: string,
  update: (entry: T) => T,
  created: T,
  format: (entry: T) => string
): { domainHash: string; fields: CookieField<T>[] } {
  if (!state) {
    return {
      domainHash: String(generateHash(domainName)),
      fields: [{ raw: format(created), entry: created }],
    };
  }

  let found = false;
  const fields = state.fields.map((field) => {
    if (!field.entry || field.entry.experimentId !== experimentId) return field;

    found = true;
    const entry = update(field.entry);
    return { raw: format(entry), entry };
  });

  if (!found) {
    fields.push({ raw: format(created), entry: created });
  }

  return { domainHash: state.domainHash, fields };
}

/**
 * New assignment cookie value recording `variation` for the experiment
 */
export function updateAssignmentCookie(
  previous: string | null | undefined,
  experimentId: ExperimentId,
  variation: number,
  domainName: string
): string {
  const value = String(variation);
  const state = upsert(
    parseAssignmentCookie(previous),
    experimentId,
    domainName,
    (entry) => ({ ...entry, variation: value }),
    { experimentId, tag: DEFAULT_TAG, variation: value },
    formatAssignmentEntry
  );
  return serializeAssignmentCookie(state);
}

/**
 * New timestamp cookie value stamping the experiment with `now` (seconds)
 */
export function updateTimestampCookie(
  previous: string | null | undefined,
  experimentId: ExperimentId,
  now: number,
  domainName: string
): string {
  const timestamp = String(now);
  const state = upsert(
    parseTimestampCookie(previous),
    experimentId,
    domainName,
    (entry) => ({ ...entry, timestamp }),
    { experimentId, tag: DEFAULT_TAG, timestamp, ttl: TIMESTAMP_COOKIE_TTL },
    formatTimestampEntry
  );
  return serializeTimestampCookie(state);
}
