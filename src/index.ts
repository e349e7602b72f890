// Core client
export { ContentExperiments, createContentExperiments } from "./client";
export {
  resolveConfig,
  resolveDomainName,
  AUTO_DOMAIN_NAME,
  DEFAULT_COOKIE_PATH,
  DEFAULT_COOKIE_EXPIRATION_SECONDS,
} from "./config";
export type { ResolvedConfig } from "./config";

// Types
export type { ContentExperimentsConfig, ErrorCode, ProviderErrorCode } from "./types";
export { CxError, ConfigurationError, ProviderError, ErrorCodes } from "./types";

// Experiments exports
export {
  Experiment,
  ExperimentSession,
  HttpExperimentDataProvider,
  FileResponseCache,
  createDefaultProvider,
  generateHash,
  selectVariation,
  decodeChosenVariation,
  updateAssignmentCookie,
  updateTimestampCookie,
  parseAssignmentCookie,
  parseTimestampCookie,
  serializeAssignmentCookie,
  serializeTimestampCookie,
  parseExperimentResponse,
  extractExperimentsJson,
  buildExperimentCookies,
  cookieHeader,
  ORIGINAL_VARIATION,
  NO_CHOSEN_VARIATION,
  NOT_PARTICIPATING,
  TIMESTAMP_COOKIE_TTL,
  ASSIGNMENT_COOKIE_NAME,
  TIMESTAMP_COOKIE_NAME,
  DEFAULT_ENDPOINT,
} from "./experiments";
export type {
  ExperimentId,
  VariationRecord,
  ChosenVariation,
  AssignmentEntry,
  TimestampEntry,
  AssignmentCookieState,
  TimestampCookieState,
  CookieField,
  ExperimentDataProvider,
  ChooseVariationInput,
  ChooseVariationResult,
  CookieDescriptor,
  RequestCookies,
  ExperimentRequestOptions,
  VariationDecision,
  HttpProviderOptions,
} from "./experiments";
