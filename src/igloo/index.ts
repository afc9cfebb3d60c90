// pattern: Functional Core

export type {
  ApplicationName,
  UpdatedWithin,
  DateRange,
  SearchQuery,
  SearchHit,
  SearchResult,
  FetchRequest,
  PagePayload,
  MemberHit,
  MemberProfile,
  ProfileField,
  IglooClient,
  Logger,
  FetchFn,
} from "./types.js";
export { APPLICATION_TYPES, UPDATED_WITHIN } from "./types.js";
export { createIglooClient, type IglooClientOptions } from "./client.js";
export { callWithRetry, computeBackoff, parseRetryAfter, type RetryOptions, type SleepFn } from "./retry.js";
export { buildSearchParams, queryFingerprint } from "./query.js";
export { encodeToken, decodeToken, type TokenState } from "./token.js";
export { normalizeSearchRecord, normalizePage, normalizeMember, normalizeProfileItems } from "./normalize.js";
