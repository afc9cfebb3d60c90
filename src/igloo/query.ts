// pattern: Functional Core

import { createHash } from "node:crypto";
import { ValidationError } from "../errors/index.js";
import { APPLICATION_TYPES, UPDATED_WITHIN } from "./types.js";
import type { ApplicationName, SearchQuery } from "./types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** `YYYY-MM-DD` to the `MM-DD-YYYY` form the search endpoint expects. */
export function toApiDate(isoDate: string): string {
  const match = ISO_DATE.exec(isoDate);
  if (!match) {
    throw new ValidationError("dateRange", `not an ISO date (YYYY-MM-DD): ${isoDate}`);
  }
  const [, year, month, day] = match;
  return `${month}-${day}-${year}`;
}

function urlPathname(value: string): string | null {
  try {
    return new URL(value).pathname;
  } catch {
    return null;
  }
}

export function normalizeParentPath(path: string): string {
  let value = path.trim();
  if (/^https?:\/\//i.test(value)) {
    value = urlPathname(value) ?? value;
  }
  value = value.replace(/\/+$/, "");
  if (!value.startsWith("/")) {
    value = `/${value}`;
  }
  return value;
}

export function uniqueParentPaths(query: SearchQuery): ReadonlyArray<string> {
  const paths = (query.parentPaths ?? [])
    .filter((p) => p.trim() !== "")
    .map(normalizeParentPath);
  return Array.from(new Set(paths));
}

function uniqueApplications(query: SearchQuery): ReadonlyArray<ApplicationName> {
  return Array.from(new Set(query.applications ?? []));
}

/**
 * Parent-path prefixes the remote cannot apply itself. The search endpoint
 * takes a single `parentHref`; two or more prefixes are matched client side.
 */
export function clientSideParentPaths(query: SearchQuery): ReadonlyArray<string> | null {
  const paths = uniqueParentPaths(query);
  return paths.length > 1 ? paths : null;
}

export function matchesParentPath(parentPath: string, prefixes: ReadonlyArray<string>): boolean {
  const path = parentPath.replace(/\/+$/, "");
  return prefixes.some(
    (prefix) => prefix === "/" || path === prefix || path.startsWith(`${prefix}/`),
  );
}

/**
 * Build the query string for one remote call. Filters that are not set are
 * left out entirely.
 */
export function buildSearchParams(
  query: SearchQuery,
  page: { readonly limit: number; readonly offset: number },
): URLSearchParams {
  const params = new URLSearchParams();
  params.set("limit", String(page.limit));
  if (page.offset > 0) {
    params.set("offset", String(page.offset));
  }

  const term = query.term?.trim();
  if (term) {
    params.set("query", term);
  }

  const applications = uniqueApplications(query);
  if (applications.length > 0) {
    params.set("applications", applications.map((name) => APPLICATION_TYPES[name]).join(","));
  }

  const parents = uniqueParentPaths(query);
  if (parents.length === 1 && parents[0] !== undefined) {
    params.set("parentHref", parents[0]);
  }

  if (query.matchAll !== undefined) {
    params.set("searchAll", String(query.matchAll));
  }
  if (query.includeMicroblog !== undefined) {
    params.set("includeMicroblog", String(query.includeMicroblog));
  }
  if (query.includeArchived !== undefined) {
    params.set("includeArchived", String(query.includeArchived));
  }

  if (query.updatedWithin !== undefined) {
    params.set("updatedDateType", UPDATED_WITHIN[query.updatedWithin]);
  } else {
    const range = query.dateRange;
    if (range && (range.start !== undefined || range.end !== undefined)) {
      params.set("updatedDateType", "dateRange");
      if (range.start !== undefined) {
        params.set("updatedFrom", toApiDate(range.start));
      }
      if (range.end !== undefined) {
        params.set("updatedTo", toApiDate(range.end));
      }
    }
  }

  return params;
}

/**
 * Stable digest of every filter that shapes the result sequence. Page size and
 * token are excluded: resuming with a different page size is an equivalent
 * traversal.
 */
export function queryFingerprint(query: SearchQuery): string {
  const canonical = {
    term: query.term?.trim() ?? "",
    applications: [...uniqueApplications(query)].sort(),
    parents: [...uniqueParentPaths(query)].sort(),
    start: query.dateRange?.start ?? null,
    end: query.dateRange?.end ?? null,
    within: query.updatedWithin ?? null,
    matchAll: query.matchAll ?? null,
    microblog: query.includeMicroblog ?? null,
    archived: query.includeArchived ?? null,
  };
  return createHash("sha256").update(JSON.stringify(canonical)).digest("hex").slice(0, 16);
}
