// pattern: Functional Core

/**
 * Adapters from the platform's raw JSON (and page HTML) to the stable shapes in
 * types.ts. Optional fields of the wrong type become empty values; a missing
 * identifier, title or URL raises MalformedRecordError.
 */

import { z } from "zod";
import { parseHTML } from "linkedom";
import { MalformedRecordError, NotFoundError } from "../errors/index.js";
import type { MemberHit, PagePayload, ProfileField, SearchHit } from "./types.js";

const EXCERPT_LENGTH = 200;

const optionalString = z.string().optional().catch(undefined);
const optionalCount = z.number().nonnegative().optional().catch(undefined);
const optionalFlag = z.boolean().optional().catch(undefined);

const RawSearchRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number()]),
  title: z.string().trim().min(1),
  full_url: z.string().min(1),
  href: optionalString,
  parent_href: optionalString,
  type: optionalString,
  modified_date: optionalString,
  description: z.string().nullish().catch(undefined),
  content: z.string().nullish().catch(undefined),
  views_count: optionalCount,
  comments_count: optionalCount,
  likes_count: optionalCount,
  labels: z.record(z.string(), z.unknown()).optional().catch(undefined),
  is_recommended: optionalFlag,
  is_archived: optionalFlag,
});

const RawObjectViewSchema = z.object({
  response: z
    .object({
      id: z.union([z.string(), z.number()]).optional(),
      title: optionalString,
      href: optionalString,
      modifiedDate: optionalString,
    })
    .nullish(),
});

const RawMemberSchema = z.object({
  id: z.union([z.string().min(1), z.number()]),
  name: z
    .object({ fullName: optionalString })
    .optional()
    .catch(undefined),
  email: optionalString,
  namespace: optionalString,
});

const RawProfileItemSchema = z.object({
  Name: z.string(),
  Value: z.union([z.string(), z.number()]).nullish(),
});

const PROFILE_FIELD_LABELS: Readonly<Record<string, string>> = {
  title: "Job Title",
  department: "Department",
  i_report_to_email: "Manager Email",
  office_location: "Office",
  desk_number: "Desk",
  busphone: "Work Phone",
  extension: "Extension",
  cellphone: "Mobile",
  work_start_date: "Start Date",
};

const MANAGER_FIELD = "i_report_to";

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? issue.path.join(".") : "record"))
    .join(", ");
}

function resolveUrl(url: string, base: string): string | null {
  try {
    return new URL(url, base).href;
  } catch {
    return null;
  }
}

function resolveAgainst(url: string, community: string): string | null {
  return resolveUrl(url, `${community}/`);
}

export function clipText(text: string, maxLength = EXCERPT_LENGTH): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxLength) {
    return collapsed;
  }
  const head = collapsed.slice(0, maxLength);
  const space = head.lastIndexOf(" ");
  return `${space > 0 ? head.slice(0, space) : head}...`;
}

export function parentOf(href: string): string {
  const path = href.replace(/\/+$/, "");
  const slash = path.lastIndexOf("/");
  if (slash < 0) return "";
  if (slash === 0) return "/";
  return path.slice(0, slash);
}

export function normalizeSearchRecord(raw: unknown, community: string): SearchHit {
  const parsed = RawSearchRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `malformed search record: missing or invalid ${describeIssues(parsed.error)}`,
      raw,
    );
  }
  const record = parsed.data;

  const url = resolveAgainst(record.full_url, community);
  if (url === null) {
    throw new MalformedRecordError(`malformed search record: unusable full_url ${record.full_url}`, raw);
  }

  const parentPath =
    record.parent_href !== undefined
      ? record.parent_href.replace(/\/+$/, "") || "/"
      : record.href !== undefined
        ? parentOf(record.href)
        : "";

  const excerptSource = record.description?.trim() || record.content?.trim() || "";
  const labels = record.labels ? Object.values(record.labels).map((value) => String(value)) : [];

  return {
    id: String(record.id),
    title: record.title,
    url,
    application: record.type ?? "",
    parentPath,
    lastModified: record.modified_date ?? null,
    ...(excerptSource !== "" && { excerpt: clipText(excerptSource) }),
    ...(record.views_count !== undefined && { views: record.views_count }),
    ...(record.comments_count !== undefined && { comments: record.comments_count }),
    ...(record.likes_count !== undefined && { likes: record.likes_count }),
    ...(labels.length > 0 && { labels }),
    ...(record.is_recommended !== undefined && { recommended: record.is_recommended }),
    ...(record.is_archived !== undefined && { archived: record.is_archived }),
  };
}

export type PageMetadata = {
  readonly url: string;
  readonly title?: string;
  readonly lastModified?: string;
};

/**
 * Metadata for a page looked up by identifier. An empty `response` means the
 * object does not exist.
 */
export function normalizeObjectView(raw: unknown, community: string, id: string): PageMetadata {
  const parsed = RawObjectViewSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError(`malformed object view: ${describeIssues(parsed.error)}`, raw);
  }
  const view = parsed.data.response;
  if (!view || (view.id === undefined && view.href === undefined)) {
    throw new NotFoundError(`no page with id ${id}`);
  }
  if (view.href === undefined) {
    throw new MalformedRecordError(`object ${id} has no href`, raw);
  }
  const url = resolveAgainst(view.href, community);
  if (url === null) {
    throw new MalformedRecordError(`object ${id} has an unusable href ${view.href}`, raw);
  }

  return {
    url,
    ...(view.title !== undefined && view.title.trim() !== "" && { title: view.title.trim() }),
    ...(view.modifiedDate !== undefined && { lastModified: view.modifiedDate }),
  };
}

export type RawPage = {
  readonly requestUrl: string;
  readonly html: string;
  readonly metadata?: PageMetadata;
  readonly lastModifiedHeader?: string | null;
};

function httpDateToIso(value: string | null | undefined): string | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export function normalizePage(raw: RawPage): PagePayload {
  const { document } = parseHTML(raw.html);

  const headTitle = document.querySelector("title")?.textContent?.trim() ?? "";
  const heading = document.querySelector("h1")?.textContent?.trim() ?? "";
  const title = raw.metadata?.title || headTitle || heading || raw.requestUrl;

  const canonicalHref = document.querySelector('link[rel="canonical"]')?.getAttribute("href");
  const canonical = canonicalHref ? resolveUrl(canonicalHref, raw.requestUrl) : null;

  return {
    url: canonical ?? raw.requestUrl,
    title,
    html: raw.html,
    lastModified: raw.metadata?.lastModified ?? httpDateToIso(raw.lastModifiedHeader),
  };
}

export function normalizeMember(raw: unknown, community: string): MemberHit {
  const parsed = RawMemberSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `malformed member record: missing or invalid ${describeIssues(parsed.error)}`,
      raw,
    );
  }
  const member = parsed.data;
  const username = member.namespace ?? "";

  return {
    id: String(member.id),
    fullName: member.name?.fullName ?? "Unknown",
    email: member.email ?? "",
    username,
    profileUrl: username ? `${community}/.profile/${username}` : "",
  };
}

export type NormalizedProfile = {
  readonly fields: ReadonlyArray<ProfileField>;
  readonly managerId?: string;
};

/**
 * Keeps only whitelisted profile fields, in platform order, with display
 * labels. Date values arrive as "M/D/YYYY h:mm:ss" and keep only the date.
 */
export function normalizeProfileItems(items: ReadonlyArray<unknown>): NormalizedProfile {
  const fields: Array<ProfileField> = [];
  let managerId: string | undefined;

  for (const item of items) {
    const parsed = RawProfileItemSchema.safeParse(item);
    if (!parsed.success) continue;

    const name = parsed.data.Name;
    const rawValue = parsed.data.Value;
    const value = rawValue === null || rawValue === undefined ? "" : String(rawValue).trim();
    if (value === "" || value === "null") continue;

    if (name === MANAGER_FIELD) {
      managerId = value;
      continue;
    }

    const label = PROFILE_FIELD_LABELS[name];
    if (!label) continue;

    const cleaned = name.includes("date") && value.includes(" ") ? (value.split(" ")[0] ?? value) : value;
    fields.push({ label, value: cleaned });
  }

  return { fields, ...(managerId !== undefined && { managerId }) };
}
