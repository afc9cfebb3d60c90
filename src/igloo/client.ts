// pattern: Imperative Shell

/**
 * HTTP client for an Igloo community.
 * Owns session authentication, per-call timeouts, retries and search
 * pagination. Raw responses go through the normalizer before leaving here.
 */

import { z } from "zod";
import type { IglooConfig } from "../config/schema.js";
import {
  AuthError,
  CancelledError,
  ClientError,
  ConversionError,
  MalformedRecordError,
  NotFoundError,
  TransientError,
  ValidationError,
  isToolError,
} from "../errors/index.js";
import {
  normalizeMember,
  normalizeObjectView,
  normalizePage,
  normalizeProfileItems,
  normalizeSearchRecord,
  type PageMetadata,
} from "./normalize.js";
import {
  buildSearchParams,
  clientSideParentPaths,
  matchesParentPath,
  queryFingerprint,
} from "./query.js";
import { callWithRetry, parseRetryAfter, type SleepFn } from "./retry.js";
import { decodeToken, encodeToken } from "./token.js";
import type {
  FetchFn,
  FetchRequest,
  IglooClient,
  Logger,
  MemberHit,
  MemberProfile,
  PagePayload,
  SearchHit,
  SearchQuery,
  SearchResult,
} from "./types.js";

const SESSION_PATH = "/.api/api.svc/session/create";
const MEMBER_SEARCH_PATH = "/.api/api.svc/search/members";
const ERROR_DETAIL_LENGTH = 200;

const SessionResponseSchema = z.object({
  response: z.object({ sessionKey: z.string().min(1) }).passthrough(),
});

const SearchPageSchema = z.object({
  results: z.array(z.unknown()).nullish(),
  numFound: z.number().int().nonnegative().optional().catch(undefined),
});

const MemberSearchSchema = z.object({
  response: z
    .object({
      value: z.object({ hit: z.array(z.unknown()).nullish() }).nullish(),
    })
    .nullish(),
});

const MemberViewSchema = z.object({
  response: z.unknown(),
});

const ProfileSchema = z.object({
  response: z
    .object({ items: z.array(z.unknown()).nullish().catch(null) })
    .nullish()
    .catch(null),
});

export type IglooClientOptions = {
  readonly fetch?: FetchFn;
  readonly logger?: Logger;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
};

type RequestSpec = {
  readonly method: "GET" | "POST";
  readonly accept: string;
};

// consumes a successful response; runs inside the retried attempt
type BodyReader<T> = (response: Response) => Promise<T>;

type HtmlBody = {
  readonly html: string;
  readonly lastModified: string | null;
};

const JSON_GET: RequestSpec = { method: "GET", accept: "application/json" };

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readDetail(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.replace(/\s+/g, " ").trim().slice(0, ERROR_DETAIL_LENGTH);
  } catch (error) {
    return `(unreadable body: ${messageOf(error)})`;
  }
}

async function classifyStatus(response: Response, label: string): Promise<Error> {
  const status = response.status;
  const detail = await readDetail(response);
  const message = `${label} failed: ${status} ${response.statusText}${detail ? ` - ${detail}` : ""}`;

  if (status === 401 || status === 403) {
    return new AuthError(message, status);
  }
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 408 || status === 429 || status >= 500) {
    const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
    return new TransientError(message, retryAfterMs !== undefined ? { retryAfterMs } : {});
  }
  return new ClientError(message, status);
}

function readJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): BodyReader<T> {
  return async (response) => {
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new TransientError(`${label} returned a body that is not JSON: ${messageOf(error)}`, { cause: error });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransientError(`${label} returned an unexpected response shape`);
    }
    return parsed.data;
  };
}

const readHtml: BodyReader<HtmlBody> = async (response) => {
  const contentType = response.headers.get("content-type") ?? "not specified";
  if (!/text\/html|application\/xhtml\+xml/i.test(contentType)) {
    await response.body?.cancel();
    throw new ConversionError(`unsupported content type: ${contentType}`);
  }
  return { html: await response.text(), lastModified: response.headers.get("last-modified") };
};

/**
 * Waits for `promise` unless `signal` aborts first. The promise itself keeps
 * running, so work shared with other callers is not cut short.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined, label: string): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError(`${label} cancelled`, { cause: signal.reason }));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancelledError(`${label} cancelled`, { cause: signal.reason }));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export function createIglooClient(
  config: IglooConfig,
  options: IglooClientOptions = {},
): IglooClient {
  const community = config.community.replace(/\/+$/, "");
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const logger: Logger = options.logger ?? console;
  const searchPath = `/.api2/api/v1/communities/${encodeURIComponent(config.community_key)}/search/contentDetailed`;

  // Shared across calls; created once and dropped on any auth rejection.
  let session: Promise<string> | null = null;

  async function sendOnce<T>(
    url: URL,
    spec: RequestSpec,
    sessionKey: string | null,
    signal: AbortSignal | undefined,
    read: BodyReader<T>,
  ): Promise<T> {
    const label = `${spec.method} ${url.pathname}`;
    const timeout = AbortSignal.timeout(config.request_timeout_ms);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    const headers: Record<string, string> = { Accept: spec.accept };
    if (sessionKey !== null) {
      headers["Cookie"] = `iglooAuth=${sessionKey}`;
    }

    // the same signal governs the body, so an abort can land in either phase
    const interrupted = (error: unknown): Error => {
      if (signal?.aborted) {
        return new CancelledError(`${label} cancelled`, { cause: error });
      }
      if (timeout.aborted) {
        return new TransientError(`${label} timed out after ${config.request_timeout_ms}ms`, { cause: error });
      }
      return new TransientError(`${label} failed: ${messageOf(error)}`, { cause: error });
    };

    let response: Response;
    try {
      response = await fetchFn(url, { method: spec.method, headers, signal: combined });
    } catch (error) {
      throw interrupted(error);
    }

    if (!response.ok) {
      throw await classifyStatus(response, label);
    }

    try {
      return await read(response);
    } catch (error) {
      if (isToolError(error)) {
        throw error;
      }
      throw interrupted(error);
    }
  }

  function withRetry<T>(
    url: URL,
    spec: RequestSpec,
    sessionKey: string | null,
    signal: AbortSignal | undefined,
    read: BodyReader<T>,
  ): Promise<T> {
    return callWithRetry(() => sendOnce(url, spec, sessionKey, signal, read), {
      maxAttempts: config.max_retries,
      initialBackoffMs: config.initial_backoff_ms,
      maxBackoffMs: config.max_backoff_ms,
      isRetryableError: (error) => error instanceof TransientError,
      retryAfterMs: (error) => (error instanceof TransientError ? error.retryAfterMs : undefined),
      onError: (error, attempt) => {
        if (error instanceof TransientError) {
          logger.warn(`[igloo] ${url.pathname} attempt ${attempt + 1}/${config.max_retries}: ${error.message}`);
        }
      },
      ...(signal && { signal }),
      ...(options.sleep && { sleep: options.sleep }),
      ...(options.random && { random: options.random }),
    });
  }

  async function createSession(): Promise<string> {
    const url = new URL(`${community}${SESSION_PATH}`);
    url.searchParams.set("appId", config.app_id);
    url.searchParams.set("appPass", config.app_pass);
    url.searchParams.set("apiversion", "1");
    url.searchParams.set("community", community);
    url.searchParams.set("username", config.username);
    url.searchParams.set("password", config.password);

    const body = await withRetry(
      url,
      { method: "POST", accept: "application/json" },
      null,
      undefined,
      readJson(z.unknown(), "session create"),
    );
    const parsed = SessionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("session create returned no session key");
    }
    return parsed.data.response.sessionKey;
  }

  function getSession(): Promise<string> {
    if (session === null) {
      const pending = createSession();
      session = pending;
      pending.catch(() => {
        if (session === pending) {
          session = null;
        }
      });
    }
    return session;
  }

  async function request<T>(
    url: URL,
    spec: RequestSpec,
    signal: AbortSignal | undefined,
    read: BodyReader<T>,
  ): Promise<T> {
    const sessionPromise = getSession();
    const sessionKey = await untilAborted(sessionPromise, signal, `${spec.method} ${url.pathname}`);
    try {
      return await withRetry(url, spec, sessionKey, signal, read);
    } catch (error) {
      if (error instanceof AuthError && session === sessionPromise) {
        logger.error(`[igloo] credentials rejected for ${url.pathname}; session cleared`);
        session = null;
      }
      throw error;
    }
  }

  function apiUrl(path: string): URL {
    return new URL(`${community}${path}`);
  }

  function assertCommunityUrl(raw: string): URL {
    const candidate = raw.trim();
    const belongs =
      candidate === community ||
      candidate.startsWith(`${community}/`) ||
      candidate.startsWith(`${community}?`);
    if (!belongs) {
      throw new ValidationError("url", `must belong to community ${community}, got ${candidate}`);
    }
    try {
      return new URL(candidate);
    } catch (error) {
      throw new ValidationError("url", `not a valid URL: ${messageOf(error)}`);
    }
  }

  async function loadPage(
    url: URL,
    metadata: PageMetadata | undefined,
    signal: AbortSignal | undefined,
  ): Promise<PagePayload> {
    const body = await request(url, { method: "GET", accept: "text/html" }, signal, readHtml);
    return normalizePage({
      requestUrl: url.href,
      html: body.html,
      ...(metadata && { metadata }),
      lastModifiedHeader: body.lastModified,
    });
  }

  function normalizeOrDrop(raw: unknown): SearchHit | null {
    try {
      return normalizeSearchRecord(raw, community);
    } catch (error) {
      if (error instanceof MalformedRecordError) {
        logger.warn(`[igloo] dropping search record: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  return {
    community,

    async search(query: SearchQuery, signal?: AbortSignal): Promise<SearchResult> {
      const pageSize = query.pageSize ?? config.default_page_size;
      const fingerprint = queryFingerprint(query);
      const prefixes = clientSideParentPaths(query);

      let offset = 0;
      if (query.pageToken !== undefined) {
        const state = decodeToken(query.pageToken);
        if (state.fingerprint !== fingerprint) {
          throw new ValidationError("pageToken", "token belongs to a different query");
        }
        offset = state.offset;
      }

      const hits: Array<SearchHit> = [];
      let totalFound: number | undefined;
      let exhausted = false;

      // Pages are requested one after another: each offset depends on how
      // many records the previous page yielded.
      while (hits.length < pageSize) {
        if (signal?.aborted) {
          throw new CancelledError("search cancelled", { cause: signal.reason });
        }

        const limit = Math.min(config.per_call_limit, pageSize - hits.length);
        const url = apiUrl(searchPath);
        url.search = buildSearchParams(query, { limit, offset }).toString();

        const page = await request(url, JSON_GET, signal, readJson(SearchPageSchema, "search"));
        const records = page.results ?? [];
        totalFound = page.numFound ?? totalFound;

        let consumed = 0;
        for (const raw of records) {
          consumed++;
          const hit = normalizeOrDrop(raw);
          if (hit !== null && (prefixes === null || matchesParentPath(hit.parentPath, prefixes))) {
            hits.push(hit);
          }
          if (hits.length >= pageSize) {
            break;
          }
        }
        offset += consumed;

        const drained = consumed === records.length;
        const noMoreRemote =
          records.length < limit || (totalFound !== undefined && offset >= totalFound);
        if (drained && noMoreRemote) {
          exhausted = true;
          break;
        }
      }

      return {
        hits,
        ...(!exhausted && { nextPageToken: encodeToken({ offset, fingerprint }) }),
        ...(totalFound !== undefined && { totalFound }),
      };
    },

    async fetchPage(fetchRequest: FetchRequest, signal?: AbortSignal): Promise<PagePayload> {
      if (fetchRequest.url !== undefined) {
        return loadPage(assertCommunityUrl(fetchRequest.url), undefined, signal);
      }
      if (fetchRequest.id !== undefined) {
        const id = fetchRequest.id;
        const view = await request(
          apiUrl(`/.api/api.svc/objects/${encodeURIComponent(id)}/view`),
          JSON_GET,
          signal,
          readJson(z.unknown(), "object view"),
        );
        const metadata = normalizeObjectView(view, community, id);
        return loadPage(assertCommunityUrl(metadata.url), metadata, signal);
      }
      throw new ValidationError("id", "either id or url is required");
    },

    async searchMembers(query: string, limit: number, signal?: AbortSignal): Promise<ReadonlyArray<MemberHit>> {
      const url = apiUrl(MEMBER_SEARCH_PATH);
      url.searchParams.set("q", query);

      const found = await request(url, JSON_GET, signal, readJson(MemberSearchSchema, "member search"));

      const members: Array<MemberHit> = [];
      for (const raw of found.response?.value?.hit ?? []) {
        if (members.length >= limit) break;
        try {
          members.push(normalizeMember(raw, community));
        } catch (error) {
          if (!(error instanceof MalformedRecordError)) throw error;
          logger.warn(`[igloo] dropping member record: ${error.message}`);
        }
      }
      return members;
    },

    async getMemberProfile(id: string, signal?: AbortSignal): Promise<MemberProfile> {
      const encoded = encodeURIComponent(id);
      // the two lookups share a fate: when one fails the other is aborted
      const siblings = new AbortController();
      const linked = signal ? AbortSignal.any([signal, siblings.signal]) : siblings.signal;
      const abortSibling = (error: unknown): never => {
        siblings.abort(error);
        throw error;
      };

      const [view, profile] = await Promise.all([
        request(
          apiUrl(`/.api/api.svc/users/${encoded}/view`),
          JSON_GET,
          linked,
          readJson(MemberViewSchema, "member view"),
        ).catch(abortSibling),
        request(
          apiUrl(`/.api/api.svc/users/${encoded}/viewprofile`),
          JSON_GET,
          linked,
          readJson(ProfileSchema, "member profile"),
        ).catch(abortSibling),
      ]);

      if (view.response === null || view.response === undefined) {
        throw new NotFoundError(`no member with id ${id}`);
      }
      const member = normalizeMember(view.response, community);
      const { fields, managerId } = normalizeProfileItems(profile.response?.items ?? []);

      let managerName: string | undefined;
      if (managerId !== undefined) {
        try {
          const manager = await request(
            apiUrl(`/.api/api.svc/users/${encodeURIComponent(managerId)}/view`),
            JSON_GET,
            signal,
            readJson(MemberViewSchema, "manager view"),
          );
          if (manager.response) {
            managerName = normalizeMember(manager.response, community).fullName;
          }
        } catch (error) {
          if (error instanceof CancelledError || error instanceof AuthError) throw error;
          logger.warn(`[igloo] could not resolve manager ${managerId}: ${messageOf(error)}`);
        }
      }

      return { ...member, ...(managerName !== undefined && { managerName }), fields };
    },
  };
}
