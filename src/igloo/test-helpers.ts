// pattern: Imperative Shell

/**
 * In-process stand-in for an Igloo community, served through an injected
 * fetch implementation. Only the endpoints the client uses are modelled.
 */

import { vi } from "vitest";
import type { IglooConfig } from "../config/schema.js";

export const COMMUNITY = "https://community.example.com";
export const SESSION_KEY = "test-session";

export function makeConfig(overrides: Partial<IglooConfig> = {}): IglooConfig {
  return {
    community: COMMUNITY,
    community_key: "10",
    app_id: "test-app",
    app_pass: "test-secret",
    username: "reader",
    password: "test-password",
    default_page_size: 20,
    max_page_size: 100,
    per_call_limit: 50,
    request_timeout_ms: 1000,
    max_retries: 3,
    initial_backoff_ms: 0,
    max_backoff_ms: 10000,
    ...overrides,
  };
}

export function makeRecord(i: number, parent = "/docs"): Record<string, unknown> {
  return {
    id: i,
    title: `Doc ${i}`,
    full_url: `${COMMUNITY}${parent}/${i}`,
    href: `${parent}/${i}`,
    type: "wiki",
    modified_date: "2025-09-01T10:00:00Z",
  };
}

export type FakePage = {
  readonly html: string;
  readonly contentType?: string;
  readonly lastModified?: string;
};

export type FakeFailure = {
  // substring of the request path this failure applies to
  readonly match: string;
  readonly status?: number;
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly throws?: Error;
  // answers 200 with these headers, then never sends the body until aborted
  readonly stallBody?: boolean;
};

export type FakeIglooOptions = {
  readonly records?: ReadonlyArray<unknown>;
  // omitted from responses when null
  readonly numFound?: number | null;
  readonly pages?: Readonly<Record<string, FakePage>>;
  readonly objects?: Readonly<Record<string, unknown>>;
  readonly members?: ReadonlyArray<unknown>;
  readonly users?: Readonly<Record<string, unknown>>;
  readonly profiles?: Readonly<Record<string, ReadonlyArray<unknown>>>;
  readonly failures?: ReadonlyArray<FakeFailure>;
  // requests whose path contains this never answer until aborted
  readonly hangOn?: string;
};

export type RecordedCall = {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly signal: AbortSignal | undefined;
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function notFound(): Response {
  return new Response("not found", { status: 404, statusText: "Not Found" });
}

export function createFakeIgloo(options: FakeIglooOptions = {}) {
  const calls: Array<RecordedCall> = [];
  const failures = [...(options.failures ?? [])];
  const records = options.records ?? [];

  const fetch = vi.fn(async (input: string | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(String(input));
    const path = url.pathname;
    calls.push({
      method: init?.method ?? "GET",
      url,
      headers: new Headers(init?.headers),
      signal: init?.signal ?? undefined,
    });

    if (options.hangOn !== undefined && path.includes(options.hangOn)) {
      const signal = init?.signal;
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    }

    const failureIndex = failures.findIndex((f) => path.includes(f.match));
    const failure = failureIndex >= 0 ? failures.splice(failureIndex, 1)[0] : undefined;
    if (failure) {
      if (failure.throws) {
        throw failure.throws;
      }
      if (failure.stallBody) {
        const signal = init?.signal;
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            signal?.addEventListener("abort", () => controller.error(signal.reason), { once: true });
          },
        });
        return new Response(body, {
          status: 200,
          headers: failure.headers ?? { "content-type": "application/json" },
        });
      }
      return new Response(failure.body ?? "failure", {
        status: failure.status ?? 500,
        ...(failure.headers && { headers: failure.headers }),
      });
    }

    if (path === "/.api/api.svc/session/create") {
      return json({ response: { sessionKey: SESSION_KEY } });
    }

    if (path.endsWith("/search/contentDetailed")) {
      const limit = Number(url.searchParams.get("limit") ?? "20");
      const offset = Number(url.searchParams.get("offset") ?? "0");
      const results = records.slice(offset, offset + limit);
      const numFound = options.numFound === undefined ? records.length : options.numFound;
      return json(numFound === null ? { results } : { results, numFound });
    }

    const objectMatch = /^\/\.api\/api\.svc\/objects\/([^/]+)\/view$/.exec(path);
    if (objectMatch?.[1] !== undefined) {
      const id = decodeURIComponent(objectMatch[1]);
      return json({ response: options.objects?.[id] ?? null });
    }

    if (path === "/.api/api.svc/search/members") {
      return json({ response: { value: { hit: options.members ?? [] } } });
    }

    const userMatch = /^\/\.api\/api\.svc\/users\/([^/]+)\/(view|viewprofile)$/.exec(path);
    if (userMatch?.[1] !== undefined) {
      const id = decodeURIComponent(userMatch[1]);
      const user = options.users?.[id];
      if (user === undefined) {
        return notFound();
      }
      return userMatch[2] === "view"
        ? json({ response: user })
        : json({ response: { items: options.profiles?.[id] ?? [] } });
    }

    const page = options.pages?.[url.href];
    if (page) {
      const headers: Record<string, string> = {
        "content-type": page.contentType ?? "text/html; charset=utf-8",
      };
      if (page.lastModified) {
        headers["last-modified"] = page.lastModified;
      }
      return new Response(page.html, { status: 200, headers });
    }

    return notFound();
  });

  return {
    fetch,
    calls,
    callsTo(fragment: string): Array<RecordedCall> {
      return calls.filter((call) => call.url.pathname.includes(fragment));
    },
  };
}

export function createLogger() {
  return { warn: vi.fn(), error: vi.fn() };
}
