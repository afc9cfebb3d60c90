// pattern: Imperative Shell

/**
 * Typed operations behind the tools.
 * Every input is validated before the client is touched, and every outcome is
 * returned as a Result so no exception crosses the tool boundary.
 */

import type { FetchConfig, IglooConfig } from '../config/schema.js';
import { CancelledError, isToolError, toToolFailure, ValidationError, type ToolFailure } from '../errors/index.js';
import {
  APPLICATION_TYPES,
  UPDATED_WITHIN,
  type ApplicationName,
  type DateRange,
  type FetchRequest,
  type IglooClient,
  type Logger,
  type MemberHit,
  type MemberProfile,
  type SearchQuery,
  type SearchResult,
  type UpdatedWithin,
} from '../igloo/index.js';
import { convertHtml, extractMainContent } from '../markdown/index.js';

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ToolFailure };

export type SearchInput = Omit<SearchQuery, 'applications' | 'updatedWithin'> & {
  readonly applications?: ReadonlyArray<string>;
  readonly updatedWithin?: string;
};

export type FetchInput = {
  readonly id?: string;
  readonly url?: string;
  readonly startIndex?: number;
};

export type FetchResult = {
  readonly title: string;
  readonly url: string;
  readonly markdown: string;
  readonly lastModified: string | null;
  readonly truncated: boolean;
  readonly totalLength: number;
  readonly startIndex: number;
  readonly nextStartIndex?: number;
};

export type FetchManyInput = {
  readonly urls: ReadonlyArray<string>;
  readonly id?: string;
  readonly startIndex?: number;
};

// one entry per requested URL, in request order
export type PageOutcome = {
  readonly url: string;
  readonly result: Result<FetchResult>;
};

export type Operations = {
  search(input: SearchInput, signal?: AbortSignal): Promise<Result<SearchResult>>;
  fetch(input: FetchInput, signal?: AbortSignal): Promise<Result<FetchResult>>;
  fetchMany(input: FetchManyInput, signal?: AbortSignal): Promise<Result<ReadonlyArray<PageOutcome>>>;
  searchMembers(query: string, limit?: number, signal?: AbortSignal): Promise<Result<ReadonlyArray<MemberHit>>>;
  fetchMember(id: string, signal?: AbortSignal): Promise<Result<MemberProfile>>;
};

export type OperationsConfig = {
  readonly igloo: Pick<IglooConfig, 'default_page_size' | 'max_page_size'>;
  readonly fetch: FetchConfig;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MAX_FETCH_URLS = 10;

function isApplicationName(name: string): name is ApplicationName {
  return Object.hasOwn(APPLICATION_TYPES, name);
}

function isUpdatedWithin(value: string): value is UpdatedWithin {
  return Object.hasOwn(UPDATED_WITHIN, value);
}

// returns the date as a UTC timestamp, or throws when it is not a real calendar day
function calendarDate(value: string, field: string): number {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ValidationError(field, `expected YYYY-MM-DD, got ${JSON.stringify(value)}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const parsed = new Date(time);
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    throw new ValidationError(field, `${value} is not a calendar date`);
  }
  return time;
}

function validateDateRange(range: DateRange): void {
  const start = range.start !== undefined ? calendarDate(range.start, 'dateRange.start') : undefined;
  const end = range.end !== undefined ? calendarDate(range.end, 'dateRange.end') : undefined;
  if (start !== undefined && end !== undefined && start > end) {
    throw new ValidationError('dateRange', `start ${range.start} is after end ${range.end}`);
  }
}

function validatePageSize(value: number, field: string, max: number): void {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new ValidationError(field, `must be an integer between 1 and ${max}, got ${value}`);
  }
}

function validateSearch(input: SearchInput, maxPageSize: number): SearchQuery {
  const { applications, updatedWithin, ...rest } = input;

  if (input.dateRange !== undefined) {
    validateDateRange(input.dateRange);
  }

  let within: UpdatedWithin | undefined;
  if (updatedWithin !== undefined) {
    if (input.dateRange !== undefined && (input.dateRange.start !== undefined || input.dateRange.end !== undefined)) {
      throw new ValidationError('updatedWithin', 'cannot be combined with dateRange');
    }
    if (!isUpdatedWithin(updatedWithin)) {
      throw new ValidationError(
        'updatedWithin',
        `unknown value ${updatedWithin}; expected one of ${Object.keys(UPDATED_WITHIN).join(', ')}`,
      );
    }
    within = updatedWithin;
  }

  if (input.pageSize !== undefined) {
    validatePageSize(input.pageSize, 'pageSize', maxPageSize);
  }

  let apps: Array<ApplicationName> | undefined;
  if (applications !== undefined) {
    apps = [];
    for (const name of applications) {
      if (!isApplicationName(name)) {
        throw new ValidationError(
          'applications',
          `unknown application ${name}; expected one of ${Object.keys(APPLICATION_TYPES).join(', ')}`,
        );
      }
      apps.push(name);
    }
  }

  if (input.pageToken !== undefined && input.pageToken.trim() === '') {
    throw new ValidationError('pageToken', 'must not be empty');
  }

  return {
    ...rest,
    ...(apps && { applications: apps }),
    ...(within && { updatedWithin: within }),
  };
}

export function createOperations(deps: {
  readonly client: IglooClient;
  readonly config: OperationsConfig;
  readonly logger?: Logger;
}): Operations {
  const { client, config } = deps;
  const logger = deps.logger ?? console;

  function failure(label: string, error: unknown): { readonly ok: false; readonly error: ToolFailure } {
    if (!isToolError(error)) {
      logger.error(`[tool] ${label} failed unexpectedly:`, error);
    }
    return { ok: false, error: toToolFailure(error) };
  }

  async function run<T>(label: string, operation: () => Promise<T>): Promise<Result<T>> {
    try {
      return { ok: true, value: await operation() };
    } catch (error) {
      return failure(label, error);
    }
  }

  async function loadPage(request: FetchRequest, startIndex: number, signal?: AbortSignal): Promise<FetchResult> {
    const page = await client.fetchPage(request, signal);
    const html = config.fetch.extract_main_content ? extractMainContent(page.html, logger) : page.html;
    const converted = convertHtml(html, page.url, {
      maxLength: config.fetch.max_markdown_length,
      startIndex,
    });

    return {
      title: page.title,
      url: page.url,
      lastModified: page.lastModified,
      markdown: converted.markdown,
      truncated: converted.truncated,
      totalLength: converted.totalLength,
      startIndex: converted.startIndex,
      ...(converted.nextStartIndex !== undefined && { nextStartIndex: converted.nextStartIndex }),
    };
  }

  return {
    search(input, signal) {
      return run('search', () => {
        const query = validateSearch(input, config.igloo.max_page_size);
        return client.search(query, signal);
      });
    },

    fetch(input, signal) {
      return run('fetch', async () => {
        const id = input.id?.trim() ?? '';
        const url = input.url?.trim() ?? '';
        if (id !== '' && url !== '') {
          throw new ValidationError('url', 'give either id or url, not both');
        }
        if (id === '' && url === '') {
          throw new ValidationError('id', 'either id or url is required');
        }
        const startIndex = input.startIndex ?? 0;
        if (!Number.isInteger(startIndex) || startIndex < 0) {
          throw new ValidationError('startIndex', `must be a non-negative integer, got ${startIndex}`);
        }

        return loadPage(id !== '' ? { id } : { url }, startIndex, signal);
      });
    },

    fetchMany(input, signal) {
      return run('fetch', async () => {
        const { urls } = input;
        if (input.id !== undefined && input.id.trim() !== '') {
          throw new ValidationError('url', 'give either id or url, not both');
        }
        if (input.startIndex !== undefined && input.startIndex !== 0) {
          throw new ValidationError('startIndex', 'only applies when fetching a single url');
        }
        if (urls.length === 0) {
          throw new ValidationError('url', 'must list at least one url');
        }
        if (urls.length > MAX_FETCH_URLS) {
          throw new ValidationError('url', `at most ${MAX_FETCH_URLS} urls per call, got ${urls.length}`);
        }
        const trimmed = urls.map((url) => url.trim());
        if (trimmed.some((url) => url === '')) {
          throw new ValidationError('url', 'must not contain an empty url');
        }

        // each page settles on its own
        const settled = await Promise.allSettled(trimmed.map((url) => loadPage({ url }, 0, signal)));
        if (signal?.aborted) {
          throw new CancelledError('fetch cancelled', { cause: signal.reason });
        }

        return settled.map((outcome, i): PageOutcome => ({
          url: trimmed[i] ?? '',
          result:
            outcome.status === 'fulfilled'
              ? { ok: true, value: outcome.value }
              : failure('fetch', outcome.reason),
        }));
      });
    },

    searchMembers(query, limit, signal) {
      return run('search_members', () => {
        const term = query.trim();
        if (term === '') {
          throw new ValidationError('query', 'must not be empty');
        }
        const max = limit ?? config.igloo.default_page_size;
        validatePageSize(max, 'limit', config.igloo.max_page_size);
        return client.searchMembers(term, max, signal);
      });
    },

    fetchMember(id, signal) {
      return run('fetch_member', () => {
        const memberId = id.trim();
        if (memberId === '') {
          throw new ValidationError('id', 'must not be empty');
        }
        return client.getMemberProfile(memberId, signal);
      });
    },
  };
}
