// pattern: Imperative Shell

/**
 * Built-in Igloo tools.
 * Each tool maps its snake_case parameters onto a typed operation and renders
 * the outcome as text.
 */

import type { ToolFailure } from '../../errors/index.js';
import { APPLICATION_TYPES, UPDATED_WITHIN } from '../../igloo/index.js';
import {
  formatFetchResult,
  formatFetchResults,
  formatMemberProfile,
  formatMemberResults,
  formatSearchResults,
} from '../format.js';
import { MAX_FETCH_URLS, type Operations, type Result, type SearchInput } from '../operations.js';
import type { Tool, ToolResult } from '../types.js';

type Params = Readonly<Record<string, unknown>>;

type IglooToolOptions = {
  readonly operations: Operations;
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
};

// operation field names as the tools spell them
const PARAMETER_FOR_FIELD: Readonly<Record<string, string>> = {
  dateRange: 'date_from, date_to',
  'dateRange.start': 'date_from',
  'dateRange.end': 'date_to',
  updatedWithin: 'updated_within',
  pageSize: 'page_size',
  pageToken: 'page_token',
  startIndex: 'start_index',
};

function stringParam(params: Params, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

function numberParam(params: Params, name: string): number | undefined {
  const value = params[name];
  return typeof value === 'number' ? value : undefined;
}

function booleanParam(params: Params, name: string): boolean | undefined {
  const value = params[name];
  return typeof value === 'boolean' ? value : undefined;
}

function stringListParam(params: Params, name: string): ReadonlyArray<string> | undefined {
  const value = params[name];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function describeFailure(failure: ToolFailure): string {
  const text = `${failure.kind}: ${failure.message}`;
  if (failure.field === undefined) {
    return text;
  }
  return `${text} (parameter: ${PARAMETER_FOR_FIELD[failure.field] ?? failure.field})`;
}

function render<T>(result: Result<T>, format: (value: T) => string): ToolResult {
  if (!result.ok) {
    return { success: false, output: '', error: describeFailure(result.error) };
  }
  return { success: true, output: format(result.value) };
}

function searchInput(params: Params): SearchInput {
  const term = stringParam(params, 'query');
  const applications = stringListParam(params, 'applications');
  const updatedWithin = stringParam(params, 'updated_within');
  const start = stringParam(params, 'date_from');
  const end = stringParam(params, 'date_to');
  const parentPaths = stringListParam(params, 'parent_paths');
  const matchAll = booleanParam(params, 'match_all');
  const includeMicroblog = booleanParam(params, 'include_microblog');
  const includeArchived = booleanParam(params, 'include_archived');
  const pageSize = numberParam(params, 'page_size');
  const pageToken = stringParam(params, 'page_token');

  return {
    ...(term !== undefined && { term }),
    ...(applications !== undefined && { applications }),
    ...(updatedWithin !== undefined && { updatedWithin }),
    ...((start !== undefined || end !== undefined) && {
      dateRange: { ...(start !== undefined && { start }), ...(end !== undefined && { end }) },
    }),
    ...(parentPaths !== undefined && { parentPaths }),
    ...(matchAll !== undefined && { matchAll }),
    ...(includeMicroblog !== undefined && { includeMicroblog }),
    ...(includeArchived !== undefined && { includeArchived }),
    ...(pageSize !== undefined && { pageSize }),
    ...(pageToken !== undefined && { pageToken }),
  };
}

export function createIglooTools(options: IglooToolOptions): Array<Tool> {
  const { operations, defaultPageSize, maxPageSize } = options;

  const search: Tool = {
    definition: {
      name: 'search',
      description:
        'Search the Igloo community for pages, documents, blog posts, forum threads and other content. Results keep the relevance order and come in pages; pass page_token from a previous call to continue.',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'Free-text search terms. Omit to list everything that matches the filters.',
          required: false,
        },
        {
          name: 'applications',
          type: 'array',
          items: 'string',
          description: 'Restrict results to these application types.',
          required: false,
          enum_values: Object.keys(APPLICATION_TYPES),
        },
        {
          name: 'updated_within',
          type: 'string',
          description: 'Only content updated within this period. Cannot be combined with date_from or date_to.',
          required: false,
          enum_values: Object.keys(UPDATED_WITHIN),
        },
        {
          name: 'date_from',
          type: 'string',
          description: 'Only content updated on or after this date (YYYY-MM-DD).',
          required: false,
        },
        {
          name: 'date_to',
          type: 'string',
          description: 'Only content updated on or before this date (YYYY-MM-DD).',
          required: false,
        },
        {
          name: 'parent_paths',
          type: 'array',
          items: 'string',
          description: 'Only content under these paths, e.g. "/departments/hr".',
          required: false,
        },
        {
          name: 'match_all',
          type: 'boolean',
          description: 'Require every search term to match.',
          required: false,
        },
        {
          name: 'include_microblog',
          type: 'boolean',
          description: 'Include microblog posts.',
          required: false,
        },
        {
          name: 'include_archived',
          type: 'boolean',
          description: 'Include archived content.',
          required: false,
        },
        {
          name: 'page_size',
          type: 'integer',
          description: `Results per page (default ${defaultPageSize}, at most ${maxPageSize}).`,
          required: false,
        },
        {
          name: 'page_token',
          type: 'string',
          description: 'Continuation token returned by a previous search with the same filters.',
          required: false,
        },
      ],
    },
    handler: async (params, signal) => {
      const input = searchInput(params);
      const result = await operations.search(input, signal);
      return render(result, (value) => formatSearchResults(input, value, input.pageSize ?? defaultPageSize));
    },
  };

  const fetch: Tool = {
    definition: {
      name: 'fetch',
      description:
        'Fetch a community page by id or URL and return its content as Markdown. Several URLs may be fetched at once. Long pages are cut; pass start_index to continue reading a single page.',
      parameters: [
        {
          name: 'id',
          type: 'string',
          description: 'Object id from a search result. Give either id or url.',
          required: false,
        },
        {
          name: 'url',
          type: ['string', 'array'],
          items: 'string',
          description: `Absolute URL of a page in this community, or a list of up to ${MAX_FETCH_URLS} URLs to fetch together. Give either id or url.`,
          required: false,
        },
        {
          name: 'start_index',
          type: 'integer',
          description: 'Character offset to continue reading from (default 0).',
          required: false,
        },
      ],
    },
    handler: async (params, signal) => {
      const id = stringParam(params, 'id');
      const urls = stringListParam(params, 'url');
      const startIndex = numberParam(params, 'start_index');

      if (urls !== undefined && urls.length !== 1) {
        const pages = await operations.fetchMany(
          {
            urls,
            ...(id !== undefined && { id }),
            ...(startIndex !== undefined && { startIndex }),
          },
          signal,
        );
        return render(pages, (value) => formatFetchResults(value, describeFailure));
      }

      const url = urls?.[0] ?? stringParam(params, 'url');
      const result = await operations.fetch(
        {
          ...(id !== undefined && { id }),
          ...(url !== undefined && { url }),
          ...(startIndex !== undefined && { startIndex }),
        },
        signal,
      );
      return render(result, formatFetchResult);
    },
  };

  const searchMembers: Tool = {
    definition: {
      name: 'search_members',
      description: 'Find community members by name, email or username.',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'Name, email or username to look for.',
          required: true,
        },
        {
          name: 'limit',
          type: 'integer',
          description: `Maximum number of members to return (default ${defaultPageSize}).`,
          required: false,
        },
      ],
    },
    handler: async (params, signal) => {
      const query = stringParam(params, 'query') ?? '';
      const result = await operations.searchMembers(query, numberParam(params, 'limit'), signal);
      return render(result, (members) => formatMemberResults(query.trim(), members));
    },
  };

  const fetchMember: Tool = {
    definition: {
      name: 'fetch_member',
      description: "Fetch a member's profile, including job title, department and manager.",
      parameters: [
        {
          name: 'id',
          type: 'string',
          description: 'Member id from search_members.',
          required: true,
        },
      ],
    },
    handler: async (params, signal) => {
      const result = await operations.fetchMember(stringParam(params, 'id') ?? '', signal);
      return render(result, formatMemberProfile);
    },
  };

  return [search, fetch, searchMembers, fetchMember];
}
