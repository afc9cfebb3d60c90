// pattern: Functional Core

/**
 * Plain-text rendering of tool results for a language model.
 * Output stays compact: one labelled line per fact, sections split by a
 * fixed separator.
 */

import type { DateRange, MemberHit, MemberProfile, SearchHit, SearchResult } from '../igloo/index.js';
import type { ToolFailure } from '../errors/index.js';
import type { FetchResult, PageOutcome } from './operations.js';

const SEPARATOR = '----------';

// the filters echoed back in the search header
export type SearchEcho = {
  readonly term?: string;
  readonly applications?: ReadonlyArray<string>;
  readonly updatedWithin?: string;
  readonly dateRange?: DateRange;
  readonly parentPaths?: ReadonlyArray<string>;
};

function number(value: number): string {
  return value.toLocaleString('en-US');
}

// keeps the calendar day of an ISO timestamp
function day(value: string): string {
  return /^\d{4}-\d{2}-\d{2}/.test(value) ? value.slice(0, 10) : value;
}

function titleCase(value: string): string {
  return value
    .split('_')
    .map((word) => (word === '' ? word : `${word.charAt(0).toUpperCase()}${word.slice(1)}`))
    .join(' ');
}

function dateFilter(query: SearchEcho): string | null {
  if (query.updatedWithin !== undefined) {
    return `Date Filter: ${titleCase(query.updatedWithin)}`;
  }
  const start = query.dateRange?.start;
  const end = query.dateRange?.end;
  if (start !== undefined && end !== undefined) {
    return `Date Filter: ${start} to ${end}`;
  }
  if (start !== undefined) {
    return `Date Filter: from ${start}`;
  }
  if (end !== undefined) {
    return `Date Filter: until ${end}`;
  }
  return null;
}

function searchHeader(query: SearchEcho, result: SearchResult, pageSize: number): string {
  const term = query.term?.trim();
  const parts: Array<string> = [
    `Applications: ${query.applications && query.applications.length > 0 ? query.applications.join(', ') : 'All'}`,
  ];
  const filter = dateFilter(query);
  if (filter !== null) {
    parts.push(filter);
  }
  if (query.parentPaths && query.parentPaths.length > 0) {
    parts.push(`Parent: ${query.parentPaths.join(', ')}`);
  }
  parts.push(`Page Size: ${pageSize}`);
  parts.push(`Total Results Found: ${result.totalFound ?? result.hits.length}`);

  return `Search Results for Query: ${term ? `"${term}"` : 'All'} (${parts.join(' | ')}):`;
}

function formatHit(hit: SearchHit): string {
  const lines = [
    `Title: ${hit.title}`,
    `ID: ${hit.id}`,
    `Type: ${hit.application || 'unknown'}`,
    `URL: ${hit.url}`,
  ];
  if (hit.lastModified !== null) {
    lines.push(`Last Modified: ${day(hit.lastModified)}`);
  }
  if (hit.excerpt) {
    lines.push(`Summary: ${hit.excerpt}`);
  }
  lines.push(`Views: ${hit.views ?? 0} | Comments: ${hit.comments ?? 0} | Likes: ${hit.likes ?? 0}`);
  if (hit.labels && hit.labels.length > 0) {
    lines.push(`Labels: ${hit.labels.join(', ')}`);
  }
  if (hit.recommended) {
    lines.push('* This item is recommended');
  }
  if (hit.archived) {
    lines.push('* This item is archived');
  }
  return lines.join('\n');
}

export function formatSearchResults(query: SearchEcho, result: SearchResult, pageSize: number): string {
  const header = searchHeader(query, result, pageSize);
  if (result.hits.length === 0) {
    return `${header}\n\nNo results found.`;
  }

  const sections = result.hits.map((hit) => `\n${SEPARATOR}\n${formatHit(hit)}`);
  let text = `${header}${sections.join('')}\n${SEPARATOR}`;
  if (result.nextPageToken !== undefined) {
    text += `\n\nMore results are available. To continue, call search with the same filters and page_token: "${result.nextPageToken}"`;
  }
  return text;
}

export function formatFetchResult(result: FetchResult): string {
  const header = [`# ${result.title}`, '', `URL: ${result.url}`];
  if (result.lastModified !== null) {
    header.push(`Last Modified: ${day(result.lastModified)}`);
  }
  if (result.startIndex > 0) {
    header.push(`Reading from offset: ${number(result.startIndex)}`);
  }
  header.push('', '---', '', '');

  let text = header.join('\n') + result.markdown;
  if (result.truncated && result.nextStartIndex !== undefined) {
    const percent = result.totalLength > 0 ? Math.floor((100 * result.nextStartIndex) / result.totalLength) : 0;
    text += [
      '',
      '',
      '---',
      '',
      'CONTENT TRUNCATED',
      `Read up to character ${number(result.nextStartIndex)} of ${number(result.totalLength)} (${percent}% of document)`,
      '',
      'To continue reading, call fetch with start_index:',
      `  fetch(url="${result.url}", start_index=${result.nextStartIndex})`,
    ].join('\n');
  }
  return text;
}

/**
 * Several fetched pages, each under a numbered header. A page that failed
 * shows its error in place of the content.
 */
export function formatFetchResults(
  pages: ReadonlyArray<PageOutcome>,
  describe: (failure: ToolFailure) => string,
): string {
  if (pages.length === 0) {
    return 'No pages to display.';
  }
  return pages
    .map((page, i) => {
      const header = `===== PAGE ${i + 1} of ${pages.length} =====\nURL: ${page.url}\n`;
      const body = page.result.ok
        ? formatFetchResult(page.result.value)
        : `[Error fetching page: ${describe(page.result.error)}]`;
      return `${header}\n${body}\n`;
    })
    .join('\n');
}

export function formatMemberResults(query: string, members: ReadonlyArray<MemberHit>): string {
  const header = `Members found for query: "${query}" (Total Results Found: ${members.length}):`;
  if (members.length === 0) {
    return `${header}\n\nNo results found.`;
  }

  const sections = members.map((member) =>
    [`\n${SEPARATOR}`, `Name: ${member.fullName}`, `Email: ${member.email || 'N/A'}`, `Member ID: ${member.id}`].join(
      '\n',
    ),
  );
  return `${header}${sections.join('')}\n${SEPARATOR}`;
}

export function formatMemberProfile(profile: MemberProfile): string {
  const lines = [
    `Member Profile: ${profile.fullName}`,
    SEPARATOR,
    `Name: ${profile.fullName}`,
    `Email: ${profile.email || 'N/A'}`,
    `Username: ${profile.username || 'N/A'}`,
    `Profile URL: ${profile.profileUrl || 'N/A'}`,
  ];
  if (profile.managerName) {
    lines.push(`Manager Name: ${profile.managerName}`);
  }
  for (const field of profile.fields) {
    lines.push(`${field.label}: ${field.value}`);
  }
  lines.push(SEPARATOR);
  return lines.join('\n');
}
