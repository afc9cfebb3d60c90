// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import {
  formatFetchResult,
  formatFetchResults,
  formatMemberProfile,
  formatMemberResults,
  formatSearchResults,
} from './format.js';
import type { SearchHit } from '../igloo/index.js';

const hit: SearchHit = {
  id: '42',
  title: 'Travel Policy',
  url: 'https://community.example.com/hr/travel',
  application: 'wiki',
  parentPath: '/hr',
  lastModified: '2025-09-01T10:00:00Z',
  excerpt: 'Rules for booking trips.',
  views: 12,
  labels: ['policy', 'travel'],
  archived: true,
};

describe('formatSearchResults', () => {
  it('renders a header and one section per hit', () => {
    const text = formatSearchResults(
      { term: 'travel', applications: ['wiki'], updatedWithin: 'past_24_hours' },
      { hits: [hit], totalFound: 1 },
      20,
    );

    expect(text).toBe(
      [
        'Search Results for Query: "travel" (Applications: wiki | Date Filter: Past 24 Hours | Page Size: 20 | Total Results Found: 1):',
        '----------',
        'Title: Travel Policy',
        'ID: 42',
        'Type: wiki',
        'URL: https://community.example.com/hr/travel',
        'Last Modified: 2025-09-01',
        'Summary: Rules for booking trips.',
        'Views: 12 | Comments: 0 | Likes: 0',
        'Labels: policy, travel',
        '* This item is archived',
        '----------',
      ].join('\n'),
    );
  });

  it('says so when nothing matched', () => {
    const text = formatSearchResults(
      { dateRange: { start: '2025-01-01', end: '2025-01-31' }, parentPaths: ['/hr'] },
      { hits: [] },
      10,
    );

    expect(text).toBe(
      'Search Results for Query: All (Applications: All | Date Filter: 2025-01-01 to 2025-01-31 | Parent: /hr | Page Size: 10 | Total Results Found: 0):\n\nNo results found.',
    );
  });

  it('tells the reader how to continue', () => {
    const text = formatSearchResults({ term: 'travel' }, { hits: [hit], nextPageToken: 'abc' }, 1);

    expect(text.endsWith('call search with the same filters and page_token: "abc"')).toBe(true);
  });
});

describe('formatFetchResult', () => {
  it('puts a header above the markdown', () => {
    const text = formatFetchResult({
      title: 'Travel Policy',
      url: 'https://community.example.com/hr/travel',
      markdown: '# Travel\n\nBook early.',
      lastModified: null,
      truncated: false,
      totalLength: 21,
      startIndex: 0,
    });

    expect(text).toBe(
      '# Travel Policy\n\nURL: https://community.example.com/hr/travel\n\n---\n\n# Travel\n\nBook early.',
    );
  });

  it('adds the offset and a continuation notice when truncated', () => {
    const text = formatFetchResult({
      title: 'Handbook',
      url: 'https://community.example.com/handbook',
      markdown: 'Part two.',
      lastModified: '2025-08-01T09:00:00Z',
      truncated: true,
      totalLength: 4000,
      startIndex: 1500,
      nextStartIndex: 3000,
    });

    expect(text).toBe(
      [
        '# Handbook',
        '',
        'URL: https://community.example.com/handbook',
        'Last Modified: 2025-08-01',
        'Reading from offset: 1,500',
        '',
        '---',
        '',
        'Part two.',
        '',
        '---',
        '',
        'CONTENT TRUNCATED',
        'Read up to character 3,000 of 4,000 (75% of document)',
        '',
        'To continue reading, call fetch with start_index:',
        '  fetch(url="https://community.example.com/handbook", start_index=3000)',
      ].join('\n'),
    );
  });
});

describe('formatFetchResults', () => {
  it('numbers each page and shows failures in place', () => {
    const text = formatFetchResults(
      [
        {
          url: 'https://community.example.com/a',
          result: {
            ok: true,
            value: {
              title: 'A',
              url: 'https://community.example.com/a',
              markdown: 'Alpha.',
              lastModified: null,
              truncated: false,
              totalLength: 6,
              startIndex: 0,
            },
          },
        },
        {
          url: 'https://community.example.com/b',
          result: { ok: false, error: { kind: 'not_found', message: 'no page' } },
        },
      ],
      (failure) => `${failure.kind}: ${failure.message}`,
    );

    expect(text).toBe(
      [
        '===== PAGE 1 of 2 =====',
        'URL: https://community.example.com/a',
        '',
        '# A',
        '',
        'URL: https://community.example.com/a',
        '',
        '---',
        '',
        'Alpha.',
        '',
        '===== PAGE 2 of 2 =====',
        'URL: https://community.example.com/b',
        '',
        '[Error fetching page: not_found: no page]',
        '',
      ].join('\n'),
    );
  });

  it('says so when there are no pages', () => {
    expect(formatFetchResults([], (failure) => failure.message)).toBe('No pages to display.');
  });
});

describe('member formatting', () => {
  it('lists members briefly', () => {
    const text = formatMemberResults('ada', [
      { id: 'u1', fullName: 'Ada Lovelace', email: '', username: 'ada', profileUrl: '' },
    ]);

    expect(text).toBe(
      'Members found for query: "ada" (Total Results Found: 1):\n----------\nName: Ada Lovelace\nEmail: N/A\nMember ID: u1\n----------',
    );
  });

  it('renders a full profile', () => {
    const text = formatMemberProfile({
      id: 'u1',
      fullName: 'Ada Lovelace',
      email: 'ada@example.com',
      username: 'ada',
      profileUrl: 'https://community.example.com/.profile/ada',
      managerName: 'Grace Hopper',
      fields: [{ label: 'Job Title', value: 'Engineer' }],
    });

    expect(text).toBe(
      [
        'Member Profile: Ada Lovelace',
        '----------',
        'Name: Ada Lovelace',
        'Email: ada@example.com',
        'Username: ada',
        'Profile URL: https://community.example.com/.profile/ada',
        'Manager Name: Grace Hopper',
        'Job Title: Engineer',
        '----------',
      ].join('\n'),
    );
  });
});
