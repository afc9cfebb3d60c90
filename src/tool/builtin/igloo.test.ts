// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createIglooTools, describeFailure } from './igloo.js';
import { createOperations } from '../operations.js';
import { createToolRegistry } from '../registry.js';
import { createIglooClient } from '../../igloo/index.js';
import {
  COMMUNITY,
  createFakeIgloo,
  createLogger,
  makeConfig,
  makeRecord,
  type FakeIglooOptions,
} from '../../igloo/test-helpers.js';

function setup(options: FakeIglooOptions = {}) {
  const fake = createFakeIgloo(options);
  const logger = createLogger();
  const client = createIglooClient(makeConfig(), { fetch: fake.fetch, logger, sleep: async () => {} });
  const operations = createOperations({
    client,
    config: {
      igloo: { default_page_size: 20, max_page_size: 50 },
      fetch: { max_markdown_length: 20000, extract_main_content: false },
    },
    logger,
  });
  const registry = createToolRegistry();
  for (const tool of createIglooTools({ operations, defaultPageSize: 20, maxPageSize: 50 })) {
    registry.register(tool);
  }
  return { registry, fake };
}

describe('igloo tools', () => {
  it('registers the four tools', () => {
    const { registry } = setup();

    expect(registry.getDefinitions().map((definition) => definition.name)).toEqual([
      'search',
      'fetch',
      'search_members',
      'fetch_member',
    ]);
  });

  it('advertises the application names as an enum', () => {
    const { registry } = setup();

    const search = registry.toModelTools().find((tool) => tool.name === 'search');

    expect(search?.inputSchema.properties['applications']?.items?.enum).toContain('wiki');
    expect(search?.inputSchema.required).toEqual([]);
  });

  it('renders search results as text', async () => {
    const { registry, fake } = setup({ records: [makeRecord(1)] });

    const result = await registry.dispatch('search', { query: 'docs', applications: ['wiki'] });

    expect(result).toEqual({
      success: true,
      output: [
        'Search Results for Query: "docs" (Applications: wiki | Page Size: 20 | Total Results Found: 1):',
        '----------',
        'Title: Doc 1',
        'ID: 1',
        'Type: wiki',
        `URL: ${COMMUNITY}/docs/1`,
        'Last Modified: 2025-09-01',
        'Views: 0 | Comments: 0 | Likes: 0',
        '----------',
      ].join('\n'),
    });
    expect(fake.callsTo('contentDetailed')[0]?.url.searchParams.get('applications')).toBe('2');
  });

  it('names the tool parameter in validation errors', async () => {
    const { registry, fake } = setup();

    const pageSize = await registry.dispatch('search', { page_size: 500 });
    const range = await registry.dispatch('search', { date_from: '2025-03-01', date_to: '2025-02-01' });

    expect(pageSize.error).toBe(
      'validation: pageSize: must be an integer between 1 and 50, got 500 (parameter: page_size)',
    );
    expect(range.error).toBe(
      'validation: dateRange: start 2025-03-01 is after end 2025-02-01 (parameter: date_from, date_to)',
    );
    expect(fake.fetch).not.toHaveBeenCalled();
  });

  it('rejects unknown applications at the registry', async () => {
    const { registry } = setup();

    const result = await registry.dispatch('search', { applications: ['chat'] });

    expect(result.success).toBe(false);
    expect(result.error?.startsWith('invalid value for parameter applications: chat')).toBe(true);
  });

  it('fetches a page as markdown', async () => {
    const { registry } = setup({
      pages: { [`${COMMUNITY}/hr/travel`]: { html: '<html><head><title>Travel</title></head><body><p>Book early.</p></body></html>' } },
    });

    const result = await registry.dispatch('fetch', { url: `${COMMUNITY}/hr/travel` });

    expect(result).toEqual({
      success: true,
      output: `# Travel\n\nURL: ${COMMUNITY}/hr/travel\n\n---\n\nBook early.`,
    });
  });

  it('fetches several pages in one call', async () => {
    const { registry } = setup({
      pages: { [`${COMMUNITY}/hr/travel`]: { html: '<html><head><title>Travel</title></head><body><p>Book early.</p></body></html>' } },
    });

    const result = await registry.dispatch('fetch', { url: [`${COMMUNITY}/hr/travel`, `${COMMUNITY}/missing`] });

    expect(result).toEqual({
      success: true,
      output: [
        '===== PAGE 1 of 2 =====',
        `URL: ${COMMUNITY}/hr/travel`,
        '',
        '# Travel',
        '',
        `URL: ${COMMUNITY}/hr/travel`,
        '',
        '---',
        '',
        'Book early.',
        '',
        '===== PAGE 2 of 2 =====',
        `URL: ${COMMUNITY}/missing`,
        '',
        '[Error fetching page: not_found: GET /missing failed: 404 Not Found - not found]',
        '',
      ].join('\n'),
    });
  });

  it('treats a one-element url list like a single url', async () => {
    const { registry } = setup({
      pages: { [`${COMMUNITY}/hr/travel`]: { html: '<html><head><title>Travel</title></head><body><p>Book early.</p></body></html>' } },
    });

    const result = await registry.dispatch('fetch', { url: [`${COMMUNITY}/hr/travel`] });

    expect(result.output).toBe(`# Travel\n\nURL: ${COMMUNITY}/hr/travel\n\n---\n\nBook early.`);
  });

  it('advertises url as a string or a list of strings', () => {
    const { registry } = setup();

    const fetch = registry.toModelTools().find((tool) => tool.name === 'fetch');

    expect(fetch?.inputSchema.properties['url']?.type).toEqual(['string', 'array']);
    expect(fetch?.inputSchema.properties['url']?.items).toEqual({ type: 'string' });
  });

  it('requires an id or a url to fetch', async () => {
    const { registry } = setup();

    const result = await registry.dispatch('fetch', {});

    expect(result).toEqual({
      success: false,
      output: '',
      error: 'validation: id: either id or url is required (parameter: id)',
    });
  });

  it('reports missing pages with their kind', async () => {
    const { registry } = setup();

    const result = await registry.dispatch('fetch', { id: 'gone' });

    expect(result.error).toBe('not_found: no page with id gone');
  });

  it('looks up members and their profiles', async () => {
    const ada = { id: 'u1', name: { fullName: 'Ada Lovelace' }, email: 'ada@example.com', namespace: 'ada' };
    const { registry } = setup({ members: [ada], users: { u1: ada } });

    const members = await registry.dispatch('search_members', { query: ' ada ' });
    const profile = await registry.dispatch('fetch_member', { id: 'u1' });

    expect(members.output).toBe(
      'Members found for query: "ada" (Total Results Found: 1):\n----------\nName: Ada Lovelace\nEmail: ada@example.com\nMember ID: u1\n----------',
    );
    expect(profile.output).toBe(
      [
        'Member Profile: Ada Lovelace',
        '----------',
        'Name: Ada Lovelace',
        'Email: ada@example.com',
        'Username: ada',
        `Profile URL: ${COMMUNITY}/.profile/ada`,
        '----------',
      ].join('\n'),
    );
  });
});

describe('describeFailure', () => {
  it('leaves failures without a field as they are', () => {
    expect(describeFailure({ kind: 'transient', message: 'gave up after 3 attempts' })).toBe(
      'transient: gave up after 3 attempts',
    );
  });
});
