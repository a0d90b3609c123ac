import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MockWeb, makeTempDir, removeDir } from '../../../shared/test/fixtures.js';
import { ArticlesToolHandler } from '../handlers/articles-tool-handler.js';
import { CrawlToolHandler } from '../handlers/crawl-tool-handler.js';
import { SearchToolHandler } from '../handlers/search-tool-handler.js';
import { NewsService, encodePageToken } from '../services/NewsService.js';
import { McpToolResponse } from '../tool-types.js';
import { createNewsService, link, publishStories } from './harness.js';

function textOf(response: McpToolResponse): string {
  return response.content.map((item) => item.text).join('\n');
}

describe('MCP tool handlers', () => {
  let dir: string;
  let web: MockWeb;
  let service: NewsService;
  let search: SearchToolHandler;
  let articles: ArticlesToolHandler;
  let crawl: CrawlToolHandler;

  beforeEach(async () => {
    dir = await makeTempDir();
    web = new MockWeb();
    const created = createNewsService(dir, web);
    service = created.service;
    search = new SearchToolHandler(service, created.logger);
    articles = new ArticlesToolHandler(service, created.logger);
    crawl = new CrawlToolHandler(service, created.logger);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const crawlStories = async () => {
    const status = await service.start(publishStories(web));
    expect(status.state).toBe('completed');
  };

  it('claims only its own tools', () => {
    expect(search.handles('newsdex-search')).toBe(true);
    expect(search.handles('newsdex-articles')).toBe(false);
    expect(articles.handles('newsdex-articles')).toBe(true);
    expect(crawl.handles('newsdex-crawl')).toBe(true);
  });

  describe('newsdex-search', () => {
    it('names every invalid argument', async () => {
      const missing = await search.handleToolCall('newsdex-search', {});
      expect(missing.isError).toBe(true);
      expect(missing.errorDetails).toEqual({ type: 'ValidationError', code: 'VALIDATION_ERROR' });
      expect(textOf(missing)).toBe('Validation failed: Invalid arguments for newsdex-search: query: Required');

      const blank = await search.handleToolCall('newsdex-search', { query: '   ' });
      expect(textOf(blank)).toBe('Validation failed: Invalid arguments for newsdex-search: query: Query cannot be empty');

      const badLimit = await search.handleToolCall('newsdex-search', { query: 'budget', limit: 0 });
      expect(textOf(badLimit)).toBe('Validation failed: Invalid arguments for newsdex-search: limit: Number must be greater than 0');
    });

    it('lists hits as markdown', async () => {
      await crawlStories();

      const response = await search.handleToolCall('newsdex-search', { query: 'council budget' });

      expect(response.isError).toBeUndefined();
      const lines = textOf(response).split('\n');
      expect(lines[0]).toBe('# Search Results for "council budget"');
      expect(lines[2]).toMatch(/^1\. \*\*Council passes budget\*\* \(id 2, score \d\.\d{3}\)$/);
      expect(lines[3]).toBe(`   Link: ${link(2)}`);
      expect(lines[4]).toBe('   Published: 2024-03-05T14:30:00.000Z');
    });

    it('says so when nothing matches', async () => {
      const response = await search.handleToolCall('newsdex-search', { query: 'zebra' });
      expect(textOf(response)).toBe('No results found for query: "zebra"');
    });
  });

  describe('newsdex-articles', () => {
    it('rejects unknown actions and missing ids', async () => {
      const unknownAction = await articles.handleToolCall('newsdex-articles', { action: 'explode' });
      expect(unknownAction.errorDetails).toEqual({ type: 'ValidationError', code: 'VALIDATION_ERROR' });

      const missingId = await articles.handleToolCall('newsdex-articles', { action: 'get' });
      expect(textOf(missingId)).toBe('Validation failed: Invalid arguments for newsdex-articles: id: Required');
    });

    it('reports a missing article as a structured error', async () => {
      const response = await articles.handleToolCall('newsdex-articles', { action: 'get', id: 42 });

      expect(response).toEqual({
        isError: true,
        content: [{ type: 'text', text: "Article '42' not found." }],
        errorDetails: { type: 'ArticleNotFoundError', code: 'ARTICLE_NOT_FOUND' }
      });
    });

    it('pages through articles', async () => {
      await crawlStories();

      const response = await articles.handleToolCall('newsdex-articles', { action: 'list', limit: 2 });

      expect(textOf(response)).toBe(
        [
          '# Articles',
          '',
          '- 1: **Harbour reopens** (2024-03-05T14:30:00.000Z)',
          `  ${link(1)}`,
          '- 2: **Council passes budget** (2024-03-05T14:30:00.000Z)',
          `  ${link(2)}`,
          '',
          `nextPageToken: ${encodePageToken(2)}`
        ].join('\n')
      );
    });

    it('rejects a malformed page token', async () => {
      const response = await articles.handleToolCall('newsdex-articles', { action: 'list', pageToken: 'not-a-token' });

      expect(textOf(response)).toBe('Validation failed: invalid page token');
      expect(response.errorDetails?.code).toBe('VALIDATION_ERROR');
    });

    it('shows one article in full', async () => {
      await crawlStories();

      const response = await articles.handleToolCall('newsdex-articles', { action: 'get', id: 1 });

      expect(textOf(response)).toBe(
        [
          '# Harbour reopens',
          '',
          '- **ID:** 1',
          `- **Link:** ${link(1)}`,
          '- **Published:** 2024-03-05T14:30:00.000Z',
          '- **Author:** unknown',
          '- **Tags:** city',
          '',
          'The harbour reopened after the storm damaged the pier.'
        ].join('\n')
      );
    });

    it('deletes an article once', async () => {
      await crawlStories();

      expect(textOf(await articles.handleToolCall('newsdex-articles', { action: 'delete', id: 3 }))).toBe('Deleted article 3.');
      const again = await articles.handleToolCall('newsdex-articles', { action: 'delete', id: 3 });
      expect(again.errorDetails).toEqual({ type: 'ArticleNotFoundError', code: 'ARTICLE_NOT_FOUND' });
    });

    it('reports similar articles of a missing id as not found', async () => {
      const response = await articles.handleToolCall('newsdex-articles', { action: 'similar', id: 7 });
      expect(response.errorDetails?.code).toBe('ARTICLE_NOT_FOUND');
    });
  });

  describe('newsdex-crawl', () => {
    it('reports the idle status', async () => {
      const response = await crawl.handleToolCall('newsdex-crawl', { action: 'status' });

      expect(textOf(response)).toBe(
        [
          '# Crawl idle',
          '',
          '- **Run:** none',
          '- **Processed:** 0',
          '- **Inserted:** 0, **updated:** 0, **skipped:** 0, **failed:** 0'
        ].join('\n')
      );
    });

    it('validates archive dates', async () => {
      const response = await crawl.handleToolCall('newsdex-crawl', { action: 'archive', startDate: 'March 5' });
      expect(textOf(response)).toBe(
        'Validation failed: Invalid arguments for newsdex-crawl: startDate: Expected a date as dd.mm.yyyy'
      );
    });

    it('fails an archive crawl without a listing template', async () => {
      const response = await crawl.handleToolCall('newsdex-crawl', { action: 'archive', startDate: '05.03.2024' });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe('Validation failed: no archive listing URL template is configured');
    });

    it('starts a crawl in the background', async () => {
      const links = publishStories(web);

      const response = await crawl.handleToolCall('newsdex-crawl', { action: 'start', links });

      expect(textOf(response).split('\n')[0]).toBe('# Crawl running');
      await vi.waitFor(() => expect(service.status().state).toBe('completed'));
      expect(service.status().counters.inserted).toBe(3);
    });
  });
});
