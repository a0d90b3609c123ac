/**
 * Handler for the newsdex-articles tool
 *
 * Lists, reads and deletes stored articles, and finds articles similar to a
 * stored one.
 */
import { z } from 'zod';
import { BaseToolHandler, ToolDefinition } from './base-tool-handler.js';
import { ArticlesToolArgs, McpToolResponse } from '../tool-types.js';
import { NewsService } from '../services/NewsService.js';
import { formatHits } from './search-tool-handler.js';
import { ArticleNotFoundError, describeError } from '../../../shared/domain/errors.js';
import { ArticleRecord } from '../../../shared/domain/models/Article.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

const isoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO-8601 date');

const articleId = z.number().int().min(0);
const limit = z.number().int().positive().max(100).optional();

const ArticlesToolParamsSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('list'),
    tags: z.array(z.string().min(1)).optional(),
    publishedAfter: isoDate.optional(),
    publishedBefore: isoDate.optional(),
    limit,
    pageToken: z.string().min(1).optional()
  }),
  z.object({ action: z.literal('get'), id: articleId }),
  z.object({ action: z.literal('delete'), id: articleId }),
  z.object({ action: z.literal('similar'), id: articleId, limit })
]);

function formatArticle(article: ArticleRecord): string {
  const lines = [
    `# ${article.title === 'unknown' ? 'Untitled article' : article.title}`,
    '',
    `- **ID:** ${article.id}`,
    `- **Link:** ${article.link}`,
    `- **Published:** ${article.publishedAt}`,
    `- **Author:** ${article.author}`,
    `- **Tags:** ${article.tags.length > 0 ? article.tags.join(', ') : 'none'}`
  ];
  if (article.alternateLinks.length > 0) {
    lines.push(`- **Also seen at:** ${article.alternateLinks.join(', ')}`);
  }
  if (article.relatedLinks.length > 0) {
    lines.push(`- **Related:** ${article.relatedLinks.join(', ')}`);
  }
  lines.push('', article.body);
  return lines.join('\n');
}

export class ArticlesToolHandler extends BaseToolHandler {
  constructor(private readonly newsService: NewsService, logger?: Logger) {
    super(logger);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'newsdex-articles',
        description:
          'Browse stored news articles. "list" pages through articles in id order with optional tag and date filters, ' +
          '"get" returns one article, "similar" finds the articles most like a stored one, "delete" removes an article.',
        inputSchema: {
          type: 'object',
          properties: {
            action: { type: 'string', enum: ['list', 'get', 'similar', 'delete'], description: 'Action to perform.' },
            id: { type: 'integer', description: 'Article id (get, similar, delete).' },
            tags: { type: 'array', items: { type: 'string' }, description: 'Only articles carrying all of these tags (list).' },
            publishedAfter: { type: 'string', description: 'ISO-8601 lower bound on the publication date (list).' },
            publishedBefore: { type: 'string', description: 'ISO-8601 upper bound on the publication date (list).' },
            limit: { type: 'integer', description: 'Page size (list) or number of similar articles (similar).', minimum: 1, maximum: 100 },
            pageToken: { type: 'string', description: 'nextPageToken of the previous page (list).' }
          },
          required: ['action']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    const parsed = ArticlesToolParamsSchema.safeParse(args);
    if (!parsed.success) {
      return this.createValidationErrorResponse(name, parsed.error, args);
    }
    const params: ArticlesToolArgs = parsed.data;

    try {
      switch (params.action) {
        case 'list':
          return await this.list(params);
        case 'get':
          return await this.get(params.id);
        case 'similar':
          return await this.similar(params.id, params.limit);
        case 'delete':
          return await this.delete(params.id);
      }
    } catch (error: unknown) {
      this.logger.error(`newsdex-articles ${params.action} failed`, 'ArticlesToolHandler', { error: describeError(error) });
      return this.createStructuredErrorResponse(error);
    }
  }

  private async list(params: Extract<ArticlesToolArgs, { action: 'list' }>): Promise<McpToolResponse> {
    const outcome = await this.newsService.listArticles(
      {
        tags: params.tags,
        publishedAfter: params.publishedAfter ? new Date(params.publishedAfter) : undefined,
        publishedBefore: params.publishedBefore ? new Date(params.publishedBefore) : undefined,
        limit: params.limit
      },
      params.pageToken
    );
    if (!outcome.ok) {
      return this.createStructuredErrorResponse(outcome.error);
    }
    if (outcome.articles.length === 0) {
      return this.createSuccessResponse('No articles found.');
    }

    const entries = outcome.articles.map(
      (article) =>
        `- ${article.id}: **${article.title === 'unknown' ? 'Untitled article' : article.title}** (${article.publishedAt})\n  ${article.link}`
    );
    const footer = outcome.nextPageToken ? `\n\nnextPageToken: ${outcome.nextPageToken}` : '';
    return this.createSuccessResponse(`# Articles\n\n${entries.join('\n')}${footer}`);
  }

  private async get(id: number): Promise<McpToolResponse> {
    const outcome = await this.newsService.getArticle(id);
    if (!outcome.found) {
      return this.createStructuredErrorResponse(new ArticleNotFoundError(id));
    }
    return this.createSuccessResponse(formatArticle(outcome.article));
  }

  private async similar(id: number, limit?: number): Promise<McpToolResponse> {
    const hits = await this.newsService.findSimilarTo(id, limit);
    if (hits.length === 0) {
      return this.createSuccessResponse(`No articles similar to ${id}.`);
    }
    return this.createSuccessResponse(`# Articles similar to ${id}\n\n${formatHits(hits)}`);
  }

  private async delete(id: number): Promise<McpToolResponse> {
    const deleted = await this.newsService.deleteArticle(id);
    if (!deleted) {
      return this.createStructuredErrorResponse(new ArticleNotFoundError(id));
    }
    return this.createSuccessResponse(`Deleted article ${id}.`);
  }
}
