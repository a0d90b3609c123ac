/**
 * Handler for the newsdex-search tool
 */
import { z } from 'zod';
import { BaseToolHandler, ToolDefinition } from './base-tool-handler.js';
import { McpToolResponse, SearchToolArgs } from '../tool-types.js';
import { NewsService, SearchHit } from '../services/NewsService.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

const SearchToolParamsSchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty'),
  limit: z.number().int().positive().max(100).optional()
});

/**
 * One numbered markdown entry per hit
 */
export function formatHits(hits: SearchHit[]): string {
  return hits
    .map((hit, index) => {
      const title = hit.title === 'unknown' ? 'Untitled article' : hit.title;
      return `${index + 1}. **${title}** (id ${hit.id}, score ${hit.score.toFixed(3)})\n   Link: ${hit.link}\n   Published: ${hit.date}`;
    })
    .join('\n\n');
}

export class SearchToolHandler extends BaseToolHandler {
  constructor(private readonly newsService: NewsService, logger?: Logger) {
    super(logger);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'newsdex-search',
        description: 'Find stored news articles most similar to a free-text query (TF-IDF cosine similarity).',
        inputSchema: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'Search query.' },
            limit: { type: 'integer', description: 'Max results', minimum: 1, maximum: 100 }
          },
          required: ['query']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    const parsed = SearchToolParamsSchema.safeParse(args);
    if (!parsed.success) {
      return this.createValidationErrorResponse(name, parsed.error, args);
    }
    const { query, limit }: SearchToolArgs = parsed.data;

    const hits = await this.newsService.search(query, limit);
    this.logger.info(`Search returned ${hits.length} results for "${query}"`, 'SearchToolHandler');
    if (hits.length === 0) {
      return this.createSuccessResponse(`No results found for query: "${query}"`);
    }
    return this.createSuccessResponse(`# Search Results for "${query}"\n\n${formatHits(hits)}`);
  }
}
