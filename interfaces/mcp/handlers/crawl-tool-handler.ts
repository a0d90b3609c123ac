/**
 * Handler for the newsdex-crawl tool
 *
 * Crawls run in the background; the tool answers with the status right after
 * the run started. Progress is read back with the "status" action.
 */
import { z } from 'zod';
import { BaseToolHandler, ToolDefinition } from './base-tool-handler.js';
import { CrawlToolArgs, McpToolResponse } from '../tool-types.js';
import { NewsService } from '../services/NewsService.js';
import { CrawlStatus } from '../../../services/crawler/domain/CrawlOrchestrator.js';
import { describeError } from '../../../shared/domain/errors.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

const archiveDate = z.string().regex(/^\d{2}\.\d{2}\.\d{4}$/, 'Expected a date as dd.mm.yyyy');

const CrawlToolParamsSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('start'), links: z.array(z.string().url()).min(1).optional() }),
  z.object({ action: z.literal('archive'), startDate: archiveDate, endDate: archiveDate.optional() }),
  z.object({ action: z.literal('pause') }),
  z.object({ action: z.literal('status') })
]);

export function formatStatus(status: CrawlStatus): string {
  const { counters } = status;
  const lines = [
    `# Crawl ${status.state}`,
    '',
    `- **Run:** ${status.runId ?? 'none'}`,
    `- **Processed:** ${status.processedCount}`,
    `- **Inserted:** ${counters.inserted}, **updated:** ${counters.updated}, **skipped:** ${counters.skipped}, **failed:** ${counters.failed}`
  ];
  if (status.lastLink) {
    lines.push(`- **Last link:** ${status.lastLink}`);
  }
  if (status.lastError) {
    lines.push(`- **Last error:** ${status.lastError}`);
  }
  return lines.join('\n');
}

export class CrawlToolHandler extends BaseToolHandler {
  constructor(private readonly newsService: NewsService, logger?: Logger) {
    super(logger);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'newsdex-crawl',
        description:
          'Control the article crawler. "start" crawls the given links (or the configured seeds), "archive" crawls ' +
          'the dated archive listings from startDate up to endDate (exclusive), "pause" stops the running crawl ' +
          'so it can resume later, "status" reports progress.',
        inputSchema: {
          type: 'object',
          properties: {
            action: { type: 'string', enum: ['start', 'archive', 'pause', 'status'], description: 'Action to perform.' },
            links: { type: 'array', items: { type: 'string' }, description: 'Article links to crawl (start).' },
            startDate: { type: 'string', description: 'First day as dd.mm.yyyy (archive).' },
            endDate: { type: 'string', description: 'Day after the last one as dd.mm.yyyy (archive).' }
          },
          required: ['action']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    const parsed = CrawlToolParamsSchema.safeParse(args);
    if (!parsed.success) {
      return this.createValidationErrorResponse(name, parsed.error, args);
    }
    const params: CrawlToolArgs = parsed.data;

    try {
      switch (params.action) {
        case 'start': {
          const links = params.links;
          const status = this.newsService.launch(() => (links ? this.newsService.start(links) : this.newsService.start()));
          return this.createSuccessResponse(formatStatus(status));
        }
        case 'archive': {
          const { startDate, endDate } = params;
          const status = this.newsService.launch(() => this.newsService.startArchive(startDate, endDate));
          return this.createSuccessResponse(formatStatus(status));
        }
        case 'pause':
          return this.createSuccessResponse(formatStatus(await this.newsService.pause()));
        case 'status':
          return this.createSuccessResponse(formatStatus(this.newsService.status()));
      }
    } catch (error: unknown) {
      this.logger.error(`newsdex-crawl ${params.action} failed`, 'CrawlToolHandler', { error: describeError(error) });
      return this.createStructuredErrorResponse(error);
    }
  }
}
