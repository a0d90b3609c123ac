#!/usr/bin/env node
/**
 * newsdex MCP Server - Main entry point
 *
 * Exposes article search, browsing and crawl control as MCP tools over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { IToolHandler } from './handlers/base-tool-handler.js';
import { SearchToolHandler } from './handlers/search-tool-handler.js';
import { ArticlesToolHandler } from './handlers/articles-tool-handler.js';
import { CrawlToolHandler } from './handlers/crawl-tool-handler.js';
import { NewsService } from './services/NewsService.js';
import { NewsdexServiceProvider } from '../../services/crawler/infrastructure/NewsdexServiceProvider.js';
import { describeError } from '../../shared/domain/errors.js';
import { NewsdexConfig, getConfig } from '../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../shared/infrastructure/logging.js';

/**
 * Main newsdex MCP server class
 */
export class NewsdexServer {
  private readonly server: Server;
  private readonly handlers: IToolHandler[];

  constructor(
    private readonly newsService: NewsService,
    config: NewsdexConfig = getConfig(),
    private readonly logger: Logger = getLogger()
  ) {
    this.server = new Server(
      {
        name: config.mcp.name,
        version: config.mcp.version
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.handlers = [
      new SearchToolHandler(newsService, logger),
      new ArticlesToolHandler(newsService, logger),
      new CrawlToolHandler(newsService, logger)
    ];

    this.server.onerror = (error) => {
      this.logger.error('MCP transport error', 'NewsdexServer', { error: describeError(error) });
    };

    this.initializeHandlers();
  }

  /**
   * Initialize server handlers
   */
  private initializeHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.handlers.flatMap((handler) => handler.getToolDefinitions())
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: toolArgs } = request.params;
      const handler = this.handlers.find((candidate) => candidate.handles(name));
      if (!handler) {
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true
        };
      }

      const toolResponse = await handler.handleToolCall(name, toolArgs ?? {});
      return {
        content: toolResponse.content,
        isError: toolResponse.isError ?? false
      };
    });
  }

  /**
   * Start the server on stdio
   */
  public async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('newsdex MCP server running on stdio', 'NewsdexServer');
  }

  public async close(): Promise<void> {
    await this.server.close();
    await this.newsService.close();
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const logger = getLogger();
  const newsService = new NewsService(NewsdexServiceProvider.createComponents(config, { logger }));
  const server = new NewsdexServer(newsService, config, logger);

  const shutdown = (): void => {
    void server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to shut down cleanly', 'NewsdexServer', { error: describeError(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
}

main().catch((error: unknown) => {
  getLogger().error('Failed to start server', 'NewsdexServer', { error: describeError(error) });
  process.exit(1);
});
