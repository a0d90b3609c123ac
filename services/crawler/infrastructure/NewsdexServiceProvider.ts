/**
 * NewsdexServiceProvider
 *
 * Builds the ingestion pipeline from configuration and wires its components together.
 */

import path from 'path';
import { AxiosAdapter } from 'axios';
import { IArticleRepository } from '../../../shared/domain/repositories/ArticleRepository.js';
import { ArticleExtractor } from '../../../shared/infrastructure/ArticleExtractor.js';
import { HttpClient, IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { RateLimiter } from '../../../shared/infrastructure/RateLimiter.js';
import { RetryPolicy } from '../../../shared/infrastructure/RetryPolicy.js';
import { NewsdexConfig, getConfig } from '../../../shared/infrastructure/config.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { FileSystemArticleRepository } from '../../../shared/infrastructure/repositories/FileSystemArticleRepository.js';
import { SimilarityIndexProvider } from '../../../shared/infrastructure/similarity/SimilarityIndexProvider.js';
import { CrawlCheckpoint } from '../domain/CrawlCheckpoint.js';
import { CrawlOrchestrator } from '../domain/CrawlOrchestrator.js';
import { IdentityResolver } from '../domain/IdentityResolver.js';
import { LinkDiscovery } from '../domain/LinkDiscovery.js';

export interface NewsdexComponents {
  config: NewsdexConfig;
  logger: Logger;
  fetcher: IHttpClient;
  extractor: ArticleExtractor;
  resolver: IdentityResolver;
  repository: IArticleRepository;
  indexProvider: SimilarityIndexProvider;
  orchestrator: CrawlOrchestrator;
  linkDiscovery: LinkDiscovery;
}

export interface NewsdexProviderOverrides {
  logger?: Logger;
  /** Network transport for the fetcher */
  adapter?: AxiosAdapter;
  fetcher?: IHttpClient;
  repository?: IArticleRepository;
}

/**
 * Creates and configures the pipeline components
 */
export class NewsdexServiceProvider {
  public static createComponents(
    config: NewsdexConfig = getConfig(),
    overrides: NewsdexProviderOverrides = {}
  ): NewsdexComponents {
    const logger = overrides.logger ?? getLogger();
    logger.info(`Creating newsdex components (data dir ${config.dataDir})`, 'NewsdexServiceProvider');

    const fetcher =
      overrides.fetcher ??
      new HttpClient({
        userAgents: config.crawler.userAgents,
        timeout: config.crawler.requestTimeoutMs,
        retryPolicy: new RetryPolicy(config.crawler.retry),
        rateLimiter: new RateLimiter(config.crawler.minRequestIntervalMs),
        adapter: overrides.adapter,
        logger
      });
    const extractor = new ArticleExtractor({ minBodyLength: config.extractor.minBodyLength });
    const resolver = new IdentityResolver({ boilerplatePatterns: config.identity.boilerplatePatterns, logger });
    const repository =
      overrides.repository ?? new FileSystemArticleRepository({ baseDir: path.join(config.dataDir, 'articles'), logger });
    const indexProvider = new SimilarityIndexProvider(repository, {
      nearDuplicateThreshold: config.similarity.nearDuplicateThreshold,
      rebuildAfterWrites: config.similarity.rebuildAfterWrites,
      rebuildChunkSize: config.similarity.rebuildChunkSize,
      logger
    });
    const checkpoint = new CrawlCheckpoint(path.join(config.dataDir, 'crawl-state.json'), logger);

    const orchestrator = new CrawlOrchestrator(
      { fetcher, extractor, resolver, repository, indexProvider, checkpoint, logger },
      {
        concurrency: config.crawler.concurrency,
        storeMaxAttempts: config.store.maxAttempts,
        storeRetryDelayMs: config.store.retryDelayMs
      }
    );
    const linkDiscovery = new LinkDiscovery(fetcher, {
      listingUrlTemplate: config.crawler.archive.listingUrlTemplate,
      pagePathTemplate: config.crawler.archive.pagePathTemplate,
      logger
    });

    return { config, logger, fetcher, extractor, resolver, repository, indexProvider, orchestrator, linkDiscovery };
  }
}
