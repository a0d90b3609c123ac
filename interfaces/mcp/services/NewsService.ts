/**
 * NewsService
 *
 * Query and crawl-control facade over the pipeline. This is the surface the
 * view layer (and the MCP tool handlers) talk to.
 */

import { z } from 'zod';
import { ArticleNotFoundError, IndexError, ValidationError, describeError } from '../../../shared/domain/errors.js';
import { ArticleRecord, Known } from '../../../shared/domain/models/Article.js';
import { ArticleQueryFilters } from '../../../shared/domain/repositories/ArticleRepository.js';
import { TfIdfIndex, documentText } from '../../../shared/infrastructure/similarity/TfIdfIndex.js';
import { CrawlStatus, LinkSource } from '../../../services/crawler/domain/CrawlOrchestrator.js';
import { generateArchiveDates } from '../../../services/crawler/domain/LinkDiscovery.js';
import { NewsdexComponents } from '../../../services/crawler/infrastructure/NewsdexServiceProvider.js';

export interface SearchHit {
  id: number;
  title: Known<string>;
  link: string;
  date: Known<string>;
  score: number;
}

export type ListArticlesOutcome =
  | { ok: true; articles: ArticleRecord[]; nextPageToken: string | null }
  | { ok: false; error: ValidationError };

export type GetArticleOutcome = { found: true; article: ArticleRecord } | { found: false };

const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

const PageTokenSchema = z.object({ lastId: z.number().int().min(0) });

export function encodePageToken(lastId: number): string {
  return Buffer.from(JSON.stringify({ lastId }), 'utf8').toString('base64url');
}

/**
 * @returns The last id of the previous page, or null for a malformed token
 */
export function decodePageToken(token: string): number | null {
  try {
    const parsed = PageTokenSchema.safeParse(JSON.parse(Buffer.from(token, 'base64url').toString('utf8')));
    return parsed.success ? parsed.data.lastId : null;
  } catch {
    return null;
  }
}

export class NewsService {
  private archiveController: AbortController | null = null;

  constructor(private readonly components: NewsdexComponents) {}

  private get logger() {
    return this.components.logger;
  }

  /**
   * The k stored articles most similar to the query text. Empty on failure or an
   * empty query.
   */
  async search(queryText: string, k: number = this.components.config.similarity.defaultK): Promise<SearchHit[]> {
    if (!queryText.trim() || k <= 0) {
      return [];
    }
    try {
      const scored = await this.queryIndex((index) => index.query(queryText, k));
      return await this.toHits(scored);
    } catch (error: unknown) {
      this.logger.error(`Search failed for "${queryText}"`, 'NewsService.search', { error: describeError(error) });
      return [];
    }
  }

  /**
   * Articles most similar to a stored article, excluding the article itself
   * @throws ArticleNotFoundError
   */
  async findSimilarTo(id: number, k: number = this.components.config.similarity.defaultK): Promise<SearchHit[]> {
    const record = await this.components.repository.getById(id);
    if (!record) {
      throw new ArticleNotFoundError(id);
    }
    const scored = await this.queryIndex((index) => index.query(documentText(record), k, { excludeId: id }));
    return this.toHits(scored);
  }

  /**
   * One page of articles in ascending id order
   * @param pageToken Token from the previous page
   */
  async listArticles(filters: ArticleQueryFilters = {}, pageToken?: string): Promise<ListArticlesOutcome> {
    let afterId = filters.afterId;
    if (pageToken !== undefined) {
      const lastId = decodePageToken(pageToken);
      if (lastId === null) {
        return { ok: false, error: new ValidationError('invalid page token', { pageToken }) };
      }
      afterId = lastId;
    }

    const pageSize = Math.min(Math.max(1, filters.limit ?? DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE);
    const articles: ArticleRecord[] = [];
    // One extra record tells whether another page exists
    for await (const record of this.components.repository.query({ ...filters, afterId, limit: pageSize + 1 })) {
      articles.push(record);
    }

    const hasMore = articles.length > pageSize;
    const page = hasMore ? articles.slice(0, pageSize) : articles;
    const nextPageToken = hasMore ? encodePageToken(page[page.length - 1].id) : null;
    return { ok: true, articles: page, nextPageToken };
  }

  async getArticle(id: number): Promise<GetArticleOutcome> {
    const article = await this.components.repository.getById(id);
    return article ? { found: true, article } : { found: false };
  }

  /**
   * Remove an article from the store and the index. The remaining vectors are
   * recomputed without it.
   * @returns Whether the article existed
   */
  async deleteArticle(id: number): Promise<boolean> {
    const deleted = await this.components.repository.delete(id);
    if (deleted) {
      await this.components.indexProvider.withIndex(async (index) => {
        index.remove(id);
        await index.rebuild();
      });
      this.logger.info(`Deleted article ${id}`, 'NewsService.deleteArticle');
    }
    return deleted;
  }

  /**
   * Crawl the given links (the configured seeds by default). Resolves when the run stops.
   */
  start(seedLinks: LinkSource = this.components.config.crawler.seedLinks): Promise<CrawlStatus> {
    return this.components.orchestrator.start(seedLinks);
  }

  /**
   * Crawl the archive listings from startDate (inclusive) to endDate (exclusive),
   * both dd.mm.yyyy. Resolves when the run stops.
   * @throws ValidationError for malformed dates
   */
  startArchive(startDate: string, endDate?: string): Promise<CrawlStatus> {
    const dates = generateArchiveDates(startDate, endDate);
    // Fail before starting when no listing template is configured
    this.components.linkDiscovery.listingUrl(dates[0]);

    const controller = new AbortController();
    const run = this.start(this.components.linkDiscovery.archiveLinkStream(dates, controller.signal));
    this.archiveController = controller;
    return run;
  }

  /**
   * Start a crawl without waiting for it; the outcome is logged
   * @returns Status right after the run started
   */
  launch(run: () => Promise<CrawlStatus>): CrawlStatus {
    void run().then(
      (status) => this.logger.info(`Crawl run ${status.runId} ended: ${status.state}`, 'NewsService.launch', status),
      (error: unknown) => this.logger.error('Crawl run failed to start', 'NewsService.launch', { error: describeError(error) })
    );
    return this.status();
  }

  async pause(): Promise<CrawlStatus> {
    this.archiveController?.abort();
    this.archiveController = null;
    return this.components.orchestrator.pause();
  }

  status(): CrawlStatus {
    return this.components.orchestrator.status();
  }

  /**
   * Recompute every vector against current statistics, or reload the whole index
   * from the store
   * @returns Number of indexed documents
   */
  async rebuildIndex(options: { fromStore?: boolean } = {}): Promise<number> {
    if (options.fromStore) {
      await this.components.indexProvider.reloadFromStore();
    }
    return this.components.indexProvider.withIndex(async (index) => {
      if (!options.fromStore) {
        await index.rebuild();
      }
      return index.size;
    });
  }

  async close(): Promise<void> {
    await this.pause();
    await this.components.indexProvider.close();
    this.components.logger.close();
  }

  /**
   * Run a query; a corrupt index is rebuilt from the store and the query retried once
   */
  private async queryIndex<T>(fn: (index: TfIdfIndex) => T): Promise<T> {
    try {
      return await this.components.indexProvider.withIndex(fn);
    } catch (error: unknown) {
      if (!(error instanceof IndexError)) {
        throw error;
      }
      this.logger.error(`Similarity index failed, rebuilding from store: ${error.message}`, 'NewsService.queryIndex');
      await this.components.indexProvider.reloadFromStore();
      return this.components.indexProvider.withIndex(fn);
    }
  }

  private async toHits(scored: Array<{ id: number; score: number }>): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    for (const { id, score } of scored) {
      const record = await this.components.repository.getById(id);
      // Deleted between the query and the lookup
      if (!record) continue;
      hits.push({ id, title: record.title, link: record.link, date: record.publishedAt, score });
    }
    return hits;
  }
}
