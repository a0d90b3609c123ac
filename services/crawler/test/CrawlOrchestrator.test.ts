import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CrawlStateError, IndexError, ResolutionConflictError, StoreError } from '../../../shared/domain/errors.js';
import { ArticleRecord } from '../../../shared/domain/models/Article.js';
import { IArticleRepository } from '../../../shared/domain/repositories/ArticleRepository.js';
import { ArticleExtractor } from '../../../shared/infrastructure/ArticleExtractor.js';
import { HttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { RetryPolicy } from '../../../shared/infrastructure/RetryPolicy.js';
import { LogLevel, Logger, MemoryLogSink } from '../../../shared/infrastructure/logging.js';
import { FileSystemArticleRepository } from '../../../shared/infrastructure/repositories/FileSystemArticleRepository.js';
import { SimilarityIndexProvider } from '../../../shared/infrastructure/similarity/SimilarityIndexProvider.js';
import { TfIdfIndex, documentText } from '../../../shared/infrastructure/similarity/TfIdfIndex.js';
import { FAST_RETRY, MockWeb, articleHtml, makeTempDir, removeDir, waitForAbort } from '../../../shared/test/fixtures.js';
import { CrawlCheckpoint } from '../domain/CrawlCheckpoint.js';
import { CrawlEvent, CrawlOrchestrator, LinkFailedData } from '../domain/CrawlOrchestrator.js';
import { IdentityResolver } from '../domain/IdentityResolver.js';

const link = (n: number) => `https://news.example/a/${n}`;

function storyHtml(n: number, body = `Story ${n} tells how the harbour coped with the storm.`): string {
  return articleHtml({ title: `Story ${n}`, body, tags: ['harbour'], date: '05.03.2024, 14:30' });
}

class FailingRepository extends FileSystemArticleRepository {
  upsertCalls = 0;

  override async upsert(): Promise<ArticleRecord> {
    this.upsertCalls++;
    throw new StoreError('disk full');
  }
}

class ConflictingRepository extends FileSystemArticleRepository {
  upsertCalls = 0;

  override async upsert(): Promise<ArticleRecord> {
    this.upsertCalls++;
    throw new ResolutionConflictError('record 1 changed underneath');
  }
}

/** Deletes each record right after storing it, as a concurrent delete would */
class DeletingRepository extends FileSystemArticleRepository {
  override async upsert(...args: Parameters<FileSystemArticleRepository['upsert']>): Promise<ArticleRecord> {
    const record = await super.upsert(...args);
    await this.delete(record.id);
    return record;
  }
}

class FlakyIndexProvider extends SimilarityIndexProvider {
  private failuresLeft = 1;
  reloads = 0;

  override async withIndex<T>(fn: (index: TfIdfIndex) => T | Promise<T>): Promise<T> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new IndexError('simulated corruption');
    }
    return super.withIndex(fn);
  }

  override async reloadFromStore(): Promise<void> {
    this.reloads++;
    await super.reloadFromStore();
  }
}

interface PipelineOptions {
  concurrency?: number;
  repository?: IArticleRepository;
  indexProvider?: SimilarityIndexProvider;
}

describe('CrawlOrchestrator', () => {
  let dir: string;
  let web: MockWeb;
  let logger: Logger;
  let sink: MemoryLogSink;

  beforeEach(async () => {
    dir = await makeTempDir();
    web = new MockWeb();
    ({ logger, sink } = Logger.inMemory());
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function createPipeline(options: PipelineOptions = {}) {
    const repository = options.repository ?? new FileSystemArticleRepository({ baseDir: path.join(dir, 'articles'), logger });
    const indexProvider = options.indexProvider ?? new SimilarityIndexProvider(repository, { logger });
    const checkpoint = new CrawlCheckpoint(path.join(dir, 'crawl-state.json'), logger);
    const fetcher = new HttpClient({
      userAgents: ['test-agent'],
      timeout: 1000,
      retryPolicy: new RetryPolicy(FAST_RETRY),
      adapter: web.adapter,
      logger
    });
    const orchestrator = new CrawlOrchestrator(
      {
        fetcher,
        extractor: new ArticleExtractor(),
        resolver: new IdentityResolver({ logger }),
        repository,
        indexProvider,
        checkpoint,
        logger
      },
      { concurrency: options.concurrency ?? 2, storeMaxAttempts: 3, storeRetryDelayMs: 1 }
    );
    return { orchestrator, repository, indexProvider, checkpoint };
  }

  it('retries transient network errors and stores the article', async () => {
    web.flaky(link(1), 'ECONNRESET', 3, storyHtml(1));
    const { orchestrator, repository } = createPipeline();

    const status = await orchestrator.start([link(1)]);

    expect(status.state).toBe('completed');
    expect(status.counters).toEqual({ inserted: 1, updated: 0, skipped: 0, failed: 0 });
    expect(web.requestCount(link(1))).toBe(4);
    expect(sink.events('fetch-retry')).toHaveLength(3);
    expect((await repository.getByLink(link(1)))?.title).toBe('Story 1');
  });

  it('reports running then completed', async () => {
    web.page(link(1), storyHtml(1));
    const { orchestrator } = createPipeline();
    const states: string[] = [];
    orchestrator.getEventEmitter().on('state-changed', (event: CrawlEvent<{ to: string }>) => states.push(event.data.to));

    await orchestrator.start([link(1)]);

    expect(states).toEqual(['running', 'completed']);
  });

  it('stores the same content once and remembers the other link', async () => {
    const body = 'The harbour reopened on Tuesday after the storm passed.';
    web.page(link(1), storyHtml(1, body)).page(link(2), storyHtml(2, body));
    const { orchestrator, repository } = createPipeline({ concurrency: 1 });

    const status = await orchestrator.start([link(1), link(2), link(1)]);

    expect(status.counters).toEqual({ inserted: 1, updated: 0, skipped: 2, failed: 0 });
    expect(await repository.count()).toBe(1);
    expect((await repository.getById(1))?.alternateLinks).toEqual([link(2)]);
  });

  it('stores a link ingested by several workers at once a single time', async () => {
    web.page(link(1), storyHtml(1));
    const { orchestrator, repository } = createPipeline({ concurrency: 4 });

    const status = await orchestrator.start([link(1), link(1), link(1), link(1)]);

    expect(status.counters).toEqual({ inserted: 1, updated: 0, skipped: 3, failed: 0 });
    expect(await repository.count()).toBe(1);
  });

  it('fails a link at the resolve stage when conflicts persist', async () => {
    web.page(link(1), storyHtml(1));
    const conflicting = new ConflictingRepository({ baseDir: path.join(dir, 'articles'), logger });
    const { orchestrator } = createPipeline({ repository: conflicting });
    const failures: LinkFailedData[] = [];
    orchestrator.getEventEmitter().on('link-failed', (event: CrawlEvent<LinkFailedData>) => failures.push(event.data));

    const status = await orchestrator.start([link(1)]);

    expect(status.state).toBe('completed');
    expect(status.counters).toEqual({ inserted: 0, updated: 0, skipped: 0, failed: 1 });
    expect(conflicting.upsertCalls).toBe(2);
    expect(failures).toEqual([
      {
        link: link(1),
        position: 0,
        stage: 'resolve',
        error: 'resolution kept conflicting with concurrent ingestion'
      }
    ]);
  });

  it('updates an article whose page changed', async () => {
    web.page(link(1), storyHtml(1));
    const { orchestrator, repository } = createPipeline();
    await orchestrator.start([link(1)]);

    web.page(link(1), storyHtml(1, 'Story 1 now reports that the harbour reopened a day late.'));
    const status = await orchestrator.start([link(1)]);

    expect(status.counters).toEqual({ inserted: 0, updated: 1, skipped: 0, failed: 0 });
    expect((await repository.getById(1))?.body).toBe('Story 1 now reports that the harbour reopened a day late.');
  });

  it('counts failed links by stage and keeps going', async () => {
    web.page(link(3), articleHtml({ title: 'Brief', body: 'Too short' }));
    web.page(link(4), storyHtml(4));
    const { orchestrator } = createPipeline({ concurrency: 1 });
    const stages: string[] = [];
    orchestrator.getEventEmitter().on('link-failed', (event: CrawlEvent<LinkFailedData>) => stages.push(event.data.stage));

    const status = await orchestrator.start(['mailto:desk@news.example', link(2), link(3), link(4)]);

    expect(stages).toEqual(['link', 'fetch', 'extract']);
    expect(status.state).toBe('completed');
    expect(status.processedCount).toBe(4);
    expect(status.counters).toEqual({ inserted: 1, updated: 0, skipped: 0, failed: 3 });
  });

  describe('checkpoint', () => {
    it('resumes after the saved position and clears the checkpoint when done', async () => {
      for (const n of [1, 2, 3]) web.page(link(n), storyHtml(n));
      const { orchestrator, checkpoint } = createPipeline();
      await checkpoint.save({
        runId: 'earlier-run',
        cursor: 2,
        lastLink: link(2),
        counters: { inserted: 2, updated: 0, skipped: 0, failed: 0 },
        updatedAt: '2026-01-01T00:00:00.000Z'
      });

      const status = await orchestrator.start([link(1), link(2), link(3)]);

      expect(web.requests.map((request) => request.url)).toEqual([link(3)]);
      expect(status.counters.inserted).toBe(3);
      expect(status.processedCount).toBe(3);
      expect(await checkpoint.load()).toBeNull();
    });

    it('starts over when the checkpoint belongs to another stream', async () => {
      for (const n of [1, 2, 3]) web.page(link(n), storyHtml(n));
      const { orchestrator, checkpoint } = createPipeline();
      await checkpoint.save({
        runId: 'earlier-run',
        cursor: 2,
        lastLink: link(9),
        counters: { inserted: 2, updated: 0, skipped: 0, failed: 0 },
        updatedAt: '2026-01-01T00:00:00.000Z'
      });

      const status = await orchestrator.start([link(1), link(2), link(3)]);

      expect(status.counters.inserted).toBe(3);
      expect(web.requests).toHaveLength(3);
      expect(sink.entries.some((entry) => entry.level === LogLevel.WARN && entry.message.startsWith('Discarding crawl checkpoint'))).toBe(
        true
      );
    });
  });

  describe('pause', () => {
    it('stops at the in-flight link and resumes from the checkpoint', async () => {
      web.page(link(1), storyHtml(1)).on(link(2), waitForAbort).page(link(3), storyHtml(3));
      const { orchestrator, checkpoint } = createPipeline({ concurrency: 1 });

      const run = orchestrator.start([link(1), link(2), link(3)]);
      await vi.waitFor(() => expect(web.requestCount(link(2))).toBe(1));
      const paused = await orchestrator.pause();

      expect(paused.state).toBe('paused');
      expect(paused.processedCount).toBe(1);
      expect(await run).toEqual(paused);
      expect(await checkpoint.load()).toMatchObject({ cursor: 1, lastLink: link(1) });

      web.page(link(2), storyHtml(2));
      const resumed = await orchestrator.start([link(1), link(2), link(3)]);

      expect(resumed.state).toBe('completed');
      expect(resumed.counters.inserted).toBe(3);
      expect(web.requestCount(link(1))).toBe(1);
    });

    it('refuses a second start while running', async () => {
      web.on(link(1), waitForAbort);
      const { orchestrator } = createPipeline();

      const run = orchestrator.start([link(1)]);
      expect(() => orchestrator.start([link(1)])).toThrow(CrawlStateError);

      await orchestrator.pause();
      expect((await run).state).toBe('paused');
    });
  });

  it('fails the run once store retries are used up', async () => {
    web.page(link(1), storyHtml(1)).page(link(2), storyHtml(2));
    const failing = new FailingRepository({ baseDir: path.join(dir, 'articles'), logger });
    const { orchestrator } = createPipeline({ concurrency: 1, repository: failing });

    const status = await orchestrator.start([link(1), link(2)]);

    expect(status.state).toBe('failed');
    expect(status.lastError).toContain('disk full');
    expect(failing.upsertCalls).toBe(3);
    expect(web.requestCount(link(2))).toBe(0);
  });

  describe('similarity index', () => {
    const TOPICS = ['budget', 'roads', 'schools', 'parks', 'libraries', 'buses', 'bridges', 'markets'];

    it('ranks each article first for its own text when the run ends', async () => {
      web.page(link(1), articleHtml({ title: 'Harbour', body: 'Ferries resume their service at the harbour.' }));
      TOPICS.forEach((topic, i) =>
        web.page(link(i + 2), articleHtml({ title: 'Council', body: `The council discussed the ${topic} at length.` }))
      );
      web.page(
        link(10),
        articleHtml({ title: 'Harbour', body: 'Ferries ferries ferries resume service at the harbour after the storm.' })
      );
      const { orchestrator, repository, indexProvider } = createPipeline({ concurrency: 1 });

      const status = await orchestrator.start(Array.from({ length: 10 }, (_, i) => link(i + 1)));
      expect(status.counters.inserted).toBe(10);

      const first = await repository.getById(1);
      expect(first).not.toBeNull();
      if (!first) return;
      await indexProvider.withIndex((index) => {
        expect(index.writesSinceRebuild).toBe(0);
        const [top] = index.query(documentText(first), 3);
        expect(top.id).toBe(1);
        expect(top.score).toBeCloseTo(1, 10);
      });
      expect(sink.events('index-rebuilt')).toHaveLength(1);
    });

    it('rebuilds while a run is going once enough writes piled up', async () => {
      TOPICS.slice(0, 4).forEach((topic, i) =>
        web.page(link(i + 1), articleHtml({ title: 'Council', body: `The council discussed the ${topic} at length.` }))
      );
      const repository = new FileSystemArticleRepository({ baseDir: path.join(dir, 'articles'), logger });
      const indexProvider = new SimilarityIndexProvider(repository, { logger, rebuildAfterWrites: 2 });
      const { orchestrator } = createPipeline({ concurrency: 1, repository, indexProvider });

      await orchestrator.start([link(1), link(2), link(3), link(4)]);

      // After the second and fourth writes; nothing is left for the end of the run
      expect(sink.events('index-rebuilt').map((entry) => entry.metadata?.documents)).toEqual([2, 4]);
    });

    it('reports near duplicates of a new article', async () => {
      web.page(link(1), articleHtml({ title: 'Harbour reopens', body: 'The harbour reopened after the storm damaged the pier.' }));
      web.page(
        link(2),
        articleHtml({ title: 'Harbour reopens', body: 'The harbour reopened after the storm damaged the pier today.' })
      );
      const { orchestrator } = createPipeline({ concurrency: 1 });

      const status = await orchestrator.start([link(1), link(2)]);

      expect(status.counters.inserted).toBe(2);
      const reports = sink.events('near-duplicate');
      expect(reports).toHaveLength(1);
      expect(reports[0].metadata).toMatchObject({ recordId: 2, duplicates: [1] });
    });

    it('leaves no vector behind for a record deleted while it was stored', async () => {
      web.page(link(1), storyHtml(1));
      const deleting = new DeletingRepository({ baseDir: path.join(dir, 'articles'), logger });
      const { orchestrator, indexProvider } = createPipeline({ repository: deleting });

      const status = await orchestrator.start([link(1)]);

      expect(status.counters.inserted).toBe(1);
      expect(await deleting.count()).toBe(0);
      await indexProvider.withIndex((index) => {
        expect(index.size).toBe(0);
        expect(index.snapshot().documentFrequency.size).toBe(0);
      });
    });
  });

  it('rebuilds the similarity index from the store when it fails', async () => {
    web.page(link(1), storyHtml(1));
    const repository = new FileSystemArticleRepository({ baseDir: path.join(dir, 'articles'), logger });
    const flaky = new FlakyIndexProvider(repository, { logger });
    const { orchestrator } = createPipeline({ repository, indexProvider: flaky });
    const rebuilt: unknown[] = [];
    orchestrator.getEventEmitter().on('index-rebuilt', (event: CrawlEvent) => rebuilt.push(event.data));

    const status = await orchestrator.start([link(1)]);

    expect(status.state).toBe('completed');
    expect(rebuilt).toHaveLength(1);
    expect(flaky.reloads).toBe(1);
    expect(await flaky.withIndex((index) => index.size)).toBe(1);
  });
});
