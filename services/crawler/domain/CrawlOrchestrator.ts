/**
 * CrawlOrchestrator drives the ingestion pipeline
 *
 * A bounded pool of workers pulls links from a shared stream and takes each one
 * through fetch, extract, resolve, upsert and index. Request starts are spaced
 * by the fetcher's rate limiter. Cancellation (pause or a fatal error) interrupts
 * fetches and rate-limit waits only; work past those points runs to completion.
 * Vectors written during a run are recomputed when it ends, and every
 * `rebuildAfterWrites` writes while it runs.
 */

import EventEmitter from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  CrawlStateError,
  IndexError,
  ResolutionConflictError,
  StoreError,
  describeError
} from '../../../shared/domain/errors.js';
import { ArticleCandidate, ArticleRecord, RawPage, ResolutionDecision } from '../../../shared/domain/models/Article.js';
import { IArticleRepository } from '../../../shared/domain/repositories/ArticleRepository.js';
import { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { ExtractionOutcome } from '../../../shared/infrastructure/ArticleExtractor.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { SimilarityIndexProvider } from '../../../shared/infrastructure/similarity/SimilarityIndexProvider.js';
import { TfIdfIndex, documentText } from '../../../shared/infrastructure/similarity/TfIdfIndex.js';
import { sleep } from '../../../shared/utils/async.js';
import { Semaphore } from '../../../shared/utils/concurrency.js';
import { normalizeLink } from '../../../shared/utils/urlUtils.js';
import { CrawlCheckpoint, CrawlCounters, emptyCounters } from './CrawlCheckpoint.js';
import { IdentityResolver } from './IdentityResolver.js';

export type CrawlState = 'idle' | 'running' | 'paused' | 'completed' | 'failed';

export interface CrawlStatus {
  state: CrawlState;
  runId: string | null;
  /** Stream positions fully handled (processed or failed), including resumed ones */
  processedCount: number;
  lastLink: string | null;
  lastError: string | null;
  counters: CrawlCounters;
}

export type LinkSource = Iterable<string> | AsyncIterable<string>;

export interface PageExtractor {
  extract(page: RawPage): ExtractionOutcome;
}

export interface CrawlOrchestratorOptions {
  /** Links in flight at once */
  concurrency: number;
  /** Attempts for a store transaction before the run fails */
  storeMaxAttempts: number;
  storeRetryDelayMs: number;
}

export interface CrawlOrchestratorDependencies {
  fetcher: IHttpClient;
  extractor: PageExtractor;
  resolver: IdentityResolver;
  repository: IArticleRepository;
  indexProvider: SimilarityIndexProvider;
  checkpoint?: CrawlCheckpoint;
  logger?: Logger;
}

/**
 * Event interface for orchestrator events
 */
export interface CrawlEvent<T = unknown> {
  type: 'state-changed' | 'link-processed' | 'link-failed' | 'index-rebuilt';
  runId: string | null;
  timestamp: Date;
  data: T;
}

export interface LinkProcessedData {
  link: string;
  position: number;
  decision: ResolutionDecision['kind'];
  recordId: number;
}

export interface LinkFailedData {
  link: string;
  position: number;
  stage: 'fetch' | 'extract' | 'resolve' | 'link';
  error: string;
}

interface StreamItem {
  position: number;
  link: string;
}

/** Thrown inside a worker to stop the whole run */
class FatalCrawlError extends Error {
  constructor(readonly reason: unknown) {
    super(describeError(reason));
    this.name = 'FatalCrawlError';
  }
}

async function* fromIterable(source: Iterable<string>): AsyncGenerator<string> {
  yield* source;
}

function toAsyncIterator(source: LinkSource): AsyncIterator<string> {
  return Symbol.asyncIterator in source ? source[Symbol.asyncIterator]() : fromIterable(source);
}

export class CrawlOrchestrator {
  /** Event emitter for orchestrator events */
  private eventEmitter = new EventEmitter();
  private readonly logger: Logger;

  private state: CrawlState = 'idle';
  private runId: string | null = null;
  private processedCount = 0;
  private lastLink: string | null = null;
  private lastError: string | null = null;
  private counters: CrawlCounters = emptyCounters();

  private controller: AbortController | null = null;
  private pauseRequested = false;
  private currentRun: Promise<CrawlStatus> | null = null;
  /** Index writes made by the current run */
  private indexWrites = 0;

  // Watermark bookkeeping for the checkpoint: positions finished above the cursor
  private cursor = 0;
  private finished = new Map<number, string>();

  constructor(
    private readonly deps: CrawlOrchestratorDependencies,
    private readonly options: CrawlOrchestratorOptions
  ) {
    this.logger = deps.logger ?? getLogger();
  }

  /**
   * Get the event emitter for this orchestrator
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  status(): CrawlStatus {
    return {
      state: this.state,
      runId: this.runId,
      processedCount: this.processedCount,
      lastLink: this.lastLink,
      lastError: this.lastError,
      counters: { ...this.counters }
    };
  }

  /**
   * Crawl the given links. Resolves with the final status once the stream is
   * exhausted, the run is paused, or a fatal error stopped it.
   * @throws CrawlStateError if a run is already in progress
   */
  start(links: LinkSource): Promise<CrawlStatus> {
    if (this.state === 'running') {
      throw new CrawlStateError('a crawl is already running', { runId: this.runId });
    }
    this.currentRun = this.run(links).finally(() => {
      this.currentRun = null;
    });
    return this.currentRun;
  }

  /**
   * Stop the running crawl. In-flight fetches and rate-limit waits are aborted;
   * links already past the fetch run to completion. Resolves with the final status.
   */
  async pause(): Promise<CrawlStatus> {
    const run = this.currentRun;
    if (this.state !== 'running' || !run) {
      return this.status();
    }
    this.pauseRequested = true;
    this.controller?.abort();
    this.logger.info('Pausing crawl', 'CrawlOrchestrator.pause', { runId: this.runId });
    return run;
  }

  private async run(links: LinkSource): Promise<CrawlStatus> {
    const controller = new AbortController();
    this.controller = controller;
    this.pauseRequested = false;
    this.runId = uuidv4();
    this.lastError = null;
    this.indexWrites = 0;
    this.finished.clear();
    this.setState('running');

    const iterator = toAsyncIterator(links);
    let fatal: FatalCrawlError | null = null;

    try {
      await this.deps.repository.initialize();
      const replay = await this.restoreCheckpoint(iterator);
      const pull = this.createPuller(iterator, replay, controller.signal);

      const workers = Array.from({ length: Math.max(1, this.options.concurrency) }, (_, worker) =>
        this.workerLoop(worker, pull, controller)
      );
      const results = await Promise.allSettled(workers);
      for (const result of results) {
        if (result.status === 'rejected') {
          fatal ??= result.reason instanceof FatalCrawlError ? result.reason : new FatalCrawlError(result.reason);
        }
      }
    } catch (error: unknown) {
      fatal = error instanceof FatalCrawlError ? error : new FatalCrawlError(error);
      controller.abort();
    } finally {
      await this.closeIterator(iterator);
    }

    if (!fatal && this.indexWrites > 0) {
      try {
        await this.refreshIndex();
      } catch (error: unknown) {
        fatal = error instanceof FatalCrawlError ? error : new FatalCrawlError(error);
      }
    }

    await this.deps.checkpoint?.flush();

    if (fatal) {
      this.lastError = fatal.message;
      this.logger.error(`Crawl failed: ${fatal.message}`, 'CrawlOrchestrator.run', { runId: this.runId, ...this.counters });
      this.setState('failed');
    } else if (this.pauseRequested) {
      this.setState('paused');
    } else {
      await this.clearCheckpoint();
      this.setState('completed');
    }

    this.logger.info(`Crawl ${this.state}`, 'CrawlOrchestrator.run', {
      runId: this.runId,
      processedCount: this.processedCount,
      ...this.counters
    });
    this.controller = null;
    return this.status();
  }

  /**
   * Skip the positions a previous run already processed. Links read while
   * checking the checkpoint are handed back for processing if it does not match.
   */
  private async restoreCheckpoint(iterator: AsyncIterator<string>): Promise<StreamItem[]> {
    const saved = await this.deps.checkpoint?.load();
    this.cursor = 0;
    this.processedCount = 0;
    this.lastLink = null;
    this.counters = emptyCounters();

    if (!saved || saved.cursor === 0) {
      return [];
    }

    const consumed: string[] = [];
    while (consumed.length < saved.cursor) {
      const next = await iterator.next();
      if (next.done) break;
      consumed.push(next.value);
    }

    const watermark = consumed.length === saved.cursor ? consumed[saved.cursor - 1] : null;
    const watermarkLink = watermark === null ? null : normalizeLink(watermark) ?? watermark;
    if (watermarkLink !== null && watermarkLink === saved.lastLink) {
      this.cursor = saved.cursor;
      this.processedCount = saved.cursor;
      this.lastLink = saved.lastLink;
      this.counters = { ...saved.counters };
      this.logger.info(`Resuming crawl after ${saved.cursor} links`, 'CrawlOrchestrator.restoreCheckpoint', {
        runId: this.runId,
        previousRunId: saved.runId,
        cursor: saved.cursor
      });
      return [];
    }

    this.logger.warn('Discarding crawl checkpoint that does not match the link stream', 'CrawlOrchestrator.restoreCheckpoint', {
      expected: saved.lastLink,
      found: watermarkLink,
      cursor: saved.cursor
    });
    await this.clearCheckpoint();
    return consumed.map((link, position) => ({ link, position }));
  }

  /**
   * Serialized access to the shared stream; positions follow stream order
   */
  private createPuller(
    iterator: AsyncIterator<string>,
    replay: StreamItem[],
    signal: AbortSignal
  ): () => Promise<StreamItem | null> {
    const lock = new Semaphore(1);
    let position = this.cursor + replay.length;
    let exhausted = false;

    return () =>
      lock.runExclusive(async () => {
        if (signal.aborted) return null;
        const replayed = replay.shift();
        if (replayed) return replayed;
        if (exhausted) return null;
        const next = await iterator.next();
        if (next.done) {
          exhausted = true;
          return null;
        }
        return { link: next.value, position: position++ };
      });
  }

  private async workerLoop(
    worker: number,
    pull: () => Promise<StreamItem | null>,
    controller: AbortController
  ): Promise<void> {
    for (;;) {
      const item = await pull();
      if (!item) {
        return;
      }
      try {
        await this.processLink(item, controller.signal);
      } catch (error: unknown) {
        // Fatal: stop every worker
        controller.abort();
        this.logger.error(`Worker ${worker} stopped the crawl at ${item.link}`, 'CrawlOrchestrator.workerLoop', {
          error: describeError(error instanceof FatalCrawlError ? error.reason : error)
        });
        throw error;
      }
    }
  }

  private async processLink(item: StreamItem, signal: AbortSignal): Promise<void> {
    const link = normalizeLink(item.link);
    if (!link) {
      this.recordFailure(item, item.link, 'link', `not an http(s) link: ${item.link}`);
      return;
    }
    const outcome = await this.deps.fetcher.fetch(link, signal);
    if (!outcome.ok) {
      if (outcome.error.kind === 'Cancelled') {
        // Not processed: a resumed run picks it up again
        return;
      }
      this.recordFailure(item, link, 'fetch', outcome.error.message);
      return;
    }

    const extraction = this.deps.extractor.extract(outcome.page);
    if (!extraction.ok) {
      this.logger.warn(extraction.error.message, 'CrawlOrchestrator.processLink', {
        event: 'extraction-failed',
        link,
        reason: extraction.error.reason
      });
      this.recordFailure(item, link, 'extract', extraction.error.message);
      return;
    }

    const stored = await this.store({ ...extraction.article, link });
    if (!stored) {
      this.recordFailure(item, link, 'resolve', 'resolution kept conflicting with concurrent ingestion');
      return;
    }

    const { decision, record } = stored;
    if (decision.kind === 'insert' || decision.kind === 'update') {
      await this.updateIndex(record);
    }

    switch (decision.kind) {
      case 'insert':
        this.counters.inserted++;
        break;
      case 'update':
        this.counters.updated++;
        break;
      case 'skip':
        this.counters.skipped++;
        break;
    }
    this.logger.info(`Processed ${link}: ${decision.kind}`, 'CrawlOrchestrator.processLink', {
      event: 'link-processed',
      link,
      decision: decision.kind,
      recordId: record.id,
      ...(decision.kind === 'skip' ? { reason: decision.reason } : {}),
      ...(decision.kind === 'update' ? { changedFields: decision.changedFields } : {})
    });
    this.emitEvent<LinkProcessedData>('link-processed', {
      link,
      position: item.position,
      decision: decision.kind,
      recordId: record.id
    });
    this.markFinished(item.position, link);
  }

  /**
   * Resolve and upsert. A conflict is re-resolved once; retryable store errors are
   * retried with backoff and become fatal once attempts run out.
   * @returns null when the conflict persisted
   */
  private async store(
    candidate: ArticleCandidate
  ): Promise<{ decision: ResolutionDecision; record: ArticleRecord } | null> {
    let conflictRetried = false;
    let storeAttempt = 0;

    for (;;) {
      try {
        const decision = await this.deps.resolver.resolve(candidate, this.deps.repository);
        const record = await this.deps.repository.upsert(decision, candidate);
        return { decision, record };
      } catch (error: unknown) {
        if (error instanceof ResolutionConflictError) {
          if (conflictRetried) {
            this.logger.warn(`Giving up on ${candidate.link} after repeated conflicts`, 'CrawlOrchestrator.store', {
              error: error.message
            });
            return null;
          }
          conflictRetried = true;
          this.logger.debug(`Re-resolving ${candidate.link} after conflict`, 'CrawlOrchestrator.store', {
            error: error.message
          });
          continue;
        }

        if (error instanceof StoreError && error.retryable && ++storeAttempt < this.options.storeMaxAttempts) {
          const delayMs = this.options.storeRetryDelayMs * storeAttempt;
          this.logger.warn(`Store transaction failed, retrying in ${delayMs}ms`, 'CrawlOrchestrator.store', {
            link: candidate.link,
            attempt: storeAttempt,
            error: error.message
          });
          await sleep(delayMs);
          continue;
        }

        throw new FatalCrawlError(error);
      }
    }
  }

  private async updateIndex(record: ArticleRecord): Promise<void> {
    try {
      await this.deps.indexProvider.withIndex(async (index) => {
        index.index(record);
        this.indexWrites++;
        // A delete that finished before this check missed the vector written above
        if (!(await this.deps.repository.getById(record.id))) {
          index.remove(record.id);
          return;
        }
        this.reportNearDuplicates(index, record);
        if (index.needsRebuild()) {
          await index.rebuild();
        }
      });
    } catch (error: unknown) {
      await this.recoverIndex(error, { recordId: record.id });
    }
  }

  /**
   * Recompute the vectors written during the run against the final statistics
   */
  private async refreshIndex(): Promise<void> {
    try {
      await this.deps.indexProvider.withIndex(async (index) => {
        if (index.writesSinceRebuild > 0) {
          await index.rebuild();
        }
      });
    } catch (error: unknown) {
      await this.recoverIndex(error, {});
    }
  }

  /**
   * A corrupt index is reloaded from the store; anything else stops the run
   */
  private async recoverIndex(error: unknown, details: Record<string, unknown>): Promise<void> {
    if (!(error instanceof IndexError)) {
      throw new FatalCrawlError(error);
    }
    this.logger.error(`Similarity index failed, rebuilding from store: ${error.message}`, 'CrawlOrchestrator.recoverIndex', details);
    try {
      await this.deps.indexProvider.reloadFromStore();
    } catch (rebuildError: unknown) {
      throw new FatalCrawlError(rebuildError);
    }
    this.emitEvent('index-rebuilt', { reason: error.message, ...details });
  }

  private reportNearDuplicates(index: TfIdfIndex, record: ArticleRecord): void {
    const duplicates = index.findNearDuplicates(documentText(record), undefined, record.id);
    if (duplicates.length === 0) {
      return;
    }
    this.logger.info(`Record ${record.id} nearly duplicates ${duplicates.length} stored articles`, 'CrawlOrchestrator.updateIndex', {
      event: 'near-duplicate',
      recordId: record.id,
      duplicates: duplicates.map((hit) => hit.id)
    });
  }

  private recordFailure(item: StreamItem, link: string, stage: LinkFailedData['stage'], message: string): void {
    this.counters.failed++;
    this.logger.warn(`Skipping ${link} (${stage} failed)`, 'CrawlOrchestrator.processLink', {
      event: 'link-failed',
      link,
      stage,
      error: message
    });
    this.emitEvent<LinkFailedData>('link-failed', { link, position: item.position, stage, error: message });
    this.markFinished(item.position, link);
  }

  /**
   * Advance the watermark over every contiguously finished position
   */
  private markFinished(position: number, link: string): void {
    this.processedCount++;
    this.finished.set(position, link);

    let advanced = false;
    for (let next = this.finished.get(this.cursor); next !== undefined; next = this.finished.get(this.cursor)) {
      this.finished.delete(this.cursor);
      this.lastLink = next;
      this.cursor++;
      advanced = true;
    }

    if (advanced && this.deps.checkpoint && this.runId) {
      void this.deps.checkpoint.save({
        runId: this.runId,
        cursor: this.cursor,
        lastLink: this.lastLink,
        counters: this.counters,
        updatedAt: new Date().toISOString()
      });
    }
  }

  private async clearCheckpoint(): Promise<void> {
    try {
      await this.deps.checkpoint?.clear();
    } catch (error: unknown) {
      this.logger.warn('Failed to clear crawl checkpoint', 'CrawlOrchestrator.clearCheckpoint', {
        error: describeError(error)
      });
    }
  }

  private async closeIterator(iterator: AsyncIterator<string>): Promise<void> {
    if (!iterator.return) {
      return;
    }
    try {
      await iterator.return();
    } catch (error: unknown) {
      this.logger.warn('Link stream failed to close', 'CrawlOrchestrator.closeIterator', { error: describeError(error) });
    }
  }

  private setState(state: CrawlState): void {
    const previous = this.state;
    this.state = state;
    this.emitEvent('state-changed', { from: previous, to: state });
  }

  /**
   * Emit an event
   */
  private emitEvent<T>(type: CrawlEvent['type'], data: T): void {
    const event: CrawlEvent<T> = { type, runId: this.runId, timestamp: new Date(), data };
    this.eventEmitter.emit(type, event);
  }
}
