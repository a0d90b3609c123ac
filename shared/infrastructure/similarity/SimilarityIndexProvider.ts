import { IndexError } from '../../domain/errors.js';
import { IArticleRepository } from '../../domain/repositories/ArticleRepository.js';
import { Logger, getLogger } from '../logging.js';
import { IndexableDocument, TfIdfIndex, TfIdfIndexOptions, documentText } from './TfIdfIndex.js';

/**
 * A hold on the loaded index. Release it when done.
 */
export interface IndexLease {
  readonly index: TfIdfIndex;
  release(): void;
}

/**
 * Process-wide access to the similarity index. The index is loaded from the
 * store on first acquire; close() waits for outstanding leases.
 */
export class SimilarityIndexProvider {
  private readonly index: TfIdfIndex;
  private readonly logger: Logger;
  private loading: Promise<void> | null = null;
  private reloading: Promise<void> | null = null;
  private activeLeases = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly repository: IArticleRepository,
    options: TfIdfIndexOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.index = new TfIdfIndex({ ...options, logger: this.logger });
  }

  get leases(): number {
    return this.activeLeases;
  }

  async acquire(): Promise<IndexLease> {
    if (this.closed) {
      throw new IndexError('similarity index provider is closed');
    }
    // Counted before loading so close() waits for this caller too
    this.activeLeases++;
    try {
      await this.ensureLoaded();
    } catch (error) {
      this.endLease();
      throw error;
    }

    let released = false;
    return {
      index: this.index,
      release: () => {
        if (released) return;
        released = true;
        this.endLease();
      }
    };
  }

  async withIndex<T>(fn: (index: TfIdfIndex) => T | Promise<T>): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn(lease.index);
    } finally {
      lease.release();
    }
  }

  /**
   * Discard the index and rebuild it from every record in the store
   */
  reloadFromStore(): Promise<void> {
    if (!this.reloading) {
      this.reloading = this.ensureLoaded()
        .then(() => this.loadFromStore())
        .finally(() => {
          this.reloading = null;
        });
    }
    return this.reloading;
  }

  /**
   * Refuse new leases and wait for outstanding ones to be released
   */
  async close(): Promise<void> {
    this.closed = true;
    if (this.activeLeases === 0) {
      return;
    }
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadFromStore().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async loadFromStore(): Promise<void> {
    const startTime = Date.now();
    await this.index.replaceAll(this.storeDocuments());
    this.logger.info(`Similarity index loaded with ${this.index.size} documents`, 'SimilarityIndexProvider.load', {
      documents: this.index.size,
      elapsedMs: Date.now() - startTime
    });
  }

  private async *storeDocuments(): AsyncIterable<IndexableDocument> {
    for await (const record of this.repository.query()) {
      yield { id: record.id, text: documentText(record) };
    }
  }

  private endLease(): void {
    this.activeLeases--;
    if (this.activeLeases === 0 && this.closed) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
