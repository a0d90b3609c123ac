/**
 * File system implementation of the ArticleRepository interface
 * Stores records as JSON files and keeps link, fingerprint and id indexes in memory
 */

import path from 'path';
import { ResolutionConflictError, StoreError } from '../../domain/errors.js';
import {
  ArticleCandidate,
  ArticleRecord,
  ResolutionDecision,
  UNKNOWN,
  mergeCandidate,
  normalizeTags
} from '../../domain/models/Article.js';
import { ArticleQueryFilters, IArticleRepository } from '../../domain/repositories/ArticleRepository.js';
import { getConfig } from '../config.js';
import { Logger, getLogger } from '../logging.js';
import { Semaphore } from '../../utils/concurrency.js';
import { ArticleFileStorage } from './article/ArticleFileStorage.js';

export interface FileSystemArticleRepositoryOptions {
  /** Base directory for storing records */
  baseDir?: string;
  logger?: Logger;
  /** Clock for createdAt/updatedAt, replaceable in tests */
  now?: () => Date;
}

/**
 * File system-based article repository.
 *
 * Every mutation runs under a single write lock. Decisions are re-validated inside
 * the lock, so two ingestions racing on the same link or fingerprint cannot both
 * commit.
 */
export class FileSystemArticleRepository implements IArticleRepository {
  private readonly baseDir: string;
  private readonly storage: ArticleFileStorage;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly writeLock = new Semaphore(1);

  private readonly linkIndex = new Map<string, number>();
  private readonly fingerprintIndex = new Map<string, number>();
  /** Ascending; ids are allocated in increasing order so appends keep it sorted */
  private ids: number[] = [];
  private nextId = 1;
  private initialization: Promise<void> | null = null;

  /**
   * Create a new file system article repository
   */
  constructor(options: FileSystemArticleRepositoryOptions = {}) {
    this.baseDir = options.baseDir ?? path.join(getConfig().dataDir, 'articles');
    this.logger = options.logger ?? getLogger();
    this.storage = new ArticleFileStorage(this.baseDir, this.logger);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Initialize the repository (create directories and build indices)
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.writeLock.runExclusive(() => this.buildIndices()).catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  /**
   * Build in-memory indices for existing records
   */
  private async buildIndices(): Promise<void> {
    this.logger.info(`Initializing article repository at ${this.baseDir}`, 'FileSystemArticleRepository.initialize');
    await this.storage.initialize();

    this.linkIndex.clear();
    this.fingerprintIndex.clear();
    const ids: number[] = [];
    let maxId = 0;
    let skipped = 0;

    await this.storage.walkRecords(async (filePath) => {
      let record: ArticleRecord;
      try {
        record = await this.storage.readRecordFile(filePath);
      } catch (error: unknown) {
        if (error instanceof StoreError && !error.retryable) {
          skipped++;
          this.logger.error(`Skipping unreadable record file ${filePath}`, 'FileSystemArticleRepository.buildIndices', {
            error: error.message,
            details: error.details
          });
          return;
        }
        throw error;
      }
      if (this.linkIndex.has(record.link) || this.fingerprintIndex.has(record.fingerprint)) {
        skipped++;
        this.logger.error(`Record ${record.id} duplicates the link or fingerprint of another record`, 'FileSystemArticleRepository.buildIndices', {
          link: record.link,
          fingerprint: record.fingerprint
        });
        return;
      }
      this.linkIndex.set(record.link, record.id);
      this.fingerprintIndex.set(record.fingerprint, record.id);
      ids.push(record.id);
      maxId = Math.max(maxId, record.id);
    });

    this.ids = ids.sort((a, b) => a - b);

    const sequence = await this.storage.readSequence();
    this.nextId = Math.max(sequence?.next ?? 1, maxId + 1);
    if (!sequence || sequence.next !== this.nextId) {
      await this.storage.writeSequence({ next: this.nextId });
    }

    this.logger.info(`Article repository initialized. Indexed ${this.ids.length} records.`, 'FileSystemArticleRepository.initialize', {
      records: this.ids.length,
      skipped,
      nextId: this.nextId
    });
  }

  async getById(id: number): Promise<ArticleRecord | null> {
    await this.initialize();
    return this.hasId(id) ? this.storage.readRecord(id) : null;
  }

  async getByLink(link: string): Promise<ArticleRecord | null> {
    await this.initialize();
    const id = this.linkIndex.get(link);
    return id === undefined ? null : this.storage.readRecord(id);
  }

  async getByFingerprint(fingerprint: string): Promise<ArticleRecord | null> {
    await this.initialize();
    const id = this.fingerprintIndex.get(fingerprint);
    return id === undefined ? null : this.storage.readRecord(id);
  }

  async count(): Promise<number> {
    await this.initialize();
    return this.ids.length;
  }

  async upsert(decision: ResolutionDecision, candidate: ArticleCandidate): Promise<ArticleRecord> {
    await this.initialize();
    return this.writeLock.runExclusive(async () => {
      switch (decision.kind) {
        case 'insert':
          return this.insert(decision.fingerprint, candidate);
        case 'update':
          return this.update(decision.existingId, decision.fingerprint, candidate);
        case 'skip':
          return this.skip(decision.existingId, decision.reason, decision.fingerprint, candidate);
      }
    });
  }

  private async insert(fingerprint: string, candidate: ArticleCandidate): Promise<ArticleRecord> {
    const linkOwner = this.linkIndex.get(candidate.link);
    if (linkOwner !== undefined) {
      throw new ResolutionConflictError(`link already stored as record ${linkOwner}`, { link: candidate.link, existingId: linkOwner });
    }
    const fingerprintOwner = this.fingerprintIndex.get(fingerprint);
    if (fingerprintOwner !== undefined) {
      throw new ResolutionConflictError(`content already stored as record ${fingerprintOwner}`, {
        link: candidate.link,
        existingId: fingerprintOwner
      });
    }

    // The sequence is persisted first: a crash can burn an id, never reuse one
    const id = this.nextId;
    await this.storage.writeSequence({ next: id + 1 });
    this.nextId = id + 1;

    const timestamp = this.now().toISOString();
    const record: ArticleRecord = {
      id,
      link: candidate.link,
      title: candidate.title,
      publishedAt: candidate.publishedAt,
      author: candidate.author,
      tags: normalizeTags(candidate.tags),
      body: candidate.body,
      fingerprint,
      alternateLinks: [],
      relatedLinks: [...new Set(candidate.relatedLinks)],
      createdAt: timestamp,
      updatedAt: timestamp
    };
    await this.storage.writeRecord(record);

    this.linkIndex.set(record.link, id);
    this.fingerprintIndex.set(fingerprint, id);
    this.ids.push(id);
    this.logger.info(`Inserted record ${id} for ${record.link}`, 'FileSystemArticleRepository.upsert', { event: 'record-inserted', id });
    return record;
  }

  private async update(existingId: number, fingerprint: string, candidate: ArticleCandidate): Promise<ArticleRecord> {
    const existing = await this.requireRecord(existingId, candidate);
    if (existing.link !== candidate.link) {
      throw new ResolutionConflictError(`record ${existingId} no longer owns ${candidate.link}`, { existingId });
    }
    if (existing.fingerprint === fingerprint) {
      throw new ResolutionConflictError(`record ${existingId} already holds this content`, { existingId });
    }
    const fingerprintOwner = this.fingerprintIndex.get(fingerprint);
    if (fingerprintOwner !== undefined) {
      throw new ResolutionConflictError(`content already stored as record ${fingerprintOwner}`, {
        existingId,
        fingerprintOwner
      });
    }

    const record = mergeCandidate(existing, candidate, fingerprint, this.now().toISOString());
    await this.storage.writeRecord(record);

    this.fingerprintIndex.delete(existing.fingerprint);
    this.fingerprintIndex.set(fingerprint, existingId);
    this.logger.info(`Updated record ${existingId} for ${record.link}`, 'FileSystemArticleRepository.upsert', {
      event: 'record-updated',
      id: existingId
    });
    return record;
  }

  private async skip(
    existingId: number,
    reason: Extract<ResolutionDecision, { kind: 'skip' }>['reason'],
    fingerprint: string,
    candidate: ArticleCandidate
  ): Promise<ArticleRecord> {
    const existing = await this.requireRecord(existingId, candidate);

    if (reason === 'duplicate-content') {
      if (existing.fingerprint !== fingerprint) {
        throw new ResolutionConflictError(`record ${existingId} content changed`, { existingId });
      }
      const linkOwner = this.linkIndex.get(candidate.link);
      if (linkOwner !== undefined && linkOwner !== existingId) {
        throw new ResolutionConflictError(`link already stored as record ${linkOwner}`, { existingId, linkOwner });
      }
      if (candidate.link === existing.link || existing.alternateLinks.includes(candidate.link)) {
        return existing;
      }
      // Provenance only: updatedAt tracks content changes
      const record: ArticleRecord = { ...existing, alternateLinks: [...existing.alternateLinks, candidate.link] };
      await this.storage.writeRecord(record);
      this.logger.debug(`Recorded alternate link ${candidate.link} for record ${existingId}`, 'FileSystemArticleRepository.upsert');
      return record;
    }

    if (existing.link !== candidate.link) {
      throw new ResolutionConflictError(`record ${existingId} no longer owns ${candidate.link}`, { existingId });
    }
    if (reason === 'unchanged' && existing.fingerprint !== fingerprint) {
      throw new ResolutionConflictError(`record ${existingId} content changed`, { existingId });
    }
    if (reason === 'fingerprint-collision') {
      const owner = this.fingerprintIndex.get(fingerprint);
      if (owner === undefined || owner === existingId) {
        throw new ResolutionConflictError(`fingerprint no longer collides for record ${existingId}`, { existingId });
      }
    }
    return existing;
  }

  private async requireRecord(id: number, candidate: ArticleCandidate): Promise<ArticleRecord> {
    const record = this.hasId(id) ? await this.storage.readRecord(id) : null;
    if (!record) {
      throw new ResolutionConflictError(`record ${id} no longer exists`, { existingId: id, link: candidate.link });
    }
    return record;
  }

  private hasId(id: number): boolean {
    return binarySearch(this.ids, id) >= 0;
  }

  async delete(id: number): Promise<boolean> {
    await this.initialize();
    return this.writeLock.runExclusive(async () => {
      const record = this.hasId(id) ? await this.storage.readRecord(id) : null;
      if (!record) {
        return false;
      }
      await this.storage.deleteRecord(id);
      this.linkIndex.delete(record.link);
      this.fingerprintIndex.delete(record.fingerprint);
      this.ids.splice(binarySearch(this.ids, id), 1);
      this.logger.info(`Deleted record ${id}`, 'FileSystemArticleRepository.delete', { event: 'record-deleted', id });
      return true;
    });
  }

  async *query(filters: ArticleQueryFilters = {}): AsyncIterable<ArticleRecord> {
    await this.initialize();
    const limit = filters.limit ?? Number.POSITIVE_INFINITY;
    if (limit <= 0) {
      return;
    }

    // Iterate over the ids present when the query started
    const ids = this.ids.slice(firstIndexAfter(this.ids, filters.afterId ?? 0));
    let yielded = 0;
    for (const id of ids) {
      const record = this.hasId(id) ? await this.storage.readRecord(id) : null;
      if (!record || !matchesFilters(record, filters)) {
        continue;
      }
      yield record;
      yielded++;
      if (yielded >= limit) {
        return;
      }
    }
  }
}

function matchesFilters(record: ArticleRecord, filters: ArticleQueryFilters): boolean {
  if (filters.tags && !filters.tags.every((tag) => record.tags.includes(tag))) {
    return false;
  }
  if (filters.publishedAfter || filters.publishedBefore) {
    if (record.publishedAt === UNKNOWN) {
      return false;
    }
    const published = Date.parse(record.publishedAt);
    if (filters.publishedAfter && published < filters.publishedAfter.getTime()) return false;
    if (filters.publishedBefore && published > filters.publishedBefore.getTime()) return false;
  }
  if (filters.createdAfter && Date.parse(record.createdAt) < filters.createdAfter.getTime()) {
    return false;
  }
  return true;
}

function binarySearch(sorted: number[], value: number): number {
  let low = 0;
  let high = sorted.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (sorted[mid] === value) return mid;
    if (sorted[mid] < value) low = mid + 1;
    else high = mid - 1;
  }
  return -1;
}

/**
 * Index of the first element greater than value
 */
function firstIndexAfter(sorted: number[], value: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (sorted[mid] <= value) low = mid + 1;
    else high = mid;
  }
  return low;
}
