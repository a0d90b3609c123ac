/**
 * Repository interface for Article records
 * Provides an abstraction layer over the storage mechanism
 */
import { ArticleCandidate, ArticleRecord, ResolutionDecision } from '../models/Article.js';

/**
 * Filters for record queries. All given filters must match.
 */
export interface ArticleQueryFilters {
  /** Records must carry ALL of these tags */
  tags?: string[];

  /** Inclusive bounds on publishedAt (records with an unknown date never match) */
  publishedAfter?: Date;
  publishedBefore?: Date;

  /** Inclusive lower bound on createdAt */
  createdAfter?: Date;

  /** Only records with a greater id (pagination cursor) */
  afterId?: number;

  /** Maximum number of records to yield */
  limit?: number;
}

/**
 * Read side of the store, used by identity resolution
 */
export interface ArticleLookup {
  getByLink(link: string): Promise<ArticleRecord | null>;
  getByFingerprint(fingerprint: string): Promise<ArticleRecord | null>;
}

/**
 * Article repository interface
 */
export interface IArticleRepository extends ArticleLookup {
  /**
   * Load the in-memory indexes from disk. Must complete before any other call.
   */
  initialize(): Promise<void>;

  getById(id: number): Promise<ArticleRecord | null>;

  /**
   * Apply a resolution decision atomically
   * @returns The inserted, updated or skipped record
   * @throws ResolutionConflictError when the decision no longer matches stored state
   * @throws StoreError on I/O failure
   */
  upsert(decision: ResolutionDecision, candidate: ArticleCandidate): Promise<ArticleRecord>;

  /**
   * Records matching the filters in ascending id order. Each call starts a new,
   * finite sequence.
   */
  query(filters?: ArticleQueryFilters): AsyncIterable<ArticleRecord>;

  /**
   * Delete a record. Its id is never handed out again.
   * @returns Whether a record was deleted
   */
  delete(id: number): Promise<boolean>;

  count(): Promise<number>;
}
