/**
 * In-memory TF-IDF similarity index.
 *
 * Incremental writes update the live maps in place under a single-writer
 * discipline: every write and every query runs synchronously, so a query never
 * sees a half-applied write. Document frequencies are exact at all times; the
 * vectors of documents indexed earlier keep the weights they were given until
 * rebuild() recomputes them against current statistics. Rebuilds and bulk loads
 * build their maps off to the side and swap them in by reference.
 */

import { IndexError } from '../../domain/errors.js';
import { ArticleRecord, ScoredArticle, isKnown } from '../../domain/models/Article.js';
import { Logger, getLogger } from '../logging.js';
import { tokenize } from '../TextNormalizer.js';
import { yieldToEventLoop } from '../../utils/async.js';

/** Tokens shorter than this are ignored */
const MIN_TOKEN_LENGTH = 2;

export interface IndexedDocument {
  /** Raw term counts, kept so vectors can be recomputed */
  readonly termCounts: ReadonlyMap<string, number>;
  readonly weights: ReadonlyMap<string, number>;
  readonly norm: number;
}

export interface IndexSnapshot {
  /** Increases with every write */
  readonly version: number;
  readonly documents: ReadonlyMap<number, IndexedDocument>;
  readonly documentFrequency: ReadonlyMap<string, number>;
}

export interface TfIdfIndexOptions {
  /** Minimum score for findNearDuplicates */
  nearDuplicateThreshold?: number;
  /** Incremental writes after which needsRebuild() turns true; 0 turns it off */
  rebuildAfterWrites?: number;
  /** Documents re-vectorized between event-loop yields during rebuild */
  rebuildChunkSize?: number;
  /** Rebuild attempts before the final, non-yielding one */
  maxRebuildAttempts?: number;
  logger?: Logger;
}

export interface QueryOptions {
  /** Leave this document out of the results */
  excludeId?: number;
  /** Drop results scoring below this */
  minScore?: number;
}

export interface IndexableDocument {
  id: number;
  text: string;
}

interface IndexState {
  documents: Map<number, IndexedDocument>;
  documentFrequency: Map<string, number>;
}

type Mutation = { op: 'index'; id: number; text: string } | { op: 'remove'; id: number };

/**
 * Text of a record as seen by the index: its title (when known) and body
 */
export function documentText(record: Pick<ArticleRecord, 'title' | 'body'>): string {
  return isKnown(record.title) ? `${record.title}\n${record.body}` : record.body;
}

/**
 * Smoothed inverse document frequency
 */
export function inverseDocumentFrequency(documentCount: number, documentFrequency: number): number {
  return Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;
}

export function countTerms(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text, MIN_TOKEN_LENGTH)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function vectorize(
  termCounts: ReadonlyMap<string, number>,
  frequencyOf: (term: string) => number,
  documentCount: number
): IndexedDocument {
  const weights = new Map<string, number>();
  let sumOfSquares = 0;
  for (const [term, count] of termCounts) {
    const weight = count * inverseDocumentFrequency(documentCount, frequencyOf(term));
    weights.set(term, weight);
    sumOfSquares += weight * weight;
  }
  const norm = Math.sqrt(sumOfSquares);
  if (!Number.isFinite(norm)) {
    throw new IndexError('non-finite vector norm', { terms: termCounts.size });
  }
  return { termCounts, weights, norm };
}

function adjustFrequencies(
  documentFrequency: Map<string, number>,
  termCounts: ReadonlyMap<string, number>,
  delta: 1 | -1
): void {
  for (const term of termCounts.keys()) {
    const next = (documentFrequency.get(term) ?? 0) + delta;
    if (next > 0) {
      documentFrequency.set(term, next);
    } else {
      documentFrequency.delete(term);
    }
  }
}

export class TfIdfIndex {
  private state: IndexState = { documents: new Map(), documentFrequency: new Map() };
  private version = 0;
  /** Incremental writes since the last rebuild or load */
  private writes = 0;
  private rebuilding: Promise<void> | null = null;
  /** Mutations recorded while a replacement is being built */
  private journal: Mutation[] | null = null;
  private readonly nearDuplicateThreshold: number;
  private readonly rebuildAfterWrites: number;
  private readonly rebuildChunkSize: number;
  private readonly maxRebuildAttempts: number;
  private readonly logger: Logger;

  constructor(options: TfIdfIndexOptions = {}) {
    this.nearDuplicateThreshold = options.nearDuplicateThreshold ?? 0.9;
    this.rebuildAfterWrites = options.rebuildAfterWrites ?? 0;
    this.rebuildChunkSize = options.rebuildChunkSize ?? 250;
    this.maxRebuildAttempts = options.maxRebuildAttempts ?? 3;
    this.logger = options.logger ?? getLogger();
  }

  get size(): number {
    return this.state.documents.size;
  }

  get writesSinceRebuild(): number {
    return this.writes;
  }

  /**
   * Whether enough incremental writes piled up to call for a rebuild
   */
  needsRebuild(): boolean {
    return this.rebuildAfterWrites > 0 && this.writes >= this.rebuildAfterWrites;
  }

  /**
   * A copy of the current state; later writes do not change it
   */
  snapshot(): IndexSnapshot {
    return {
      version: this.version,
      documents: new Map(this.state.documents),
      documentFrequency: new Map(this.state.documentFrequency)
    };
  }

  /**
   * Add a record, or replace its vector when its text changed
   */
  index(record: Pick<ArticleRecord, 'id' | 'title' | 'body'>): void {
    this.indexText(record.id, documentText(record));
  }

  indexText(id: number, text: string): void {
    this.journal?.push({ op: 'index', id, text });
    applyIndex(this.state, id, text);
    this.version++;
    this.writes++;
  }

  /**
   * Remove a document
   * @returns Whether it was indexed
   */
  remove(id: number): boolean {
    this.journal?.push({ op: 'remove', id });
    if (!applyRemove(this.state, id)) {
      return false;
    }
    this.version++;
    this.writes++;
    return true;
  }

  /**
   * The k documents most similar to the text, by descending score then ascending id.
   * Documents scoring zero are left out.
   */
  query(text: string, k: number, options: QueryOptions = {}): ScoredArticle[] {
    if (k <= 0) {
      return [];
    }
    const { documents, documentFrequency } = this.state;
    const queryCounts = countTerms(text);
    if (queryCounts.size === 0 || documents.size === 0) {
      return [];
    }

    // Vectorized against current statistics without touching them
    const queryWeights = new Map<string, number>();
    let querySumOfSquares = 0;
    for (const [term, count] of queryCounts) {
      const weight = count * inverseDocumentFrequency(documents.size, documentFrequency.get(term) ?? 0);
      queryWeights.set(term, weight);
      querySumOfSquares += weight * weight;
    }
    const queryNorm = Math.sqrt(querySumOfSquares);
    if (!Number.isFinite(queryNorm) || queryNorm === 0) {
      return [];
    }

    const minScore = options.minScore ?? 0;
    const results: ScoredArticle[] = [];
    for (const [id, document] of documents) {
      if (id === options.excludeId) continue;
      if (!Number.isFinite(document.norm)) {
        throw new IndexError(`corrupt vector for document ${id}`, { id });
      }
      if (document.norm === 0) continue;

      let dot = 0;
      for (const [term, weight] of queryWeights) {
        const documentWeight = document.weights.get(term);
        if (documentWeight !== undefined) {
          dot += weight * documentWeight;
        }
      }
      if (!Number.isFinite(dot)) {
        throw new IndexError(`corrupt weights for document ${id}`, { id });
      }
      if (dot <= 0) continue;

      const score = Math.min(1, dot / (queryNorm * document.norm));
      if (score > 0 && score >= minScore) {
        results.push({ id, score });
      }
    }

    results.sort((a, b) => b.score - a.score || a.id - b.id);
    return results.slice(0, k);
  }

  /**
   * Documents whose similarity to the text reaches the near-duplicate threshold
   */
  findNearDuplicates(text: string, threshold: number = this.nearDuplicateThreshold, excludeId?: number): ScoredArticle[] {
    return this.query(text, Number.POSITIVE_INFINITY, { minScore: threshold, excludeId });
  }

  /**
   * Recompute every vector against current statistics and swap the result in.
   * Writes landing mid-rebuild restart it against the newer state; the last
   * attempt runs without yielding so it always completes.
   */
  rebuild(): Promise<void> {
    if (!this.rebuilding) {
      this.rebuilding = this.runRebuild().finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  private async runRebuild(): Promise<void> {
    for (let attempt = 1; attempt <= this.maxRebuildAttempts; attempt++) {
      const base = this.state;
      const baseVersion = this.version;
      const finalAttempt = attempt === this.maxRebuildAttempts;
      const frequencyOf = (term: string) => base.documentFrequency.get(term) ?? 0;
      const documents = new Map<number, IndexedDocument>();
      let processed = 0;
      let stale = false;

      for (const [id, document] of base.documents) {
        documents.set(id, vectorize(document.termCounts, frequencyOf, base.documents.size));
        processed++;
        if (!finalAttempt && processed % this.rebuildChunkSize === 0) {
          await yieldToEventLoop();
          if (this.version !== baseVersion) {
            stale = true;
            break;
          }
        }
      }

      if (!stale && this.version === baseVersion) {
        this.state = { documents, documentFrequency: base.documentFrequency };
        this.version++;
        this.writes = 0;
        this.logger.info(`Rebuilt similarity index (${documents.size} documents)`, 'TfIdfIndex.rebuild', {
          event: 'index-rebuilt',
          documents: documents.size,
          attempt
        });
        return;
      }
      this.logger.debug(`Index changed during rebuild attempt ${attempt}, restarting`, 'TfIdfIndex.rebuild');
    }
  }

  /**
   * Replace the whole index with the given documents. Mutations made while the
   * documents are read are replayed onto the result before it is swapped in.
   */
  async replaceAll(documents: AsyncIterable<IndexableDocument> | Iterable<IndexableDocument>): Promise<void> {
    if (this.journal) {
      throw new IndexError('a replacement is already in progress');
    }
    const journal: Mutation[] = [];
    this.journal = journal;
    try {
      const termCounts = new Map<number, Map<string, number>>();
      let read = 0;
      for await (const document of documents) {
        termCounts.set(document.id, countTerms(document.text));
        if (++read % this.rebuildChunkSize === 0) {
          await yieldToEventLoop();
        }
      }

      const next = buildState(termCounts);
      for (const mutation of journal) {
        if (mutation.op === 'index') {
          applyIndex(next, mutation.id, mutation.text);
        } else {
          applyRemove(next, mutation.id);
        }
      }
      this.state = next;
      this.version++;
      this.writes = journal.length;
      this.logger.info(`Loaded similarity index (${next.documents.size} documents)`, 'TfIdfIndex.replaceAll', {
        documents: next.documents.size,
        replayed: journal.length
      });
    } finally {
      this.journal = null;
    }
  }
}

function buildState(termCounts: ReadonlyMap<number, ReadonlyMap<string, number>>): IndexState {
  const documentFrequency = new Map<string, number>();
  for (const counts of termCounts.values()) {
    adjustFrequencies(documentFrequency, counts, 1);
  }
  const frequencyOf = (term: string) => documentFrequency.get(term) ?? 0;
  const documents = new Map<number, IndexedDocument>();
  for (const [id, counts] of termCounts) {
    documents.set(id, vectorize(counts, frequencyOf, termCounts.size));
  }
  return { documents, documentFrequency };
}

/**
 * Index a document in place. The vector is computed before anything changes, so
 * a failure leaves the state as it was.
 */
function applyIndex(state: IndexState, id: number, text: string): void {
  const termCounts = countTerms(text);
  const previous = state.documents.get(id);
  // Frequency of each of the new document's terms once it is in
  const frequencyOf = (term: string) =>
    (state.documentFrequency.get(term) ?? 0) + (previous?.termCounts.has(term) ? 0 : 1);
  const documentCount = previous ? state.documents.size : state.documents.size + 1;
  const vector = vectorize(termCounts, frequencyOf, documentCount);

  if (previous) {
    adjustFrequencies(state.documentFrequency, previous.termCounts, -1);
  }
  adjustFrequencies(state.documentFrequency, termCounts, 1);
  state.documents.set(id, vector);
}

function applyRemove(state: IndexState, id: number): boolean {
  const previous = state.documents.get(id);
  if (!previous) {
    return false;
  }
  state.documents.delete(id);
  adjustFrequencies(state.documentFrequency, previous.termCounts, -1);
  return true;
}
