/**
 * Article entities for the newsdex ingestion pipeline
 */

/**
 * Marker for optional fields that a page does not carry
 */
export const UNKNOWN = 'unknown' as const;
export type Unknown = typeof UNKNOWN;

/**
 * A value or the explicit "unknown" marker
 */
export type Known<T> = T | Unknown;

export function isKnown<T>(value: Known<T>): value is T {
  return value !== UNKNOWN;
}

/**
 * A page as returned by the fetcher
 */
export interface RawPage {
  /** Link that was requested */
  link: string;

  statusCode: number;

  /** Response headers with lower-cased names */
  headers: Record<string, string>;

  body: string;

  /** ISO-8601 time the response arrived */
  fetchedAt: string;

  /** Attempts it took, including the successful one */
  attempts: number;

  elapsedMs: number;
}

/**
 * An article as produced by the extractor, before identity resolution
 */
export interface ArticleCandidate {
  link: string;
  title: Known<string>;
  /** ISO-8601 publication date */
  publishedAt: Known<string>;
  author: Known<string>;
  /** Tags in page order, may contain duplicates */
  tags: string[];
  body: string;
  /** Links the page lists as related coverage */
  relatedLinks: string[];
}

/**
 * A persisted article
 */
export interface ArticleRecord {
  /** Application-assigned identity, never reused */
  id: number;

  /** Unique across records */
  link: string;

  title: Known<string>;
  publishedAt: Known<string>;
  author: Known<string>;

  /** Sorted and de-duplicated */
  tags: string[];

  body: string;

  /** SHA-256 hex of the normalized body, unique across records */
  fingerprint: string;

  /** Other links whose content resolved to this record */
  alternateLinks: string[];

  relatedLinks: string[];

  createdAt: string;
  updatedAt: string;
}

/**
 * Fields an update can change
 */
export type ChangedField = 'title' | 'publishedAt' | 'author' | 'tags' | 'body' | 'relatedLinks';

export type SkipReason = 'unchanged' | 'duplicate-content' | 'fingerprint-collision';

/**
 * Outcome of identity resolution for one candidate
 */
export type ResolutionDecision =
  | { kind: 'insert'; fingerprint: string }
  | { kind: 'skip'; existingId: number; reason: SkipReason; fingerprint: string }
  | { kind: 'update'; existingId: number; changedFields: ChangedField[]; fingerprint: string };

/**
 * A similarity query hit
 */
export interface ScoredArticle {
  id: number;
  score: number;
}

const MERGED_SCALARS = ['title', 'publishedAt', 'author'] as const;

/**
 * Tags with set semantics: trimmed, de-duplicated and sorted
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) unique.add(trimmed);
  }
  return [...unique].sort();
}

/**
 * Apply a re-crawled candidate to its existing record. Tags are united, the
 * candidate's title, date and author win unless unknown, and the body is replaced.
 */
export function mergeCandidate(
  existing: ArticleRecord,
  candidate: ArticleCandidate,
  fingerprint: string,
  updatedAt: string
): ArticleRecord {
  const merged: ArticleRecord = {
    ...existing,
    tags: normalizeTags([...existing.tags, ...candidate.tags]),
    body: candidate.body,
    fingerprint,
    relatedLinks: [...new Set([...existing.relatedLinks, ...candidate.relatedLinks])],
    updatedAt
  };
  for (const field of MERGED_SCALARS) {
    const value = candidate[field];
    if (isKnown(value)) {
      merged[field] = value;
    }
  }
  return merged;
}

/**
 * Fields whose value differs between two versions of a record
 */
export function diffRecords(before: ArticleRecord, after: ArticleRecord): ChangedField[] {
  const changed: ChangedField[] = [];
  for (const field of MERGED_SCALARS) {
    if (before[field] !== after[field]) changed.push(field);
  }
  if (before.tags.join('\u0000') !== after.tags.join('\u0000')) changed.push('tags');
  if (before.body !== after.body) changed.push('body');
  if (before.relatedLinks.join('\u0000') !== after.relatedLinks.join('\u0000')) changed.push('relatedLinks');
  return changed;
}
