/**
 * Article record validation
 * Every record read from disk passes through this schema before it is indexed
 */

import { z } from 'zod';
import { ArticleRecord, UNKNOWN } from '../../../domain/models/Article.js';
import { StoreError } from '../../../domain/errors.js';

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 timestamp'
});

const knownString = z.string().min(1);

export const ArticleRecordSchema = z.object({
  id: z.number().int().min(1),
  link: z.string().url(),
  title: knownString,
  publishedAt: z.union([z.literal(UNKNOWN), isoTimestamp]),
  author: knownString,
  tags: z.array(z.string()),
  body: z.string(),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/, 'Expected a SHA-256 hex digest'),
  alternateLinks: z.array(z.string()),
  relatedLinks: z.array(z.string()),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp
});

export const SequenceSchema = z.object({
  /** Next identity value to hand out */
  next: z.number().int().min(1)
});

export type SequenceState = z.infer<typeof SequenceSchema>;

/**
 * Article validator utility
 */
export class ArticleValidator {
  /**
   * Validate a parsed record file
   * @throws StoreError (not retryable) describing every failing field
   */
  static validate(value: unknown, source: string): ArticleRecord {
    const parsed = ArticleRecordSchema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new StoreError(`Invalid article record in ${source}`, { retryable: false, details: { issues } });
    }
    return parsed.data;
  }

  static validateSequence(value: unknown, source: string): SequenceState {
    const parsed = SequenceSchema.safeParse(value);
    if (!parsed.success) {
      throw new StoreError(`Invalid sequence state in ${source}`, {
        retryable: false,
        details: { issues: parsed.error.issues.map((issue) => issue.message) }
      });
    }
    return parsed.data;
  }
}
