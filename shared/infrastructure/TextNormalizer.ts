/**
 * Text normalization shared by fingerprinting and the similarity index
 */

import { createHash } from 'crypto';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * NFKC-normalize and lowercase
 */
export function foldText(text: string): string {
  return text.normalize('NFKC').toLowerCase();
}

/**
 * Split folded text into Unicode letter/digit runs
 * @param minLength Shorter runs are dropped
 */
export function tokenize(text: string, minLength = 1): string[] {
  const tokens = foldText(text).match(TOKEN_PATTERN) ?? [];
  return minLength > 1 ? tokens.filter((token) => token.length >= minLength) : tokens;
}

/**
 * Compile boilerplate patterns once; they are matched against folded, trimmed lines
 */
export function compileBoilerplatePatterns(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(pattern, 'u'));
}

/**
 * Canonical form of a body for fingerprinting: folded, boilerplate lines removed,
 * reduced to its tokens joined by single spaces
 */
export function normalizeForFingerprint(body: string, boilerplate: RegExp[] = []): string {
  const lines = foldText(body)
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !boilerplate.some((pattern) => pattern.test(line)));
  return tokenize(lines.join('\n')).join(' ');
}

/**
 * SHA-256 hex of the normalized body
 */
export function computeFingerprint(body: string, boilerplate: RegExp[] = []): string {
  return createHash('sha256').update(normalizeForFingerprint(body, boilerplate), 'utf8').digest('hex');
}
