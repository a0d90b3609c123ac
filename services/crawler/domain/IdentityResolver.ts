/**
 * Identity resolution: decides whether a candidate is new, a re-crawl of a stored
 * article, or the same content under another link.
 */

import {
  ArticleCandidate,
  ResolutionDecision,
  diffRecords,
  mergeCandidate
} from '../../../shared/domain/models/Article.js';
import { ArticleLookup } from '../../../shared/domain/repositories/ArticleRepository.js';
import { compileBoilerplatePatterns, computeFingerprint } from '../../../shared/infrastructure/TextNormalizer.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

export interface IdentityResolverOptions {
  /** Lines matching any of these patterns do not count towards the fingerprint */
  boilerplatePatterns?: string[];
  logger?: Logger;
}

export class IdentityResolver {
  private readonly boilerplate: RegExp[];
  private readonly logger: Logger;

  constructor(options: IdentityResolverOptions = {}) {
    this.boilerplate = compileBoilerplatePatterns(options.boilerplatePatterns ?? []);
    this.logger = options.logger ?? getLogger();
  }

  fingerprint(body: string): string {
    return computeFingerprint(body, this.boilerplate);
  }

  /**
   * Resolve a candidate against the store. A link match always wins over a
   * fingerprint match.
   */
  async resolve(candidate: ArticleCandidate, store: ArticleLookup): Promise<ResolutionDecision> {
    const fingerprint = this.fingerprint(candidate.body);

    const byLink = await store.getByLink(candidate.link);
    if (byLink) {
      if (byLink.fingerprint === fingerprint) {
        return { kind: 'skip', existingId: byLink.id, reason: 'unchanged', fingerprint };
      }

      const owner = await store.getByFingerprint(fingerprint);
      if (owner && owner.id !== byLink.id) {
        this.logger.warn(
          `Updated content of ${candidate.link} matches record ${owner.id}; keeping record ${byLink.id} as is`,
          'IdentityResolver.resolve',
          { event: 'fingerprint-collision', existingId: byLink.id, ownerId: owner.id }
        );
        return { kind: 'skip', existingId: byLink.id, reason: 'fingerprint-collision', fingerprint };
      }

      const merged = mergeCandidate(byLink, candidate, fingerprint, byLink.updatedAt);
      return { kind: 'update', existingId: byLink.id, changedFields: diffRecords(byLink, merged), fingerprint };
    }

    const byFingerprint = await store.getByFingerprint(fingerprint);
    if (byFingerprint) {
      return { kind: 'skip', existingId: byFingerprint.id, reason: 'duplicate-content', fingerprint };
    }

    return { kind: 'insert', fingerprint };
  }
}
