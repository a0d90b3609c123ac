/**
 * Persistent crawl progress, used to resume an interrupted crawl of the same stream
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { readJsonIfExists, writeJsonAtomic } from '../../../shared/utils/fileUtils.js';
import { describeError } from '../../../shared/domain/errors.js';

const CountersSchema = z.object({
  inserted: z.number().int().min(0),
  updated: z.number().int().min(0),
  skipped: z.number().int().min(0),
  failed: z.number().int().min(0)
});

const CheckpointSchema = z.object({
  runId: z.string(),
  /** Stream positions below this are all processed */
  cursor: z.number().int().min(0),
  /** Link at position cursor - 1 */
  lastLink: z.string().nullable(),
  counters: CountersSchema,
  updatedAt: z.string()
});

export type CrawlCounters = z.infer<typeof CountersSchema>;
export type CrawlCheckpointState = z.infer<typeof CheckpointSchema>;

export function emptyCounters(): CrawlCounters {
  return { inserted: 0, updated: 0, skipped: 0, failed: 0 };
}

export class CrawlCheckpoint {
  private readonly logger: Logger;
  /** Saves are chained so an older state never lands after a newer one */
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Load the saved state. A missing or malformed file yields null.
   */
  async load(): Promise<CrawlCheckpointState | null> {
    await this.pendingWrite;
    let value: unknown;
    try {
      value = await readJsonIfExists(this.filePath);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable crawl checkpoint ${this.filePath}`, 'CrawlCheckpoint.load', {
        error: describeError(error)
      });
      return null;
    }
    if (value === null) {
      return null;
    }
    const parsed = CheckpointSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed crawl checkpoint ${this.filePath}`, 'CrawlCheckpoint.load', {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
      return null;
    }
    return parsed.data;
  }

  /**
   * Queue a save of the given state. Failures are logged, never thrown: losing a
   * checkpoint only means more links are revisited on resume.
   */
  save(state: CrawlCheckpointState): Promise<void> {
    const snapshot: CrawlCheckpointState = { ...state, counters: { ...state.counters } };
    this.pendingWrite = this.pendingWrite.then(() =>
      writeJsonAtomic(this.filePath, snapshot).catch((error: unknown) => {
        this.logger.error(`Failed to save crawl checkpoint ${this.filePath}`, 'CrawlCheckpoint.save', {
          error: describeError(error)
        });
      })
    );
    return this.pendingWrite;
  }

  async clear(): Promise<void> {
    await this.pendingWrite;
    await fs.rm(this.filePath, { force: true });
  }

  /**
   * Wait for queued saves to finish
   */
  flush(): Promise<void> {
    return this.pendingWrite;
  }
}
