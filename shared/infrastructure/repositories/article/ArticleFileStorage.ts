import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { StoreError } from '../../../domain/errors.js';
import { ArticleRecord } from '../../../domain/models/Article.js';
import { Logger, getLogger } from '../../logging.js';
import { ensureDirectoryExists, isErrnoException, readJsonIfExists, writeJsonAtomic } from '../../../utils/fileUtils.js';
import { ArticleValidator, SequenceState } from './ArticleValidator.js';

/** Records per shard directory */
const SHARD_SIZE = 1000;

/**
 * Article file system operations helper.
 *
 * Layout under the base directory:
 *   sequence.json            next identity value
 *   records/000000/1.json    one file per record, sharded by id
 */
export class ArticleFileStorage {
  private readonly recordsDir: string;
  private readonly sequencePath: string;
  private readonly logger: Logger;

  constructor(private readonly baseDir: string, loggerInstance?: Logger) {
    this.recordsDir = path.join(baseDir, 'records');
    this.sequencePath = path.join(baseDir, 'sequence.json');
    this.logger = loggerInstance ?? getLogger();
  }

  async initialize(): Promise<void> {
    await this.guard('create storage directories', this.baseDir, () => ensureDirectoryExists(this.recordsDir));
    this.logger.info(`Article storage initialized at ${this.baseDir}`, 'ArticleFileStorage.initialize');
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  getFilePath(id: number): string {
    const shard = String(Math.floor(id / SHARD_SIZE)).padStart(6, '0');
    return path.join(this.recordsDir, shard, `${id}.json`);
  }

  async readSequence(): Promise<SequenceState | null> {
    const value = await this.guard('read sequence', this.sequencePath, () => readJsonIfExists(this.sequencePath));
    return value === null ? null : ArticleValidator.validateSequence(value, this.sequencePath);
  }

  async writeSequence(state: SequenceState): Promise<void> {
    await this.guard('write sequence', this.sequencePath, () => writeJsonAtomic(this.sequencePath, state));
  }

  /**
   * Read a record, or null if its file does not exist
   */
  async readRecord(id: number): Promise<ArticleRecord | null> {
    const filePath = this.getFilePath(id);
    const value = await this.guard('read record', filePath, () => readJsonIfExists(filePath));
    return value === null ? null : ArticleValidator.validate(value, filePath);
  }

  async writeRecord(record: ArticleRecord): Promise<void> {
    const filePath = this.getFilePath(record.id);
    await this.guard('write record', filePath, () => writeJsonAtomic(filePath, record));
    this.logger.debug(`Wrote record ${record.id} to ${filePath}`, 'ArticleFileStorage.writeRecord');
  }

  async deleteRecord(id: number): Promise<void> {
    const filePath = this.getFilePath(id);
    await this.guard('delete record', filePath, () => fs.rm(filePath, { force: true }));
  }

  /**
   * Visit every record file. Leftover temporary files from interrupted writes are removed.
   */
  async walkRecords(callback: (filePath: string) => Promise<void>): Promise<void> {
    await this.walkDirectory(this.recordsDir, callback);
  }

  private async walkDirectory(dirPath: string, callback: (filePath: string) => Promise<void>): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.warn(`Directory not found during walk: ${dirPath}`, 'ArticleFileStorage.walkDirectory');
        return;
      }
      throw this.wrap('walk directory', dirPath, error);
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        await this.walkDirectory(fullPath, callback);
      } else if (entry.isFile() && entry.name.endsWith('.tmp')) {
        this.logger.warn(`Removing leftover temporary file ${fullPath}`, 'ArticleFileStorage.walkDirectory');
        await this.guard('remove temporary file', fullPath, () => fs.rm(fullPath, { force: true }));
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        await callback(fullPath);
      }
    }
  }

  /**
   * Read and validate a record file found by walkRecords
   */
  async readRecordFile(filePath: string): Promise<ArticleRecord> {
    const value = await this.guard('read record', filePath, () => readJsonIfExists(filePath));
    return ArticleValidator.validate(value, filePath);
  }

  private async guard<T>(operation: string, filePath: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw this.wrap(operation, filePath, error);
    }
  }

  private wrap(operation: string, filePath: string, error: unknown): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    // Malformed JSON will not fix itself on retry
    const retryable = !(error instanceof SyntaxError);
    const storeError = new StoreError(`Failed to ${operation} at ${filePath}`, {
      retryable,
      originalError: error instanceof Error ? error : undefined,
      details: { filePath, operation }
    });
    this.logger.error(storeError.message, 'ArticleFileStorage', { filePath, operation, retryable });
    return storeError;
  }
}
