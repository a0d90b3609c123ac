/**
 * Logging infrastructure for newsdex
 *
 * Structured log entries (level, context, message, metadata) are handed to one
 * or more sinks. The pipeline only emits entries; where they end up is decided
 * by the configured sinks (a rotating file by default).
 */

import path from 'path';
import { createWriteStream, existsSync, mkdirSync, renameSync, statSync, WriteStream } from 'fs';
import { getConfig, LogLevelName } from './config.js';

/**
 * Log level enumeration
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * A single structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Class or module name, e.g. "HttpClient.fetch" */
  context: string;
  message: string;
  metadata?: Record<string, unknown>;
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(entry: LogEntry): void;
  close?(): void;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Minimum log level to record */
  minLevel: LogLevel;

  sinks: LogSink[];
}

/**
 * Render an entry as a single line
 */
export function formatLogEntry(entry: LogEntry): string {
  let line = `${entry.timestamp} [${entry.level}] [${entry.context}] ${entry.message}`;
  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    line += ` ${JSON.stringify(entry.metadata)}`;
  }
  return line;
}

/**
 * Options for the rotating file sink
 */
export interface FileLogSinkOptions {
  /** Base directory for log files */
  logDir: string;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of rotated files to keep */
  maxFiles: number;
}

/**
 * Appends entries to a file, rotating it once it grows past maxFileSize.
 * The file is opened on the first write.
 */
export class FileLogSink implements LogSink {
  private stream: WriteStream | null = null;
  private currentSize = 0;
  private readonly filePath: string;

  constructor(private readonly options: FileLogSinkOptions) {
    this.filePath = path.join(options.logDir, options.logFile);
  }

  write(entry: LogEntry): void {
    const line = `${formatLogEntry(entry)}\n`;
    if (!this.stream) {
      this.open();
    }
    if (this.currentSize >= this.options.maxFileSize) {
      this.rotate();
    }
    this.stream?.write(line);
    this.currentSize += Buffer.byteLength(line);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
  }

  private open(): void {
    if (!existsSync(this.options.logDir)) {
      mkdirSync(this.options.logDir, { recursive: true });
    }
    this.currentSize = existsSync(this.filePath) ? statSync(this.filePath).size : 0;
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
  }

  private rotate(): void {
    this.close();
    for (let i = this.options.maxFiles - 1; i > 0; i--) {
      const oldPath = `${this.filePath}.${i}`;
      if (existsSync(oldPath)) {
        renameSync(oldPath, `${this.filePath}.${i + 1}`);
      }
    }
    if (existsSync(this.filePath)) {
      renameSync(this.filePath, `${this.filePath}.1`);
    }
    this.open();
  }
}

/**
 * Writes entries to stderr (stdout is reserved for the MCP transport)
 */
export class StderrLogSink implements LogSink {
  write(entry: LogEntry): void {
    process.stderr.write(`${formatLogEntry(entry)}\n`);
  }
}

/**
 * Keeps entries in memory, newest last
 */
export class MemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  constructor(private readonly capacity = 10_000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  /**
   * Entries whose metadata carries the given event name
   */
  events(event: string): LogEntry[] {
    return this.entries.filter((entry) => entry.metadata?.event === event);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

function toLogLevel(level: LogLevelName): LogLevel {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function normalizeMetadata(metadata: unknown): Record<string, unknown> | undefined {
  if (metadata === undefined || metadata === null) {
    return undefined;
  }
  if (metadata instanceof Error) {
    return { name: metadata.name, message: metadata.message, stack: metadata.stack };
  }
  if (typeof metadata === 'object' && !Array.isArray(metadata)) {
    return { ...metadata };
  }
  return { value: metadata };
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | null = null;
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /**
   * Get the process-wide logger, built from the application config on first use
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      const appConfig = getConfig();
      const sinks: LogSink[] = [];
      if (appConfig.logTarget === 'file') {
        sinks.push(
          new FileLogSink({
            logDir: path.join(appConfig.dataDir, 'logs'),
            logFile: 'newsdex.log',
            maxFileSize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5
          })
        );
      } else if (appConfig.logTarget === 'stderr') {
        sinks.push(new StderrLogSink());
      }
      Logger.instance = new Logger({ minLevel: toLogLevel(appConfig.logLevel), sinks });
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the process-wide logger
   */
  public static configure(config: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();
    if (config.sinks) {
      for (const sink of logger.config.sinks) {
        if (!config.sinks.includes(sink)) {
          sink.close?.();
        }
      }
    }
    logger.config = { ...logger.config, ...config };
  }

  /**
   * Create a logger that collects entries in memory
   */
  public static inMemory(minLevel: LogLevel = LogLevel.DEBUG): { logger: Logger; sink: MemoryLogSink } {
    const sink = new MemoryLogSink();
    return { logger: new Logger({ minLevel, sinks: [sink] }), sink };
  }

  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) > LEVEL_ORDER.indexOf(this.config.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context,
      message,
      metadata: normalizeMetadata(metadata)
    };

    for (const sink of this.config.sinks) {
      try {
        sink.write(entry);
      } catch (error) {
        // Sink failures go to stderr only
        process.stderr.write(`Failed to write log entry: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with stack trace
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      stack: error.stack,
      name: error.name,
      message: error.message
    });
  }

  public close(): void {
    for (const sink of this.config.sinks) {
      sink.close?.();
    }
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
