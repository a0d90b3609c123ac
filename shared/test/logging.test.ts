import { describe, expect, it } from 'vitest';
import { LogLevel, Logger, formatLogEntry } from '../infrastructure/logging.js';

describe('Logger', () => {
  it('drops entries below the minimum level', () => {
    const { logger, sink } = Logger.inMemory(LogLevel.WARN);

    logger.debug('noise', 'Test');
    logger.info('progress', 'Test');
    logger.warn('careful', 'Test');
    logger.error('broken', 'Test');

    expect(sink.entries.map((entry) => entry.level)).toEqual([LogLevel.WARN, LogLevel.ERROR]);
  });

  it('keeps metadata objects and wraps other values', () => {
    const { logger, sink } = Logger.inMemory();

    logger.info('fetched', 'HttpClient.fetch', { event: 'fetch-succeeded', attempt: 1 });
    logger.info('plain', 'Test', 42);

    expect(sink.events('fetch-succeeded')).toHaveLength(1);
    expect(sink.entries[0].metadata).toEqual({ event: 'fetch-succeeded', attempt: 1 });
    expect(sink.entries[1].metadata).toEqual({ value: 42 });
  });

  it('records name and message of logged errors', () => {
    const { logger, sink } = Logger.inMemory();
    logger.logError(new TypeError('bad input'), 'Test');

    expect(sink.entries[0].message).toBe('bad input');
    expect(sink.entries[0].metadata).toMatchObject({ name: 'TypeError', message: 'bad input' });
  });
});

describe('formatLogEntry', () => {
  it('renders one line with the metadata as JSON', () => {
    const line = formatLogEntry({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: LogLevel.INFO,
      context: 'CrawlOrchestrator.run',
      message: 'Crawl completed',
      metadata: { inserted: 2 }
    });
    expect(line).toBe('2026-01-01T00:00:00.000Z [INFO] [CrawlOrchestrator.run] Crawl completed {"inserted":2}');
  });

  it('leaves out empty metadata', () => {
    const line = formatLogEntry({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: LogLevel.WARN,
      context: 'Test',
      message: 'careful',
      metadata: {}
    });
    expect(line).toBe('2026-01-01T00:00:00.000Z [WARN] [Test] careful');
  });
});
