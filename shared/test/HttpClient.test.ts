import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../domain/errors.js';
import { HttpClient, classifyError, classifyStatus } from '../infrastructure/HttpClient.js';
import { RateLimiter } from '../infrastructure/RateLimiter.js';
import { RetryPolicy } from '../infrastructure/RetryPolicy.js';
import { Logger } from '../infrastructure/logging.js';
import { FAST_RETRY, MockWeb, respond } from './fixtures.js';

const LINK = 'https://news.example/a/1';
const HTML = '<html><body><article>Body</article></body></html>';

function createClient(web: MockWeb, userAgents = ['test-agent'], maxAttempts = FAST_RETRY.maxAttempts) {
  const { logger, sink } = Logger.inMemory();
  const client = new HttpClient({
    userAgents,
    timeout: 1000,
    retryPolicy: new RetryPolicy({ ...FAST_RETRY, maxAttempts }),
    adapter: web.adapter,
    logger
  });
  return { client, sink };
}

describe('classifyStatus', () => {
  it('accepts successful responses', () => {
    expect(classifyStatus(200)).toBeNull();
    expect(classifyStatus(304)).toBeNull();
  });

  it('does not retry missing pages', () => {
    expect(classifyStatus(404)).toMatchObject({ kind: 'NotFound', retryable: false, statusCode: 404 });
    expect(classifyStatus(410)).toMatchObject({ kind: 'NotFound', retryable: false });
  });

  it('retries throttling and server errors only', () => {
    expect(classifyStatus(429)).toMatchObject({ kind: 'Other', retryable: true });
    expect(classifyStatus(503)).toMatchObject({ kind: 'Other', retryable: true });
    expect(classifyStatus(403)).toMatchObject({ kind: 'Other', retryable: false });
  });
});

describe('classifyError', () => {
  it('maps transport error codes to kinds', () => {
    expect(classifyError(new AxiosError('reset', 'ECONNRESET'))).toMatchObject({ kind: 'ConnectionReset', retryable: true });
    expect(classifyError(new AxiosError('refused', 'ECONNREFUSED'))).toMatchObject({ kind: 'ConnectionReset' });
    expect(classifyError(new AxiosError('slow', 'ECONNABORTED'))).toMatchObject({ kind: 'Timeout', retryable: true });
    expect(classifyError(new AxiosError('stop', 'ERR_CANCELED'))).toMatchObject({ kind: 'Cancelled', retryable: false });
    expect(classifyError(Object.assign(new Error('bad chunk'), { code: 'HPE_INVALID_CHUNK_SIZE' }))).toMatchObject({
      kind: 'ProtocolError',
      retryable: true
    });
    expect(classifyError(new Error('boom'))).toMatchObject({ kind: 'Other', retryable: false });
  });
});

describe('HttpClient', () => {
  it('retries connection resets and returns the page', async () => {
    const web = new MockWeb().flaky(LINK, 'ECONNRESET', 3, HTML);
    const { client, sink } = createClient(web);

    const outcome = await client.fetch(LINK);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.page).toMatchObject({ link: LINK, statusCode: 200, body: HTML, attempts: 4 });
    expect(outcome.page.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(web.requestCount(LINK)).toBe(4);
    expect(sink.events('fetch-retry')).toHaveLength(3);
    expect(sink.events('fetch-retry').map((entry) => entry.metadata?.kind)).toEqual([
      'ConnectionReset',
      'ConnectionReset',
      'ConnectionReset'
    ]);
    expect(sink.events('fetch-succeeded')).toHaveLength(1);
  });

  it('spaces every attempt of every caller by the rate limit', async () => {
    const OTHER = 'https://news.example/a/2';
    const started = Date.now();
    const starts: number[] = [];
    let failures = 0;
    const web = new MockWeb()
      .on(LINK, async (config) => {
        starts.push(Date.now() - started);
        if (failures < 2) {
          failures++;
          throw new AxiosError('simulated ECONNRESET', 'ECONNRESET', config);
        }
        return respond(config, HTML);
      })
      .on(OTHER, async (config) => {
        starts.push(Date.now() - started);
        return respond(config, HTML);
      });
    const { logger } = Logger.inMemory();
    const client = new HttpClient({
      userAgents: ['test-agent'],
      timeout: 1000,
      retryPolicy: new RetryPolicy(FAST_RETRY),
      rateLimiter: new RateLimiter(40),
      adapter: web.adapter,
      logger
    });

    const [first, second] = await Promise.all([client.fetch(LINK), client.fetch(OTHER)]);

    expect(first.ok && second.ok).toBe(true);
    expect(starts).toHaveLength(4);
    for (let i = 1; i < starts.length; i++) {
      expect(starts[i] - starts[i - 1]).toBeGreaterThanOrEqual(35);
    }
  });

  it('gives up a rate-limit wait when aborted', async () => {
    const web = new MockWeb().page(LINK, HTML);
    const { logger } = Logger.inMemory();
    const client = new HttpClient({
      userAgents: ['test-agent'],
      timeout: 1000,
      retryPolicy: new RetryPolicy(FAST_RETRY),
      rateLimiter: new RateLimiter(10_000),
      adapter: web.adapter,
      logger
    });
    await client.fetch(LINK);

    const controller = new AbortController();
    const waiting = client.fetch(LINK, controller.signal);
    controller.abort();
    const outcome = await waiting;

    expect(outcome.ok ? null : outcome.error.kind).toBe('Cancelled');
    expect(web.requestCount(LINK)).toBe(1);
  });

  it('retries timeouts', async () => {
    const web = new MockWeb().flaky(LINK, 'ECONNABORTED', 1, HTML);
    const { client } = createClient(web);

    const outcome = await client.fetch(LINK);
    expect(outcome.ok && outcome.page.attempts).toBe(2);
  });

  it('gives up on missing pages without retrying', async () => {
    const web = new MockWeb();
    const { client, sink } = createClient(web);

    const outcome = await client.fetch(LINK);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('NotFound');
    expect(outcome.error.statusCode).toBe(404);
    expect(outcome.error.attempts).toBe(1);
    expect(web.requestCount(LINK)).toBe(1);
    expect(sink.events('fetch-failed')).toHaveLength(1);
  });

  it('stops after the configured number of attempts', async () => {
    const web = new MockWeb().page(LINK, 'busy', 503);
    const { client } = createClient(web, ['test-agent'], 3);

    const outcome = await client.fetch(LINK);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('Other');
    expect(outcome.error.attempts).toBe(3);
    expect(web.requestCount(LINK)).toBe(3);
  });

  it('does not send requests once the signal has aborted', async () => {
    const web = new MockWeb().page(LINK, HTML);
    const { client } = createClient(web);
    const controller = new AbortController();
    controller.abort();

    const outcome = await client.fetch(LINK, controller.signal);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('Cancelled');
    expect(web.requests).toHaveLength(0);
  });

  it('rotates user agents round-robin, one per request', async () => {
    const web = new MockWeb().page(LINK, HTML);
    const { client } = createClient(web, ['agent-1', 'agent-2', 'agent-3']);

    for (let i = 0; i < 4; i++) {
      await client.fetch(LINK);
    }

    expect(web.requests.map((request) => request.userAgent)).toEqual(['agent-1', 'agent-2', 'agent-3', 'agent-1']);
  });

  it('requires a user agent', () => {
    expect(() => createClient(new MockWeb(), [])).toThrow(ConfigurationError);
  });
});
