import http from 'http';
import https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { ConfigurationError, FetchError, FetchErrorKind, describeError } from '../domain/errors.js';
import { RawPage } from '../domain/models/Article.js';
import { Logger, getLogger } from './logging.js';
import { RateLimiter } from './RateLimiter.js';
import { RetryPolicy } from './RetryPolicy.js';
import { AbortedError } from '../utils/async.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** User agents rotated round-robin, one per request */
  userAgents: string[];

  /** Per-request timeout in milliseconds */
  timeout: number;

  retryPolicy: RetryPolicy;

  /** Spaces every attempt, retries included; shared by all callers of the client */
  rateLimiter?: RateLimiter;

  /** Maximum redirects followed per request */
  maxRedirects?: number;

  /** Replaces the network transport (used by tests) */
  adapter?: AxiosAdapter;

  logger?: Logger;
}

/**
 * Result of a fetch: the page, or a classified failure
 */
export type FetchOutcome = { ok: true; page: RawPage } | { ok: false; error: FetchError };

/**
 * Interface for the HTTP client
 */
export interface IHttpClient {
  /**
   * Fetch a link, retrying transient failures. Never rejects for network failures.
   * @param link Absolute URL to fetch
   * @param signal Aborts in-flight requests and backoff waits
   */
  fetch(link: string, signal?: AbortSignal): Promise<FetchOutcome>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CONNECTION_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNREFUSED', 'EAI_AGAIN']);
const CANCEL_CODES = new Set(['ERR_CANCELED', 'ABORT_ERR']);

interface AttemptFailure {
  kind: FetchErrorKind;
  retryable: boolean;
  statusCode?: number;
  cause: string;
}

/**
 * Map a failed status code to a failure, or null when the response is usable
 */
export function classifyStatus(statusCode: number): AttemptFailure | null {
  if (statusCode < 400) {
    return null;
  }
  if (statusCode === 404 || statusCode === 410) {
    return { kind: 'NotFound', retryable: false, statusCode, cause: `HTTP ${statusCode}` };
  }
  const retryable = statusCode === 429 || statusCode >= 500;
  return { kind: 'Other', retryable, statusCode, cause: `HTTP ${statusCode}` };
}

/**
 * Map a thrown transport error to a failure
 */
export function classifyError(error: unknown): AttemptFailure {
  const code = errorCode(error);
  const cause = code ? `${code}: ${describeError(error)}` : describeError(error);

  if (code && CANCEL_CODES.has(code)) {
    return { kind: 'Cancelled', retryable: false, cause };
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return { kind: 'Timeout', retryable: true, cause };
  }
  if (code && CONNECTION_CODES.has(code)) {
    return { kind: 'ConnectionReset', retryable: true, cause };
  }
  if (code && (code.startsWith('HPE_') || code === 'ERR_BAD_RESPONSE')) {
    return { kind: 'ProtocolError', retryable: true, cause };
  }
  return { kind: 'Other', retryable: false, cause };
}

function errorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    if (error.code) return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function normalizeHeaders(response: AxiosResponse): Record<string, string> {
  const headers: Record<string, string> = {};
  const entries: Array<[string, unknown]> = Object.entries(response.headers ?? {});
  for (const [name, value] of entries) {
    if (value == null) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
}

/**
 * Implementation of the HTTP client
 */
export class HttpClient implements IHttpClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;
  private readonly rateLimiter: RateLimiter;
  private readonly userAgents: string[];
  private readonly logger: Logger;
  private userAgentCursor = 0;

  /**
   * Create a new HTTP client
   * @param options Options for the HTTP client
   */
  constructor(options: HttpClientOptions) {
    if (options.userAgents.length === 0) {
      throw new ConfigurationError('the HTTP client needs at least one user agent');
    }
    this.userAgents = [...options.userAgents];
    this.retryPolicy = options.retryPolicy;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(0);
    this.logger = options.logger ?? getLogger();

    // One instance with pooled connections for the whole crawl
    this.axiosInstance = axios.create({
      timeout: options.timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      maxRedirects: options.maxRedirects ?? 10,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true, // statuses are classified below
      adapter: options.adapter
    });
  }

  /**
   * The user agent for the next request
   */
  nextUserAgent(): string {
    const agent = this.userAgents[this.userAgentCursor % this.userAgents.length];
    this.userAgentCursor = (this.userAgentCursor + 1) % this.userAgents.length;
    return agent;
  }

  async fetch(link: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const startTime = Date.now();
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        await this.rateLimiter.waitForNextSlot(signal);
      } catch (error: unknown) {
        if (error instanceof AbortedError) {
          return this.fail({ kind: 'Cancelled', retryable: false, cause: 'aborted' }, link, attempt - 1, startTime);
        }
        throw error;
      }

      this.logger.debug(`Fetching ${link} (attempt ${attempt})`, 'HttpClient.fetch', {
        event: 'fetch-attempt',
        link,
        attempt
      });

      let failure: AttemptFailure;
      try {
        const response = await this.axiosInstance.get<string>(link, {
          headers: { 'User-Agent': this.nextUserAgent() },
          signal
        });
        const statusFailure = classifyStatus(response.status);
        if (!statusFailure) {
          const elapsedMs = Date.now() - startTime;
          this.logger.info(`Fetched ${link} (${response.status})`, 'HttpClient.fetch', {
            event: 'fetch-succeeded',
            link,
            attempt,
            elapsedMs,
            statusCode: response.status
          });
          return {
            ok: true,
            page: {
              link,
              statusCode: response.status,
              headers: normalizeHeaders(response),
              body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
              fetchedAt: new Date().toISOString(),
              attempts: attempt,
              elapsedMs
            }
          };
        }
        failure = statusFailure;
      } catch (error: unknown) {
        failure = signal?.aborted ? { kind: 'Cancelled', retryable: false, cause: 'aborted' } : classifyError(error);
      }

      if (!failure.retryable || !this.retryPolicy.canRetry(attempt)) {
        return this.fail(failure, link, attempt, startTime);
      }

      const delayMs = this.retryPolicy.delayFor(attempt);
      this.logger.warn(`Retrying ${link} after ${failure.kind} in ${delayMs}ms`, 'HttpClient.fetch', {
        event: 'fetch-retry',
        link,
        attempt,
        kind: failure.kind,
        cause: failure.cause,
        delayMs,
        elapsedMs: Date.now() - startTime
      });

      try {
        await this.retryPolicy.wait(attempt, signal);
      } catch (error: unknown) {
        if (error instanceof AbortedError) {
          return this.fail({ kind: 'Cancelled', retryable: false, cause: 'aborted during backoff' }, link, attempt, startTime);
        }
        throw error;
      }
    }
  }

  private fail(failure: AttemptFailure, link: string, attempts: number, startTime: number): FetchOutcome {
    const elapsedMs = Date.now() - startTime;
    const error = new FetchError(failure.kind, link, attempts, elapsedMs, {
      statusCode: failure.statusCode,
      cause: failure.cause
    });
    const log = failure.kind === 'Cancelled' ? this.logger.info.bind(this.logger) : this.logger.error.bind(this.logger);
    log(error.message, 'HttpClient.fetch', {
      event: 'fetch-failed',
      link,
      attempts,
      kind: failure.kind,
      statusCode: failure.statusCode,
      elapsedMs
    });
    return { ok: false, error };
  }
}
