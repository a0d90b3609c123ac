/**
 * Test doubles and builders shared by the test suites
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ArticleCandidate, ArticleRecord } from '../domain/models/Article.js';
import { RetrySettings } from '../infrastructure/config.js';

export const FAST_RETRY: RetrySettings = {
  maxAttempts: 5,
  baseDelayMs: 1,
  maxDelayMs: 5,
  factor: 2,
  jitter: 0
};

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'newsdex-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export function respond(
  config: InternalAxiosRequestConfig,
  body: string,
  status = 200,
  contentType = 'text/html; charset=utf-8'
): AxiosResponse<string> {
  return { data: body, status, statusText: String(status), headers: { 'Content-Type': contentType }, config };
}

/**
 * Rejects like a cancelled request once the request's signal aborts
 */
export function waitForAbort(config: InternalAxiosRequestConfig): Promise<AxiosResponse<string>> {
  return new Promise((_, reject) => {
    const cancel = () => reject(new AxiosError('canceled', 'ERR_CANCELED', config));
    const signal = config.signal;
    if (!signal || signal.aborted) {
      cancel();
      return;
    }
    signal.addEventListener?.('abort', cancel);
  });
}

export type RouteHandler = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse<string>>;

/**
 * In-process stand-in for the web, plugged into axios as its adapter.
 * Unknown links answer 404.
 */
export class MockWeb {
  private readonly routes = new Map<string, RouteHandler>();
  /** Every request in arrival order, with its arrival time in ms since the epoch */
  readonly requests: Array<{ url: string; userAgent: string; at: number }> = [];

  readonly adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? '';
    this.requests.push({ url, userAgent: String(config.headers.get('User-Agent')), at: Date.now() });
    const handler = this.routes.get(url);
    return handler ? handler(config) : respond(config, 'Not found', 404);
  };

  on(url: string, handler: RouteHandler): this {
    this.routes.set(url, handler);
    return this;
  }

  page(url: string, html: string, status = 200): this {
    return this.on(url, async (config) => respond(config, html, status));
  }

  /**
   * Throw a transport error with the given code for the first `times` requests,
   * then serve the page
   */
  flaky(url: string, code: string, times: number, html: string): this {
    let failures = 0;
    return this.on(url, async (config) => {
      if (failures < times) {
        failures++;
        throw new AxiosError(`simulated ${code}`, code, config);
      }
      return respond(config, html);
    });
  }

  requestCount(url: string): number {
    return this.requests.filter((request) => request.url === url).length;
  }
}

export interface ArticlePageContent {
  title: string;
  /** Paragraphs separated by newlines */
  body: string;
  tags?: string[];
  /** dd.mm.yyyy[, HH:MM] */
  date?: string;
}

/**
 * An article page in the news-site layout the extractor knows
 */
export function articleHtml(article: ArticlePageContent): string {
  const lines = ['<html><head><title>News site</title></head><body>', `<h1 class="article_title">${article.title}</h1>`];
  if (article.date) {
    lines.push(`<p class="date_public_art">${article.date}</p>`);
  }
  if (article.tags) {
    lines.push(`<div class="keyword_art">${article.tags.map((tag) => `#${tag}`).join(' ')}</div>`);
  }
  lines.push('<div class="article_news_body">');
  for (const paragraph of article.body.split('\n')) {
    lines.push(`<p>${paragraph}</p>`);
  }
  lines.push('</div>', '</body></html>');
  return lines.join('\n');
}

export function makeCandidate(overrides: Partial<ArticleCandidate> = {}): ArticleCandidate {
  return {
    link: 'https://news.example/a/1',
    title: 'Harbour reopens after storm',
    publishedAt: '2024-03-05T14:30:00.000Z',
    author: 'Desk Staff',
    tags: ['weather', 'harbour'],
    body: 'The harbour reopened on Tuesday after the storm passed.',
    relatedLinks: [],
    ...overrides
  };
}

export function makeRecord(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    id: 1,
    link: 'https://news.example/a/1',
    title: 'Harbour reopens after storm',
    publishedAt: '2024-03-05T14:30:00.000Z',
    author: 'Desk Staff',
    tags: ['harbour', 'weather'],
    body: 'The harbour reopened on Tuesday after the storm passed.',
    fingerprint: '0'.repeat(64),
    alternateLinks: [],
    relatedLinks: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}
