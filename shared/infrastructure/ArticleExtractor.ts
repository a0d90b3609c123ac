/**
 * ArticleExtractor
 *
 * Turns a fetched page into an article candidate. Each field is looked up through
 * an ordered selector list: the news-site layout first, then generic fallbacks
 * (Open Graph, article metadata, semantic elements). Extraction is pure: the same
 * page always yields the same outcome.
 */

import * as cheerio from 'cheerio';
import { ExtractionError } from '../domain/errors.js';
import { ArticleCandidate, Known, RawPage, UNKNOWN } from '../domain/models/Article.js';
import { normalizeLink } from '../utils/urlUtils.js';

/**
 * A selector whose text is read, or whose attribute is read when one is named
 */
export type FieldSelector = string | { selector: string; attribute: string };

export interface ExtractorSelectors {
  title: FieldSelector[];
  publishedAt: FieldSelector[];
  author: FieldSelector[];
  tags: FieldSelector[];
  body: string[];
  /** Containers whose links are related coverage; removed before the body is read */
  related: string[];
  /** Elements dropped before the body is read (embedded social posts, scripts) */
  remove: string[];
}

export interface ExtractorOptions {
  /** Bodies shorter than this after cleaning are unrecoverable */
  minBodyLength?: number;
  selectors?: Partial<ExtractorSelectors>;
}

export type ExtractionOutcome = { ok: true; article: ArticleCandidate } | { ok: false; error: ExtractionError };

export const DEFAULT_SELECTORS: ExtractorSelectors = {
  title: [
    '.article_title',
    { selector: 'meta[property="og:title"]', attribute: 'content' },
    'article h1',
    'h1',
    'title'
  ],
  publishedAt: [
    '.date_public_art',
    { selector: 'meta[property="article:published_time"]', attribute: 'content' },
    { selector: 'meta[itemprop="datePublished"]', attribute: 'content' },
    { selector: 'time[datetime]', attribute: 'datetime' },
    { selector: 'meta[name="pubdate"]', attribute: 'content' }
  ],
  author: [
    'p.name_p',
    { selector: 'meta[name="author"]', attribute: 'content' },
    { selector: 'meta[property="article:author"]', attribute: 'content' },
    '[rel="author"]',
    '.author'
  ],
  tags: ['.keyword_art', { selector: 'meta[name="keywords"]', attribute: 'content' }],
  body: ['.article_news_body', '[itemprop="articleBody"]', 'article', 'main'],
  related: ['.frame_news_article'],
  remove: ['blockquote.instagram-media', 'blockquote.twitter-tweet', 'script', 'style', 'noscript']
};

/**
 * Collapse the whitespace of extracted body text
 */
export function cleanBodyText(text: string): string {
  return text
    .trim()
    .replace(/[ \t]+/g, ' ')
    .replace(/\r/g, '\n')
    .replace(/\n +/g, '\n')
    .replace(/ +\n/g, '\n')
    .replace(/\n+/g, '\n')
    .trim();
}

const DOTTED_DATE = /(\d{1,2})\.(\d{1,2})\.(\d{4})(?:[,\s]+(\d{1,2}):(\d{2}))?/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Parse an ISO timestamp, an epoch value (seconds or milliseconds) or a
 * dd.mm.yyyy[ HH:MM] text into an ISO-8601 string
 */
export function parsePublicationDate(value: string): Known<string> {
  const text = value.trim();
  if (!text) return UNKNOWN;

  if (/^\d{10}$/.test(text) || /^\d{13}$/.test(text)) {
    const millis = text.length === 10 ? Number(text) * 1000 : Number(text);
    return new Date(millis).toISOString();
  }

  if (ISO_DATE.test(text)) {
    const parsed = new Date(text);
    return Number.isNaN(parsed.getTime()) ? UNKNOWN : parsed.toISOString();
  }

  const match = DOTTED_DATE.exec(text);
  if (match) {
    const [, day, month, year, hours, minutes] = match;
    const date = new Date(
      Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours ?? 0), Number(minutes ?? 0))
    );
    // Reject overflowing components such as 31.02
    if (
      date.getUTCDate() !== Number(day) ||
      date.getUTCMonth() !== Number(month) - 1 ||
      Number(hours ?? 0) > 23 ||
      Number(minutes ?? 0) > 59
    ) {
      return UNKNOWN;
    }
    return date.toISOString();
  }

  return UNKNOWN;
}

/**
 * Split a tag block on "#" or ","
 */
export function splitTags(text: string): string[] {
  return text
    .split(/[#,]/)
    .map((tag) => tag.trim().replace(/\s+/g, ' '))
    .filter((tag) => tag.length > 0);
}

function isHtmlContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return true;
  return /html/i.test(contentType);
}

export class ArticleExtractor {
  private readonly minBodyLength: number;
  private readonly selectors: ExtractorSelectors;

  constructor(options: ExtractorOptions = {}) {
    this.minBodyLength = options.minBodyLength ?? 20;
    this.selectors = { ...DEFAULT_SELECTORS, ...options.selectors };
  }

  extract(page: RawPage): ExtractionOutcome {
    if (page.statusCode < 200 || page.statusCode >= 300) {
      return this.failure('unexpected-status', page, { statusCode: page.statusCode });
    }
    const contentType = page.headers['content-type'];
    if (!isHtmlContentType(contentType)) {
      return this.failure('not-html', page, { contentType });
    }

    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(page.body);
    } catch (error) {
      return this.failure('unparseable', page, { cause: error instanceof Error ? error.message : String(error) });
    }

    const title = this.readField($, this.selectors.title);
    const dateText = this.readField($, this.selectors.publishedAt);
    const author = this.readField($, this.selectors.author);
    const tagText = this.readField($, this.selectors.tags);

    // Related links are collected before their container is removed from the body
    const relatedLinks = this.collectRelatedLinks($, page.link);
    for (const selector of [...this.selectors.related, ...this.selectors.remove]) {
      $(selector).remove();
    }

    const body = this.readBody($);
    if (body.length < this.minBodyLength) {
      return this.failure('missing-body', page, { bodyLength: body.length, minBodyLength: this.minBodyLength });
    }

    return {
      ok: true,
      article: {
        link: page.link,
        title: title ?? UNKNOWN,
        publishedAt: dateText ? parsePublicationDate(dateText) : UNKNOWN,
        author: author ?? UNKNOWN,
        tags: tagText ? splitTags(tagText) : [],
        body,
        relatedLinks
      }
    };
  }

  /**
   * First non-empty value along the selector list
   */
  private readField($: cheerio.CheerioAPI, selectors: FieldSelector[]): string | null {
    for (const entry of selectors) {
      const element = $(typeof entry === 'string' ? entry : entry.selector).first();
      if (element.length === 0) continue;
      const raw = typeof entry === 'string' ? element.text() : element.attr(entry.attribute) ?? '';
      const value = raw.replace(/\s+/g, ' ').trim();
      if (value) return value;
    }
    return null;
  }

  private collectRelatedLinks($: cheerio.CheerioAPI, pageLink: string): string[] {
    const links = new Set<string>();
    for (const selector of this.selectors.related) {
      $(selector)
        .find('a[href]')
        .each((_, anchor) => {
          const href = $(anchor).attr('href');
          const link = href ? normalizeLink(href, pageLink) : null;
          if (link) links.add(link);
        });
    }
    return [...links];
  }

  private readBody($: cheerio.CheerioAPI): string {
    for (const selector of this.selectors.body) {
      const element = $(selector).first();
      if (element.length === 0) continue;
      const text = cleanBodyText(element.text());
      if (text) return text;
    }
    return '';
  }

  private failure(
    reason: ExtractionError['reason'],
    page: RawPage,
    details?: Record<string, unknown>
  ): ExtractionOutcome {
    return { ok: false, error: new ExtractionError(reason, page.link, details) };
  }
}
