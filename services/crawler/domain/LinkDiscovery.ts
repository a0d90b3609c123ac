/**
 * LinkDiscovery
 *
 * Expands dated archive listing pages into article links. A listing page for a
 * day links to the day's first articles and carries a pagination block whose
 * first and last numbers give the range of further listing pages.
 */

import * as cheerio from 'cheerio';
import { ValidationError } from '../../../shared/domain/errors.js';
import { IHttpClient } from '../../../shared/infrastructure/HttpClient.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { normalizeLink } from '../../../shared/utils/urlUtils.js';

export { normalizeLink };

const DAY_MS = 24 * 60 * 60 * 1000;
const ARCHIVE_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;

export interface LinkDiscoveryOptions {
  /** Listing page for one day; {date} is replaced by dd.mm.yyyy */
  listingUrlTemplate: string;
  /** Path of the n-th listing page; {page} is replaced by the page number */
  pagePathTemplate: string;
  /** Article links inside a listing page */
  articleLinkSelectors?: string[];
  /** Pagination block of a listing page */
  paginationSelectors?: string[];
  logger?: Logger;
}

const DEFAULT_ARTICLE_LINK_SELECTORS = ['div.lenta_news_block li a[href]', 'article h2 a[href]', 'article h3 a[href]'];
const DEFAULT_PAGINATION_SELECTORS = ['p.pagination', '.pagination', 'nav[aria-label="pagination"]'];

function parseArchiveDate(value: string): Date {
  const match = ARCHIVE_DATE.exec(value.trim());
  if (!match) {
    throw new ValidationError(`invalid date "${value}", expected dd.mm.yyyy`, { value });
  }
  const [, day, month, year] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.getUTCDate() !== Number(day) || date.getUTCMonth() !== Number(month) - 1) {
    throw new ValidationError(`invalid date "${value}", no such day`, { value });
  }
  return date;
}

export function formatArchiveDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}.${month}.${date.getUTCFullYear()}`;
}

/**
 * Days from start (inclusive) to end (exclusive) as dd.mm.yyyy
 * @param end Defaults to the day after start
 * @throws ValidationError for malformed dates or an empty range
 */
export function generateArchiveDates(start: string, end?: string): string[] {
  const startDate = parseArchiveDate(start);
  const endDate = end === undefined ? new Date(startDate.getTime() + DAY_MS) : parseArchiveDate(end);
  if (startDate.getTime() >= endDate.getTime()) {
    throw new ValidationError('the end date must be after the start date', { start, end });
  }

  const dates: string[] = [];
  for (let time = startDate.getTime(); time < endDate.getTime(); time += DAY_MS) {
    dates.push(formatArchiveDate(new Date(time)));
  }
  return dates;
}

export class LinkDiscovery {
  private readonly articleLinkSelectors: string[];
  private readonly paginationSelectors: string[];
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: IHttpClient,
    private readonly options: LinkDiscoveryOptions
  ) {
    this.articleLinkSelectors = options.articleLinkSelectors ?? DEFAULT_ARTICLE_LINK_SELECTORS;
    this.paginationSelectors = options.paginationSelectors ?? DEFAULT_PAGINATION_SELECTORS;
    this.logger = options.logger ?? getLogger();
  }

  listingUrl(date: string): string {
    if (!this.options.listingUrlTemplate) {
      throw new ValidationError('no archive listing URL template is configured');
    }
    return this.options.listingUrlTemplate.replace('{date}', encodeURIComponent(date));
  }

  /**
   * Article links on a listing page, in page order without duplicates
   */
  extractArticleLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    const links = new Set<string>();
    for (const selector of this.articleLinkSelectors) {
      $(selector).each((_, anchor) => {
        const href = $(anchor).attr('href');
        const link = href ? normalizeLink(href, pageUrl) : null;
        if (link) links.add(link);
      });
      if (links.size > 0) break;
    }
    return [...links];
  }

  /**
   * Further listing pages named by the pagination block. The first and last
   * page numbers give the range; a page without pagination yields none.
   */
  extractPaginationLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    for (const selector of this.paginationSelectors) {
      const anchors = $(selector).first().find('a');
      if (anchors.length === 0) continue;

      const first = Number.parseInt(anchors.first().text().trim(), 10);
      const last = Number.parseInt(anchors.last().text().trim(), 10);
      if (!Number.isInteger(first) || !Number.isInteger(last) || first > last) {
        this.logger.warn(`Unreadable pagination on ${pageUrl}`, 'LinkDiscovery.extractPaginationLinks', {
          first: anchors.first().text().trim(),
          last: anchors.last().text().trim()
        });
        return [];
      }

      const pages: string[] = [];
      for (let page = first; page <= last; page++) {
        const url = new URL(pageUrl);
        url.pathname = this.options.pagePathTemplate.replace('{page}', String(page));
        const link = normalizeLink(url.toString());
        if (link) pages.push(link);
      }
      return pages;
    }
    return [];
  }

  /**
   * Article links for each day: the listing page first, then its further pages.
   * Listing pages that cannot be fetched are logged and skipped.
   */
  async *archiveLinkStream(dates: Iterable<string>, signal?: AbortSignal): AsyncGenerator<string> {
    for (const date of dates) {
      if (signal?.aborted) return;
      const listingUrl = this.listingUrl(date);
      const listing = await this.fetchListing(listingUrl, signal);
      if (listing === null) continue;

      let count = 0;
      for (const link of this.extractArticleLinks(listing, listingUrl)) {
        count++;
        yield link;
      }

      for (const pageUrl of this.extractPaginationLinks(listing, listingUrl)) {
        if (signal?.aborted) return;
        if (pageUrl === normalizeLink(listingUrl)) continue;
        const page = await this.fetchListing(pageUrl, signal);
        if (page === null) continue;
        for (const link of this.extractArticleLinks(page, pageUrl)) {
          count++;
          yield link;
        }
      }

      this.logger.info(`Discovered ${count} article links for ${date}`, 'LinkDiscovery.archiveLinkStream', { date, count });
    }
  }

  private async fetchListing(url: string, signal?: AbortSignal): Promise<string | null> {
    const outcome = await this.fetcher.fetch(url, signal);
    if (!outcome.ok) {
      this.logger.warn(`Skipping listing page ${url}: ${outcome.error.kind}`, 'LinkDiscovery.fetchListing', {
        event: 'listing-failed',
        link: url,
        kind: outcome.error.kind
      });
      return null;
    }
    return outcome.page.body;
  }
}
