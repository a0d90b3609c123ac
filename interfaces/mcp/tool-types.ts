/**
 * Type definitions for MCP tool arguments and responses
 */

/**
 * Arguments for the newsdex-search tool
 */
export interface SearchToolArgs {
  /** Free-text query */
  query: string;

  /** Maximum number of results to return */
  limit?: number;
}

/**
 * Arguments for the newsdex-articles tool
 */
export type ArticlesToolArgs =
  | {
      action: 'list';
      /** Only articles carrying all of these tags */
      tags?: string[];
      /** ISO-8601 publication date bounds */
      publishedAfter?: string;
      publishedBefore?: string;
      /** Page size */
      limit?: number;
      /** Token from the previous page */
      pageToken?: string;
    }
  | { action: 'get' | 'delete'; id: number }
  | {
      action: 'similar';
      id: number;
      /** Number of neighbours */
      limit?: number;
    };

/**
 * Arguments for the newsdex-crawl tool
 */
export type CrawlToolArgs =
  | {
      action: 'start';
      /** Links to crawl; the configured seeds when omitted */
      links?: string[];
    }
  | {
      action: 'archive';
      /** First and end (exclusive) day as dd.mm.yyyy */
      startDate: string;
      endDate?: string;
    }
  | { action: 'pause' }
  | { action: 'status' };

/**
 * Content item for MCP tool responses
 */
export interface McpContentItem {
  type: 'text';
  text: string;
}

/**
 * Machine-readable description of a failed tool call
 */
export interface McpErrorDetails {
  /** Error class name */
  type: string;
  /** Stable error code */
  code: string;
}

/**
 * Response for MCP tools
 */
export interface McpToolResponse {
  /** Content items */
  content: McpContentItem[];

  /** Whether the response is an error */
  isError?: boolean;

  errorDetails?: McpErrorDetails;
}
