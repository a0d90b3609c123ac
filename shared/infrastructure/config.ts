/**
 * Configuration module for newsdex
 *
 * Loads configuration from defaults, an optional newsdex.config.json in the
 * working directory, and NEWSDEX_* environment variables (in that order of
 * precedence), then validates the result.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

// Load environment variables from .env file if present
dotenv.config();

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const RetrySchema = z.object({
  /** Total attempts including the first one */
  maxAttempts: z.number().int().min(1),
  baseDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  factor: z.number().min(1),
  /** Fraction of the delay randomized on each side (0 disables jitter) */
  jitter: z.number().min(0).max(1)
});

export const ConfigSchema = z.object({
  /** Base directory for data storage */
  dataDir: z.string().min(1),

  logLevel: LogLevelSchema,

  /** Where log entries go */
  logTarget: z.enum(['file', 'stderr', 'silent']),

  crawler: z.object({
    /** User agents rotated round-robin, one per request */
    userAgents: z.array(z.string().min(1)).min(1),
    /** Links crawled when no explicit seeds are given */
    seedLinks: z.array(z.string().url()),
    /** Number of links in flight at once */
    concurrency: z.number().int().min(1).max(64),
    /** Minimum delay between two request starts, across all workers */
    minRequestIntervalMs: z.number().int().min(0),
    /** Per-request timeout */
    requestTimeoutMs: z.number().int().min(1),
    retry: RetrySchema,
    archive: z.object({
      /** Listing page for one day; {date} is replaced by dd.mm.yyyy */
      listingUrlTemplate: z.string(),
      /** Path of the n-th listing page; {page} is replaced by the page number */
      pagePathTemplate: z.string()
    })
  }),

  extractor: z.object({
    /** Bodies shorter than this (after cleaning) are treated as unrecoverable */
    minBodyLength: z.number().int().min(1)
  }),

  store: z.object({
    /** Attempts for a store transaction before a failure becomes fatal */
    maxAttempts: z.number().int().min(1),
    retryDelayMs: z.number().int().min(0)
  }),

  similarity: z.object({
    /** Results returned when a caller gives no k */
    defaultK: z.number().int().min(1),
    /** Minimum cosine score for two texts to count as near-duplicates */
    nearDuplicateThreshold: z.number().min(0).max(1),
    /** Incremental index writes after which every vector is recomputed; 0 turns it off */
    rebuildAfterWrites: z.number().int().min(0),
    /** Records re-vectorized per event-loop turn during a rebuild */
    rebuildChunkSize: z.number().int().min(1)
  }),

  identity: z.object({
    /** Lines matching any of these patterns are dropped before fingerprinting */
    boilerplatePatterns: z.array(z.string())
  }),

  mcp: z.object({
    name: z.string(),
    version: z.string()
  })
});

export type NewsdexConfig = z.infer<typeof ConfigSchema>;
export type RetrySettings = z.infer<typeof RetrySchema>;
export type LogLevelName = z.infer<typeof LogLevelSchema>;

/**
 * Deep-partial overrides accepted by loadConfig
 */
export type ConfigOverrides = {
  [K in keyof NewsdexConfig]?: NewsdexConfig[K] extends unknown[]
    ? NewsdexConfig[K]
    : NewsdexConfig[K] extends object
      ? Partial<NewsdexConfig[K]>
      : NewsdexConfig[K];
};

const HOME_DIR = os.homedir();

export function defaultConfig(): NewsdexConfig {
  return {
    dataDir: path.join(HOME_DIR, '.newsdex'),
    logLevel: 'info',
    logTarget: 'file',
    crawler: {
      userAgents: [
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_6) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
        'Mozilla/5.0 (X11; Linux x86_64; rv:123.0) Gecko/20100101 Firefox/123.0',
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:123.0) Gecko/20100101 Firefox/123.0'
      ],
      seedLinks: [],
      concurrency: 4,
      minRequestIntervalMs: 1000,
      requestTimeoutMs: 15000,
      retry: {
        maxAttempts: 5,
        baseDelayMs: 500,
        maxDelayMs: 30000,
        factor: 2,
        jitter: 0.2
      },
      archive: {
        listingUrlTemplate: '',
        pagePathTemplate: '/archive/{page}'
      }
    },
    extractor: {
      minBodyLength: 20
    },
    store: {
      maxAttempts: 3,
      retryDelayMs: 200
    },
    similarity: {
      defaultK: 10,
      nearDuplicateThreshold: 0.9,
      rebuildAfterWrites: 200,
      rebuildChunkSize: 250
    },
    identity: {
      boilerplatePatterns: [
        '^read more\\b',
        '^subscribe to\\b',
        '^follow us on\\b',
        '^share this( article)?$',
        '^advertisement$'
      ]
    },
    mcp: {
      name: 'newsdex',
      version: '0.1.0'
    }
  };
}

const numberFromEnv = (value: string | undefined): number | undefined => {
  if (value == null || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const csvFromEnv = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
};

const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Drop undefined values so they do not shadow lower-precedence sources
 */
function compact(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/**
 * Read overrides from NEWSDEX_* environment variables. Values are validated
 * together with every other layer by loadConfig.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const retry = compact({
    maxAttempts: numberFromEnv(env.NEWSDEX_RETRY_MAX_ATTEMPTS),
    baseDelayMs: numberFromEnv(env.NEWSDEX_RETRY_BASE_DELAY_MS),
    maxDelayMs: numberFromEnv(env.NEWSDEX_RETRY_MAX_DELAY_MS)
  });

  return compact({
    dataDir: stringFromEnv(env.NEWSDEX_DATA_DIR),
    logLevel: stringFromEnv(env.NEWSDEX_LOG_LEVEL)?.toLowerCase(),
    logTarget: stringFromEnv(env.NEWSDEX_LOG_TARGET)?.toLowerCase(),
    crawler: compact({
      userAgents: csvFromEnv(env.NEWSDEX_USER_AGENTS),
      seedLinks: csvFromEnv(env.NEWSDEX_SEED_LINKS),
      concurrency: numberFromEnv(env.NEWSDEX_CONCURRENCY),
      minRequestIntervalMs: numberFromEnv(env.NEWSDEX_MIN_REQUEST_INTERVAL_MS),
      requestTimeoutMs: numberFromEnv(env.NEWSDEX_REQUEST_TIMEOUT_MS),
      retry: Object.keys(retry).length > 0 ? retry : undefined
    }),
    store: compact({
      maxAttempts: numberFromEnv(env.NEWSDEX_STORE_MAX_ATTEMPTS)
    }),
    similarity: compact({
      defaultK: numberFromEnv(env.NEWSDEX_SIMILARITY_DEFAULT_K),
      nearDuplicateThreshold: numberFromEnv(env.NEWSDEX_NEAR_DUPLICATE_THRESHOLD),
      rebuildAfterWrites: numberFromEnv(env.NEWSDEX_REBUILD_AFTER_WRITES)
    })
  });
}

function loadConfigFromFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load configuration from ${filePath}`, {
      originalError: error instanceof Error ? error.message : String(error)
    });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge overrides into a base, one level of nesting deep per section
 */
function mergeSections(base: Record<string, unknown>, ...layers: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = result[key];
      result[key] = isPlainObject(current) && isPlainObject(value) ? mergeSections(current, value) : value;
    }
  }
  return result;
}

/**
 * Build and validate a configuration
 * @param overrides Highest-precedence values (used by tests and embedders)
 * @param options Where to look for the config file and environment
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  options: { configFile?: string; env?: NodeJS.ProcessEnv } = {}
): NewsdexConfig {
  const configFile = options.configFile ?? path.join(process.cwd(), 'newsdex.config.json');
  const merged = mergeSections(
    defaultConfig(),
    loadConfigFromFile(configFile),
    configFromEnv(options.env ?? process.env),
    overrides
  );

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '), { issues });
  }
  return parsed.data;
}

let cachedConfig: NewsdexConfig | null = null;

export function getConfig(): NewsdexConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function reloadConfig(): NewsdexConfig {
  cachedConfig = null;
  return getConfig();
}
