/**
 * Environment Variable Parsing
 *
 * Centralized, typed access to every environment variable the pipeline reads.
 * Values are parsed by hand with explicit defaults and cached after the first call.
 */

import * as dotenv from 'dotenv';
dotenv.config();

export type RateLimitScope = 'process' | 'domain' | 'shared';
export type ContentStoreDriver = 'mongodb' | 'memory';

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

function parseEnumEnv<T extends string>(value: string | undefined, allowed: readonly T[], defaultValue: T): T {
  const match = allowed.find(candidate => candidate === value);
  return match ?? defaultValue;
}

export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  LOG_LEVEL?: string;

  // Content store
  CONTENT_STORE: ContentStoreDriver;
  MONGODB_URI: string;
  DB_NAME: string;
  DB_CONNECT_TIMEOUT_MS: number;

  // Crawling
  SEEDS_FILE: string;
  SCRAPER_USER_AGENT: string;
  CRAWL_DELAY_MS: number;
  CRAWL_RATE_LIMIT_SCOPE: RateLimitScope;
  CRAWL_FETCH_TIMEOUT_MS: number;
  CRAWL_MIN_CONTENT_LENGTH: number;
  CRAWL_CONCURRENCY: number;
  CRAWL_RESPECT_ROBOTS: boolean;
  CRAWL_RUN_DEADLINE_MS?: number;
  BROWSER_EXECUTABLE_PATH?: string;

  // Language model services
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  EMBEDDING_ENABLED: boolean;
  EMBEDDING_MODEL: string;
  RERANKER_ENABLED: boolean;
  RERANKER_MODEL: string;
  RERANKER_POOL_SIZE: number;
  ASSISTED_EXTRACTION_ENABLED: boolean;

  // Retrieval
  HYBRID_SEMANTIC_WEIGHT: number;
  HYBRID_KEYWORD_WEIGHT: number;
  CONTEXT_MAX_ITEMS: number;
  CONTEXT_TOKEN_BUDGET: number;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const deadline = parseNumericEnv(process.env.CRAWL_RUN_DEADLINE_MS, 0);

  cachedEnv = {
    NODE_ENV: parseEnumEnv(process.env.NODE_ENV, ['development', 'production', 'test'] as const, 'development'),
    PORT: parseNumericEnv(process.env.PORT, 4000),
    LOG_LEVEL: process.env.LOG_LEVEL,

    CONTENT_STORE: parseEnumEnv(process.env.CONTENT_STORE, ['mongodb', 'memory'] as const, 'mongodb'),
    MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/?replicaSet=rs0',
    DB_NAME: process.env.DB_NAME || 'visa_context',
    DB_CONNECT_TIMEOUT_MS: parseNumericEnv(process.env.DB_CONNECT_TIMEOUT_MS, 10000),

    SEEDS_FILE: process.env.SEEDS_FILE || 'config/seeds.json',
    SCRAPER_USER_AGENT:
      process.env.SCRAPER_USER_AGENT || 'VisaContextBot/1.0 (+https://example.org/bot; crawler@example.org)',
    CRAWL_DELAY_MS: parseNumericEnv(process.env.CRAWL_DELAY_MS, 1000),
    CRAWL_RATE_LIMIT_SCOPE: parseEnumEnv(
      process.env.CRAWL_RATE_LIMIT_SCOPE,
      ['process', 'domain', 'shared'] as const,
      'process'
    ),
    CRAWL_FETCH_TIMEOUT_MS: parseNumericEnv(process.env.CRAWL_FETCH_TIMEOUT_MS, 10000),
    CRAWL_MIN_CONTENT_LENGTH: parseNumericEnv(process.env.CRAWL_MIN_CONTENT_LENGTH, 100),
    CRAWL_CONCURRENCY: Math.max(1, parseNumericEnv(process.env.CRAWL_CONCURRENCY, 2)),
    CRAWL_RESPECT_ROBOTS: parseBooleanEnv(process.env.CRAWL_RESPECT_ROBOTS, true),
    CRAWL_RUN_DEADLINE_MS: deadline > 0 ? deadline : undefined,
    BROWSER_EXECUTABLE_PATH: process.env.BROWSER_EXECUTABLE_PATH,

    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    EMBEDDING_ENABLED: parseBooleanEnv(process.env.EMBEDDING_ENABLED, false),
    EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
    RERANKER_ENABLED: parseBooleanEnv(process.env.RERANKER_ENABLED, false),
    RERANKER_MODEL: process.env.RERANKER_MODEL || 'gpt-4o-mini',
    RERANKER_POOL_SIZE: parseNumericEnv(process.env.RERANKER_POOL_SIZE, 20),
    ASSISTED_EXTRACTION_ENABLED: parseBooleanEnv(process.env.ASSISTED_EXTRACTION_ENABLED, false),

    HYBRID_SEMANTIC_WEIGHT: parseFloatEnv(process.env.HYBRID_SEMANTIC_WEIGHT, 0.6),
    HYBRID_KEYWORD_WEIGHT: parseFloatEnv(process.env.HYBRID_KEYWORD_WEIGHT, 0.4),
    CONTEXT_MAX_ITEMS: parseNumericEnv(process.env.CONTEXT_MAX_ITEMS, 5),
    CONTEXT_TOKEN_BUDGET: parseNumericEnv(process.env.CONTEXT_TOKEN_BUDGET, 3000),
  };

  return cachedEnv;
}

/**
 * Drop the cached values so the next getEnv() re-reads process.env (tests)
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}
