import { getEnv, resetEnvCache } from '../../../src/server/config/env.js';

const KEYS = ['CRAWL_RATE_LIMIT_SCOPE', 'CRAWL_CONCURRENCY', 'CRAWL_RUN_DEADLINE_MS', 'EMBEDDING_ENABLED', 'HYBRID_SEMANTIC_WEIGHT'];

describe('getEnv', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetEnvCache();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetEnvCache();
  });

  it('applies defaults when variables are unset', () => {
    const env = getEnv();

    expect(env.CRAWL_RATE_LIMIT_SCOPE).toBe('process');
    expect(env.CRAWL_CONCURRENCY).toBe(2);
    expect(env.CRAWL_RUN_DEADLINE_MS).toBeUndefined();
    expect(env.EMBEDDING_ENABLED).toBe(false);
    expect(env.HYBRID_SEMANTIC_WEIGHT).toBe(0.6);
  });

  it('parses configured values and ignores invalid ones', () => {
    process.env.CRAWL_RATE_LIMIT_SCOPE = 'shared';
    process.env.CRAWL_CONCURRENCY = '0';
    process.env.CRAWL_RUN_DEADLINE_MS = '60000';
    process.env.EMBEDDING_ENABLED = 'true';
    process.env.HYBRID_SEMANTIC_WEIGHT = 'heavy';

    const env = getEnv();

    expect(env.CRAWL_RATE_LIMIT_SCOPE).toBe('shared');
    expect(env.CRAWL_CONCURRENCY).toBe(1);
    expect(env.CRAWL_RUN_DEADLINE_MS).toBe(60000);
    expect(env.EMBEDDING_ENABLED).toBe(true);
    expect(env.HYBRID_SEMANTIC_WEIGHT).toBe(0.6);
  });

  it('caches until reset', () => {
    const first = getEnv();
    process.env.CRAWL_RATE_LIMIT_SCOPE = 'domain';

    expect(getEnv()).toBe(first);
    resetEnvCache();
    expect(getEnv().CRAWL_RATE_LIMIT_SCOPE).toBe('domain');
  });
});
