import { describe, it, expect } from 'vitest';
import { ConfigError } from './errors.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.dataDir).toBe('data');
    expect(config.budget).toEqual({ ceiling: 1, period: 'day' });
    expect(config.detection).toEqual({ dedupWindowMs: 86_400_000, volatilityThreshold: 0.1, priceBucketSize: 1 });
    expect(config.pendingClaimTimeoutMs).toBe(1_800_000);
    expect(config.extraction).toEqual({ maxAttempts: 2, retryBaseDelayMs: 1000, fullPageUrls: 1 });
    expect(config.pageExtract).toEqual({ costPerUrl: 0.02 });
    expect(config.concurrency).toBe(4);
    expect(config.deadlineMs).toBeUndefined();
    expect(config.llm.model).toBe('gpt-4o-mini');
    expect(config.search.apiKey).toBeUndefined();
  });

  it('should coerce numbers and treat blank values as unset', () => {
    const config = loadConfig({
      BUDGET_CEILING_USD: '2.5',
      BUDGET_PERIOD: 'month',
      DEDUP_WINDOW_HOURS: '6',
      RUN_CONCURRENCY: '8',
      RUN_DEADLINE_MS: '60000',
      TAVILY_API_KEY: '  ',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config.budget).toEqual({ ceiling: 2.5, period: 'month' });
    expect(config.detection.dedupWindowMs).toBe(21_600_000);
    expect(config.concurrency).toBe(8);
    expect(config.deadlineMs).toBe(60000);
    expect(config.search.apiKey).toBeUndefined();
    expect(config.llm.apiKey).toBe('test-secret');
  });

  it('should name every invalid field', () => {
    const error = (() => {
      try {
        loadConfig({ BUDGET_PERIOD: 'week', RUN_CONCURRENCY: '0' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('message', expect.stringContaining('BUDGET_PERIOD'));
    expect(error).toHaveProperty('message', expect.stringContaining('RUN_CONCURRENCY'));
  });

  it('should turn full-page extraction off with zero URLs', () => {
    expect(loadConfig({ PAGE_EXTRACT_MAX_URLS: '0' }).extraction.fullPageUrls).toBe(0);
  });

  it('should reject a negative ceiling', () => {
    expect(() => loadConfig({ BUDGET_CEILING_USD: '-1' })).toThrow(ConfigError);
  });
});
