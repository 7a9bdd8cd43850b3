import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { BudgetPeriod } from './types.js';

function emptyToUndefined(v: unknown): unknown {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

function formatZodError(e: z.ZodError): string {
  const flat = e.flatten();
  const lines = Object.entries(flat.fieldErrors).flatMap(([k, v]) =>
    (v ?? []).map((msg) => `${k}: ${msg}`)
  );
  const formErrors = flat.formErrors.map((msg) => `env: ${msg}`);
  return [...lines, ...formErrors].join('\n');
}

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const envSchema = z.object({
  DATA_DIR: z.preprocess(emptyToUndefined, z.string().default('data')),

  // Spend ceiling
  BUDGET_CEILING_USD: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(1)),
  BUDGET_PERIOD: z.preprocess(emptyToUndefined, z.enum(['day', 'month']).default('day')),

  // Change detection policy
  DEDUP_WINDOW_HOURS: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(24)),
  VOLATILITY_THRESHOLD: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).default(0.1)),
  PRICE_BUCKET_SIZE: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(1)),
  PENDING_CLAIM_TIMEOUT_MINUTES: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(30)),

  // Extraction and retries
  EXTRACTION_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(5).default(2)),
  RETRY_BASE_DELAY_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(1000)),
  HTTP_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(15000)),

  // Run
  RUN_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(32).default(4)),
  RUN_DEADLINE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),

  // Search provider (Tavily)
  TAVILY_API_KEY: optionalString,
  SEARCH_COST_USD: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(0.01)),
  SEARCH_MAX_RESULTS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(20).default(5)),
  // Full-page extraction when snippets show no price; 0 URLs turns it off
  PAGE_EXTRACT_COST_USD: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(0.02)),
  PAGE_EXTRACT_MAX_URLS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(5).default(1)),

  // Extraction provider (OpenAI)
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(emptyToUndefined, z.string().default('gpt-4o-mini')),
  OPENAI_INPUT_COST_PER_MILLION: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(0.15)),
  OPENAI_OUTPUT_COST_PER_MILLION: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(0.6)),
  OPENAI_MAX_TOKENS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(300)),

  // Channels
  RESEND_API_KEY: optionalString,
  EMAIL_FROM: z.preprocess(emptyToUndefined, z.string().default('Price Drop Watch <alerts@example.com>')),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_FROM_NUMBER: optionalString,
});

export interface PriceWatchConfig {
  dataDir: string;
  budget: {
    ceiling: number;
    period: BudgetPeriod;
  };
  detection: {
    dedupWindowMs: number;
    volatilityThreshold: number;
    priceBucketSize: number;
  };
  pendingClaimTimeoutMs: number;
  extraction: {
    maxAttempts: number;
    retryBaseDelayMs: number;
    fullPageUrls: number;
  };
  pageExtract: {
    costPerUrl: number;
  };
  httpTimeoutMs: number;
  concurrency: number;
  deadlineMs?: number;
  search: {
    apiKey?: string;
    costPerCall: number;
    maxResults: number;
  };
  llm: {
    apiKey?: string;
    model: string;
    inputCostPerMillion: number;
    outputCostPerMillion: number;
    maxTokens: number;
  };
  email: {
    apiKey?: string;
    from: string;
  };
  sms: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
  };
}

/**
 * Parse configuration from the environment. Throws ConfigError listing every bad field.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PriceWatchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatZodError(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    dataDir: e.DATA_DIR,
    budget: {
      ceiling: e.BUDGET_CEILING_USD,
      period: e.BUDGET_PERIOD,
    },
    detection: {
      dedupWindowMs: e.DEDUP_WINDOW_HOURS * 60 * 60 * 1000,
      volatilityThreshold: e.VOLATILITY_THRESHOLD,
      priceBucketSize: e.PRICE_BUCKET_SIZE,
    },
    pendingClaimTimeoutMs: e.PENDING_CLAIM_TIMEOUT_MINUTES * 60 * 1000,
    extraction: {
      maxAttempts: e.EXTRACTION_MAX_ATTEMPTS,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
      fullPageUrls: e.PAGE_EXTRACT_MAX_URLS,
    },
    pageExtract: {
      costPerUrl: e.PAGE_EXTRACT_COST_USD,
    },
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    concurrency: e.RUN_CONCURRENCY,
    deadlineMs: e.RUN_DEADLINE_MS,
    search: {
      apiKey: e.TAVILY_API_KEY,
      costPerCall: e.SEARCH_COST_USD,
      maxResults: e.SEARCH_MAX_RESULTS,
    },
    llm: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      inputCostPerMillion: e.OPENAI_INPUT_COST_PER_MILLION,
      outputCostPerMillion: e.OPENAI_OUTPUT_COST_PER_MILLION,
      maxTokens: e.OPENAI_MAX_TOKENS,
    },
    email: {
      apiKey: e.RESEND_API_KEY,
      from: e.EMAIL_FROM,
    },
    sms: {
      accountSid: e.TWILIO_ACCOUNT_SID,
      authToken: e.TWILIO_AUTH_TOKEN,
      fromNumber: e.TWILIO_FROM_NUMBER,
    },
  };
}
