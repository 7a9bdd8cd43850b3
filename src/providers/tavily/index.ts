import { ConfigError, ProviderError } from '../../errors.js';
import { DEFAULT_TIMEOUT_MS, postJson } from '../../utils/http.js';
import type {
  CallOptions,
  PageExtractProvider,
  PageExtractResponse,
  SearchHit,
  SearchProvider,
  SearchResponse,
} from '../types.js';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';
const TAVILY_EXTRACT_URL = 'https://api.tavily.com/extract';

/**
 * Tavily search API response (the parts we read)
 */
interface TavilyResult {
  title?: string;
  url?: string;
  content?: string;
  raw_content?: string | null;
}

interface TavilySearchResponse {
  results?: TavilyResult[];
}

export interface TavilySearchOptions {
  apiKey?: string;
  /** Flat price of one basic search, in USD */
  costPerCall: number;
  maxResults: number;
  timeoutMs?: number;
}

/**
 * Tavily web search
 * Billed per call, so the cost is the configured flat price
 */
export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily-search';

  constructor(private readonly options: TavilySearchOptions) {}

  estimateCost(): number {
    return this.options.costPerCall;
  }

  async search(query: string, callOptions: CallOptions = {}): Promise<SearchResponse> {
    if (!this.options.apiKey) {
      throw new ConfigError('Missing TAVILY_API_KEY');
    }

    const data = await postJson<TavilySearchResponse>(
      TAVILY_SEARCH_URL,
      {
        query,
        search_depth: 'basic',
        topic: 'general',
        max_results: this.options.maxResults,
        include_raw_content: false,
      },
      {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        signal: callOptions.signal,
      }
    );

    if (!Array.isArray(data.results)) {
      throw new ProviderError('Tavily response has no results array');
    }

    const hits: SearchHit[] = [];
    for (const result of data.results) {
      if (!result.url) {
        continue;
      }
      hits.push({
        title: result.title ?? '',
        url: result.url,
        content: result.content || result.raw_content || '',
      });
    }

    console.log(`[tavily] "${query}" returned ${hits.length} results`);
    return { hits, cost: this.options.costPerCall };
  }
}

interface TavilyExtractResponse {
  results?: Array<{ url?: string; raw_content?: string | null }>;
  failed_results?: Array<{ url?: string; error?: string }>;
}

export interface TavilyExtractOptions {
  apiKey?: string;
  /** Price of one advanced extraction, in USD per URL */
  costPerUrl: number;
  timeoutMs?: number;
}

/**
 * Tavily extract: full page text for URLs whose snippets had no price.
 * Billed per successfully extracted URL.
 */
export class TavilyExtractProvider implements PageExtractProvider {
  readonly name = 'tavily-extract';

  constructor(private readonly options: TavilyExtractOptions) {}

  estimateCost(urls: string[]): number {
    return this.options.costPerUrl * urls.length;
  }

  async extract(urls: string[], callOptions: CallOptions = {}): Promise<PageExtractResponse> {
    if (!this.options.apiKey) {
      throw new ConfigError('Missing TAVILY_API_KEY');
    }

    const data = await postJson<TavilyExtractResponse>(
      TAVILY_EXTRACT_URL,
      { urls, extract_depth: 'advanced', format: 'text' },
      {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        signal: callOptions.signal,
      }
    );

    if (!Array.isArray(data.results)) {
      throw new ProviderError('Tavily extract response has no results array');
    }

    for (const failed of data.failed_results ?? []) {
      console.warn(`[tavily] Could not extract ${failed.url ?? '?'}: ${failed.error ?? 'unknown error'}`);
    }

    const pages = data.results.flatMap(result =>
      result.url && result.raw_content ? [{ url: result.url, text: result.raw_content }] : []
    );
    console.log(`[tavily] Extracted ${pages.length}/${urls.length} pages`);
    return { pages, cost: this.options.costPerUrl * data.results.length };
  }
}
