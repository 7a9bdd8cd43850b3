import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CostTracker } from '../cost/tracker.js';
import { ConfigError, ProviderError, TransientIOError } from '../errors.js';
import { PriceExtractor, assessConfidence } from './index.js';
import type {
  CallOptions,
  ExtractionAnswer,
  ExtractionProvider,
  ExtractionRequest,
  PageExtractProvider,
  PageExtractResponse,
  PageReader,
  PageSnapshot,
  SearchProvider,
  SearchResponse,
} from '../providers/types.js';
import type { TrackedProduct } from '../types.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const product: TrackedProduct = {
  productId: 'p1',
  name: 'Acme Blender 5000',
  searchQuery: 'Acme Blender 5000 price',
  currency: 'USD',
  lastKnownPrice: 100,
  lastCheckedAt: null,
  subscribers: [{ email: 'shopper@example.com' }],
};

const shopResults: SearchResponse = {
  hits: [
    {
      title: 'Acme Blender 5000',
      url: 'https://shop.example/acme-5000',
      content: 'Acme Blender 5000 now $80.00. Add to cart.',
    },
  ],
  cost: 0.01,
};

function answer(overrides: Partial<ExtractionAnswer> = {}): ExtractionAnswer {
  return {
    price: 80,
    currency: 'USD',
    candidates: [80],
    sourceUrl: 'https://shop.example/acme-5000',
    cost: 0.0015,
    ...overrides,
  };
}

class FakeSearch implements SearchProvider {
  readonly name = 'search';
  readonly search = vi.fn<(query: string, options?: CallOptions) => Promise<SearchResponse>>();

  estimateCost(): number {
    return 0.01;
  }
}

class FakePageExtract implements PageExtractProvider {
  readonly name = 'page-extract';
  readonly extract = vi.fn<(urls: string[], options?: CallOptions) => Promise<PageExtractResponse>>();

  estimateCost(urls: string[]): number {
    return 0.02 * urls.length;
  }
}

class FakeExtraction implements ExtractionProvider {
  readonly name = 'extraction';
  readonly extract = vi.fn<(request: ExtractionRequest, options?: CallOptions) => Promise<ExtractionAnswer>>();

  estimateCost(): number {
    return 0.002;
  }
}

describe('assessConfidence', () => {
  it('should be HIGH when the text backs up a single price', () => {
    expect(assessConfidence(answer(), 'usd', [80, 95])).toBe('HIGH');
  });

  it('should be HIGH without text candidates to compare', () => {
    expect(assessConfidence(answer(), 'USD', [])).toBe('HIGH');
  });

  it('should be UNKNOWN without a price', () => {
    expect(assessConfidence(answer({ price: null }), 'USD', [80])).toBe('UNKNOWN');
  });

  it('should be LOW for a missing or different currency', () => {
    expect(assessConfidence(answer({ currency: null }), 'USD', [80])).toBe('LOW');
    expect(assessConfidence(answer({ currency: 'EUR' }), 'USD', [80])).toBe('LOW');
  });

  it('should be LOW when the model saw conflicting prices', () => {
    expect(assessConfidence(answer({ candidates: [80, 95] }), 'USD', [80])).toBe('LOW');
  });

  it('should be LOW when no price in the text agrees', () => {
    expect(assessConfidence(answer(), 'USD', [95, 120])).toBe('LOW');
  });
});

describe('PriceExtractor', () => {
  let search: FakeSearch;
  let extraction: FakeExtraction;
  let costs: CostTracker;

  function extractor(
    options: { maxAttempts?: number; pages?: PageReader; pageExtract?: PageExtractProvider } = {}
  ): PriceExtractor {
    return new PriceExtractor(
      { search, extraction, costs, pages: options.pages, pageExtract: options.pageExtract },
      { maxAttempts: options.maxAttempts ?? 2, retryBaseDelayMs: 0, now: () => NOW }
    );
  }

  beforeEach(() => {
    search = new FakeSearch();
    extraction = new FakeExtraction();
    costs = new CostTracker({ ceiling: 1, period: 'day', now: () => NOW });
  });

  it('should return a HIGH confidence observation and charge both calls', async () => {
    search.search.mockResolvedValue(shopResults);
    extraction.extract.mockResolvedValue(answer());

    const result = await extractor().extract(product);

    expect(result).toEqual({
      kind: 'observation',
      observation: {
        productId: 'p1',
        observedPrice: 80,
        currency: 'USD',
        confidence: 'HIGH',
        observedAt: '2026-03-01T12:00:00.000Z',
        sourceUrl: 'https://shop.example/acme-5000',
      },
    });
    expect(search.search).toHaveBeenCalledWith('Acme Blender 5000 price', { signal: undefined });
    expect(costs.spent()).toBeCloseTo(0.0115, 6);
  });

  it('should report LOW confidence for conflicting candidates', async () => {
    search.search.mockResolvedValue(shopResults);
    extraction.extract.mockResolvedValue(answer({ candidates: [80, 95] }));

    const result = await extractor().extract(product);

    expect(result.kind === 'observation' && result.observation.confidence).toBe('LOW');
  });

  it('should skip every call when the budget is exhausted', async () => {
    costs = new CostTracker({ ceiling: 0, period: 'day', now: () => NOW });

    const result = await extractor().extract(product);

    expect(result).toEqual({ kind: 'budget-exceeded', apiName: 'search' });
    expect(search.search).not.toHaveBeenCalled();
    expect(costs.spent()).toBe(0);
  });

  it('should stop before extraction when only the search fits the budget', async () => {
    costs = new CostTracker({ ceiling: 0.01, period: 'day', now: () => NOW });
    search.search.mockResolvedValue(shopResults);

    const result = await extractor().extract(product);

    expect(result).toEqual({ kind: 'budget-exceeded', apiName: 'extraction' });
    expect(extraction.extract).not.toHaveBeenCalled();
    expect(costs.spent()).toBe(0.01);
  });

  it('should fail after every attempt finds no price', async () => {
    search.search.mockResolvedValue(shopResults);
    extraction.extract.mockResolvedValue(answer({ price: null, candidates: [], cost: 0.001 }));

    const result = await extractor().extract(product);

    expect(result).toEqual({ kind: 'extraction-failed', reason: 'no price found after 2 attempt(s)' });
    expect(search.search).toHaveBeenCalledTimes(2);
    expect(extraction.extract).toHaveBeenCalledTimes(2);
    expect(costs.spent()).toBeCloseTo(0.022, 6);
  });

  it('should retry a transient search failure', async () => {
    search.search.mockRejectedValueOnce(new TransientIOError('timeout')).mockResolvedValueOnce(shopResults);
    extraction.extract.mockResolvedValue(answer());

    const result = await extractor().extract(product);

    expect(result.kind).toBe('observation');
    expect(search.search).toHaveBeenCalledTimes(2);
    // the failed call is charged at its estimate
    expect(costs.spent()).toBeCloseTo(0.0215, 6);
  });

  it('should give up on a permanent provider error', async () => {
    search.search.mockResolvedValue(shopResults);
    extraction.extract.mockRejectedValue(new ProviderError('Extraction output is not JSON: nope'));

    const result = await extractor().extract(product);

    expect(result).toEqual({
      kind: 'extraction-failed',
      reason: 'extraction: Extraction output is not JSON: nope',
    });
    expect(extraction.extract).toHaveBeenCalledTimes(1);
    expect(costs.spent()).toBeCloseTo(0.012, 6);
  });

  it('should not charge a call that could not be made', async () => {
    search.search.mockRejectedValue(new ConfigError('Missing TAVILY_API_KEY'));

    const result = await extractor().extract(product);

    expect(result).toEqual({ kind: 'extraction-failed', reason: 'search: Missing TAVILY_API_KEY' });
    expect(costs.spent()).toBe(0);
    expect(costs.remainingBudget()).toBe(1);
  });

  it('should retry when every hit is filtered out', async () => {
    search.search.mockResolvedValue({
      hits: [{ title: 'Acme 5000 review', url: 'https://www.youtube.com/watch?v=1', content: '' }],
      cost: 0.01,
    });

    const result = await extractor().extract(product);

    expect(result).toEqual({ kind: 'extraction-failed', reason: 'no usable search results after 2 attempt(s)' });
    expect(extraction.extract).not.toHaveBeenCalled();
  });

  it('should reject an unusable query without spending', async () => {
    const result = await extractor().extract({ ...product, searchQuery: 'ab' });

    expect(result).toEqual({
      kind: 'extraction-failed',
      reason: 'invalid-query: query too short (minimum 3 characters)',
    });
    expect(search.search).not.toHaveBeenCalled();
  });

  it('should read the product page and trust its structured price', async () => {
    const snapshot: PageSnapshot = {
      url: 'https://shop.example/acme-5000',
      title: 'Acme Blender 5000',
      text: 'Acme Blender 5000 $79.99',
      structuredPrices: [79.99],
      structuredCurrency: 'USD',
    };
    const pages = { read: vi.fn<(url: string, options?: CallOptions) => Promise<PageSnapshot>>() };
    pages.read.mockResolvedValue(snapshot);
    search.search.mockResolvedValue({ hits: [], cost: 0.01 });
    extraction.extract.mockResolvedValue(answer({ price: 79.99, candidates: [79.99], sourceUrl: undefined }));

    const result = await extractor({ pages }).extract({ ...product, url: 'https://shop.example/acme-5000' });

    expect(result).toMatchObject({
      kind: 'observation',
      observation: { observedPrice: 79.99, confidence: 'HIGH', sourceUrl: 'https://shop.example/acme-5000' },
    });
    expect(extraction.extract.mock.calls[0][0].sources[0].url).toBe('https://shop.example/acme-5000');
  });

  it('should carry on when the product page cannot be read', async () => {
    const pages = { read: vi.fn<(url: string, options?: CallOptions) => Promise<PageSnapshot>>() };
    pages.read.mockRejectedValue(new TransientIOError('GET failed: 503'));
    search.search.mockResolvedValue(shopResults);
    extraction.extract.mockResolvedValue(answer());

    const result = await extractor({ pages }).extract({ ...product, url: 'https://shop.example/acme-5000' });

    expect(result.kind).toBe('observation');
    expect(pages.read).toHaveBeenCalledTimes(1);
  });

  it('should stop when the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(extractor().extract(product, controller.signal)).rejects.toThrow();
    expect(search.search).not.toHaveBeenCalled();
  });

  describe('full page extraction', () => {
    const snippetWithoutPrice: SearchResponse = {
      hits: [
        { title: 'Acme Blender 5000', url: 'https://shop.example/acme-5000', content: 'Acme Blender 5000 in stock now' },
        { title: 'Acme Blender 5000 deal', url: 'https://deals.example/acme', content: 'Limited offer on blenders' },
      ],
      cost: 0.01,
    };
    let pageExtract: FakePageExtract;

    beforeEach(() => {
      pageExtract = new FakePageExtract();
    });

    it('should read the top page when no snippet shows a price', async () => {
      search.search.mockResolvedValue(snippetWithoutPrice);
      pageExtract.extract.mockResolvedValue({
        pages: [{ url: 'https://shop.example/acme-5000', text: 'Acme Blender 5000 now $79.99' }],
        cost: 0.02,
      });
      extraction.extract.mockResolvedValue(answer({ price: 79.99, candidates: [79.99] }));

      const result = await extractor({ pageExtract }).extract(product);

      expect(pageExtract.extract).toHaveBeenCalledWith(['https://shop.example/acme-5000'], { signal: undefined });
      expect(extraction.extract.mock.calls[0][0].sources[0].text).toBe('Acme Blender 5000 now $79.99');
      expect(result).toMatchObject({ kind: 'observation', observation: { observedPrice: 79.99, confidence: 'HIGH' } });
      expect(costs.spent()).toBeCloseTo(0.0315, 6);
    });

    it('should not pay for full pages when a snippet shows a price', async () => {
      search.search.mockResolvedValue(shopResults);
      extraction.extract.mockResolvedValue(answer());

      await extractor({ pageExtract }).extract(product);

      expect(pageExtract.extract).not.toHaveBeenCalled();
    });

    it('should carry on with snippets when the budget cannot cover full pages', async () => {
      costs = new CostTracker({ ceiling: 0.0125, period: 'day', now: () => NOW });
      search.search.mockResolvedValue(snippetWithoutPrice);
      extraction.extract.mockResolvedValue(answer());

      const result = await extractor({ pageExtract }).extract(product);

      expect(pageExtract.extract).not.toHaveBeenCalled();
      expect(result.kind).toBe('observation');
      expect(costs.spent()).toBeCloseTo(0.0115, 6);
    });
  });

  it('should stop waiting between attempts when the run is cancelled', async () => {
    const controller = new AbortController();
    search.search.mockImplementation(async () => {
      setTimeout(() => controller.abort(), 5);
      throw new TransientIOError('timeout');
    });
    const slowRetries = new PriceExtractor({ search, extraction, costs }, { maxAttempts: 2, retryBaseDelayMs: 60_000, now: () => NOW });
    const started = Date.now();

    await expect(slowRetries.extract(product, controller.signal)).rejects.toThrow();
    expect(Date.now() - started).toBeLessThan(1000);
    expect(search.search).toHaveBeenCalledTimes(1);
  });
});
