import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError, ProviderError } from '../../errors.js';
import { OpenAIExtractionProvider, buildExtractionPrompt, estimateTokens, extractJsonObject } from './index.js';
import type { ExtractionRequest } from '../types.js';

vi.mock('../../utils/http.js', () => ({
  DEFAULT_TIMEOUT_MS: 15000,
  postJson: vi.fn(),
}));

const request: ExtractionRequest = {
  productName: 'Acme Blender 5000',
  query: 'Acme Blender 5000 price',
  expectedCurrency: 'USD',
  sources: [{ url: 'https://shop.example/acme-5000', title: 'Acme Blender 5000', text: 'Now $799.99. Add to cart.' }],
};

function completion(content: string, usage?: { prompt_tokens: number; completion_tokens: number }) {
  return { choices: [{ message: { content } }], usage };
}

describe('OpenAIExtractionProvider', () => {
  let provider: OpenAIExtractionProvider;

  beforeEach(() => {
    provider = new OpenAIExtractionProvider({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      inputCostPerMillion: 0.15,
      outputCostPerMillion: 0.6,
      maxTokens: 300,
    });
    vi.clearAllMocks();
  });

  it('should parse a fenced JSON answer and price the call from usage', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(
      completion(
        '```json\n{"price": 799.99, "currency": "usd", "candidates": [799.99], "source_url": "https://shop.example/acme-5000"}\n```',
        { prompt_tokens: 1000, completion_tokens: 100 }
      )
    );

    const answer = await provider.extract(request);

    expect(answer).toMatchObject({
      price: 799.99,
      currency: 'USD',
      candidates: [799.99],
      sourceUrl: 'https://shop.example/acme-5000',
    });
    expect(answer.cost).toBeCloseTo(0.00021, 8);
  });

  it('should accept a missing price', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(completion('{"price": null, "currency": null}'));

    const answer = await provider.extract(request);

    expect(answer).toMatchObject({ price: null, currency: null, candidates: [], sourceUrl: undefined });
    expect(answer.cost).toBe(provider.estimateCost(request));
  });

  it('should drop a currency that is not an ISO code', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(completion('{"price": 95, "currency": "US$", "candidates": [95]}'));

    const answer = await provider.extract(request);

    expect(answer).toMatchObject({ price: 95, currency: null });
  });

  it('should send the model, the prompt and the API key', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(completion('{"price": 799.99, "currency": "USD"}'));

    await provider.extract(request);

    expect(postJson).toHaveBeenCalledWith(
      'https://api.openai.com/v1/chat/completions',
      expect.objectContaining({ model: 'gpt-4o-mini', max_tokens: 300, response_format: { type: 'json_object' } }),
      expect.objectContaining({ headers: { Authorization: 'Bearer test-secret' } })
    );
  });

  it('should reject output that is not JSON', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(completion('I could not find a price.'));

    await expect(provider.extract(request)).rejects.toBeInstanceOf(ProviderError);
  });

  it('should reject JSON of the wrong shape', async () => {
    const { postJson } = await import('../../utils/http.js');
    vi.mocked(postJson).mockResolvedValueOnce(completion('{"price": "cheap"}'));

    await expect(provider.extract(request)).rejects.toBeInstanceOf(ProviderError);
  });

  it('should fail without an API key', async () => {
    provider = new OpenAIExtractionProvider({
      model: 'gpt-4o-mini',
      inputCostPerMillion: 0.15,
      outputCostPerMillion: 0.6,
      maxTokens: 300,
    });

    await expect(provider.extract(request)).rejects.toBeInstanceOf(ConfigError);
  });

  it('should budget for the full completion allowance', () => {
    const outputOnly = new OpenAIExtractionProvider({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      inputCostPerMillion: 0,
      outputCostPerMillion: 0.6,
      maxTokens: 300,
    });

    expect(outputOnly.estimateCost(request)).toBeCloseTo(0.00018, 10);
  });
});

describe('estimateTokens', () => {
  it('should count one token per byte plus overhead', () => {
    expect(estimateTokens('a'.repeat(300))).toBe(360);
  });

  it('should not undercount text outside ASCII', () => {
    // 200 characters, three UTF-8 bytes each
    expect(estimateTokens('価格'.repeat(100))).toBe(660);
  });
});

describe('buildExtractionPrompt', () => {
  it('should include every source and truncate long text', () => {
    const prompt = buildExtractionPrompt({
      ...request,
      sources: [...request.sources, { url: 'https://other.example/a', title: 'Other', text: 'x'.repeat(3000) }],
    });

    expect(prompt).toContain('Source 1:\n- Title: Acme Blender 5000\n- URL: https://shop.example/acme-5000');
    expect(prompt).toContain(`- Content: ${'x'.repeat(2500)}\n`);
    expect(prompt).not.toContain('x'.repeat(2501));
  });
});

describe('extractJsonObject', () => {
  it('should strip text around the object', () => {
    expect(extractJsonObject('Sure! {"price": 1} Hope that helps')).toBe('{"price": 1}');
  });
});
