import type { CostTracker, GrantedReservation } from '../cost/tracker.js';
import { ConfigError, errorMessage, isTransient } from '../errors.js';
import { sleep } from '../utils/http.js';
import { findPriceCandidates, pricesMatch, roundPrice } from '../utils/price.js';
import { checkQuery } from '../utils/query.js';
import { filterProductPages } from './filter.js';
import type {
  ExtractionAnswer,
  ExtractionProvider,
  PageExtractProvider,
  PageReader,
  PageSnapshot,
  SearchHit,
  SearchProvider,
  SourceDocument,
} from '../providers/types.js';
import type { Confidence, ExtractionResult, TrackedProduct } from '../types.js';

/** Relative difference under which two prices count as the same */
const PRICE_TOLERANCE = 0.02;

export interface PriceExtractorDeps {
  search: SearchProvider;
  extraction: ExtractionProvider;
  costs: CostTracker;
  /** Reads `product.url` directly when set */
  pages?: PageReader;
  /** Paid full-page text for hits whose snippets show no price */
  pageExtract?: PageExtractProvider;
}

export interface PriceExtractorOptions {
  /** Attempts per product, counting transient failures and UNKNOWN results */
  maxAttempts: number;
  retryBaseDelayMs: number;
  /** Top hits sent to full-page extraction; defaults to 1 */
  fullPageUrls?: number;
  now?: () => Date;
}

/**
 * How much to trust the extracted price.
 *
 * HIGH: one price, in the expected currency, that the source text backs up.
 * LOW: wrong or missing currency, conflicting candidates, or text whose
 * prices all disagree with the answer.
 * UNKNOWN: no price at all.
 */
export function assessConfidence(
  answer: Pick<ExtractionAnswer, 'price' | 'currency' | 'candidates'>,
  expectedCurrency: string,
  textCandidates: number[]
): Confidence {
  const { price } = answer;
  if (price === null) {
    return 'UNKNOWN';
  }
  if (answer.currency === null || answer.currency !== expectedCurrency.toUpperCase()) {
    return 'LOW';
  }
  if (answer.candidates.some(candidate => !pricesMatch(candidate, price, PRICE_TOLERANCE))) {
    return 'LOW';
  }
  if (textCandidates.length > 0 && !textCandidates.some(candidate => pricesMatch(candidate, price, PRICE_TOLERANCE))) {
    return 'LOW';
  }
  return 'HIGH';
}

type Step<T> = { ok: true; value: T } | { ok: false; result: ExtractionResult } | { ok: false; retry: string };

/**
 * Finds the current price of a product: web search, full page text when no
 * snippet shows a price, then a language-model pass over the results. Every paid call is reserved against the cost
 * tracker first and committed with its actual cost afterwards.
 */
export class PriceExtractor {
  private readonly now: () => Date;

  constructor(
    private readonly deps: PriceExtractorDeps,
    private readonly options: PriceExtractorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async extract(product: TrackedProduct, signal?: AbortSignal): Promise<ExtractionResult> {
    const check = checkQuery(product.searchQuery ?? product.url ?? '');
    if (!check.ok) {
      console.warn(`[extractor] ${product.productId}: invalid query (${check.reason})`);
      return { kind: 'extraction-failed', reason: `invalid-query: ${check.reason}` };
    }

    let page: PageSnapshot | null | undefined;
    let fullText: Map<string, string> | undefined;
    let lastReason = 'no attempts made';

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      signal?.throwIfAborted();
      if (attempt > 1) {
        const delay = this.options.retryBaseDelayMs * Math.pow(2, attempt - 2);
        console.log(`[extractor] ${product.productId}: attempt ${attempt} in ${delay}ms (${lastReason})`);
        await sleep(delay, signal);
        signal?.throwIfAborted();
      }

      // 1-2. search
      const searched = await this.paidCall(
        this.deps.search.name,
        this.deps.search.estimateCost(),
        () => this.deps.search.search(check.query, { signal }),
        response => response.cost
      );
      if (!searched.ok) {
        if ('result' in searched) {
          return searched.result;
        }
        lastReason = searched.retry;
        continue;
      }

      const hits = filterProductPages(searched.value.hits);
      if (page === undefined) {
        page = await this.readPage(product, signal);
      }
      if (fullText === undefined && this.needsFullPages(hits, page)) {
        fullText = await this.extractFullPages(product, hits, signal);
      }
      const textOf = (hit: SearchHit) => fullText?.get(hit.url) ?? hit.content;

      const sources: SourceDocument[] = [
        ...(page ? [{ url: page.url, title: page.title, text: page.text }] : []),
        ...hits.map(hit => ({ url: hit.url, title: hit.title, text: textOf(hit) })),
      ];
      if (sources.length === 0) {
        lastReason = 'no usable search results';
        continue;
      }

      const textCandidates =
        page && page.structuredPrices.length > 0
          ? page.structuredPrices
          : hits.flatMap(hit => findPriceCandidates(textOf(hit), hit.url));

      // 3-5. extraction
      const request = {
        productName: product.name,
        query: check.query,
        expectedCurrency: product.currency,
        sources,
      };
      const extracted = await this.paidCall(
        this.deps.extraction.name,
        this.deps.extraction.estimateCost(request),
        () => this.deps.extraction.extract(request, { signal }),
        answer => answer.cost
      );
      if (!extracted.ok) {
        if ('result' in extracted) {
          return extracted.result;
        }
        lastReason = extracted.retry;
        continue;
      }

      // 6. confidence
      const answer = extracted.value;
      const confidence = assessConfidence(answer, product.currency, textCandidates);
      if (answer.price === null || confidence === 'UNKNOWN') {
        lastReason = 'no price found';
        console.log(`[extractor] ${product.productId}: no price found on attempt ${attempt}`);
        continue;
      }

      const observedPrice = roundPrice(answer.price);
      console.log(`[extractor] ${product.productId}: ${observedPrice} ${answer.currency ?? product.currency} (${confidence})`);
      return {
        kind: 'observation',
        observation: {
          productId: product.productId,
          observedPrice,
          currency: answer.currency ?? product.currency,
          confidence,
          observedAt: this.now().toISOString(),
          sourceUrl: answer.sourceUrl ?? page?.url ?? hits[0]?.url,
        },
      };
    }

    return {
      kind: 'extraction-failed',
      reason: `${lastReason} after ${this.options.maxAttempts} attempt(s)`,
    };
  }

  /**
   * Reserve, call, commit. A denied reservation ends extraction with
   * budget-exceeded; a failed call is still charged at its estimate, since
   * the provider may have billed it.
   */
  private async paidCall<T>(
    apiName: string,
    estimate: number,
    call: () => Promise<T>,
    costOf: (value: T) => number
  ): Promise<Step<T>> {
    const reservation = this.deps.costs.reserve(apiName, estimate);
    if (!reservation.granted) {
      console.warn(`[extractor] Budget denied for ${apiName}: ${reservation.reason}`);
      return { ok: false, result: { kind: 'budget-exceeded', apiName } };
    }

    try {
      const value = await call();
      this.deps.costs.commit(reservation, costOf(value));
      return { ok: true, value };
    } catch (error) {
      this.settleFailed(reservation, error);
      if (isTransient(error)) {
        return { ok: false, retry: `${apiName}: ${errorMessage(error)}` };
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      console.error(`[extractor] ${apiName} failed: ${errorMessage(error)}`);
      return { ok: false, result: { kind: 'extraction-failed', reason: `${apiName}: ${errorMessage(error)}` } };
    }
  }

  private settleFailed(reservation: GrantedReservation, error: unknown): void {
    if (error instanceof ConfigError) {
      this.deps.costs.release(reservation);
    } else {
      this.deps.costs.commit(reservation, reservation.amount);
    }
  }

  private needsFullPages(hits: SearchHit[], page: PageSnapshot | null | undefined): boolean {
    if (!this.deps.pageExtract || hits.length === 0) {
      return false;
    }
    if (page && page.structuredPrices.length > 0) {
      return false;
    }
    return hits.every(hit => findPriceCandidates(hit.content, hit.url).length === 0);
  }

  /**
   * Full text of the top hits, by URL. Optional: when the budget or the
   * provider says no, extraction carries on with the snippets.
   */
  private async extractFullPages(
    product: TrackedProduct,
    hits: SearchHit[],
    signal?: AbortSignal
  ): Promise<Map<string, string>> {
    const provider = this.deps.pageExtract;
    const urls = hits.slice(0, this.options.fullPageUrls ?? 1).map(hit => hit.url);
    if (!provider || urls.length === 0) {
      return new Map();
    }

    const extracted = await this.paidCall(
      provider.name,
      provider.estimateCost(urls),
      () => provider.extract(urls, { signal }),
      response => response.cost
    );
    if (!extracted.ok) {
      console.log(`[extractor] ${product.productId}: continuing with search snippets only`);
      return new Map();
    }
    return new Map(extracted.value.pages.map(extractedPage => [extractedPage.url, extractedPage.text]));
  }

  private async readPage(product: TrackedProduct, signal?: AbortSignal): Promise<PageSnapshot | null> {
    if (!product.url || !this.deps.pages) {
      return null;
    }
    try {
      return await this.deps.pages.read(product.url, { signal });
    } catch (error) {
      signal?.throwIfAborted();
      console.warn(`[extractor] ${product.productId}: could not read ${product.url}: ${errorMessage(error)}`);
      return null;
    }
  }
}
