/**
 * Contracts for the paid and free sources the price extractor reads from
 */

export interface SearchHit {
  title: string;
  url: string;
  /** Snippet returned by the search provider */
  content: string;
}

export interface SearchResponse {
  hits: SearchHit[];
  /** Actual cost of the call in USD */
  cost: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Web search billed per call
 */
export interface SearchProvider {
  readonly name: string;
  /** Upper bound of what one call costs, in USD */
  estimateCost(): number;
  search(query: string, options?: CallOptions): Promise<SearchResponse>;
}

/**
 * One piece of text the extraction model reads
 */
export interface SourceDocument {
  url: string;
  title: string;
  text: string;
}

export interface ExtractionRequest {
  productName: string;
  query: string;
  expectedCurrency: string;
  sources: SourceDocument[];
}

export interface ExtractionAnswer {
  /** Current price of the product, null when none was found */
  price: number | null;
  currency: string | null;
  /** Every distinct price the model saw for this exact product */
  candidates: number[];
  /** Source the price came from */
  sourceUrl?: string;
  /** Actual cost of the call in USD */
  cost: number;
}

/**
 * Language-model extraction billed per token
 */
export interface ExtractionProvider {
  readonly name: string;
  /** Upper bound of what this request costs, in USD */
  estimateCost(request: ExtractionRequest): number;
  extract(request: ExtractionRequest, options?: CallOptions): Promise<ExtractionAnswer>;
}

export interface PageExtractResponse {
  /** Full text of each page that could be extracted */
  pages: Array<{ url: string; text: string }>;
  /** Actual cost of the call in USD */
  cost: number;
}

/**
 * Full-page extraction billed per URL, for when search snippets carry no price
 */
export interface PageExtractProvider {
  readonly name: string;
  /** Upper bound of what extracting these URLs costs, in USD */
  estimateCost(urls: string[]): number;
  extract(urls: string[], options?: CallOptions): Promise<PageExtractResponse>;
}

/**
 * A product page read directly, without a paid API
 */
export interface PageSnapshot {
  url: string;
  title: string;
  text: string;
  /** Prices from structured markup (schema.org, Open Graph) */
  structuredPrices: number[];
  structuredCurrency?: string;
}

export interface PageReader {
  read(url: string, options?: CallOptions): Promise<PageSnapshot>;
}
