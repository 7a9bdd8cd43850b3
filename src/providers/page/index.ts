import * as cheerio from 'cheerio';
import { DEFAULT_TIMEOUT_MS, fetchHtml } from '../../utils/http.js';
import { parsePrice } from '../../utils/price.js';
import type { CallOptions, PageReader, PageSnapshot } from '../types.js';

/** Characters of visible text kept from a page */
const MAX_TEXT_CHARS = 6000;

function toPrice(raw: string | undefined): number | null {
  if (!raw) {
    return null;
  }
  const value = parsePrice(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Collect offer prices from JSON-LD blocks (schema.org Product / Offer)
 */
function jsonLdPrices(node: unknown, found: { prices: number[]; currency?: string }): void {
  if (Array.isArray(node)) {
    node.forEach(child => jsonLdPrices(child, found));
    return;
  }
  if (typeof node !== 'object' || node === null) {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if ((key === 'price' || key === 'lowPrice') && (typeof value === 'string' || typeof value === 'number')) {
      const price = toPrice(String(value));
      if (price !== null) {
        found.prices.push(price);
      }
    } else if (key === 'priceCurrency' && typeof value === 'string' && !found.currency) {
      found.currency = value.toUpperCase();
    } else if (typeof value === 'object') {
      jsonLdPrices(value, found);
    }
  }
}

/**
 * Parse a product page: visible text plus prices from structured markup
 */
export function parseProductPage(url: string, html: string): PageSnapshot {
  const $ = cheerio.load(html);
  const found: { prices: number[]; currency?: string } = { prices: [] };

  $('script[type="application/ld+json"]').each((_, el) => {
    try {
      jsonLdPrices(JSON.parse($(el).text()), found);
    } catch {
      // skip unparseable JSON-LD
    }
  });

  $('meta[property="product:price:amount"], meta[property="og:price:amount"], meta[itemprop="price"]').each(
    (_, el) => {
      const price = toPrice($(el).attr('content'));
      if (price !== null) {
        found.prices.push(price);
      }
    }
  );
  $('[itemprop="price"]:not(meta)').each((_, el) => {
    const price = toPrice($(el).attr('content') ?? $(el).text());
    if (price !== null) {
      found.prices.push(price);
    }
  });

  if (!found.currency) {
    const currency =
      $('meta[property="product:price:currency"]').attr('content') ??
      $('meta[property="og:price:currency"]').attr('content') ??
      $('[itemprop="priceCurrency"]').attr('content');
    found.currency = currency?.toUpperCase();
  }

  const title = $('title').first().text().trim();
  $('script, style, noscript, svg, nav, footer, header').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim().slice(0, MAX_TEXT_CHARS);

  return {
    url,
    title,
    text,
    structuredPrices: [...new Set(found.prices)],
    structuredCurrency: found.currency,
  };
}

/**
 * Reads product pages directly over HTTP. Free, so not budgeted.
 */
export class HttpPageReader implements PageReader {
  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async read(url: string, options: CallOptions = {}): Promise<PageSnapshot> {
    const html = await fetchHtml(url, { timeoutMs: this.timeoutMs, signal: options.signal });
    const snapshot = parseProductPage(url, html);
    console.log(
      `[page] ${url}: ${snapshot.text.length} chars, structured prices [${snapshot.structuredPrices.join(', ')}]`
    );
    return snapshot;
  }
}
