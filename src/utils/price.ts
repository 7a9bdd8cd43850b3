/**
 * Price text helpers: turning "$1,299.99" into numbers and spotting price-like
 * amounts in search snippets and page text.
 */

/**
 * Parse a price string like "$0.50" or "0.50" to a number
 * Extracts the first price-like number from the string
 */
export function parsePrice(priceStr: string): number {
  // First try to match a price pattern like $1.00 or 1.00
  const priceMatch = priceStr.match(/\$?\s*(-?[\d,]+(?:\.\d+)?)/);
  if (priceMatch) {
    // Remove commas and parse
    return parseFloat(priceMatch[1].replace(/,/g, ''));
  }
  // Fallback: remove $ and any other non-numeric characters except . and -
  const cleaned = priceStr.replace(/[^0-9.\-]/g, '');
  return parseFloat(cleaned);
}

/**
 * Amounts above this are not product prices (phone numbers, SKUs, years...)
 */
const MAX_REASONABLE_PRICE = 100_000;

const CARRIER_DOMAINS = ['verizon.com', 'att.com', 't-mobile.com', 'tmobile.com', 'sprint.com', 'uscellular.com'];

const FULL_RETAIL_PATTERNS = [
  /Full retail price[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
  /Outright purchase[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
  /Buy outright[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
  /One-time purchase[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
  /Full price[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
  /Retail price[:\s]+\$?([\d,]+(?:\.\d{2})?)/i,
];

/** Context words that mark an amount as an instalment or a saving */
const INSTALMENT_MARKERS = ['/mo', 'per month', 'monthly', 'for 36', 'for 24', 'saving', 'save'];

export function isCarrierUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return CARRIER_DOMAINS.some(domain => lower.includes(domain));
}

function toAmount(raw: string): number | null {
  const value = parseFloat(raw.replace(/,/g, ''));
  if (!Number.isFinite(value) || value <= 0 || value >= MAX_REASONABLE_PRICE) {
    return null;
  }
  return value;
}

function isInstalment(text: string, index: number, length: number): boolean {
  const context = text.slice(Math.max(0, index - 30), index + length + 20).toLowerCase();
  return INSTALMENT_MARKERS.some(marker => context.includes(marker));
}

/**
 * Find the distinct price-like amounts in a piece of text, in order of appearance.
 *
 * Dollar amounts come first; "price: 199.99" style labels and bare XX.XX numbers
 * are only used when no dollar amount is present. On carrier sites the full
 * retail price wins and monthly instalments or savings are skipped.
 */
export function findPriceCandidates(text: string, url = ''): number[] {
  const carrier = isCarrierUrl(url);
  if (carrier) {
    for (const pattern of FULL_RETAIL_PATTERNS) {
      const match = text.match(pattern);
      const amount = match ? toAmount(match[1]) : null;
      if (amount !== null) {
        return [amount];
      }
    }
  }

  const found: number[] = [];
  const push = (amount: number | null) => {
    if (amount !== null && !found.includes(amount)) {
      found.push(amount);
    }
  };

  for (const match of text.matchAll(/\$\s?([\d,]+(?:\.\d{2})?)/g)) {
    const index = match.index ?? 0;
    if (carrier && isInstalment(text, index, match[0].length)) {
      continue;
    }
    push(toAmount(match[1]));
  }
  if (found.length > 0) {
    return found;
  }

  for (const match of text.matchAll(/(?:price|cost|buy)[:\s]+([\d,]+\.?\d{2})/gi)) {
    push(toAmount(match[1]));
  }
  if (found.length > 0) {
    return found;
  }

  for (const match of text.matchAll(/\b(\d{1,3}(?:,\d{3})*\.\d{2})\b/g)) {
    push(toAmount(match[1]));
  }
  return found;
}

/**
 * True when two prices are within `tolerance` (relative) of each other
 */
export function pricesMatch(a: number, b: number, tolerance = 0.02): boolean {
  if (a === b) {
    return true;
  }
  return Math.abs(a - b) / Math.max(Math.abs(a), Math.abs(b)) <= tolerance;
}

/**
 * Round to whole cents
 */
export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatMoney(value: number, currency: string): string {
  return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(value);
}
