/**
 * Checks on the text we send to the search and extraction providers.
 * Product queries come from the registration surface, so they are untrusted.
 */

const MIN_QUERY_LENGTH = 3;
const MAX_QUERY_LENGTH = 1000;

const BLOCKED_PATTERNS = [
  /ignore (previous|all|your) instruction/i,
  /you are now/i,
  /roleplay as/i,
  /pretend (you are|to be)/i,
  /disregard.*rules/i,
  /reveal.*prompt/i,
];

export type QueryCheck = { ok: true; query: string } | { ok: false; reason: string };

/**
 * Validate and normalise a search query
 */
export function checkQuery(raw: string): QueryCheck {
  const query = raw.replace(/[\u0000-\u001f\u007f]/g, ' ').replace(/\s+/g, ' ').trim();

  if (query.length < MIN_QUERY_LENGTH) {
    return { ok: false, reason: `query too short (minimum ${MIN_QUERY_LENGTH} characters)` };
  }
  if (query.length > MAX_QUERY_LENGTH) {
    return { ok: false, reason: `query too long (maximum ${MAX_QUERY_LENGTH} characters)` };
  }
  if (BLOCKED_PATTERNS.some(pattern => pattern.test(query))) {
    return { ok: false, reason: 'query contains instructions' };
  }
  return { ok: true, query };
}
