import type { SearchHit } from '../providers/types.js';

const EXCLUDED_DOMAINS = [
  'youtube.com', 'youtu.be', 'reddit.com', 'quora.com', 'stackoverflow.com',
  'wikipedia.org', 'twitter.com', 'x.com', 'facebook.com', 'instagram.com',
  'pinterest.com', 'tumblr.com', 'medium.com', 'blogspot.com',
  'wordpress.com', 'linkedin.com', 'discord.com', 'tiktok.com',
];

const EXCLUDED_KEYWORDS = ['review', 'comparison', 'forum', 'discussion', 'article', 'blog'];

/** Checked against the start of the snippet only */
const REVIEW_INDICATORS = ['reviewed by', 'our pick', 'pros and cons', ' vs ', 'versus'];

function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Why a search hit is not a product page, or null if it may be one
 */
export function rejectionReason(hit: SearchHit): string | null {
  const url = hit.url.toLowerCase();
  const host = hostOf(hit.url);
  const title = hit.title.toLowerCase();

  if (EXCLUDED_DOMAINS.some(domain => host === domain || host.endsWith(`.${domain}`))) {
    return 'excluded domain';
  }
  if (url.endsWith('.pdf') || url.includes('/pdf')) {
    return 'document';
  }
  if (EXCLUDED_KEYWORDS.some(keyword => title.includes(keyword) || url.includes(keyword))) {
    return 'non-product page';
  }
  const opening = hit.content.toLowerCase().slice(0, 200);
  if (REVIEW_INDICATORS.some(indicator => opening.includes(indicator))) {
    return 'review or comparison';
  }
  return null;
}

/**
 * Keep the hits that look like pages where the product can be bought
 */
export function filterProductPages(hits: SearchHit[]): SearchHit[] {
  return hits.filter(hit => {
    const reason = rejectionReason(hit);
    if (reason) {
      console.log(`[extractor] Skipping ${hit.url.slice(0, 80)} (${reason})`);
      return false;
    }
    return true;
  });
}
