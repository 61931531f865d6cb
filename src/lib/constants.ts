/**
 * Centralized constants
 * Eliminates magic numbers and strings throughout the codebase
 */

import domainLists from './email/finder/domain-lists.json';

// ============================================
// CRAWLING
// ============================================
export const CRAWL = {
  /** Seed pages plus one hop of deep links */
  MAX_DEPTH: 1,
  /** Page ceiling per user, across all depths */
  MAX_PAGES: 6,
  /** Outbound links followed from a single link-in-bio page */
  MAX_LINKS_PER_PAGE: 5,
  /** Skip pages larger than this (bytes) */
  MAX_BYTES: 1_000_000,
} as const;

// ============================================
// SCORING
// ============================================
export const SCORING = {
  BASE: {
    BIO_TEXT: 3,
    PROFILE_LINK: 2,
    DEEP_LINK: 1,
  },
  /** Flat bonus once an address is seen from a second kind of source */
  CORROBORATION_BONUS: 1,
} as const;

// ============================================
// SMTP PROBING
// ============================================
export const SMTP = {
  PORT: 25,
  HELO_HOST: 'verification.local',
  MAIL_FROM: 'verify@verification.local',
} as const;

// ============================================
// PIPELINE
// ============================================
export const PIPELINE = {
  /** Users processed at once */
  WORKER_CONCURRENCY: 4,
  /** Simultaneous outbound connections, shared by all workers */
  MAX_CONNECTIONS: 8,
  /** Ranked candidates sent to the verifier */
  VERIFY_TOP: 1,
} as const;

// ============================================
// DOMAIN LISTS (false-positive suppression)
// ============================================
export const DEFAULT_DENY_DOMAINS: readonly string[] = domainLists.denyDomains;

/** No-reply style mailboxes nobody reads */
export const DEFAULT_DENY_LOCAL_PARTS: readonly string[] = domainLists.denyLocalParts;

/** "logo@2x.png" and friends */
export const ASSET_EXTENSIONS: ReadonlySet<string> = new Set(domainLists.assetExtensions);

/** Link-in-bio pages: their outbound links are the interesting ones */
export const AGGREGATOR_DOMAINS: readonly string[] = domainLists.aggregatorDomains;

/** Never worth crawling for a contact address */
export const SOCIAL_DOMAINS: readonly string[] = domainLists.socialDomains;

/** URL/anchor keywords that make an in-page link worth following */
export const CONTACT_LINK_KEYWORDS: readonly RegExp[] = [
  /contact/i, /kontakt/i, /about/i, /impressum/i, /imprint/i,
  /team/i, /e-?mail/i, /reach/i, /booking/i, /hire/i, /press/i,
];

export const FETCH_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; ContactFinder/1.0)',
  'Accept': 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5',
  'Accept-Language': 'en-US,en;q=0.9',
} as const;
