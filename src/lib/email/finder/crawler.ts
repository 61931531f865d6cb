/**
 * Link Crawler
 *
 * Fetches a user's declared pages and, one hop further, the in-page links
 * that look like they lead to contact details. Every fetch is bounded by a
 * timeout and a slot of the shared connection quota; a failed page is
 * recorded and skipped, never retried.
 */

import * as cheerio from 'cheerio';
import type { ConnectionQuota } from '../../connection-quota';
import {
  AGGREGATOR_DOMAINS,
  CONTACT_LINK_KEYWORDS,
  CRAWL,
  FETCH_HEADERS,
  SOCIAL_DOMAINS,
} from '../../constants';
import { errorMessage, TimeoutError } from '../../errors';
import { logger as rootLogger, type Logger } from '../../logger';
import { fetchWithTimeout, TIMEOUTS, type FetchLike } from '../../timeout';
import type { CrawledPage, CrawlReport, FetchFailure } from './types';

export interface DeepLinkPolicy {
  /** A same-site link is followed when its path or anchor text matches one of these */
  keywords: readonly RegExp[];
  /** Link-in-bio hosts: their outbound links are followed without keyword matching */
  aggregatorDomains: readonly string[];
  /** Never followed */
  socialDomains: readonly string[];
  maxLinksPerPage: number;
}

export const DEFAULT_DEEP_LINK_POLICY: DeepLinkPolicy = {
  keywords: CONTACT_LINK_KEYWORDS,
  aggregatorDomains: AGGREGATOR_DOMAINS,
  socialDomains: SOCIAL_DOMAINS,
  maxLinksPerPage: CRAWL.MAX_LINKS_PER_PAGE,
};

export interface CrawlOptions {
  maxDepth?: number;
  maxPages?: number;
  /** Per request, covering connect and body */
  timeoutMs?: number;
  maxBytes?: number;
  policy?: Partial<DeepLinkPolicy>;
  quota?: ConnectionQuota;
  /** Cooperative stop: the fetch in flight completes, nothing new starts */
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

const NON_PAGE_HREF = /^(#|javascript:|mailto:|tel:|sms:|data:)/i;
const TEXT_CONTENT_TYPE = /^(text\/html|application\/xhtml\+xml|text\/plain)/i;
const HIDDEN_ELEMENTS = 'script, style, noscript, template';
const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt',
  'footer', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main',
  'nav', 'ol', 'p', 'pre', 'section', 'table', 'td', 'th', 'tr', 'ul',
  'a', 'button', 'label', 'option',
].join(', ');
const TEXT_ATTRIBUTES = ['href', 'content', 'title'] as const;

type FetchOutcome =
  | { kind: 'page'; body: string; url: string; isHtml: boolean }
  | { kind: 'failure'; reason: FetchFailure['reason']; detail?: string };

export function matchesDomain(host: string, domains: readonly string[]): boolean {
  const lower = host.toLowerCase();
  return domains.some(domain => lower === domain || lower.endsWith(`.${domain}`));
}

function siteOf(host: string): string {
  return host.toLowerCase().replace(/^www\./, '');
}

/**
 * Absolute http(s) URL without fragment, or null. Bare "jane.studio" style
 * links get https:// in front, the way users type them into a profile.
 * URLs carrying a user name or password are refused, which also catches a
 * bare "jane@studio.io".
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const withScheme = base || /^[a-z][a-z0-9+.-]*:/i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const url = new URL(withScheme, base);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    if (url.username || url.password) return null;
    url.hash = '';
    return url.href;
  } catch {
    return null;
  }
}

/**
 * Visible text with script/style removed, followed by href/content/title
 * attribute values so mailto links and meta tags reach the extractor.
 */
export function pageText(html: string): string {
  const $ = cheerio.load(html);
  $(HIDDEN_ELEMENTS).remove();

  const attributes: string[] = [];
  $(TEXT_ATTRIBUTES.map(name => `[${name}]`).join(', ')).each((_, el) => {
    for (const name of TEXT_ATTRIBUTES) {
      const value = $(el).attr(name);
      if (value) attributes.push(value);
    }
  });

  // Keep "a@b.com</p><p>Bookings" from reading as one address
  $(BLOCK_ELEMENTS).after(' ');
  const visible = $.root().text().replace(/\s+/g, ' ').trim();

  return [visible, ...attributes].join('\n');
}

/**
 * In-page links worth one more hop, in document order
 */
export function selectDeepLinks(html: string, pageUrl: string, policy: DeepLinkPolicy): string[] {
  const $ = cheerio.load(html);
  const pageHost = new URL(pageUrl).hostname;
  const onAggregator = matchesDomain(pageHost, policy.aggregatorDomains);
  const links: string[] = [];
  const seen = new Set<string>();
  // Outbound hops from an aggregator: one per site
  const seenSites = new Set<string>();

  $('a[href]').each((_, el) => {
    if (links.length >= policy.maxLinksPerPage) return false;

    const href = $(el).attr('href')?.trim();
    if (!href || NON_PAGE_HREF.test(href)) return;

    const resolved = normalizeUrl(href, pageUrl);
    if (!resolved || seen.has(resolved)) return;

    const url = new URL(resolved);
    const host = url.hostname;
    if (matchesDomain(host, policy.socialDomains)) return;

    const sameSite = siteOf(host) === siteOf(pageHost);
    let follow: boolean;
    if (onAggregator) {
      follow =
        !sameSite && !seenSites.has(siteOf(host)) && !matchesDomain(host, policy.aggregatorDomains);
    } else {
      const anchorText = $(el).text();
      follow = sameSite && policy.keywords.some(k => k.test(url.pathname) || k.test(anchorText));
    }

    if (follow) {
      seen.add(resolved);
      seenSites.add(siteOf(host));
      links.push(resolved);
    }
    return;
  });

  return links;
}

/**
 * Body as text, reading at most maxBytes bytes off the stream. The rest is
 * cancelled unread; a multi-byte character cut at the limit decodes as U+FFFD.
 */
async function readCapped(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) return '';

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  while (received < maxBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    const room = maxBytes - received;
    const kept = value.byteLength > room ? value.subarray(0, room) : value;
    chunks.push(kept);
    received += kept.byteLength;
  }

  if (received >= maxBytes) await reader.cancel();
  return Buffer.concat(chunks).toString('utf8');
}

async function fetchOnce(
  url: string,
  timeoutMs: number,
  maxBytes: number,
  fetchImpl: FetchLike | undefined
): Promise<FetchOutcome> {
  return fetchWithTimeout<FetchOutcome>(url, {
    timeout: timeoutMs,
    fetchImpl,
    headers: FETCH_HEADERS,
    redirect: 'follow',
    read: async (response) => {
      if (!response.ok) {
        await response.body?.cancel();
        return { kind: 'failure', reason: 'http_status', detail: String(response.status) };
      }

      const declaredLength = parseInt(response.headers.get('content-length') || '0', 10);
      if (declaredLength > maxBytes) {
        await response.body?.cancel();
        return { kind: 'failure', reason: 'too_large', detail: String(declaredLength) };
      }

      const contentType = response.headers.get('content-type') || 'text/html';
      if (!TEXT_CONTENT_TYPE.test(contentType)) {
        await response.body?.cancel();
        return { kind: 'failure', reason: 'unsupported_content', detail: contentType };
      }

      return {
        kind: 'page',
        body: await readCapped(response, maxBytes),
        url: response.url || url,
        isHtml: !/^text\/plain/i.test(contentType),
      };
    },
  });
}

/**
 * Breadth-first crawl from the seed URLs.
 *
 * Returns every page fetched, in fetch order, plus a record of every page
 * that failed. A seed list where nothing could be fetched yields no pages
 * and no error. Only a ResourceExhaustedError from the quota escapes.
 */
export async function crawl(seedUrls: readonly string[], options: CrawlOptions = {}): Promise<CrawlReport> {
  const {
    maxDepth = CRAWL.MAX_DEPTH,
    maxPages = CRAWL.MAX_PAGES,
    timeoutMs = TIMEOUTS.FETCH_DEFAULT,
    maxBytes = CRAWL.MAX_BYTES,
    quota,
    signal,
    fetchImpl,
    logger = rootLogger,
  } = options;
  const policy: DeepLinkPolicy = { ...DEFAULT_DEEP_LINK_POLICY, ...options.policy };

  const pages: CrawledPage[] = [];
  const failures: FetchFailure[] = [];
  const visited = new Set<string>();
  const queue: Array<{ url: string; depth: number }> = [];

  for (const seed of seedUrls) {
    const url = normalizeUrl(seed);
    if (!url) {
      logger.debug({ seed }, 'Skipping unusable seed link');
      continue;
    }
    if (visited.has(url)) continue;
    visited.add(url);
    queue.push({ url, depth: 0 });
  }

  let attempts = 0;
  while (queue.length > 0 && attempts < maxPages) {
    if (signal?.aborted) {
      logger.info({ pending: queue.length }, 'Crawl stopped before remaining pages');
      break;
    }

    const next = queue.shift();
    if (!next) break;
    const { url, depth } = next;
    attempts++;

    const release = quota ? await quota.acquire() : undefined;
    let outcome: FetchOutcome;
    try {
      outcome = await fetchOnce(url, timeoutMs, maxBytes, fetchImpl);
    } catch (error) {
      outcome = error instanceof TimeoutError
        ? { kind: 'failure', reason: 'timeout', detail: `${error.timeoutMs}ms` }
        : { kind: 'failure', reason: 'network_error', detail: errorMessage(error) };
    } finally {
      release?.();
    }

    if (outcome.kind === 'failure') {
      const failure: FetchFailure = { url, depth, reason: outcome.reason, detail: outcome.detail };
      failures.push(failure);
      logger.warn(failure, 'Page fetch failed');
      continue;
    }

    visited.add(outcome.url);
    const text = outcome.isHtml ? pageText(outcome.body) : outcome.body;
    pages.push({ text, url: outcome.url, depth });
    logger.debug({ url: outcome.url, depth, bytes: outcome.body.length }, 'Page fetched');

    if (depth >= maxDepth || !outcome.isHtml) continue;

    for (const link of selectDeepLinks(outcome.body, outcome.url, policy)) {
      if (visited.has(link)) continue;
      visited.add(link);
      queue.push({ url: link, depth: depth + 1 });
    }
  }

  if (queue.length > 0 && attempts >= maxPages) {
    logger.debug({ maxPages, skipped: queue.length }, 'Page ceiling reached');
  }

  return { pages, failures };
}
