/**
 * Candidate Extractor
 *
 * Finds email-like substrings in bio text or fetched page text and turns
 * them into RawCandidates. Pure: no I/O, no shared state.
 */

import {
  ASSET_EXTENSIONS,
  DEFAULT_DENY_DOMAINS,
  DEFAULT_DENY_LOCAL_PARTS,
} from '../../constants';
import type { RawCandidate, SourceKind } from './types';

// local-part@label.label.tld; the match starts where a run of local-part
// characters starts, and every repeat is bounded (64 / 63 / 24) so a long
// run without an @ is rejected in linear time
const LOCAL_PART = '[A-Za-z0-9._%+-]{1,64}';
const DOMAIN = '(?:[A-Za-z0-9-]{1,63}\\.)+[A-Za-z]{2,24}';
const EMAIL_PATTERN = new RegExp(
  `(?<![A-Za-z0-9._%+-])(${LOCAL_PART})@(${DOMAIN})(?![A-Za-z0-9]|-[A-Za-z0-9])`,
  'g'
);
const FULL_ADDRESS_PATTERN = new RegExp(`^${LOCAL_PART}@${DOMAIN}$`);

const MAILTO_PATTERN = /mailto:([^\s"'<>?#]+)/gi;
const OBFUSCATED_AT = /\s{0,3}[[({]\s{0,3}at\s{0,3}[\])}]\s{0,3}/gi;
const OBFUSCATED_DOT = /\s{0,3}[[({]\s{0,3}dot\s{0,3}[\])}]\s{0,3}/gi;
const EDGE_PUNCTUATION = /^[.%+-]+|[.%+-]+$/g;

export interface ExtractOptions {
  /** Crawl depth of the page the text came from */
  depth?: number;
  /** Domains (and their subdomains) that never yield a candidate */
  denyDomains?: readonly string[];
  /** Mailboxes nobody reads, matched on the local-part */
  denyLocalParts?: readonly string[];
}

export interface AddressParts {
  localPart: string;
  domain: string;
}

/**
 * True when the whole string is one address in the extraction grammar
 */
export function isValidAddress(address: string): boolean {
  return FULL_ADDRESS_PATTERN.test(address);
}

export function splitAddress(address: string): AddressParts {
  const at = address.lastIndexOf('@');
  return { localPart: address.slice(0, at), domain: address.slice(at + 1) };
}

export function isDeniedDomain(domain: string, denyDomains: readonly string[]): boolean {
  const lower = domain.toLowerCase();
  return denyDomains.some((entry) => {
    const denied = entry.toLowerCase();
    return lower === denied || lower.endsWith(`.${denied}`);
  });
}

function isDeniedLocalPart(localPart: string, denyLocalParts: readonly string[]): boolean {
  const lower = localPart.toLowerCase();
  return denyLocalParts.some((entry) => {
    if (!lower.startsWith(entry)) return false;
    const rest = lower.slice(entry.length);
    return rest === '' || /^[._+-]/.test(rest);
  });
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Undo "jane [at] site [dot] com" and percent-encoded mailto targets so the
 * grammar can see them. Bare " at " / " dot " words are left alone.
 */
export function deobfuscate(text: string): string {
  return text
    .replace(MAILTO_PATTERN, (_, target: string) => ` ${safeDecode(target).split(/[,;]/).join(' ')} `)
    .replace(OBFUSCATED_AT, '@')
    .replace(OBFUSCATED_DOT, '.');
}

/**
 * Normalize one grammar match, or return null when it is noise
 */
function normalizeMatch(
  rawLocal: string,
  rawDomain: string,
  denyDomains: readonly string[],
  denyLocalParts: readonly string[]
): string | null {
  const localPart = rawLocal.replace(EDGE_PUNCTUATION, '');
  if (!localPart) return null;

  const domain = rawDomain.toLowerCase();
  const tld = domain.slice(domain.lastIndexOf('.') + 1);

  if (ASSET_EXTENSIONS.has(tld)) return null;
  if (isDeniedDomain(domain, denyDomains)) return null;
  if (isDeniedLocalPart(localPart, denyLocalParts)) return null;

  return `${localPart}@${domain}`;
}

/**
 * Extract candidate addresses from a block of text.
 *
 * Exact repeats within one call collapse into the first occurrence; the same
 * address from another source is kept for the merger to corroborate.
 *
 * @example
 * extractCandidates('reach me at jane.doe@examplemail.com', 'BIO_TEXT');
 * // [{ address: 'jane.doe@examplemail.com', source: 'BIO_TEXT', foundAtDepth: 0 }]
 */
export function extractCandidates(
  text: string,
  source: SourceKind,
  sourceUrl?: string,
  options: ExtractOptions = {}
): RawCandidate[] {
  const {
    depth = 0,
    denyDomains = DEFAULT_DENY_DOMAINS,
    denyLocalParts = DEFAULT_DENY_LOCAL_PARTS,
  } = options;

  const seen = new Set<string>();
  const candidates: RawCandidate[] = [];

  for (const match of deobfuscate(text).matchAll(EMAIL_PATTERN)) {
    const address = normalizeMatch(match[1], match[2], denyDomains, denyLocalParts);
    if (!address || seen.has(address)) continue;
    seen.add(address);

    candidates.push(
      sourceUrl === undefined
        ? { address, source, foundAtDepth: depth }
        : { address, source, sourceUrl, foundAtDepth: depth }
    );
  }

  return candidates;
}
