/**
 * Shared types for the contact email finder
 */

export type SourceKind = 'BIO_TEXT' | 'PROFILE_LINK' | 'DEEP_LINK';

export type Verdict = 'VERIFIED' | 'REJECTED' | 'UNKNOWN';

export interface RawCandidate {
  readonly address: string;
  readonly source: SourceKind;
  readonly sourceUrl?: string;
  readonly foundAtDepth: number;
}

export interface UserRecord {
  userId: string;
  bioText: string;
  /** In the order the user declared them */
  declaredLinks: string[];
}

export interface ScoredCandidate extends RawCandidate {
  score: number;
  /** 1 = best */
  rank: number;
  /** Every kind of source the address was seen from, best first */
  sources: SourceKind[];
}

export type VerificationReason =
  | 'no_mx'
  | 'null_mx'
  | 'dns_error'
  | 'mx_only'
  | 'accepted'
  | 'catch_all'
  | 'mailbox_unknown'
  | 'policy_block'
  | 'temporary_failure'
  | 'unexpected_reply'
  | 'connection_failed'
  | 'timeout'
  | 'invalid_address';

export interface VerificationResult {
  address: string;
  mxFound: boolean;
  /** null = probe skipped or inconclusive */
  smtpAccepted: boolean | null;
  verdict: Verdict;
  /** Exchangers in preference order; the domain itself for an implicit MX */
  mxHosts: string[];
  catchAll: boolean | null;
  reason: VerificationReason;
  smtpResponse?: string;
}

/** What the pipeline hands to the mail-sending step */
export interface BestEmailRecord {
  userId: string;
  address: string;
  verdict: Verdict;
  source: SourceKind;
}

export interface CrawledPage {
  text: string;
  url: string;
  depth: number;
}

export type FetchFailureReason =
  | 'timeout'
  | 'http_status'
  | 'too_large'
  | 'unsupported_content'
  | 'network_error';

export interface FetchFailure {
  url: string;
  depth: number;
  reason: FetchFailureReason;
  detail?: string;
}

export interface CrawlReport {
  pages: CrawledPage[];
  failures: FetchFailure[];
}
