/**
 * Contact Email Finder
 *
 * Finds the single best contact address for a user from their bio and the
 * pages they link to:
 * - Extraction from free text and HTML
 * - Bounded crawl of declared links, one hop deep
 * - Merge and ranking by source
 * - DNS and optional SMTP deliverability checks
 */

// Pipeline
export {
  processUser,
  runPipeline,
  type PipelineDeps,
  type RunOptions,
  type RunSummary,
  type UserOutcome,
} from './pipeline';

// Extraction
export {
  extractCandidates,
  deobfuscate,
  isValidAddress,
  isDeniedDomain,
  splitAddress,
  type ExtractOptions,
} from './extractor';

// Crawling
export {
  crawl,
  normalizeUrl,
  pageText,
  selectDeepLinks,
  DEFAULT_DEEP_LINK_POLICY,
  type CrawlOptions,
  type DeepLinkPolicy,
} from './crawler';

// Ranking
export { mergeCandidates, baseScore } from './scorer';

// Verification
export {
  verifyAddress,
  classifyRcpt,
  ReplyParser,
  type MxResolver,
  type SmtpConnector,
  type SmtpReply,
  type VerifyOptions,
} from './smtp-verify';

// Types
export type {
  BestEmailRecord,
  CrawledPage,
  CrawlReport,
  FetchFailure,
  FetchFailureReason,
  RawCandidate,
  ScoredCandidate,
  SourceKind,
  UserRecord,
  VerificationReason,
  VerificationResult,
  Verdict,
} from './types';
