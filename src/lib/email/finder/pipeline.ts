/**
 * Contact Email Pipeline
 *
 * For each user: bio extraction, declared-link crawl, merge and ranking,
 * then deliverability checks on the top candidates. Users run on a bounded
 * worker pool; every outbound connection of every worker draws from one
 * shared ConnectionQuota.
 */

import { ConnectionQuota } from '../../connection-quota';
import { loadPipelineConfig } from '../../config';
import { ResourceExhaustedError } from '../../errors';
import { ErrorTracker } from '../../error-tracking';
import { createUserLogger, logger, type Logger } from '../../logger';
import type { FetchLike } from '../../timeout';
import { userRecordSchema, validate, type PipelineConfig } from '../../validation';
import { crawl } from './crawler';
import { extractCandidates, isValidAddress } from './extractor';
import { mergeCandidates } from './scorer';
import { verifyAddress, type MxResolver, type SmtpConnector } from './smtp-verify';
import type {
  BestEmailRecord,
  FetchFailure,
  RawCandidate,
  ScoredCandidate,
  UserRecord,
  VerificationResult,
  Verdict,
} from './types';

export interface PipelineDeps {
  config: PipelineConfig;
  quota?: ConnectionQuota;
  /** Once aborted, remaining stages are skipped */
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  resolver?: MxResolver;
  connect?: SmtpConnector;
  logger?: Logger;
}

export interface UserOutcome {
  userId: string;
  candidates: ScoredCandidate[];
  /** null = no candidate found */
  best: BestEmailRecord | null;
  verification: VerificationResult[];
  failures: FetchFailure[];
  stopped: boolean;
}

export interface RunOptions extends Omit<PipelineDeps, 'config' | 'logger'> {
  /** Defaults to the environment configuration */
  config?: PipelineConfig;
  /** Called as each record is produced, in completion order */
  onRecord?: (record: BestEmailRecord, outcome: UserOutcome) => void;
}

export interface RunSummary {
  records: BestEmailRecord[];
  outcomes: UserOutcome[];
  processed: number;
  failed: number;
  stopped: boolean;
}

const MAILTO = /^mailto:/i;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const VERDICT_PREFERENCE: Verdict[] = ['VERIFIED', 'UNKNOWN'];

// ============================================
// ONE USER
// ============================================

/**
 * Pick the record to hand on: highest-ranked VERIFIED, else highest-ranked
 * UNKNOWN, else the rank 1 candidate with its own verdict.
 */
function pickBest(
  userId: string,
  candidates: ScoredCandidate[],
  verification: VerificationResult[],
  stopped: boolean
): BestEmailRecord | null {
  const [top] = candidates;
  if (!top) return null;

  if (stopped) {
    return { userId, address: top.address, verdict: 'UNKNOWN', source: top.source };
  }

  const verdictOf = new Map(verification.map(v => [v.address, v.verdict]));

  for (const preferred of VERDICT_PREFERENCE) {
    const match = candidates.find(c => verdictOf.get(c.address) === preferred);
    if (match) return { userId, address: match.address, verdict: preferred, source: match.source };
  }

  return { userId, address: top.address, verdict: verdictOf.get(top.address) ?? 'UNKNOWN', source: top.source };
}

/**
 * Run every stage for one user, strictly in order.
 *
 * Fetch and verification trouble ends up in the outcome, not as an error;
 * only a ResourceExhaustedError from the quota escapes.
 */
export async function processUser(user: UserRecord, deps: PipelineDeps): Promise<UserOutcome> {
  const { config, quota, signal, fetchImpl, resolver, connect } = deps;
  const log = deps.logger ?? createUserLogger(user.userId);
  const extractOptions = { denyDomains: config.denyDomains };
  const startTime = Date.now();

  const raw: RawCandidate[] = extractCandidates(user.bioText, 'BIO_TEXT', undefined, extractOptions);
  const fromBio = raw.length;

  const webLinks: string[] = [];
  for (const link of user.declaredLinks) {
    // A bare address typed where a URL was expected counts as a mailto link
    const trimmed = link.trim();
    const bareAddress = !HAS_SCHEME.test(trimmed) && isValidAddress(trimmed);
    if (MAILTO.test(trimmed) || bareAddress) {
      raw.push(...extractCandidates(link, 'PROFILE_LINK', undefined, extractOptions));
    } else {
      webLinks.push(link);
    }
  }

  let failures: FetchFailure[] = [];
  let stopped = signal?.aborted ?? false;

  if (!stopped && webLinks.length > 0) {
    const report = await crawl(webLinks, { ...config.crawl, quota, signal, fetchImpl, logger: log });
    failures = report.failures;
    for (const page of report.pages) {
      raw.push(
        ...extractCandidates(page.text, page.depth === 0 ? 'PROFILE_LINK' : 'DEEP_LINK', page.url, {
          ...extractOptions,
          depth: page.depth,
        })
      );
    }
    log.debug({ pages: report.pages.length, failures: failures.length }, 'Crawl finished');
    stopped = signal?.aborted ?? false;
  }

  const candidates = mergeCandidates(raw);
  log.debug({ fromBio, fromLinks: raw.length - fromBio, distinct: candidates.length }, 'Candidates merged');

  const verification: VerificationResult[] = [];
  const { top, ...verifyOptions } = config.verify;

  for (const candidate of candidates.slice(0, top)) {
    if (signal?.aborted) {
      stopped = true;
      break;
    }
    verification.push(
      await verifyAddress(candidate.address, { ...verifyOptions, quota, resolver, connect, logger: log })
    );
  }

  const best = pickBest(user.userId, candidates, verification, stopped);

  log.info(
    {
      candidates: candidates.length,
      address: best?.address,
      verdict: best?.verdict,
      failures: failures.length,
      stopped,
      duration: Date.now() - startTime,
    },
    best ? 'Best email selected' : 'No email found'
  );

  return { userId: user.userId, candidates, best, verification, failures, stopped };
}

// ============================================
// MANY USERS
// ============================================

/**
 * Process a stream of users on a bounded worker pool.
 *
 * Records arrive through onRecord as users complete, in any order. A bad
 * or failing user is captured and counted; the run rejects only when the
 * connection quota is exhausted.
 *
 * @example
 * const controller = new AbortController();
 * process.on('SIGINT', () => controller.abort());
 * const summary = await runPipeline(users, { signal: controller.signal, onRecord: print });
 */
export async function runPipeline(
  users: Iterable<unknown> | AsyncIterable<unknown>,
  options: RunOptions = {}
): Promise<RunSummary> {
  const config = options.config ?? loadPipelineConfig();
  const quota = options.quota ?? new ConnectionQuota(config.maxConnections, config.acquireTimeoutMs);
  const { signal, fetchImpl, resolver, connect, onRecord } = options;

  // Aborted by the caller's signal, or by the run itself on quota exhaustion
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  const source: AsyncIterator<unknown> = (async function* () {
    yield* users;
  })();

  const summary: RunSummary = { records: [], outcomes: [], processed: 0, failed: 0, stopped: false };
  const run: { fatal: ResourceExhaustedError | null; next: number } = { fatal: null, next: 0 };
  const tracker = new ErrorTracker(logger);

  const handle = async (input: unknown, position: number): Promise<void> => {
    let user: UserRecord;
    try {
      user = validate(userRecordSchema, input, `user record #${position}`);
    } catch (error) {
      summary.failed++;
      tracker.capture(error, { component: 'pipeline', stage: 'validate', extra: { position } });
      return;
    }

    try {
      const outcome = await processUser(user, {
        config,
        quota,
        signal: controller.signal,
        fetchImpl,
        resolver,
        connect,
      });
      summary.processed++;
      summary.outcomes.push(outcome);
      if (outcome.best) {
        summary.records.push(outcome.best);
        onRecord?.(outcome.best, outcome);
      }
    } catch (error) {
      if (error instanceof ResourceExhaustedError) {
        run.fatal ??= error;
        controller.abort();
        return;
      }
      summary.failed++;
      tracker.capture(error, { userId: user.userId, component: 'pipeline', stage: 'process' });
    }
  };

  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted) {
      const next = await source.next();
      if (next.done) return;
      await handle(next.value, run.next++);
    }
  };

  const startTime = Date.now();
  logger.info({ concurrency: config.concurrency, maxConnections: quota.capacity }, 'Run started');

  try {
    await Promise.all(Array.from({ length: config.concurrency }, () => worker()));
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
    await source.return?.();
  }

  summary.stopped = signal?.aborted ?? false;
  if (summary.stopped) {
    tracker.note('Run stopped on request', 'warning', { extra: { processed: summary.processed } });
  }

  if (run.fatal) {
    logger.fatal({ ...quota.stats(), processed: summary.processed }, 'Run aborted: connection quota exhausted');
    throw run.fatal;
  }

  logger.info(
    {
      processed: summary.processed,
      failed: summary.failed,
      errors: tracker.summary(),
      records: summary.records.length,
      stopped: summary.stopped,
      duration: Date.now() - startTime,
    },
    summary.stopped ? 'Run stopped' : 'Run completed'
  );

  return summary;
}
