/**
 * Safe SMTP Email Verification
 *
 * Classifies deliverability without sending mail:
 * 1. Resolve MX (falling back to the domain's own A/AAAA record)
 * 2. Connect to the preferred exchanger
 * 3. EHLO (HELO if refused) and MAIL FROM
 * 4. RCPT TO (target) - the server says whether it takes the mailbox
 * 5. RCPT TO (random mailbox) - tells a real yes from a catch-all yes
 * 6. QUIT (DATA is never sent)
 *
 * One attempt per call, no caching. Transient trouble is UNKNOWN, never REJECTED.
 */

import { randomBytes } from 'crypto';
import * as dns from 'dns';
import * as net from 'net';
import type { Duplex } from 'stream';
import type { ConnectionQuota } from '../../connection-quota';
import { SMTP } from '../../constants';
import { errorCode, errorMessage, ResourceExhaustedError } from '../../errors';
import { logger as rootLogger, type Logger } from '../../logger';
import { TIMEOUTS, withTimeout } from '../../timeout';
import { isValidAddress, splitAddress } from './extractor';
import type { VerificationReason, VerificationResult, Verdict } from './types';

export interface MxResolver {
  resolveMx(hostname: string): Promise<dns.MxRecord[]>;
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

export type SmtpConnector = (options: { host: string; port: number }) => Duplex;

export interface VerifyOptions {
  /** false = DNS existence check only */
  smtpProbe?: boolean;
  /** Hard limit for each DNS lookup and for the whole SMTP session */
  timeoutMs?: number;
  port?: number;
  heloHost?: string;
  /** Reverse path for MAIL FROM; empty string sends the null sender */
  mailFrom?: string;
  resolver?: MxResolver;
  connect?: SmtpConnector;
  quota?: ConnectionQuota;
  logger?: Logger;
}

export interface SmtpReply {
  code: number;
  text: string;
}

type Exchangers =
  | { kind: 'mx'; hosts: string[] }
  | { kind: 'implicit'; hosts: string[] }
  | { kind: 'null_mx' }
  | { kind: 'none' }
  | { kind: 'error'; detail: string };

type ProbeOutcome =
  | { kind: 'replied'; rcpt: SmtpReply; randomRcpt: SmtpReply | null }
  | { kind: 'failed'; reason: 'timeout' | 'connection_failed' | 'unexpected_reply'; detail: string };

type RcptClass = 'accepted' | 'mailbox_unknown' | 'policy_block' | 'temporary_failure' | 'unexpected';

const NO_RECORD_CODES = new Set<string>([dns.NOTFOUND, dns.NODATA]);
const ENHANCED_STATUS = /\b([245])\.(\d{1,3})\.(\d{1,3})\b/;
const POLICY_TEXT = /\b(block(ed|list)?|blacklist(ed)?|spam|spamhaus|policy|reputation|rbl)\b/i;
const REPLY_LINE = /^(\d{3})([ -])?(.*)$/;

let defaultResolver: MxResolver | undefined;

function getDefaultResolver(): MxResolver {
  defaultResolver ??= new dns.promises.Resolver({ timeout: TIMEOUTS.DNS_LOOKUP, tries: 1 });
  return defaultResolver;
}

const defaultConnector: SmtpConnector = ({ host, port }) => net.createConnection({ host, port });

async function withQuota<T>(quota: ConnectionQuota | undefined, operation: () => Promise<T>): Promise<T> {
  return quota ? quota.run(operation) : operation();
}

// ============================================
// DNS
// ============================================

async function resolveExchangers(
  domain: string,
  resolver: MxResolver,
  timeoutMs: number,
  quota: ConnectionQuota | undefined
): Promise<Exchangers> {
  const lookup = <T>(query: () => Promise<T>) =>
    withQuota(quota, () => withTimeout(query(), timeoutMs, `DNS lookup for ${domain} timed out`));

  try {
    const records = await lookup(() => resolver.resolveMx(domain));
    if (records.length === 1 && (records[0].exchange === '' || records[0].exchange === '.')) {
      return { kind: 'null_mx' };
    }
    if (records.length > 0) {
      const hosts = [...records]
        .sort((a, b) => a.priority - b.priority || (a.exchange < b.exchange ? -1 : a.exchange > b.exchange ? 1 : 0))
        .map(r => r.exchange.replace(/\.$/, ''));
      return { kind: 'mx', hosts };
    }
  } catch (error) {
    if (error instanceof ResourceExhaustedError) throw error;
    if (!NO_RECORD_CODES.has(errorCode(error) ?? '')) {
      return { kind: 'error', detail: errorMessage(error) };
    }
  }

  // RFC 5321 implicit MX: the domain's own address record
  for (const query of [() => resolver.resolve4(domain), () => resolver.resolve6(domain)]) {
    try {
      const addresses = await lookup(query);
      if (addresses.length > 0) return { kind: 'implicit', hosts: [domain] };
    } catch (error) {
      if (error instanceof ResourceExhaustedError) throw error;
      if (!NO_RECORD_CODES.has(errorCode(error) ?? '')) {
        return { kind: 'error', detail: errorMessage(error) };
      }
    }
  }

  return { kind: 'none' };
}

// ============================================
// SMTP
// ============================================

/**
 * Split a chunk stream into complete SMTP replies. Continuation lines
 * ("250-...") are collected until the final "250 ..." line.
 */
export class ReplyParser {
  private buffer = '';
  private lines: string[] = [];

  push(chunk: string): SmtpReply[] {
    this.buffer += chunk;
    const replies: SmtpReply[] = [];

    let newline: number;
    while ((newline = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      if (!line) continue;

      const match = REPLY_LINE.exec(line);
      if (!match) {
        replies.push({ code: 0, text: line });
        this.lines = [];
        continue;
      }

      this.lines.push(match[3]);
      if (match[2] !== '-') {
        replies.push({ code: parseInt(match[1], 10), text: this.lines.join('\n') });
        this.lines = [];
      }
    }

    return replies;
  }
}

export function classifyRcpt(reply: SmtpReply): RcptClass {
  if (reply.code >= 200 && reply.code < 300) return 'accepted';
  if (reply.code >= 400 && reply.code < 500) return 'temporary_failure';
  if (reply.code < 500 || reply.code >= 600) return 'unexpected';

  const enhanced = ENHANCED_STATUS.exec(reply.text);
  if ((enhanced && enhanced[2] === '7') || POLICY_TEXT.test(reply.text)) return 'policy_block';
  if (reply.code === 550 || reply.code === 551 || reply.code === 553) return 'mailbox_unknown';
  if (enhanced && enhanced[1] === '5' && enhanced[2] === '1') return 'mailbox_unknown';
  return 'unexpected';
}

function formatReply(reply: SmtpReply): string {
  return `${reply.code} ${reply.text}`.trim();
}

/**
 * One SMTP session against one exchanger. Resolves, never rejects.
 */
function probeMailbox(
  address: string,
  host: string,
  options: { port: number; heloHost: string; mailFrom: string; timeoutMs: number; connect: SmtpConnector; logger: Logger }
): Promise<ProbeOutcome> {
  const { domain } = splitAddress(address);
  const randomMailbox = `probe-${randomBytes(6).toString('hex')}@${domain}`;

  return new Promise<ProbeOutcome>((resolve) => {
    const socket = options.connect({ host, port: options.port });
    const parser = new ReplyParser();
    let step: 'greeting' | 'ehlo' | 'helo' | 'mail' | 'rcpt' | 'random' | 'done' = 'greeting';
    let rcpt: SmtpReply | null = null;

    const send = (command: string) => socket.write(`${command}\r\n`);

    const finish = (outcome: ProbeOutcome) => {
      if (step === 'done') return;
      step = 'done';
      clearTimeout(timeoutId);
      resolve(outcome);
    };

    const quit = (outcome: ProbeOutcome) => {
      finish(outcome);
      socket.end('QUIT\r\n');
      setTimeout(() => socket.destroy(), 1000).unref();
    };

    const abort = (outcome: ProbeOutcome) => {
      finish(outcome);
      socket.destroy();
    };

    const timeoutId = setTimeout(() => {
      abort({ kind: 'failed', reason: 'timeout', detail: `No answer within ${options.timeoutMs}ms` });
    }, options.timeoutMs);

    const handle = (reply: SmtpReply) => {
      switch (step) {
        case 'greeting':
          if (reply.code !== 220) return quit({ kind: 'failed', reason: 'unexpected_reply', detail: formatReply(reply) });
          step = 'ehlo';
          send(`EHLO ${options.heloHost}`);
          return;
        case 'ehlo':
          if (reply.code >= 500 && reply.code < 600) {
            step = 'helo';
            send(`HELO ${options.heloHost}`);
            return;
          }
          if (reply.code !== 250) return quit({ kind: 'failed', reason: 'unexpected_reply', detail: formatReply(reply) });
          step = 'mail';
          send(`MAIL FROM:<${options.mailFrom}>`);
          return;
        case 'helo':
          if (reply.code !== 250) return quit({ kind: 'failed', reason: 'unexpected_reply', detail: formatReply(reply) });
          step = 'mail';
          send(`MAIL FROM:<${options.mailFrom}>`);
          return;
        case 'mail':
          if (reply.code !== 250) return quit({ kind: 'failed', reason: 'unexpected_reply', detail: formatReply(reply) });
          step = 'rcpt';
          send(`RCPT TO:<${address}>`);
          return;
        case 'rcpt':
          rcpt = reply;
          if (classifyRcpt(reply) !== 'accepted') return quit({ kind: 'replied', rcpt: reply, randomRcpt: null });
          step = 'random';
          send(`RCPT TO:<${randomMailbox}>`);
          return;
        case 'random':
          if (rcpt) quit({ kind: 'replied', rcpt, randomRcpt: reply });
          return;
        case 'done':
          return;
      }
    };

    socket.on('data', (data: Buffer | string) => {
      for (const reply of parser.push(data.toString())) {
        handle(reply);
      }
    });

    socket.on('error', (err: Error) => {
      if (step === 'done') {
        options.logger.debug({ host, error: err.message }, 'SMTP socket error after probe finished');
        return;
      }
      abort({ kind: 'failed', reason: 'connection_failed', detail: `${errorCode(err) ?? 'Error'}: ${err.message}` });
    });

    const hangUp = () => {
      if (step === 'done') return;
      abort({ kind: 'failed', reason: 'connection_failed', detail: `Connection closed during ${step}` });
    };
    socket.on('end', hangUp);
    socket.on('close', hangUp);
  });
}

// ============================================
// VERDICT
// ============================================

function probeVerdict(outcome: ProbeOutcome): Pick<VerificationResult, 'verdict' | 'smtpAccepted' | 'catchAll' | 'reason' | 'smtpResponse'> {
  if (outcome.kind === 'failed') {
    return { verdict: 'UNKNOWN', smtpAccepted: null, catchAll: null, reason: outcome.reason, smtpResponse: outcome.detail };
  }

  const smtpResponse = formatReply(outcome.rcpt);
  const rcptClass = classifyRcpt(outcome.rcpt);

  switch (rcptClass) {
    case 'mailbox_unknown':
      return { verdict: 'REJECTED', smtpAccepted: false, catchAll: null, reason: 'mailbox_unknown', smtpResponse };
    case 'policy_block':
      return { verdict: 'UNKNOWN', smtpAccepted: null, catchAll: null, reason: 'policy_block', smtpResponse };
    case 'temporary_failure':
      return { verdict: 'UNKNOWN', smtpAccepted: null, catchAll: null, reason: 'temporary_failure', smtpResponse };
    case 'unexpected':
      return { verdict: 'UNKNOWN', smtpAccepted: null, catchAll: null, reason: 'unexpected_reply', smtpResponse };
    case 'accepted':
      break;
  }

  const randomClass = outcome.randomRcpt ? classifyRcpt(outcome.randomRcpt) : 'unexpected';
  if (randomClass === 'mailbox_unknown') {
    return { verdict: 'VERIFIED', smtpAccepted: true, catchAll: false, reason: 'accepted', smtpResponse };
  }
  if (randomClass === 'accepted') {
    return { verdict: 'UNKNOWN', smtpAccepted: true, catchAll: true, reason: 'catch_all', smtpResponse };
  }
  // The server said yes but would not say no to a made-up mailbox either way
  return {
    verdict: 'UNKNOWN',
    smtpAccepted: true,
    catchAll: null,
    reason: randomClass === 'temporary_failure' ? 'temporary_failure' : 'unexpected_reply',
    smtpResponse,
  };
}

/**
 * Verify one address.
 *
 * @example
 * const result = await verifyAddress('jane@studio.io', { smtpProbe: false });
 * // { verdict: 'UNKNOWN', reason: 'mx_only', mxFound: true, ... }
 */
export async function verifyAddress(address: string, options: VerifyOptions = {}): Promise<VerificationResult> {
  const {
    smtpProbe = false,
    timeoutMs = TIMEOUTS.SMTP_SESSION,
    port = SMTP.PORT,
    heloHost = SMTP.HELO_HOST,
    mailFrom = SMTP.MAIL_FROM,
    connect = defaultConnector,
    quota,
    logger = rootLogger,
  } = options;

  const result = (
    verdict: Verdict,
    reason: VerificationReason,
    extra: Partial<VerificationResult> = {}
  ): VerificationResult => {
    const verification: VerificationResult = {
      address,
      mxFound: false,
      smtpAccepted: null,
      verdict,
      mxHosts: [],
      catchAll: null,
      reason,
      ...extra,
    };
    logger.info(
      { address, verdict, reason, mxHosts: verification.mxHosts, smtpResponse: verification.smtpResponse },
      'Verification completed'
    );
    return verification;
  };

  if (!isValidAddress(address)) {
    return result('REJECTED', 'invalid_address');
  }

  const domain = splitAddress(address).domain.toLowerCase();
  const exchangers = await resolveExchangers(domain, options.resolver ?? getDefaultResolver(), timeoutMs, quota);

  switch (exchangers.kind) {
    case 'none':
      return result('REJECTED', 'no_mx');
    case 'null_mx':
      return result('REJECTED', 'null_mx');
    case 'error':
      logger.warn({ address, domain, error: exchangers.detail }, 'DNS lookup inconclusive');
      return result('UNKNOWN', 'dns_error', { smtpResponse: exchangers.detail });
    case 'mx':
    case 'implicit':
      break;
  }

  const mxFound = exchangers.kind === 'mx';
  const mxHosts = exchangers.hosts;

  if (!smtpProbe) {
    return result('UNKNOWN', 'mx_only', { mxFound, mxHosts });
  }

  const outcome = await withQuota(quota, () =>
    probeMailbox(address, mxHosts[0], { port, heloHost, mailFrom, timeoutMs, connect, logger })
  );

  const probed = probeVerdict(outcome);
  return result(probed.verdict, probed.reason, { ...probed, mxFound, mxHosts });
}
