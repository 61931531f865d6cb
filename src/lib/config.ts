/**
 * Centralized configuration management
 * - Single source of truth for all environment variables
 * - Type-safe access to configuration
 * - Validation of the assembled pipeline settings
 */

import { CRAWL, DEFAULT_DENY_DOMAINS, PIPELINE, SMTP } from './constants';
import { TIMEOUTS } from './timeout';
import { pipelineConfigSchema, validate, type PipelineConfig } from './validation';

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string): string[] {
  const value = process.env[key];
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

export const config = {
  // Extraction
  extract: {
    /** Built-in deny-list plus EMAIL_DENY_DOMAINS */
    get denyDomains() {
      return [...DEFAULT_DENY_DOMAINS, ...getEnvList('EMAIL_DENY_DOMAINS')];
    },
  },

  // Link crawler
  crawl: {
    get maxDepth() { return getEnvNumber('CRAWL_MAX_DEPTH', CRAWL.MAX_DEPTH); },
    get maxPages() { return getEnvNumber('CRAWL_MAX_PAGES', CRAWL.MAX_PAGES); },
    get maxBytes() { return getEnvNumber('CRAWL_MAX_BYTES', CRAWL.MAX_BYTES); },
    get timeoutMs() { return getEnvNumber('REQUEST_TIMEOUT_MS', TIMEOUTS.FETCH_DEFAULT); },
  },

  // Deliverability verifier
  smtp: {
    get probeEnabled() { return getEnvBoolean('SMTP_PROBE_ENABLED', false); },
    get timeoutMs() { return getEnvNumber('SMTP_TIMEOUT_MS', TIMEOUTS.SMTP_SESSION); },
    get port() { return getEnvNumber('SMTP_PORT', SMTP.PORT); },
    get heloHost() { return getEnv('SMTP_HELO_HOST', SMTP.HELO_HOST); },
    get mailFrom() { return getEnv('SMTP_MAIL_FROM', SMTP.MAIL_FROM); },
    get verifyTop() { return getEnvNumber('VERIFY_TOP_CANDIDATES', PIPELINE.VERIFY_TOP); },
  },

  // Worker pool and outbound connection quota
  pool: {
    get concurrency() { return getEnvNumber('WORKER_CONCURRENCY', PIPELINE.WORKER_CONCURRENCY); },
    get maxConnections() { return getEnvNumber('MAX_CONNECTIONS', PIPELINE.MAX_CONNECTIONS); },
    get acquireTimeoutMs() { return getEnvNumber('QUOTA_ACQUIRE_TIMEOUT_MS', TIMEOUTS.QUOTA_ACQUIRE); },
  },
};

/**
 * Assemble the pipeline settings from the environment and validate them
 */
export function loadPipelineConfig(): PipelineConfig {
  return validate(pipelineConfigSchema, {
    denyDomains: config.extract.denyDomains,
    crawl: {
      maxDepth: config.crawl.maxDepth,
      maxPages: config.crawl.maxPages,
      maxBytes: config.crawl.maxBytes,
      timeoutMs: config.crawl.timeoutMs,
    },
    verify: {
      smtpProbe: config.smtp.probeEnabled,
      timeoutMs: config.smtp.timeoutMs,
      port: config.smtp.port,
      heloHost: config.smtp.heloHost,
      mailFrom: config.smtp.mailFrom,
      top: config.smtp.verifyTop,
    },
    concurrency: config.pool.concurrency,
    maxConnections: config.pool.maxConnections,
    acquireTimeoutMs: config.pool.acquireTimeoutMs,
  }, 'configuration');
}
