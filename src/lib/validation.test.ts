import { describe, it, expect } from 'vitest';
import { ValidationError } from './errors';
import {
  csvUserRowSchema,
  pipelineConfigSchema,
  userRecordSchema,
  validate,
  verifyConfigSchema,
} from './validation';

describe('Validation Schemas', () => {
  describe('userRecordSchema', () => {
    it('should fill in missing bio and links', () => {
      const result = userRecordSchema.parse({ userId: '  u-42 ' });

      expect(result).toEqual({ userId: 'u-42', bioText: '', declaredLinks: [] });
    });

    it('should require a user id', () => {
      expect(userRecordSchema.safeParse({ userId: '   ' }).success).toBe(false);
      expect(userRecordSchema.safeParse({ bioText: 'hi' }).success).toBe(false);
    });

    it('should cap the number of declared links', () => {
      const links = Array.from({ length: 51 }, (_, i) => `https://site${i}.io`);

      expect(userRecordSchema.safeParse({ userId: 'u', declaredLinks: links }).success).toBe(false);
    });
  });

  describe('csvUserRowSchema', () => {
    it('should accept a row with only the id column filled', () => {
      expect(csvUserRowSchema.parse({ user_id: '7' })).toEqual({ user_id: '7', bio_text: '', links: '' });
    });
  });

  describe('verifyConfigSchema', () => {
    const base = { smtpProbe: true, timeoutMs: 1000, port: 25, heloHost: 'probe.test', top: 1 };

    it('should accept the null sender', () => {
      expect(verifyConfigSchema.safeParse({ ...base, mailFrom: '' }).success).toBe(true);
    });

    it('should reject a malformed sender', () => {
      expect(verifyConfigSchema.safeParse({ ...base, mailFrom: 'verify' }).success).toBe(false);
    });
  });

  describe('pipelineConfigSchema', () => {
    it('should lower-case deny domains and reject junk', () => {
      const base = {
        crawl: { maxDepth: 1, maxPages: 6, maxBytes: 1000, timeoutMs: 1000 },
        verify: { smtpProbe: false, timeoutMs: 1000, port: 25, heloHost: 'probe.test', mailFrom: '', top: 1 },
        concurrency: 4,
        maxConnections: 8,
        acquireTimeoutMs: 1000,
      };

      expect(pipelineConfigSchema.parse({ ...base, denyDomains: [' Tracker.IO '] }).denyDomains).toEqual(['tracker.io']);
      expect(pipelineConfigSchema.safeParse({ ...base, denyDomains: ['not a domain'] }).success).toBe(false);
    });
  });
});

describe('validate', () => {
  it('should return parsed data', () => {
    expect(validate(csvUserRowSchema, { user_id: 'a', links: 'x.io' })).toEqual({
      user_id: 'a',
      bio_text: '',
      links: 'x.io',
    });
  });

  it('should throw a ValidationError listing each issue by path', () => {
    try {
      validate(userRecordSchema, { userId: '', declaredLinks: 'x' }, 'user record');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^userId: /);
      expect(error.issues[1]).toMatch(/^declaredLinks: /);
      expect(error.message).toMatch(/^Invalid user record: /);
    }
  });
});
