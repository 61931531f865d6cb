import { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Zod schemas for pipeline input validation
 * Every UserRecord and the run configuration pass through here before use
 */

// ============================================
// INPUT SCHEMAS
// ============================================

export const userRecordSchema = z.object({
  userId: z.string().trim().min(1).max(255),
  bioText: z.string().max(20000).default(''),
  declaredLinks: z.array(z.string().trim().min(1).max(2048)).max(50).default([]),
});

/** One row of the command line input file */
export const csvUserRowSchema = z.object({
  user_id: z.string().trim().min(1),
  bio_text: z.string().default(''),
  links: z.string().default(''),
});

// ============================================
// CONFIGURATION SCHEMAS
// ============================================

const domainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'Invalid domain');

export const crawlConfigSchema = z.object({
  maxDepth: z.number().int().min(0).max(3),
  maxPages: z.number().int().min(0).max(100),
  maxBytes: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
});

export const verifyConfigSchema = z.object({
  smtpProbe: z.boolean(),
  timeoutMs: z.number().int().positive(),
  port: z.number().int().min(1).max(65535),
  heloHost: z.string().min(1),
  mailFrom: z.string().email().or(z.literal('')),
  top: z.number().int().min(1).max(10),
});

export const pipelineConfigSchema = z.object({
  denyDomains: z.array(domainSchema),
  crawl: crawlConfigSchema,
  verify: verifyConfigSchema,
  concurrency: z.number().int().min(1).max(64),
  maxConnections: z.number().int().min(1).max(256),
  acquireTimeoutMs: z.number().int().positive(),
});

// ============================================
// TYPE EXPORTS
// ============================================

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

// ============================================
// VALIDATION HELPERS
// ============================================

/**
 * Parse data with a schema, throwing a ValidationError that lists every issue
 */
export function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, what = 'input'): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
