/**
 * Find the best contact email for every user in a CSV file
 *
 * Input columns: user_id, bio_text, links (whitespace or "|" separated)
 * Output: one JSON record per line on stdout; logs go to stderr
 *
 * Run: npx tsx scripts/find-emails.ts users.csv
 * Ctrl-C stops the run: users in flight still get a record.
 */

import 'dotenv/config';
import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { loadPipelineConfig } from '../src/lib/config';
import { ResourceExhaustedError, ValidationError } from '../src/lib/errors';
import { captureError, captureMessage } from '../src/lib/error-tracking';
import { logger } from '../src/lib/logger';
import { csvUserRowSchema } from '../src/lib/validation';
import { runPipeline } from '../src/lib/email/finder';

const LINK_SEPARATOR = /[\s|]+/;

/**
 * Rows that do not fit the column layout are passed through as they are,
 * so the pipeline rejects and counts them.
 */
function* toUsers(rows: unknown[]): Generator<unknown> {
  for (const row of rows) {
    const parsed = csvUserRowSchema.safeParse(row);
    if (!parsed.success) {
      yield row;
      continue;
    }
    yield {
      userId: parsed.data.user_id,
      bioText: parsed.data.bio_text,
      declaredLinks: parsed.data.links.split(LINK_SEPARATOR).filter(Boolean),
    };
  }
}

async function main(): Promise<number> {
  const [inputPath] = process.argv.slice(2);
  if (!inputPath) {
    console.error('Usage: tsx scripts/find-emails.ts <users.csv>');
    return 2;
  }

  const config = loadPipelineConfig();
  const content = fs.readFileSync(inputPath, 'utf-8');
  const rows: unknown[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    captureMessage('Stopping: finishing users in flight', 'warning', { component: 'cli' });
    controller.abort();
  });

  const summary = await runPipeline(toUsers(rows), {
    config,
    signal: controller.signal,
    onRecord: (record) => {
      process.stdout.write(`${JSON.stringify(record)}\n`);
    },
  });

  console.error(
    `Users: ${rows.length} | processed: ${summary.processed} | failed: ${summary.failed} | ` +
      `emails: ${summary.records.length}${summary.stopped ? ' | stopped early' : ''}`
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ResourceExhaustedError || error instanceof ValidationError) {
      logger.fatal({ error: error.message }, 'Run failed');
    } else {
      captureError(error, { component: 'cli' });
    }
    process.exitCode = 1;
  });
