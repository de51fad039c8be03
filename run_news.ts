#!/usr/bin/env node
/**
 * Command-line entry for one pipeline run.
 *
 *   npm run news -- --type daily --count 6
 *   npm run news -- --type weekly --format both --feed api
 *   npm run news -- --type breaking --min-sources 5
 *
 * Exits 0 when the run finished (including "no breaking news"), 1 on a
 * fatal pipeline error and 2 on bad flags.
 */
import 'dotenv/config';
import { CliUsageError, USAGE, parseCliArgs } from './backend/cli';
import type { CliCommand } from './backend/cli';
import { closeDb } from './backend/db';
import { logger } from './backend/logger';
import { runNewsPipeline } from './backend/pipeline/index';

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    // eslint-disable-next-line no-console
    console.error(`${err.message}\n\n${USAGE}`);
    return 2;
  }
  if (command.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }

  const result = await runNewsPipeline(command.options);
  if (result.status === 'no_breaking_news') {
    logger.info('No breaking news this cycle');
  }
  for (const output of result.outputs) {
    logger.info(`Video: ${output.video}`, { title: output.title });
    if (output.thumbnail) logger.info(`Thumbnail: ${output.thumbnail}`);
  }
  if (result.summaryPath) logger.info(`Summary: ${result.summaryPath}`);
  return 0;
}

main()
  .catch((err: unknown) => {
    logger.error('Pipeline failed', err);
    return 1;
  })
  .then(async (code) => {
    await closeDb();
    process.exit(code);
  })
  .catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
