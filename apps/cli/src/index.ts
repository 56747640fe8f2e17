#!/usr/bin/env node
import 'dotenv/config';

import { createConsoleLogger } from '@codetable/logger';

import { runExtract } from './commands/extract';
import { runToCsv } from './commands/to-csv';
import { loadConfig } from './config';
import { createProgram } from './program';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn(
      '[codetable] Interrupted, cancelling the running chunk and saving what was parsed',
    );
    controller.abort();
  });

  const program = createProgram({
    extract: async (options) => {
      await runExtract(options, {
        config,
        logger,
        progress: process.stderr,
        abortSignal: controller.signal,
      });
    },
    toCsv: async (inputs, options) => {
      await runToCsv(inputs, options, logger);
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(
    `[codetable] ${error instanceof Error ? `${error.name}: ${error.message}` : String(error)}`,
  );
  process.exit(1);
});
