import type { CacheValidation } from '@codetable/epub-navigator';

import type { ExtractCommandOptions } from './commands/extract';
import type { ToCsvCommandOptions } from './commands/to-csv';

import { DEFAULT_CHUNK_SIZE } from '@codetable/code-extractor';
import { Command, InvalidArgumentError, Option } from 'commander';

import { DEFAULT_CSV_OUTPUT } from './commands/to-csv';

export interface ProgramHandlers {
  extract: (options: ExtractCommandOptions) => Promise<void>;
  toCsv: (inputs: string[], options: ToCsvCommandOptions) => Promise<void>;
}

function parseInteger(minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!/^-?\d+$/.test(value.trim()) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected an integer >= ${minimum}.`);
    }
    return parsed;
  };
}

const CACHE_VALIDATIONS: CacheValidation[] = ['presence', 'fingerprint'];

/**
 * Build the `codetable` command line
 */
export function createProgram(handlers: ProgramHandlers): Command {
  const program = new Command();

  program
    .name('codetable')
    .description('Extract procedure code tables from paginated EPUB books')
    .version('0.1.0');

  program
    .command('extract')
    .description('Extract code records from a page range of an EPUB')
    .requiredOption('--epub <path>', 'Path to the input EPUB file')
    .requiredOption('--start <page>', 'Start page number', parseInteger(1))
    .requiredOption('--end <page>', 'End page number', parseInteger(1))
    .option(
      '--output-dir <dir>',
      'Directory for JSONL artifacts (default: CODETABLE_OUTPUT_DIR or cpt_output)',
    )
    .option(
      '--model <id>',
      'Model id as provider/model (default: CODETABLE_MODEL)',
    )
    .option('--fallback-model <id>', 'Model tried once when the primary fails')
    .option(
      '--chunk-size <pages>',
      'Pages per chunk',
      parseInteger(1),
      DEFAULT_CHUNK_SIZE,
    )
    .option('--by-chapter', 'Chunk by chapter boundaries', false)
    .option('--no-hierarchy', 'Do not send hierarchy context')
    .option(
      '--strict-hierarchy',
      'Only use headings before the page marker in its own file',
      false,
    )
    .option('--stream', 'Stream responses and show progress', false)
    .option('--simple-schema', 'Ask only for code and description', false)
    .option('--skip-combined-output', 'Do not write the combined file', false)
    .option('--max-chars <count>', 'Source text limit per chunk', parseInteger(1))
    .option('--prefix <name>', 'Artifact file name prefix')
    .addOption(
      new Option('--cache-validation <mode>', 'Page index cache validation')
        .choices(CACHE_VALIDATIONS)
        .default('presence'),
    )
    .option(
      '--max-retries <count>',
      'Retries per model call',
      parseInteger(0),
      0,
    )
    .action(async (options: ExtractCommandOptions) => {
      await handlers.extract(options);
    });

  program
    .command('to-csv')
    .description('Flatten JSONL/JSON artifacts into one CSV file')
    .argument('<inputs...>', 'Files or directories to read')
    .option('-o, --output <file>', 'Output CSV path', DEFAULT_CSV_OUTPUT)
    .action(async (inputs: string[], options: ToCsvCommandOptions) => {
      await handlers.toCsv(inputs, options);
    });

  return program;
}
