import type { CsvExportResult } from '@codetable/code-extractor';
import type { LoggerMethods } from '@codetable/logger';

import { CsvExporter } from '@codetable/code-extractor';

export const DEFAULT_CSV_OUTPUT = 'cpt_codes.csv';

export interface ToCsvCommandOptions {
  output: string;
}

/**
 * Flatten JSONL/JSON artifacts into one CSV file
 */
export function runToCsv(
  inputs: readonly string[],
  options: ToCsvCommandOptions,
  logger: LoggerMethods,
): Promise<CsvExportResult> {
  return new CsvExporter(logger).export(inputs, options.output);
}
