import type { CacheValidation } from '@codetable/epub-navigator';
import type { LoggerMethods } from '@codetable/logger';
import type { ExtractionRunResult } from '@codetable/model';
import type { LanguageModel } from 'ai';

import type { CliConfig } from '../config';

import { CodeTablePipeline } from '@codetable/code-extractor';
import { EpubNavigator } from '@codetable/epub-navigator';
import { createModel } from '@codetable/shared';
import { mkdir } from 'node:fs/promises';

import { ConfigError } from '../errors';

const DIM = '\x1b[90m';
const RESET = '\x1b[0m';

/**
 * Flags of `codetable extract`
 */
export interface ExtractCommandOptions {
  epub: string;
  start: number;
  end: number;
  outputDir?: string;
  model?: string;
  fallbackModel?: string;
  chunkSize: number;
  byChapter: boolean;
  hierarchy: boolean;
  strictHierarchy: boolean;
  stream: boolean;
  simpleSchema: boolean;
  skipCombinedOutput: boolean;
  maxChars?: number;
  prefix?: string;
  cacheValidation: CacheValidation;
  maxRetries: number;
}

export interface ExtractContext {
  config: CliConfig;
  logger: LoggerMethods;

  /**
   * Receives streaming progress (dots and reasoning text)
   */
  progress: Pick<NodeJS.WritableStream, 'write'>;

  abortSignal?: AbortSignal;
}

function resolveModel(modelId: string, config: CliConfig): LanguageModel {
  try {
    return createModel(modelId, config.credentials);
  } catch (error) {
    throw ConfigError.fromError(`Cannot use model "${modelId}"`, error);
  }
}

/**
 * Run the extraction pipeline over a page range of an EPUB
 *
 * @throws ConfigError when a model cannot be created
 * @throws ArchiveOpenError when the EPUB cannot be opened
 * @throws ChunkPlanError when the page range or chunk size is invalid
 */
export async function runExtract(
  options: ExtractCommandOptions,
  context: ExtractContext,
): Promise<ExtractionRunResult> {
  const { config, logger, progress } = context;
  const model = resolveModel(options.model ?? config.modelId, config);
  const fallbackModel = options.fallbackModel
    ? resolveModel(options.fallbackModel, config)
    : undefined;

  const outputDir = options.outputDir ?? config.outputDir;
  await mkdir(outputDir, { recursive: true });

  const navigator = await EpubNavigator.open(options.epub, {
    logger,
    cacheValidation: options.cacheValidation,
    hierarchyStrictness: options.strictHierarchy ? 'anchor' : 'file',
  });

  try {
    const pipeline = new CodeTablePipeline({
      logger,
      model,
      fallbackModel,
      maxRetries: options.maxRetries,
      outputDir,
      outputPrefix: options.prefix,
      chunkingMode: options.byChapter ? 'chapter' : 'fixed',
      chunkSize: options.chunkSize,
      useHierarchy: options.hierarchy,
      simpleSchema: options.simpleSchema,
      maxInputChars: options.maxChars,
      stream: options.stream,
      onTextDelta: options.stream ? () => progress.write('.') : undefined,
      onReasoningDelta: options.stream
        ? (text) => progress.write(`${DIM}${text}${RESET}`)
        : undefined,
      onChunkComplete: options.stream ? () => progress.write('\n') : undefined,
      skipCombinedOutput: options.skipCombinedOutput,
      abortSignal: context.abortSignal,
    });

    const result = await pipeline.run(navigator, options.start, options.end);

    const failed = result.chunks.filter(
      (chunk) => chunk.status === 'parse-failed',
    ).length;
    logger.info(
      `[codetable] ${result.records.length} records from ${result.chunks.length} chunk(s), ${failed} failed${result.aborted ? ' (aborted)' : ''}`,
    );
    if (result.combinedOutputPath) {
      logger.info(`[codetable] Combined output: ${result.combinedOutputPath}`);
    }

    return result;
  } finally {
    navigator.close();
  }
}
