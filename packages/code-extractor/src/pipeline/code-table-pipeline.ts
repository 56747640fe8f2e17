import type { DocumentNavigator } from '@codetable/epub-navigator';
import type { LoggerMethods } from '@codetable/logger';
import type {
  ChunkOutcome,
  ChunkingMode,
  CodeRecord,
  ExtractionChunk,
  ExtractionRunResult,
  TokenUsageReport,
} from '@codetable/model';
import type { LanguageModel } from 'ai';

import type { PipelineState } from './pipeline-state';

import { LLMTokenUsageAggregator, toModelUsageDetail } from '@codetable/shared';

import { CodeTableExtractor } from '../extractors/code-table-extractor';
import { CodeRecordParser } from '../parsers/code-record-parser';
import { planChunks } from '../planning/chunk-planner';
import { ArtifactWriter } from './artifact-writer';
import { createPipelineState } from './pipeline-state';

export const DEFAULT_CHUNK_SIZE = 5;
export const DEFAULT_OUTPUT_PREFIX = 'cpt';

/**
 * Options for CodeTablePipeline
 */
export interface CodeTablePipelineOptions {
  logger: LoggerMethods;

  /**
   * Model used for every chunk
   */
  model: LanguageModel;

  /**
   * Model tried once when the primary model fails
   */
  fallbackModel?: LanguageModel;

  /**
   * Retry count handed to the AI SDK (default: 0)
   */
  maxRetries?: number;

  /**
   * Generation temperature (default: 0.1)
   */
  temperature?: number;

  /**
   * Directory receiving chunk, debug and combined artifacts
   */
  outputDir: string;

  /**
   * Artifact file name prefix (default: 'cpt')
   */
  outputPrefix?: string;

  /**
   * @default 'fixed'
   */
  chunkingMode?: ChunkingMode;

  /**
   * Pages per chunk in fixed mode (default: 5)
   */
  chunkSize?: number;

  /**
   * Send the hierarchy context of each chunk's start page (default: true)
   */
  useHierarchy?: boolean;

  /**
   * Ask only for code and description; skips tag stamping (default: false)
   */
  simpleSchema?: boolean;

  /**
   * @default 'CPT'
   */
  codeType?: string;

  /**
   * @default 'CPT 2024'
   */
  codeVersion?: string;

  /**
   * Source text limit per chunk (default: 350000)
   */
  maxInputChars?: number;

  /**
   * Stream generation responses (default: false)
   */
  stream?: boolean;

  onTextDelta?: (text: string) => void;

  onReasoningDelta?: (text: string) => void;

  /**
   * Do not write the combined artifact (default: false)
   */
  skipCombinedOutput?: boolean;

  /**
   * File name of the combined artifact, replacing `<prefix>_all_<first>_<last>.jsonl`
   */
  combinedFileName?: string;

  /**
   * Abort signal for cancellation support.
   * Checked before each chunk and passed to the generation call.
   */
  abortSignal?: AbortSignal;

  /**
   * Callback fired after each chunk with its outcome and the carried state
   */
  onChunkComplete?: (outcome: ChunkOutcome, state: PipelineState) => void;

  /**
   * Callback fired after each chunk with the cumulative token usage report
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

/**
 * CodeTablePipeline
 *
 * Extracts a code table from a page range, one chunk at a time.
 *
 * ## Per chunk
 *
 * 1. Fetch the chunk's text and the hierarchy context of its start page
 * 2. Ask the LLM for one JSON record per line, passing the last record of
 *    the previous chunk so split parent/child codes can be stitched
 * 3. Parse the response; on success save the chunk artifact and carry the
 *    last record forward, otherwise save the raw response and move on
 *
 * Chunks run strictly in order. An abort stops before the next chunk, or
 * cancels the running call, whose chunk is then left out. After the loop
 * (or an abort) all parsed records are saved to the combined artifact.
 *
 * @example
 * ```typescript
 * const pipeline = new CodeTablePipeline({
 *   logger,
 *   model: createModel('google/gemini-2.5-pro', credentials),
 *   outputDir: 'cpt_output',
 * });
 * const navigator = await EpubNavigator.open('codes.epub', { logger });
 * const result = await pipeline.run(navigator, 64, 80);
 * navigator.close();
 * ```
 */
export class CodeTablePipeline {
  private readonly logger: LoggerMethods;
  private readonly chunkingMode: ChunkingMode;
  private readonly chunkSize: number;
  private readonly useHierarchy: boolean;
  private readonly skipCombinedOutput: boolean;
  private readonly combinedFileName?: string;
  private readonly abortSignal?: AbortSignal;
  private readonly onChunkComplete?: (
    outcome: ChunkOutcome,
    state: PipelineState,
  ) => void;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;
  private readonly usageAggregator = new LLMTokenUsageAggregator();
  private readonly extractor: CodeTableExtractor;
  private readonly parser: CodeRecordParser;
  private readonly artifactWriter: ArtifactWriter;

  constructor(options: CodeTablePipelineOptions) {
    this.logger = options.logger;
    this.chunkingMode = options.chunkingMode ?? 'fixed';
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.useHierarchy = options.useHierarchy ?? true;
    this.skipCombinedOutput = options.skipCombinedOutput ?? false;
    this.combinedFileName = options.combinedFileName;
    this.abortSignal = options.abortSignal;
    this.onChunkComplete = options.onChunkComplete;
    this.onTokenUsage = options.onTokenUsage;

    this.extractor = new CodeTableExtractor({
      logger: options.logger,
      model: options.model,
      fallbackModel: options.fallbackModel,
      usageAggregator: this.usageAggregator,
      maxRetries: options.maxRetries,
      temperature: options.temperature,
      abortSignal: options.abortSignal,
      simpleSchema: options.simpleSchema,
      codeType: options.codeType,
      codeVersion: options.codeVersion,
      maxInputChars: options.maxInputChars,
      stream: options.stream,
      onTextDelta: options.onTextDelta,
      onReasoningDelta: options.onReasoningDelta,
    });
    this.parser = new CodeRecordParser(options.logger);
    this.artifactWriter = new ArtifactWriter(
      options.logger,
      options.outputDir,
      options.outputPrefix ?? DEFAULT_OUTPUT_PREFIX,
    );
  }

  /**
   * Extract records from `startPage` through `endPage`
   *
   * @param initialState - Carried state to resume from (e.g. a previous run's last record)
   * @throws ChunkPlanError when the range or chunk size is invalid
   */
  async run(
    navigator: DocumentNavigator,
    startPage: number,
    endPage: number,
    initialState?: Partial<PipelineState>,
  ): Promise<ExtractionRunResult> {
    this.usageAggregator.reset();

    const chunks = planChunks(
      this.chunkingMode === 'chapter'
        ? {
            mode: 'chapter',
            startPage,
            endPage,
            boundaries: navigator.getChapterBoundaries(),
          }
        : { mode: 'fixed', startPage, endPage, chunkSize: this.chunkSize },
    );
    this.logger.info(
      `[CodeTablePipeline] Planned ${chunks.length} ${this.chunkingMode} chunk(s) for pages ${startPage}-${endPage}`,
    );

    const state = createPipelineState(initialState);
    const records: CodeRecord[] = [];
    const outcomes: ChunkOutcome[] = [];
    let aborted = false;

    for (const [index, chunk] of chunks.entries()) {
      if (this.abortSignal?.aborted) {
        this.logger.warn(
          `[CodeTablePipeline] Aborted before pages ${chunk.startPage}-${chunk.endPage} (${outcomes.length}/${chunks.length} chunks done)`,
        );
        aborted = true;
        break;
      }

      this.logger.info(
        `[CodeTablePipeline] Processing chunk ${index + 1}/${chunks.length}: pages ${chunk.startPage}-${chunk.endPage}`,
      );
      const outcome = await this.processChunk(navigator, chunk, state, records);
      if (!outcome) {
        this.logger.warn(
          `[CodeTablePipeline] Aborted during pages ${chunk.startPage}-${chunk.endPage} (${outcomes.length}/${chunks.length} chunks done)`,
        );
        aborted = true;
        this.emitTokenUsage();
        break;
      }
      outcomes.push(outcome);

      this.onChunkComplete?.(outcome, state);
      this.emitTokenUsage();
    }

    let combinedOutputPath: string | undefined;
    if (!this.skipCombinedOutput) {
      combinedOutputPath = await this.artifactWriter.writeCombined(
        records,
        this.coveredRange(outcomes, { startPage, endPage }),
        this.combinedFileName,
      );
    }

    this.logger.info(
      `[CodeTablePipeline] Extracted ${records.length} records from ${outcomes.length} chunk(s)`,
    );
    this.usageAggregator.logSummary(this.logger);

    return {
      records,
      chunks: outcomes,
      tokenUsage: this.usageAggregator.getReport(),
      aborted,
      combinedOutputPath,
    };
  }

  /**
   * Run one chunk; undefined when the run was aborted during generation,
   * in which case no artifact is written and no record is added
   */
  private async processChunk(
    navigator: DocumentNavigator,
    chunk: ExtractionChunk,
    state: PipelineState,
    records: CodeRecord[],
  ): Promise<ChunkOutcome | undefined> {
    const startTime = Date.now();
    const pages = `${chunk.startPage}-${chunk.endPage}`;

    const range = await navigator.getText(chunk.startPage, chunk.endPage);
    let text: string;
    if (range.ok) {
      text = range.text;
    } else {
      this.logger.warn(
        `[CodeTablePipeline] ${range.error.message} Sending the error text for pages ${pages}`,
      );
      text = range.error.message;
    }

    state.hierarchy = this.useHierarchy
      ? await navigator.getHierarchyContext(chunk.startPage)
      : {};

    const generation = await this.extractor.extract(chunk, {
      text,
      hierarchy: state.hierarchy,
      previousRecord: state.lastRecord,
    });
    if (generation.aborted) {
      return undefined;
    }

    const parsed = this.parser.parse(generation.text);
    const usage = generation.usage
      ? toModelUsageDetail(generation.usage)
      : undefined;

    let outcome: Omit<ChunkOutcome, 'durationMs'>;
    if (parsed.kind === 'records') {
      const chunkRecords = this.extractor.stampCodeTags(parsed.records);
      records.push(...chunkRecords);
      state.lastRecord = chunkRecords[chunkRecords.length - 1];

      outcome = {
        chunk,
        status: 'parsed',
        recordCount: chunkRecords.length,
        strategy: parsed.strategy,
        skippedLines: parsed.skippedLines,
        truncated: generation.truncated,
        hierarchy: { ...state.hierarchy },
        artifactPath: await this.artifactWriter.writeChunk(chunk, chunkRecords),
        usage,
        estimatedCost: usage?.estimatedCost ?? 0,
      };
      this.logger.info(
        `[CodeTablePipeline] Pages ${pages}: ${chunkRecords.length} records (${parsed.strategy}), last code ${state.lastRecord.code}`,
      );
    } else {
      this.logger.warn(
        `[CodeTablePipeline] Pages ${pages}: no records could be parsed`,
      );
      outcome = {
        chunk,
        status: 'parse-failed',
        recordCount: 0,
        skippedLines: parsed.skippedLines,
        truncated: generation.truncated,
        hierarchy: { ...state.hierarchy },
        artifactPath: await this.artifactWriter.writeRawError(
          chunk,
          parsed.cleanedText,
        ),
        usage,
        estimatedCost: usage?.estimatedCost ?? 0,
      };
    }

    const durationMs = Date.now() - startTime;
    this.logger.info(
      usage
        ? `[CodeTablePipeline] Pages ${pages} took ${durationMs}ms (${usage.totalTokens} tokens, $${usage.estimatedCost.toFixed(6)})`
        : `[CodeTablePipeline] Pages ${pages} took ${durationMs}ms`,
    );

    return { ...outcome, durationMs };
  }

  /**
   * Page range actually processed, or the requested range when nothing ran
   */
  private coveredRange(
    outcomes: readonly ChunkOutcome[],
    requested: ExtractionChunk,
  ): ExtractionChunk {
    if (outcomes.length === 0) {
      return requested;
    }
    return {
      startPage: outcomes[0].chunk.startPage,
      endPage: outcomes[outcomes.length - 1].chunk.endPage,
    };
  }

  /**
   * Emit current token usage report via callback
   */
  private emitTokenUsage(): void {
    this.onTokenUsage?.(this.usageAggregator.getReport());
  }
}
