import type { CodeRecord } from './code-record';
import type { HierarchyContext } from './hierarchy-context';
import type {
  ModelUsageDetail,
  TokenUsageReport,
} from './token-usage-report';

/**
 * Contiguous page range processed as one unit of extraction work
 */
export interface ExtractionChunk {
  startPage: number;
  endPage: number;
}

/**
 * How chunks are cut from the requested page range
 *
 * - `fixed`: consecutive ranges of `chunkSize` pages
 * - `chapter`: one chunk per spine file overlapping the range
 */
export type ChunkingMode = 'fixed' | 'chapter';

/**
 * Which parse strategy produced the records of a chunk
 *
 * - `lines`: one JSON object per line
 * - `document`: the whole response parsed as a single JSON value
 */
export type ParseStrategy = 'lines' | 'document';

/**
 * Result of processing one chunk
 */
export interface ChunkOutcome {
  chunk: ExtractionChunk;

  /**
   * `parse-failed` covers both unparseable output and failed generation calls
   */
  status: 'parsed' | 'parse-failed';

  recordCount: number;

  /**
   * Parse strategy that produced the records (absent on failure)
   */
  strategy?: ParseStrategy;

  /**
   * Non-empty lines that failed to parse during line-by-line parsing
   */
  skippedLines: number;

  /**
   * Whether the source text was cut to fit the input budget
   */
  truncated: boolean;

  /**
   * Hierarchy context sent with the request
   */
  hierarchy: HierarchyContext;

  /**
   * Chunk artifact on success, debug artifact on failure
   */
  artifactPath: string;

  durationMs: number;

  /**
   * Usage of the generation call (absent when the call failed)
   */
  usage?: ModelUsageDetail;

  /**
   * Estimated USD cost of the chunk (0 when the call failed or the model is unpriced)
   */
  estimatedCost: number;
}

/**
 * Result of a complete extraction run
 */
export interface ExtractionRunResult {
  /**
   * All successfully parsed records, in chunk order
   */
  records: CodeRecord[];

  chunks: ChunkOutcome[];

  tokenUsage: TokenUsageReport;

  /**
   * True when the run stopped early because its abort signal fired
   */
  aborted: boolean;

  /**
   * Combined artifact path (absent when skipped)
   */
  combinedOutputPath?: string;
}
