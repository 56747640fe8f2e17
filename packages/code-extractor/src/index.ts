export { ChunkPlanError } from './errors';
export {
  CsvExporter,
  escapeCsvField,
  toCsvRow,
  type CsvExportResult,
} from './exporters';
export {
  CodeTableExtractor,
  DEFAULT_CODE_TYPE,
  DEFAULT_CODE_VERSION,
  DEFAULT_EXTRACTION_TEMPERATURE,
  DEFAULT_MAX_INPUT_CHARS,
  type ChunkGeneration,
  type CodeTableExtractorOptions,
  type ExtractionPromptInput,
} from './extractors';
export {
  CodeRecordParser,
  cleanResponseText,
  type ParseOutcome,
} from './parsers';
export {
  ArtifactWriter,
  CodeTablePipeline,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_OUTPUT_PREFIX,
  createPipelineState,
  toJsonLines,
  type CodeTablePipelineOptions,
  type PipelineState,
} from './pipeline';
export {
  planChapterChunks,
  planChunks,
  planFixedChunks,
  type ChunkPlanRequest,
} from './planning';
