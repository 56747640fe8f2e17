export {
  CodeTableExtractor,
  DEFAULT_CODE_TYPE,
  DEFAULT_CODE_VERSION,
  DEFAULT_EXTRACTION_TEMPERATURE,
  DEFAULT_MAX_INPUT_CHARS,
  type ChunkGeneration,
  type CodeTableExtractorOptions,
  type ExtractionPromptInput,
} from './code-table-extractor';
