export { ArtifactWriter, toJsonLines } from './artifact-writer';
export {
  CodeTablePipeline,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_OUTPUT_PREFIX,
  type CodeTablePipelineOptions,
} from './code-table-pipeline';
export { createPipelineState, type PipelineState } from './pipeline-state';
