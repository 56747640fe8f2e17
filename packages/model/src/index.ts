export { CODE_RECORD_COLUMNS } from './code-record';
export type {
  CodeRecord,
  CodeRecordColumn,
  CodeRecordFields,
} from './code-record';
export type {
  ChapterBoundary,
  Manifest,
  PageIndex,
  PageLocation,
  SpineEntry,
} from './epub-document';
export type {
  ChunkOutcome,
  ChunkingMode,
  ExtractionChunk,
  ExtractionRunResult,
  ParseStrategy,
} from './extraction-result';
export { HIERARCHY_LEVELS } from './hierarchy-context';
export type { HierarchyContext, HierarchyLevel } from './hierarchy-context';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
