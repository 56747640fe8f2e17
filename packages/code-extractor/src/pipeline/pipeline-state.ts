import type { CodeRecord, HierarchyContext } from '@codetable/model';

/**
 * State carried from one chunk to the next during an extraction run
 *
 * Created fresh per run. Observers receive the live object through
 * `onChunkComplete` and may inspect it between chunks.
 */
export interface PipelineState {
  /**
   * Hierarchy context resolved for the most recent chunk
   */
  hierarchy: HierarchyContext;

  /**
   * Last record of the most recent chunk that produced records
   */
  lastRecord?: CodeRecord;
}

export function createPipelineState(
  initial?: Partial<PipelineState>,
): PipelineState {
  return {
    hierarchy: { ...initial?.hierarchy },
    lastRecord: initial?.lastRecord,
  };
}
