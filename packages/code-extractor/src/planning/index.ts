export {
  planChapterChunks,
  planChunks,
  planFixedChunks,
  type ChunkPlanRequest,
} from './chunk-planner';
