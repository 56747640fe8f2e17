export { ChunkPlanError } from './chunk-plan-error';
