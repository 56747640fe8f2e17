export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMTextCallConfig,
  type LLMTextCallResult,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  toModelUsageDetail,
} from './utils/llm-token-usage-aggregator';
export {
  MODEL_PROVIDERS,
  createModel,
  parseModelId,
  type ModelProvider,
  type ProviderCredentials,
} from './utils/model-factory';
export {
  LONG_CONTEXT_THRESHOLD,
  MODEL_PRICING,
  calculateCost,
  findModelPricing,
  type ModelPricing,
  type PriceTier,
} from './utils/model-pricing';
