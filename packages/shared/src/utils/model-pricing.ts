/**
 * Price per 1 million tokens, in USD
 *
 * `long` applies when the prompt exceeds LONG_CONTEXT_THRESHOLD tokens.
 */
export interface PriceTier {
  standard: number;
  long: number;
}

export interface ModelPricing {
  input: PriceTier;
  output: PriceTier;
}

/**
 * Prompt size (in tokens) above which long-context prices apply
 */
export const LONG_CONTEXT_THRESHOLD = 200_000;

const flat = (price: number): PriceTier => ({ standard: price, long: price });

/**
 * Model pricing configuration for cost calculation
 *
 * Models not in this list will default to $0.
 */
export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Google
  'gemini-3-pro-preview': {
    input: { standard: 2, long: 4 },
    output: { standard: 12, long: 18 },
  },
  'gemini-3-flash-preview': { input: flat(0.5), output: flat(3) },
  'gemini-2.5-pro': {
    input: { standard: 1.25, long: 2.5 },
    output: { standard: 10, long: 15 },
  },
  'gemini-2.5-flash': { input: flat(0.3), output: flat(2.5) },
  // OpenAI
  'gpt-5.2': { input: flat(1.75), output: flat(14) },
  'gpt-5.1': { input: flat(1.25), output: flat(10) },
  'gpt-5-mini': { input: flat(0.25), output: flat(2) },
  // Anthropic
  'claude-opus-4-5': { input: flat(5), output: flat(25) },
  'claude-sonnet-4-5': {
    input: { standard: 3, long: 6 },
    output: { standard: 15, long: 22.5 },
  },
  'claude-haiku-4-5': { input: flat(1), output: flat(5) },
};

/**
 * Find pricing for a model
 *
 * Exact match first; otherwise the longest table key contained in the
 * model name, so versioned ids like "gemini-2.5-pro-001" still resolve.
 */
export function findModelPricing(modelName: string): ModelPricing | undefined {
  const exact = MODEL_PRICING[modelName];
  if (exact) return exact;

  const candidates = Object.keys(MODEL_PRICING)
    .filter((key) => modelName.includes(key))
    .sort((a, b) => b.length - a.length);

  return candidates.length > 0 ? MODEL_PRICING[candidates[0]] : undefined;
}

/**
 * Calculate cost for a model's token usage
 *
 * @param modelName - The model identifier
 * @param inputTokens - Number of prompt tokens
 * @param outputTokens - Number of generated tokens
 * @returns Cost in USD (0 if model not in pricing table)
 */
export function calculateCost(
  modelName: string,
  inputTokens: number,
  outputTokens: number,
): number {
  const pricing = findModelPricing(modelName);
  if (!pricing) return 0;

  const tier: keyof PriceTier =
    inputTokens > LONG_CONTEXT_THRESHOLD ? 'long' : 'standard';

  return (
    (inputTokens / 1_000_000) * pricing.input[tier] +
    (outputTokens / 1_000_000) * pricing.output[tier]
  );
}
