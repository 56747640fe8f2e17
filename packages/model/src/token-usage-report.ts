/**
 * Token usage report types for code table extraction
 *
 * Breaks LLM token consumption down by component, phase and model type
 * (primary vs fallback), with an estimated USD cost at every level.
 */

/**
 * Token usage report for one extraction run
 */
export interface TokenUsageReport {
  /**
   * Breakdown by component, in the order components first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific component
 *
 * Examples: 'CodeTableExtractor'
 */
export interface ComponentUsageReport {
  component: string;

  /**
   * Breakdown by phase within this component
   *
   * The extractor reports one phase per chunk (e.g. 'pages-64-65').
   */
  phases: PhaseUsageReport[];

  total: TokenUsageSummary;
}

/**
 * Token usage for a specific phase
 *
 * A phase may carry both primary and fallback usage when the primary model
 * failed and a fallback model was configured.
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Usage by primary model (if it succeeded)
   */
  primary?: ModelUsageDetail;

  /**
   * Usage by fallback model (if it was used)
   */
  fallback?: ModelUsageDetail;

  total: TokenUsageSummary;
}

/**
 * Detailed usage for a specific model
 */
export interface ModelUsageDetail extends TokenUsageSummary {
  /**
   * Model identifier, e.g. 'gemini-2.5-pro'
   */
  modelName: string;
}

/**
 * Summary of token usage
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;

  /**
   * Estimated cost in USD; 0 when the model has no pricing entry
   */
  estimatedCost: number;
}
