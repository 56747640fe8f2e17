import {
  type LanguageModel,
  type LanguageModelUsage,
  generateText,
  streamText,
} from 'ai';

/**
 * Configuration for a free-text LLM call with fallback support
 */
export interface LLMTextCallConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Retry count handed to the AI SDK for each model
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Consume the response incrementally via streamText (default: false)
   */
  stream?: boolean;

  /**
   * Called for every text fragment while streaming
   */
  onTextDelta?: (text: string) => void;

  /**
   * Called for every reasoning ("thinking") fragment while streaming.
   * Reasoning is never part of the returned text.
   */
  onReasoningDelta?: (text: string) => void;

  /**
   * Component name for tracking (e.g., 'CodeTableExtractor')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'pages-64-65')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMTextCallResult {
  text: string;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GenerationResponse {
  text: string;
  usage?: LanguageModelUsage;
}

interface GenerationParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

/**
 * LLMCaller - Centralized LLM API caller for free-text generation
 *
 * Wraps AI SDK's generateText/streamText:
 * 1. Try primary model
 * 2. If it fails and fallbackModel provided, try fallback once
 * 3. Return text with usage data and model type indicator
 *
 * Streaming responses are drained to completion before returning.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.callText({
 *   systemPrompt: 'You extract procedure codes',
 *   userPrompt: 'Extract the codes from this text: ...',
 *   primaryModel: google('gemini-2.5-pro'),
 *   maxRetries: 0,
 *   stream: true,
 *   onTextDelta: () => process.stderr.write('.'),
 *   component: 'CodeTableExtractor',
 *   phase: 'pages-64-65',
 * });
 *
 * console.log(result.text);          // Raw model output
 * console.log(result.usage);         // Token usage with model info
 * console.log(result.usedFallback);  // Whether fallback was used
 * ```
 */
export class LLMCaller {
  /**
   * Extract model name from LanguageModel object
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Build usage information from response
   */
  private static buildUsage(
    config: LLMTextCallConfig,
    modelName: string,
    response: GenerationResponse,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    const inputTokens = response.usage?.inputTokens ?? 0;
    const outputTokens = response.usage?.outputTokens ?? 0;

    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens,
      outputTokens,
      totalTokens: response.usage?.totalTokens ?? inputTokens + outputTokens,
    };
  }

  /**
   * One-shot generation
   */
  private static async generateOnce(
    model: LanguageModel,
    params: GenerationParams,
  ): Promise<GenerationResponse> {
    const response = await generateText({ model, ...params });
    return { text: response.text, usage: response.usage };
  }

  /**
   * Streamed generation, drained to completion
   *
   * Text and reasoning fragments are reported as they arrive; an error part
   * in the stream is re-thrown so the caller sees a failed call.
   */
  private static async generateStreamed(
    model: LanguageModel,
    params: GenerationParams,
    config: LLMTextCallConfig,
  ): Promise<GenerationResponse> {
    const result = streamText({ model, ...params });

    let text = '';
    let usage: LanguageModelUsage | undefined;

    for await (const part of result.fullStream) {
      switch (part.type) {
        case 'text-delta':
          text += part.text;
          config.onTextDelta?.(part.text);
          break;
        case 'reasoning-delta':
          config.onReasoningDelta?.(part.text);
          break;
        case 'finish':
          usage = part.totalUsage;
          break;
        case 'error':
          throw part.error instanceof Error
            ? part.error
            : new Error(String(part.error));
      }
    }

    return { text, usage };
  }

  /**
   * Execute LLM call with fallback support
   */
  private static async executeWithFallback(
    config: LLMTextCallConfig,
    generateFn: (model: LanguageModel) => Promise<GenerationResponse>,
  ): Promise<LLMTextCallResult> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await generateFn(config.primaryModel);

      return {
        text: response.text,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await generateFn(config.fallbackModel);

      return {
        text: response.text,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }

  /**
   * Call LLM for free-text output
   *
   * @param config - LLM call configuration
   * @returns Generated text with usage information
   * @throws Error if the primary (and fallback, when configured) call fails
   */
  static async callText(config: LLMTextCallConfig): Promise<LLMTextCallResult> {
    const params: GenerationParams = {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };

    return this.executeWithFallback(config, (model) =>
      config.stream
        ? this.generateStreamed(model, params, config)
        : this.generateOnce(model, params),
    );
  }
}
