import type { LoggerMethods } from '@codetable/logger';
import type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@codetable/model';

import type { ExtendedTokenUsage } from './llm-caller';

import { calculateCost } from './model-pricing';

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total ($0.004875)"
 */
function formatTokens(usage: TokenUsageSummary): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total ($${usage.estimatedCost.toFixed(6)})`;
}

function emptySummary(): TokenUsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, estimatedCost: 0 };
}

function addTo(target: TokenUsageSummary, source: TokenUsageSummary): void {
  target.inputTokens += source.inputTokens;
  target.outputTokens += source.outputTokens;
  target.totalTokens += source.totalTokens;
  target.estimatedCost += source.estimatedCost;
}

/**
 * Convert one call's usage into a priced model detail
 *
 * Cost is computed per call so the long-context tier follows each prompt.
 */
export function toModelUsageDetail(usage: ExtendedTokenUsage): ModelUsageDetail {
  return {
    modelName: usage.modelName,
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    totalTokens: usage.totalTokens,
    estimatedCost: calculateCost(
      usage.modelName,
      usage.inputTokens,
      usage.outputTokens,
    ),
  };
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls of a run
 *
 * Tracks usage by:
 * - Component (CodeTableExtractor, ...)
 * - Phase (one per chunk, e.g. 'pages-64-65')
 * - Model (primary vs fallback)
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'CodeTableExtractor',
 *   phase: 'pages-64-65',
 *   model: 'primary',
 *   modelName: 'gemini-2.5-pro',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger);
 * // [CodeTablePipeline] Token usage summary:
 * // CodeTableExtractor:
 * //   - pages-64-65:
 * //       primary (gemini-2.5-pro): 1500 input, 300 output, 1800 total ($0.004875)
 * // ...
 * ```
 */
export class LLMTokenUsageAggregator {
  private components = new Map<string, ComponentUsageReport>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.components.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: [],
        total: emptySummary(),
      };
      this.components.set(usage.component, component);
    }

    let phase = component.phases.find((p) => p.phase === usage.phase);
    if (!phase) {
      phase = { phase: usage.phase, total: emptySummary() };
      component.phases.push(phase);
    }

    const detail = toModelUsageDetail(usage);
    const slot: 'primary' | 'fallback' = usage.model;
    const existing = phase[slot];
    if (existing) {
      addTo(existing, detail);
    } else {
      phase[slot] = detail;
    }

    addTo(phase.total, detail);
    addTo(component.total, detail);
  }

  /**
   * Get token usage report
   *
   * Returns a deep copy, so later tracking does not mutate earlier reports.
   */
  getReport(): TokenUsageReport {
    const copyPhase = (phase: PhaseUsageReport): PhaseUsageReport => ({
      phase: phase.phase,
      ...(phase.primary && { primary: { ...phase.primary } }),
      ...(phase.fallback && { fallback: { ...phase.fallback } }),
      total: { ...phase.total },
    });

    const components = [...this.components.values()].map((component) => ({
      component: component.component,
      phases: component.phases.map(copyPhase),
      total: { ...component.total },
    }));

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsageSummary {
    const total = emptySummary();
    for (const component of this.components.values()) {
      addTo(total, component.total);
    }
    return total;
  }

  /**
   * Log token usage summary grouped by component and phase
   *
   * @param logger - Logger instance for output
   * @param label - Prefix for the header lines
   */
  logSummary(logger: LoggerMethods, label = 'CodeTablePipeline'): void {
    if (this.components.size === 0) {
      logger.info(`[${label}] No token usage to report`);
      return;
    }

    logger.info(`[${label}] Token usage summary:`);

    for (const component of this.components.values()) {
      logger.info(`${component.component}:`);

      for (const phase of component.phases) {
        logger.info(`  - ${phase.phase}:`);
        if (phase.primary) {
          logger.info(
            `      primary (${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
        }
        if (phase.fallback) {
          logger.info(
            `      fallback (${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
        }
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   *
   * Call this at the start of a new extraction run.
   */
  reset(): void {
    this.components.clear();
  }
}
