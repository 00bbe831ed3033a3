/**
 * Extraction Template Types
 *
 * Prompt templates for model-driven extraction strategies.
 */

import type { StrategyId } from '../types';

/**
 * Extraction template for a model-driven strategy.
 */
export interface ExtractionTemplate {
  /** The strategy this template drives */
  strategyId: StrategyId;

  /** System prompt with the extraction rules and output shape */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{source_filename}}: The original filename
   * - {{page_count}}: Number of page images attached
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}

/**
 * Fill `{{name}}` placeholders; unknown placeholders are left as-is.
 */
export function renderPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (whole, name: string) =>
    name in values ? String(values[name]) : whole
  );
}
