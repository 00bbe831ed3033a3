/**
 * Extractor Registry
 *
 * Registry pattern for strategy extractors, keyed by strategy id.
 */

import type { StrategyId } from '../types';
import type { DocumentExtractor } from './types';
import { logger } from '../logger';

/**
 * Map of strategy ids to their extractors
 */
const extractorRegistry = new Map<StrategyId, DocumentExtractor>();

/**
 * Register an extractor for its strategy.
 * Overwrites any existing extractor for that strategy.
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  extractorRegistry.set(extractor.strategyId, extractor);

  logger.debug('Registered extractor', {
    strategy: extractor.strategyId,
    kind: extractor.kind,
    description: extractor.description,
  });
}

/**
 * Get the extractor for a strategy, or undefined if not registered.
 */
export function getExtractor(strategyId: StrategyId): DocumentExtractor | undefined {
  return extractorRegistry.get(strategyId);
}

/**
 * Get the extractor for a strategy, throwing if not found.
 *
 * @throws Error if no extractor is registered for that strategy
 */
export function getExtractorOrThrow(strategyId: StrategyId): DocumentExtractor {
  const extractor = extractorRegistry.get(strategyId);
  if (!extractor) {
    throw new Error(`No extractor registered for strategy: ${strategyId}`);
  }
  return extractor;
}

/**
 * Get all registered strategy ids.
 */
export function getRegisteredStrategies(): StrategyId[] {
  return Array.from(extractorRegistry.keys());
}
