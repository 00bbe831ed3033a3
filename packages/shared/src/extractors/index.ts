/**
 * Document Extractors Module
 *
 * One extractor per strategy, registered by strategy id.
 *
 * Strategies:
 * - 'hirayama', 'french_fnb', 'maruyata': vendor regex over the text layer
 * - 'spreadsheet_known', 'spreadsheet_generic': workbook cell grids
 * - 'vision': rendered pages sent to the vision model
 */

// Core types and interfaces
export type {
  DocumentExtractor,
  DocumentSource,
  ExtractionContext,
  ExtractorKind,
  ExtractorMetadata,
  ExtractorResult,
  ExtractorServices,
  RawExtraction,
} from './types';

// Base classes
export { BaseExtractor, TextPatternExtractor } from './base-extractor';

// Registry
export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  getRegisteredStrategies,
} from './registry';

// Individual extractors
export { HirayamaExtractor, hirayamaExtractor } from './hirayama';
export { FrenchFnbExtractor, frenchFnbExtractor } from './french-fnb';
export { MaruyataExtractor, maruyataExtractor } from './maruyata';
export {
  KnownLayoutSpreadsheetExtractor,
  GenericSpreadsheetExtractor,
  knownLayoutSpreadsheetExtractor,
  genericSpreadsheetExtractor,
} from './spreadsheet';
export { KNOWN_LAYOUTS, findKnownLayout, type KnownLayout } from './spreadsheet/known-layouts';
export { detectColumnRoles, type ColumnMap, type ColumnRole } from './spreadsheet/column-roles';
export { VisionExtractor, visionExtractor, toRawLineItem } from './vision';
export {
  OpenAIVisionClient,
  type VisionModelClient,
  type VisionRequest,
  type VisionResponse,
} from './vision/client';
export {
  repairVisionResponse,
  parseDirect,
  parseByObjectScan,
  parseByBracketClosure,
  stripCodeFence,
  type RepairStage,
  type RepairResult,
} from './vision/repair';

// Import for registration
import { registerExtractor } from './registry';
import { hirayamaExtractor } from './hirayama';
import { frenchFnbExtractor } from './french-fnb';
import { maruyataExtractor } from './maruyata';
import { knownLayoutSpreadsheetExtractor, genericSpreadsheetExtractor } from './spreadsheet';
import { visionExtractor } from './vision';

/**
 * Register all built-in extractors.
 * Call this at application startup.
 */
export function registerAllExtractors(): void {
  registerExtractor(hirayamaExtractor);
  registerExtractor(frenchFnbExtractor);
  registerExtractor(maruyataExtractor);
  registerExtractor(knownLayoutSpreadsheetExtractor);
  registerExtractor(genericSpreadsheetExtractor);
  registerExtractor(visionExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
