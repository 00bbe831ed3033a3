/**
 * Document Extractor Types
 *
 * Interfaces for the extractor architecture. Each strategy (a vendor regex
 * parser, a spreadsheet reader, the vision model) is one extractor that turns
 * a document into raw line items; the base class finalizes them into
 * canonical records.
 */

import type { PageRenderer } from '../pdf/page-renderer';
import type { ExtractionTrace } from '../trace';
import type {
  CanonicalRecord,
  RawLineItem,
  RecordDefaults,
  StrategyId,
  TextLayer,
  VendorEntry,
} from '../types';
import type { VisionModelClient } from './vision/client';

/**
 * How an extractor reads its input:
 * - 'regex': line patterns over the PDF text layer
 * - 'spreadsheet': cell grid of a workbook or CSV
 * - 'vision': rendered page images sent to the vision model
 */
export type ExtractorKind = 'regex' | 'spreadsheet' | 'vision';

/**
 * The document as the session hands it to an extractor.
 */
export interface DocumentSource {
  filename: string;
  bytes: Buffer;
  /** Null for spreadsheets */
  textLayer: TextLayer | null;
}

/**
 * Collaborators an extractor may call out to.
 */
export interface ExtractorServices {
  pageRenderer: PageRenderer;
  visionClient: VisionModelClient;
}

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Per-session trace; every decision worth auditing goes here */
  trace: ExtractionTrace;
  /** Vendor from detection, if any */
  vendor: VendorEntry | null;
  services: ExtractorServices;
  /** Keep negative-amount (credit) lines */
  keepCredits?: boolean;
  /** Clock for "first of the current month" fallbacks */
  now?: Date;
}

/**
 * Raw output of one strategy, before fill-defaults.
 */
export interface RawExtraction {
  items: RawLineItem[];
  defaults: RecordDefaults;
  warnings?: string[];
  metadata?: ExtractorMetadata;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  /** Vision model used (if any) */
  model?: string;
  /** Vision request ID (if any) */
  requestId?: string;
  /** Repair stage that produced the parsed response (vision only) */
  repairStage?: string;
  /** Known spreadsheet layout that matched (spreadsheet only) */
  layoutId?: string;
  /** Algorithm version (for regex extraction) */
  algorithmVersion?: string;
  /** Duration of extraction in milliseconds */
  durationMs?: number;
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  /** Finalized records */
  records: CanonicalRecord[];
  /** Raw items the strategy produced before finalization */
  rawItemCount: number;
  /** Warnings generated during extraction */
  warnings: string[];
  metadata: ExtractorMetadata;
}

/**
 * Interface for strategy extractors.
 */
export interface DocumentExtractor {
  /** The strategy this extractor implements */
  readonly strategyId: StrategyId;

  readonly kind: ExtractorKind;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract canonical records from a document.
   *
   * @throws Error only on unexpected failures; a document the strategy does
   *   not recognize yields zero records
   */
  extract(source: DocumentSource, ctx: ExtractionContext): Promise<ExtractorResult>;
}
