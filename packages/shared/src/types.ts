/**
 * Shared TypeScript Types
 *
 * Types for the invoice and sales intake pipeline, matching the JSON schemas
 * in packages/shared/schemas/.
 */

// ============================================================================
// Units
// ============================================================================

export const WEIGHT_UNITS = ['kg', 'g', '100g'] as const;
export const VOLUME_UNITS = ['L', 'ml'] as const;
export const CONTAINER_UNITS = ['pc', 'can', 'box', 'pack', 'bottle', 'jar', 'bag'] as const;

export type WeightUnit = (typeof WEIGHT_UNITS)[number];
export type VolumeUnit = (typeof VOLUME_UNITS)[number];
export type ContainerUnit = (typeof CONTAINER_UNITS)[number];

/** Fixed unit vocabulary of canonical records. */
export type Unit = WeightUnit | VolumeUnit | ContainerUnit;

// ============================================================================
// Records
// ============================================================================

/**
 * Canonical line item: the shape every extraction path converges on.
 */
export interface CanonicalRecord {
  vendor: string;
  /** YYYY-MM-DD */
  date: string;
  /** Original-language description, never translated here */
  item_name: string;
  quantity: number;
  unit: Unit;
  /** Price per one `unit` of `quantity` */
  unit_price: number;
  /** Total line amount */
  amount: number;
}

/**
 * Line item as a parser or the vision model produced it, before the
 * fill-defaults step. Every field may be missing.
 */
export interface RawLineItem {
  vendor?: string | null;
  date?: string | null;
  item_name?: string | null;
  quantity?: number | null;
  unit?: string | null;
  unit_price?: number | null;
  amount?: number | null;
}

/**
 * Document-level values applied to raw items that lack their own.
 */
export interface RecordDefaults {
  vendor: string | null;
  /** YYYY-MM-DD */
  date: string;
}

export interface FinalizeOptions {
  /** Keep negative-amount lines (credits, returns). Dropped by default. */
  keepCredits?: boolean;
}

/**
 * Row of a POS sales export.
 */
export interface SalesRecord {
  code: string;
  name: string;
  category: string;
  quantity: number;
  price: number;
  gross_total: number;
  discount: number;
  net_total: number;
  /** YYYY-MM, from the report header */
  month: string | null;
}

// ============================================================================
// Strategies & Plans
// ============================================================================

/** Strategy identifiers as they appear in the vendor table. */
export type VendorStrategy = 'hirayama' | 'french_fnb' | 'maruyata' | 'ai';

/** Regex parser identifiers. */
export type RegexParserId = Exclude<VendorStrategy, 'ai'>;

/** Every strategy a session can attempt. */
export type StrategyId = RegexParserId | 'spreadsheet_known' | 'spreadsheet_generic' | 'vision';

/** Per-vendor parser tuning, kept in the vendor table rather than in code. */
export interface VendorTuning {
  /** Accepted quantity range for the vendor's usual product */
  plausibleQuantity?: { min: number; max: number };
  /** Unit price used when a line carries none */
  defaultUnitPrice?: number;
  /** Grams per container for weight conversion */
  gramsPerCan?: number;
}

export interface VendorEntry {
  /** Canonical vendor name */
  name: string;
  /** Detection substrings, matched case-insensitively */
  patterns: string[];
  strategy: VendorStrategy;
  tuning?: VendorTuning;
}

/**
 * Strategy selection, made once per document and passed down explicitly.
 */
export type ExtractionPlan =
  | { kind: 'spreadsheet'; vendor: VendorEntry | null }
  | { kind: 'regex'; parser: RegexParserId; vendor: VendorEntry }
  | { kind: 'vision'; vendor: VendorEntry | null };

export type AttemptOutcome = 'succeeded' | 'empty' | 'skipped' | 'failed';

export interface StrategyAttempt {
  strategy: StrategyId;
  outcome: AttemptOutcome;
  recordCount: number;
  durationMs: number;
  reason?: string;
}

// ============================================================================
// Documents & Sessions
// ============================================================================

export interface DocumentInput {
  filename: string;
  bytes: Buffer;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface TextLayer {
  /** Pages joined with newlines */
  text: string;
  pages: PageText[];
  pageCount: number;
  isScanned: boolean;
}

/**
 * Result of one extraction session, returned to the caller.
 */
export interface ExtractionOutcome {
  sessionId: string;
  filename: string;
  vendor: string | null;
  isScanned: boolean | null;
  records: CanonicalRecord[];
  attempts: StrategyAttempt[];
  trace: string[];
}

// ============================================================================
// Storage
// ============================================================================

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

// ============================================================================
// Error Envelope
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
