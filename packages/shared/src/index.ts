/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runInChildContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Trace
export { ExtractionTrace } from './trace';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractDocumentJob,
  type PersistRecordsJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  backpressureFor,
  jobIdFor,
  type Backpressure,
  type QueueCounts,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  extractionSessionsCounter,
  extractionDurationHistogram,
  strategyAttemptsCounter,
  recordsExtractedCounter,
  visionRequestsCounter,
  visionRequestDurationHistogram,
  visionRepairCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schema validation
export {
  isVendorTableFile,
  isVisionDocument,
  isVisionItem,
  validateVendorTable,
  validateRecord,
  validateRecords,
  type ValidationResult,
  type VendorTableFile,
  type VisionDocument,
  type VisionItem,
} from './schemas';

// Normalization
export { isUnit, isWeightUnit, normalizeUnit, toGrams, fromGrams } from './units/normalizer';
export { foldWidth, parseAmount, roundTo } from './numbers';
export {
  formatDate,
  isIsoDate,
  firstOfCurrentMonth,
  findHeaderMonth,
  headerFallbackDate,
  toIsoDate,
} from './dates';
export { fillDefaults, finalizeRecords, DedupKeySet } from './records';

// Reference data & detection
export { VendorTable, getVendorTable, normalizeVendorName } from './reference/vendor-table';
export {
  SPREADSHEET_EXTENSIONS,
  isSpreadsheetFilename,
  detectVendor,
  selectStrategy,
  type StrategyInput,
} from './detection/vendor-detector';

// PDF
export {
  assembleTextLayer,
  linesFromTextItems,
  readPdfTextLayer,
  type PageTextLoader,
} from './pdf/text-layer';
export {
  PdftoppmRenderer,
  type PageRenderer,
  type RenderedPage,
  type ExecFileFn,
  type PdftoppmRendererOptions,
} from './pdf/page-renderer';

// Extractors
export * from './extractors';

// Prompt templates
export { type ExtractionTemplate, renderPrompt } from './templates/types';
export { VISION_INVOICE_TEMPLATE } from './templates/vision-invoice.template';

// Sessions
export {
  ExtractionSession,
  runExtraction,
  getDefaultServices,
  type ExtractionServices,
  type ExtractionOptions,
  type TextLayerReader,
} from './session/extraction-session';

// Sales exports
export { extractSalesReport, findReportMonth } from './sales/sales-report';

// Storage
export {
  createPgDatabase,
  isRow,
  numericColumn,
  textColumn,
  type Database,
  type Queryable,
  type QueryRows,
  type DbRow,
} from './storage/database';
export {
  documentIdFor,
  storeDocument,
  readStoredDocument,
  type StoredDocument,
} from './storage/object-store';
