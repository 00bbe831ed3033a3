/**
 * Extraction Session
 *
 * Top-level entry point: one session per uploaded document. Selects a plan
 * once, runs the cheapest strategy first and escalates:
 * - spreadsheet: known layout -> generic auto-detection (never vision)
 * - PDF: vendor regex (unless the text layer is scanned) -> vision
 *
 * A session never throws. Its trace and attempts are returned to the caller
 * and never persisted.
 */

import { ulid } from 'ulid';
import { runInChildContext } from '../context';
import { isSpreadsheetFilename, selectStrategy } from '../detection/vendor-detector';
import { getExtractorOrThrow } from '../extractors';
import type { DocumentSource, ExtractorServices } from '../extractors';
import { OpenAIVisionClient } from '../extractors/vision/client';
import { logger } from '../logger';
import {
  extractionDurationHistogram,
  extractionSessionsCounter,
  strategyAttemptsCounter,
} from '../metrics';
import { PdftoppmRenderer } from '../pdf/page-renderer';
import { readPdfTextLayer } from '../pdf/text-layer';
import { getVendorTable, type VendorTable } from '../reference/vendor-table';
import { ExtractionTrace } from '../trace';
import type {
  AttemptOutcome,
  CanonicalRecord,
  DocumentInput,
  ExtractionOutcome,
  ExtractionPlan,
  StrategyAttempt,
  StrategyId,
  TextLayer,
  VendorEntry,
} from '../types';

export type TextLayerReader = (bytes: Buffer, trace: ExtractionTrace) => Promise<TextLayer>;

export interface ExtractionServices extends ExtractorServices {
  textLayerReader: TextLayerReader;
  vendorTable: VendorTable;
}

export interface ExtractionOptions {
  /** Keep negative-amount (credit) lines */
  keepCredits?: boolean;
  /** Clock for date fallbacks */
  now?: Date;
  /** Upstream document id, for log context */
  documentId?: string;
}

let defaultServices: ExtractionServices | null = null;

/**
 * Services built from config: pdfjs text reader, pdftoppm renderer, OpenAI
 * client and the packaged vendor table.
 */
export function getDefaultServices(): ExtractionServices {
  if (!defaultServices) {
    defaultServices = {
      textLayerReader: readPdfTextLayer,
      pageRenderer: new PdftoppmRenderer(),
      visionClient: new OpenAIVisionClient(),
      vendorTable: getVendorTable(),
    };
  }
  return defaultServices;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describePlan(plan: ExtractionPlan): string {
  const vendor = plan.vendor ? plan.vendor.name : 'no vendor match';
  return plan.kind === 'regex' ? `regex/${plan.parser} (${vendor})` : `${plan.kind} (${vendor})`;
}

export class ExtractionSession {
  readonly sessionId = ulid();
  readonly trace: ExtractionTrace;
  readonly attempts: StrategyAttempt[] = [];
  vendor: VendorEntry | null = null;
  isScanned: boolean | null = null;
  records: CanonicalRecord[] = [];

  constructor(
    readonly input: DocumentInput,
    private readonly services: ExtractionServices,
    private readonly options: ExtractionOptions = {}
  ) {
    this.trace = new ExtractionTrace(this.sessionId);
  }

  async run(): Promise<ExtractionOutcome> {
    const startTime = Date.now();
    const inputKind = isSpreadsheetFilename(this.input.filename) ? 'spreadsheet' : 'pdf';

    return runInChildContext(
      {
        sessionId: this.sessionId,
        documentId: this.options.documentId,
        filename: this.input.filename,
      },
      async () => {
        this.trace.add(
          `session ${this.sessionId}: ${this.input.filename} (${this.input.bytes.length} bytes)`
        );

        try {
          if (inputKind === 'spreadsheet') {
            await this.runSpreadsheet();
          } else {
            await this.runPdf();
          }
        } catch (error) {
          this.trace.add(`session: unexpected failure (${errorMessage(error)}), zero records`);
          logger.error('Extraction session failed', error);
          this.records = [];
        }

        const durationSeconds = (Date.now() - startTime) / 1000;
        extractionDurationHistogram.observe({ input_kind: inputKind }, durationSeconds);
        extractionSessionsCounter.inc({
          input_kind: inputKind,
          status: this.records.length > 0 ? 'records' : 'empty',
        });

        this.trace.add(`session: ${this.records.length} record(s) returned`);
        logger.info('Extraction session complete', {
          vendor: this.vendor?.name ?? null,
          is_scanned: this.isScanned,
          record_count: this.records.length,
          attempts: this.attempts.map((a) => `${a.strategy}:${a.outcome}`),
          duration_seconds: durationSeconds,
        });

        return this.toOutcome();
      }
    );
  }

  private async runSpreadsheet(): Promise<void> {
    const plan = selectStrategy({ filename: this.input.filename, text: '' }, this.services.vendorTable);
    this.vendor = plan.vendor;
    this.trace.add(`plan: ${describePlan(plan)}`);

    const source: DocumentSource = { ...this.input, textLayer: null };

    if (await this.attempt('spreadsheet_known', source)) return;
    if (await this.attempt('spreadsheet_generic', source)) return;

    this.trace.add('spreadsheet: no records from any layout; spreadsheets are not sent to vision');
  }

  private async runPdf(): Promise<void> {
    const textLayer = await this.readTextLayer();
    this.isScanned = textLayer.isScanned;

    const plan = selectStrategy(
      { filename: this.input.filename, text: textLayer.text },
      this.services.vendorTable
    );
    this.vendor = plan.vendor;
    this.trace.add(`plan: ${describePlan(plan)}`);

    const source: DocumentSource = { ...this.input, textLayer };

    if (plan.kind === 'regex') {
      if (textLayer.isScanned) {
        this.skip(plan.parser, 'text layer is scanned');
      } else if (await this.attempt(plan.parser, source)) {
        return;
      } else {
        this.trace.add(`escalate: ${plan.parser} produced no records, trying vision`);
      }
    }

    await this.attempt('vision', source);
  }

  private async readTextLayer(): Promise<TextLayer> {
    try {
      return await this.services.textLayerReader(this.input.bytes, this.trace);
    } catch (error) {
      this.trace.add(`text layer: reader failed (${errorMessage(error)}), treated as scanned`);
      return { text: '', pages: [], pageCount: 0, isScanned: true };
    }
  }

  /**
   * Run one strategy and record the attempt. True when it produced records,
   * which become the session's records.
   */
  private async attempt(strategy: StrategyId, source: DocumentSource): Promise<boolean> {
    const startTime = Date.now();
    try {
      const result = await getExtractorOrThrow(strategy).extract(source, {
        trace: this.trace,
        vendor: this.vendor,
        services: this.services,
        keepCredits: this.options.keepCredits,
        now: this.options.now,
      });

      let outcome: AttemptOutcome = result.records.length > 0 ? 'succeeded' : 'empty';
      let reason = result.warnings.length > 0 ? result.warnings.join('; ') : undefined;
      if (strategy === 'spreadsheet_known' && !result.metadata.layoutId) {
        outcome = 'skipped';
        reason = 'no known layout matched';
      }

      this.record(strategy, outcome, result.records.length, Date.now() - startTime, reason);
      if (outcome !== 'succeeded') return false;

      this.records = result.records;
      return true;
    } catch (error) {
      this.trace.add(`${strategy}: failed (${errorMessage(error)})`);
      this.record(strategy, 'failed', 0, Date.now() - startTime, errorMessage(error));
      return false;
    }
  }

  private skip(strategy: StrategyId, reason: string): void {
    this.trace.add(`${strategy}: skipped, ${reason}`);
    this.record(strategy, 'skipped', 0, 0, reason);
  }

  private record(
    strategy: StrategyId,
    outcome: AttemptOutcome,
    recordCount: number,
    durationMs: number,
    reason?: string
  ): void {
    this.attempts.push({ strategy, outcome, recordCount, durationMs, ...(reason ? { reason } : {}) });
    strategyAttemptsCounter.inc({ strategy, outcome });
  }

  toOutcome(): ExtractionOutcome {
    return {
      sessionId: this.sessionId,
      filename: this.input.filename,
      vendor: this.vendor?.name ?? null,
      isScanned: this.isScanned,
      records: this.records,
      attempts: [...this.attempts],
      trace: this.trace.lines(),
    };
  }
}

/**
 * Extract canonical records from one document. Never throws; the outcome
 * always carries a (possibly empty) record list and the trace.
 */
export async function runExtraction(
  input: DocumentInput,
  services: Partial<ExtractionServices> = {},
  options: ExtractionOptions = {}
): Promise<ExtractionOutcome> {
  let resolved: ExtractionServices;
  try {
    resolved = { ...getDefaultServices(), ...services };
  } catch (error) {
    // Default services could not be built (unreadable vendor table)
    logger.error('Extraction services unavailable', error);
    return {
      sessionId: ulid(),
      filename: input.filename,
      vendor: null,
      isScanned: null,
      records: [],
      attempts: [],
      trace: [`session: services unavailable (${errorMessage(error)}), zero records`],
    };
  }

  return new ExtractionSession(input, resolved, options).run();
}
