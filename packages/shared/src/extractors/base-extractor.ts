/**
 * Base Document Extractor
 *
 * Abstract base class providing the shared extraction lifecycle: logging,
 * timing, record finalization, trace and metrics. Subclasses only produce raw
 * line items.
 */

import { logger } from '../logger';
import { recordsExtractedCounter } from '../metrics';
import { finalizeRecords } from '../records';
import type { StrategyId } from '../types';
import type {
  DocumentExtractor,
  DocumentSource,
  ExtractionContext,
  ExtractorKind,
  ExtractorResult,
  RawExtraction,
} from './types';

export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly strategyId: StrategyId;
  abstract readonly kind: ExtractorKind;
  abstract readonly description: string;

  /**
   * Produce raw line items and document defaults. Return no items when the
   * document is not recognized.
   */
  protected abstract extractRaw(
    source: DocumentSource,
    ctx: ExtractionContext
  ): Promise<RawExtraction>;

  async extract(source: DocumentSource, ctx: ExtractionContext): Promise<ExtractorResult> {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      strategy: this.strategyId,
      filename: source.filename,
      vendor: ctx.vendor?.name ?? null,
    });

    try {
      const raw = await this.extractRaw(source, ctx);
      const records = finalizeRecords(raw.items, raw.defaults, { keepCredits: ctx.keepCredits });
      const durationMs = Date.now() - startTime;

      ctx.trace.add(
        `${this.strategyId}: ${raw.items.length} raw item(s), ${records.length} record(s) kept`
      );
      recordsExtractedCounter.inc({ strategy: this.strategyId }, records.length);

      logger.info('Extraction complete', {
        strategy: this.strategyId,
        filename: source.filename,
        raw_item_count: raw.items.length,
        record_count: records.length,
        duration_ms: durationMs,
      });

      return {
        records,
        rawItemCount: raw.items.length,
        warnings: raw.warnings ?? [],
        metadata: { ...raw.metadata, durationMs },
      };
    } catch (error) {
      logger.error('Extraction failed', error, {
        strategy: this.strategyId,
        filename: source.filename,
      });
      throw error;
    }
  }
}

/**
 * Base for regex parsers that read the PDF text layer.
 */
export abstract class TextPatternExtractor extends BaseExtractor {
  readonly kind: ExtractorKind = 'regex';

  /**
   * Parse invoice text. Pure: repeated calls on the same text return the
   * same items.
   */
  abstract parseText(text: string, ctx: ExtractionContext): RawExtraction;

  protected async extractRaw(
    source: DocumentSource,
    ctx: ExtractionContext
  ): Promise<RawExtraction> {
    return this.parseText(source.textLayer?.text ?? '', ctx);
  }
}
