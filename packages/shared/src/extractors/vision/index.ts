/**
 * Vision Extractor
 *
 * Last-resort strategy for scanned or unrecognized documents: render up to
 * VISION_MAX_PAGES pages, ask the vision model for a JSON line-item list and
 * recover what it can through the repair ladder. A missing credential, a
 * failed request or an unrecoverable response all yield zero items; there is
 * no further fallback.
 */

import { config } from '../../config';
import { firstOfCurrentMonth, toIsoDate } from '../../dates';
import { logger } from '../../logger';
import { visionRepairCounter } from '../../metrics';
import { parseAmount } from '../../numbers';
import { isVisionItem, type VisionItem } from '../../schemas';
import { VISION_INVOICE_TEMPLATE } from '../../templates/vision-invoice.template';
import { renderPrompt, type ExtractionTemplate } from '../../templates/types';
import type { RawLineItem, RecordDefaults } from '../../types';
import { BaseExtractor } from '../base-extractor';
import type { DocumentSource, ExtractionContext, ExtractorKind, RawExtraction } from '../types';
import { repairVisionResponse } from './repair';

export interface VisionExtractorOptions {
  maxPages?: number;
}

export function toRawLineItem(item: VisionItem): RawLineItem {
  return {
    date: item.date ?? null,
    item_name: item.item_name,
    quantity: parseAmount(item.quantity),
    unit: item.unit ?? null,
    unit_price: parseAmount(item.unit_price),
    amount: parseAmount(item.amount),
  };
}

export class VisionExtractor extends BaseExtractor {
  readonly strategyId = 'vision' as const;
  readonly kind: ExtractorKind = 'vision';
  readonly description = 'Vision model over rendered page images, with response repair';

  private readonly maxPages: number;

  constructor(options: VisionExtractorOptions = {}) {
    super();
    this.maxPages = options.maxPages ?? config.visionMaxPages;
  }

  getTemplate(): ExtractionTemplate {
    return VISION_INVOICE_TEMPLATE;
  }

  protected async extractRaw(
    source: DocumentSource,
    ctx: ExtractionContext
  ): Promise<RawExtraction> {
    const { trace } = ctx;
    const { pageRenderer, visionClient } = ctx.services;
    const fallback: RecordDefaults = {
      vendor: ctx.vendor?.name ?? null,
      date: firstOfCurrentMonth(ctx.now),
    };
    const empty = (warning: string): RawExtraction => ({
      items: [],
      defaults: fallback,
      warnings: [warning],
      metadata: { model: visionClient.model },
    });

    if (!visionClient.isConfigured()) {
      trace.add('vision: no API credential configured, zero records');
      return empty('vision model not configured');
    }

    const pageCount = source.textLayer?.pageCount ?? 0;
    const images = await pageRenderer.render(source.bytes, pageCount, this.maxPages, trace);
    trace.add(
      `vision: ${pageCount > 0 ? pageCount : 'unknown'} page(s) in document, ` +
        `${images.length} image(s) rendered (cap ${this.maxPages})`
    );
    if (images.length === 0) {
      return empty('no pages could be rendered');
    }

    const template = this.getTemplate();
    let text: string;
    let requestId: string;
    try {
      const response = await visionClient.complete({
        images: images.map((page) => page.png),
        systemPrompt: template.systemPrompt,
        userPrompt: renderPrompt(template.userPromptTemplate, {
          source_filename: source.filename,
          page_count: images.length,
        }),
      });
      text = response.text;
      requestId = response.requestId;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      trace.add(`vision: request failed (${message}), zero records`);
      return empty('vision request failed');
    }

    trace.add(`vision: response length ${text.length} chars`);

    const repaired = repairVisionResponse(text);
    if (!repaired) {
      trace.add('vision: response unparseable at every repair stage, zero records');
      visionRepairCounter.inc({ stage: 'failed' });
      return {
        ...empty('vision response could not be parsed'),
        metadata: { model: visionClient.model, requestId },
      };
    }

    visionRepairCounter.inc({ stage: repaired.stage });
    const { document, stage } = repaired;
    const accepted: VisionItem[] = [];
    for (const item of document.items) {
      if (isVisionItem(item)) accepted.push(item);
    }
    trace.add(
      `vision: parsed at stage ${stage}, ${document.items.length} item(s)` +
        (accepted.length < document.items.length
          ? `, ${document.items.length - accepted.length} without item_name/amount dropped`
          : '')
    );

    if (stage !== 'direct') {
      logger.warn('Vision response needed repair', {
        stage,
        request_id: requestId,
        item_count: accepted.length,
      });
    }

    return {
      items: accepted.map(toRawLineItem),
      defaults: {
        vendor: document.vendor_name || ctx.vendor?.name || null,
        date: toIsoDate(document.invoice_date) ?? fallback.date,
      },
      metadata: { model: visionClient.model, requestId, repairStage: stage },
    };
  }
}

export const visionExtractor = new VisionExtractor();
