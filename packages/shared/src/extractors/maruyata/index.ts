/**
 * Maruyata Extractor
 *
 * Regex extraction for the fish/produce delivery statements. Lines whose unit
 * token is not in the unit synonym table are skipped.
 */

import { findHeaderMonth, formatDate, headerFallbackDate, isIsoDate } from '../../dates';
import { foldWidth, parseAmount } from '../../numbers';
import { DedupKeySet } from '../../records';
import type { RawLineItem } from '../../types';
import { normalizeUnit } from '../../units/normalizer';
import { TextPatternExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import { itemLine, lineDate } from './patterns';

export const ALGORITHM_VERSION = 'maruyata-1.0.0';

export class MaruyataExtractor extends TextPatternExtractor {
  readonly strategyId = 'maruyata' as const;
  readonly description = 'Maruyata delivery statement - line regex over the text layer';

  parseText(text: string, ctx: ExtractionContext): RawExtraction {
    const fallbackDate = headerFallbackDate(text, ctx.now);
    const year = findHeaderMonth(text)?.year ?? (ctx.now ?? new Date()).getFullYear();
    const seen = new DedupKeySet();
    const items: RawLineItem[] = [];
    let currentDate = fallbackDate;

    for (const rawLine of text.split('\n')) {
      let line = foldWidth(rawLine);

      const date = lineDate(line);
      if (date) {
        const iso = formatDate(year, date.month, date.day);
        if (isIsoDate(iso)) currentDate = iso;
        line = date.rest;
      }

      const parsed = itemLine(line);
      if (!parsed || /^[\d\s,.]+$/.test(parsed.itemName)) continue;

      const unit = normalizeUnit(parsed.unit);
      const quantity = parseAmount(parsed.quantity);
      const unitPrice = parseAmount(parsed.unitPrice);
      const amount = parseAmount(parsed.amount);
      if (!unit || quantity === null || amount === null) continue;

      if (!seen.accept(currentDate, parsed.itemName, quantity, amount)) continue;

      items.push({
        date: currentDate,
        item_name: parsed.itemName,
        quantity,
        unit,
        unit_price: unitPrice,
        amount,
      });
    }

    return {
      items,
      defaults: { vendor: ctx.vendor?.name ?? null, date: fallbackDate },
      metadata: { algorithmVersion: ALGORITHM_VERSION },
    };
  }
}

export const maruyataExtractor = new MaruyataExtractor();
