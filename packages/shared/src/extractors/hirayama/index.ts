/**
 * Meat Shop Hirayama Extractor
 *
 * Regex extraction for the wagyu tenderloin delivery statements. OCR output
 * is noisy, so quantities are accepted only as decimal kg values inside the
 * vendor's plausible range, and doubled lines are dropped by
 * date + quantity + amount.
 */

import { headerFallbackDate } from '../../dates';
import { foldWidth, parseAmount } from '../../numbers';
import { DedupKeySet } from '../../records';
import type { RawLineItem } from '../../types';
import { TextPatternExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import { ITEM_NAME, lineDate, numberTokens, quantityMatches } from './patterns';

export const ALGORITHM_VERSION = 'hirayama-1.0.0';

const DEFAULT_QUANTITY_RANGE = { min: 4, max: 10 };
const DEFAULT_UNIT_PRICE = 12000;

export class HirayamaExtractor extends TextPatternExtractor {
  readonly strategyId = 'hirayama' as const;
  readonly description = 'Meat Shop Hirayama delivery statement - line regex over the text layer';

  parseText(text: string, ctx: ExtractionContext): RawExtraction {
    const tuning = ctx.vendor?.tuning ?? {};
    const range = tuning.plausibleQuantity ?? DEFAULT_QUANTITY_RANGE;
    const defaultUnitPrice = tuning.defaultUnitPrice ?? DEFAULT_UNIT_PRICE;

    const fallbackDate = headerFallbackDate(text, ctx.now);
    const seen = new DedupKeySet();
    const items: RawLineItem[] = [];
    let currentDate = fallbackDate;
    let duplicates = 0;

    for (const rawLine of text.split('\n')) {
      const line = foldWidth(rawLine).replace(/\|/g, ' ');

      const date = lineDate(line);
      if (date) currentDate = date;

      const match = quantityMatches(line).find(
        (m) => m.quantity >= range.min && m.quantity <= range.max
      );
      if (!match) continue;

      const trailing = numberTokens(match.rest)
        .map((token) => parseAmount(token))
        .filter((n): n is number => n !== null);

      let unitPrice: number;
      let amount: number;
      if (trailing.length >= 2) {
        unitPrice = trailing[trailing.length - 2];
        amount = trailing[trailing.length - 1];
      } else if (trailing.length === 1) {
        amount = trailing[0];
        unitPrice = Math.round(amount / match.quantity);
      } else {
        unitPrice = defaultUnitPrice;
        amount = Math.round(match.quantity * defaultUnitPrice);
      }

      if (!seen.accept(currentDate, match.quantity, amount)) {
        duplicates++;
        continue;
      }

      items.push({
        date: currentDate,
        item_name: ITEM_NAME,
        quantity: match.quantity,
        unit: 'kg',
        unit_price: unitPrice,
        amount,
      });
    }

    if (duplicates > 0) {
      ctx.trace.add(`hirayama: ${duplicates} duplicate line(s) dropped`);
    }

    return {
      items,
      defaults: { vendor: ctx.vendor?.name ?? null, date: fallbackDate },
      metadata: { algorithmVersion: ALGORITHM_VERSION },
    };
  }
}

export const hirayamaExtractor = new HirayamaExtractor();
