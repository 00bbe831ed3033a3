/**
 * French F&B Japan Extractor
 *
 * Regex extraction for the specialty-import product summaries and invoices.
 * Four products are recognized by keyword; caviar counts in cans convert to
 * grams. Doubled lines are dropped by date + item + quantity + amount.
 */

import { formatDate, headerFallbackDate } from '../../dates';
import { foldWidth, parseAmount } from '../../numbers';
import { DedupKeySet } from '../../records';
import type { RawLineItem } from '../../types';
import { toGrams } from '../../units/normalizer';
import { TextPatternExtractor } from '../base-extractor';
import type { ExtractionContext, RawExtraction } from '../types';
import {
  LINE_DATE_PATTERN,
  TRAILING_AMOUNT_PATTERN,
  matchProduct,
  type ProductRule,
} from './patterns';

export const ALGORITHM_VERSION = 'french-fnb-1.0.0';

const DEFAULT_GRAMS_PER_CAN = 100;

interface CountMatch {
  count: number;
  amount: number;
}

function matchCount(rule: ProductRule, line: string): CountMatch | null {
  const m = rule.countPattern.exec(line);
  if (!m) return null;
  const count = parseAmount(m[1]);
  const amount = parseAmount(m[2]);
  if (count === null || amount === null) return null;
  return { count, amount };
}

function trailingAmount(line: string): number | null {
  const m = TRAILING_AMOUNT_PATTERN.exec(line);
  if (!m) return null;
  return parseAmount(m[1] ?? m[2]);
}

export class FrenchFnbExtractor extends TextPatternExtractor {
  readonly strategyId = 'french_fnb' as const;
  readonly description = 'French F&B Japan product summary / invoice - keyword regex over the text layer';

  parseText(text: string, ctx: ExtractionContext): RawExtraction {
    const gramsPerCan = ctx.vendor?.tuning?.gramsPerCan ?? DEFAULT_GRAMS_PER_CAN;
    const fallbackDate = headerFallbackDate(text, ctx.now);
    const lines = text.split('\n').map((l) => foldWidth(l));
    const seen = new DedupKeySet();
    const items: RawLineItem[] = [];
    let currentDate = fallbackDate;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];

      const dateMatch = LINE_DATE_PATTERN.exec(line);
      if (dateMatch) {
        currentDate = formatDate(Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3]));
      }

      const rule = matchProduct(line);
      if (!rule) continue;

      let counted = matchCount(rule, line);
      if (!counted && i + 1 < lines.length) {
        counted = matchCount(rule, lines[i + 1]);
        // The wrapped count line belongs to this product
        if (counted) i++;
      }

      let item: RawLineItem | null = null;
      if (counted) {
        item = rule.cansToGrams
          ? {
              date: currentDate,
              item_name: rule.itemName,
              quantity: toGrams(counted.count, rule.unit, gramsPerCan),
              unit: 'g',
              amount: counted.amount,
            }
          : {
              date: currentDate,
              item_name: rule.itemName,
              quantity: counted.count,
              unit: rule.unit,
              amount: counted.amount,
            };
      } else {
        const amount = trailingAmount(line);
        if (amount !== null) {
          item = { date: currentDate, item_name: rule.itemName, quantity: 1, unit: 'pc', amount };
        }
      }

      if (!item) continue;
      if (!seen.accept(item.date, item.item_name, item.quantity, item.amount)) continue;
      items.push(item);
    }

    return {
      items,
      defaults: { vendor: ctx.vendor?.name ?? null, date: fallbackDate },
      metadata: { algorithmVersion: ALGORITHM_VERSION },
    };
  }
}

export const frenchFnbExtractor = new FrenchFnbExtractor();
