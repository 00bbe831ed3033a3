/**
 * Spreadsheet Extractors
 *
 * Two strategies over the same workbook reader:
 * - spreadsheet_known: vendor exports with fixed column positions
 * - spreadsheet_generic: column roles auto-detected from the header row
 *
 * Rows without an item or an amount are skipped; unparseable dates fall back
 * to the first of the current month. The workbook is never modified.
 */

import { firstOfCurrentMonth, toIsoDate } from '../../dates';
import { parseAmount } from '../../numbers';
import type { RawLineItem } from '../../types';
import { toGrams } from '../../units/normalizer';
import { BaseExtractor } from '../base-extractor';
import { CAVIAR_KEYWORDS } from '../french-fnb/patterns';
import type { DocumentSource, ExtractionContext, ExtractorKind, RawExtraction } from '../types';
import { detectColumnRoles, fallbackItemColumn } from './column-roles';
import { findKnownLayout, type KnownLayout } from './known-layouts';
import { cellText, readSheets, type Row, type SheetRows } from './workbook';

const CAVIAR_ITEM_NAME = 'KAVIARI キャビア クリスタル 100g';
const DEFAULT_GRAMS_PER_CAN = 100;

function loadSheets(source: DocumentSource, ctx: ExtractionContext): SheetRows[] | null {
  try {
    return readSheets(source.bytes, source.filename);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.trace.add(`spreadsheet: workbook could not be read (${message})`);
    return null;
  }
}

// ============================================================================
// Known layouts
// ============================================================================

function knownLayoutItem(
  layout: KnownLayout,
  row: Row,
  fallbackDate: string,
  gramsPerCan: number
): RawLineItem | null {
  const { columns } = layout;
  const product = cellText(row[columns.item]);
  if (!product) return null;
  if (layout.skipItemKeywords.some((k) => product.includes(k))) return null;

  const amount = parseAmount(row[columns.amount]);
  if (amount === null || amount <= 0) return null;

  const date = toIsoDate(row[columns.date]) ?? fallbackDate;
  const quantity = parseAmount(row[columns.quantity]);
  const unit = cellText(row[columns.unit]);

  if (CAVIAR_KEYWORDS.some((k) => product.includes(k)) && unit === '缶' && quantity !== null) {
    return {
      date,
      item_name: CAVIAR_ITEM_NAME,
      quantity: toGrams(quantity, unit, gramsPerCan),
      unit: 'g',
      amount,
    };
  }

  return {
    date,
    item_name: product,
    quantity,
    unit,
    unit_price: parseAmount(row[columns.unitPrice]),
    amount,
  };
}

export class KnownLayoutSpreadsheetExtractor extends BaseExtractor {
  readonly strategyId = 'spreadsheet_known' as const;
  readonly kind: ExtractorKind = 'spreadsheet';
  readonly description = 'Vendor spreadsheet exports with fixed column positions';

  protected async extractRaw(
    source: DocumentSource,
    ctx: ExtractionContext
  ): Promise<RawExtraction> {
    const fallbackDate = firstOfCurrentMonth(ctx.now);
    const sheets = loadSheets(source, ctx) ?? [];
    const items: RawLineItem[] = [];
    let matched: KnownLayout | null = null;

    for (const sheet of sheets) {
      const [header, ...dataRows] = sheet.rows;
      if (!header) continue;

      const layout = findKnownLayout(source.filename, header);
      if (!layout) continue;
      matched = matched ?? layout;
      ctx.trace.add(`spreadsheet: sheet "${sheet.name}" matches known layout ${layout.id}`);

      const gramsPerCan = ctx.vendor?.tuning?.gramsPerCan ?? DEFAULT_GRAMS_PER_CAN;
      for (const row of dataRows) {
        const item = knownLayoutItem(layout, row, fallbackDate, gramsPerCan);
        if (item) items.push(item);
      }
    }

    if (!matched) {
      ctx.trace.add('spreadsheet: no known layout matched');
    }

    return {
      items,
      defaults: { vendor: matched?.vendorName ?? ctx.vendor?.name ?? null, date: fallbackDate },
      metadata: matched ? { layoutId: matched.id } : {},
    };
  }
}

// ============================================================================
// Generic auto-detection
// ============================================================================

export class GenericSpreadsheetExtractor extends BaseExtractor {
  readonly strategyId = 'spreadsheet_generic' as const;
  readonly kind: ExtractorKind = 'spreadsheet';
  readonly description = 'Spreadsheets of unknown layout - column roles from header keywords';

  protected async extractRaw(
    source: DocumentSource,
    ctx: ExtractionContext
  ): Promise<RawExtraction> {
    const fallbackDate = firstOfCurrentMonth(ctx.now);
    const sheets = loadSheets(source, ctx) ?? [];
    const items: RawLineItem[] = [];

    for (const sheet of sheets) {
      const [header, ...dataRows] = sheet.rows;
      if (!header) continue;

      const roles = detectColumnRoles(header);
      let itemColumn = roles.item ?? null;
      if (itemColumn === null) {
        itemColumn = fallbackItemColumn(roles, dataRows[0]);
        if (itemColumn !== null) {
          ctx.trace.add(`spreadsheet: sheet "${sheet.name}" has no item header, using column ${itemColumn}`);
        }
      }

      const described = Object.entries(roles)
        .map(([role, index]) => `${role}=${index}`)
        .join(', ');
      ctx.trace.add(`spreadsheet: sheet "${sheet.name}" column roles {${described}}`);

      if (itemColumn === null || roles.amount === undefined) {
        ctx.trace.add(`spreadsheet: sheet "${sheet.name}" skipped, no item or amount column`);
        continue;
      }

      for (const row of dataRows) {
        const itemName = cellText(row[itemColumn]);
        const amount = parseAmount(row[roles.amount]);
        if (!itemName || amount === null) continue;

        items.push({
          date: roles.date !== undefined ? (toIsoDate(row[roles.date]) ?? fallbackDate) : fallbackDate,
          item_name: itemName,
          quantity: roles.quantity !== undefined ? parseAmount(row[roles.quantity]) : null,
          unit: roles.unit !== undefined ? cellText(row[roles.unit]) || null : null,
          unit_price: roles.unit_price !== undefined ? parseAmount(row[roles.unit_price]) : null,
          amount,
        });
      }
    }

    return {
      items,
      defaults: { vendor: ctx.vendor?.name ?? null, date: fallbackDate },
    };
  }
}

export const knownLayoutSpreadsheetExtractor = new KnownLayoutSpreadsheetExtractor();
export const genericSpreadsheetExtractor = new GenericSpreadsheetExtractor();
