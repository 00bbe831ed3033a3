/**
 * Spreadsheet Extractor Tests
 *
 * Known fixed-column layouts and header-keyword auto-detection.
 */

import {
  detectColumnRoles,
  genericSpreadsheetExtractor,
  knownLayoutSpreadsheetExtractor,
  type DocumentSource,
} from '@ledgerline/shared';
import { exportRow, makeContext, workbookBytes, type CellValue } from './helpers';

function source(filename: string, bytes: Buffer): DocumentSource {
  return { filename, bytes, textLayer: null };
}

const EXPORT_HEADER = exportRow({
  0: '[注文番号]',
  15: '[納品日]',
  30: '[商品名]',
  32: '[単価]',
  33: '[数量]',
  34: '[単位]',
  35: '[金額]',
});

const EXPORT_ROWS = [
  EXPORT_HEADER,
  exportRow({ 0: 'A-1', 15: '2025/10/05', 30: 'KAVIARI キャビア クリスタル 100g', 32: 19500, 33: 22, 34: '缶', 35: 429000 }),
  exportRow({ 0: 'A-1', 15: '2025/10/05', 30: 'パレット バター 20g', 32: 800, 33: 40, 34: 'PC', 35: 32000 }),
  exportRow({ 0: 'A-1', 15: '2025/10/05', 30: '運賃', 32: 1100, 33: 1, 34: '式', 35: 1100 }),
  exportRow({ 0: 'A-2', 15: '2025/10/06', 30: '返品 バター', 32: 800, 33: 1, 34: 'PC', 35: -800 }),
];

const GENERIC_ROWS: CellValue[][] = [
  ['日付', '商品名', '数量', '単位', '単価', '金額'],
  ['2025-10-05', 'ミニトマト', 3, 'pack', 450, 1350],
  ['2025-10-06', 'ルッコラ', 2, '袋', 300, 600],
  ['2025-10-07', 'メモ', null, null, null, null],
];

describe('detectColumnRoles', () => {
  it('gives each header at most one role, unit price before unit', () => {
    expect(detectColumnRoles(['Item', 'Qty', 'Unit', 'Unit Price', 'Amount', 'Date'])).toEqual({
      item: 0,
      quantity: 1,
      unit: 2,
      unit_price: 3,
      amount: 4,
      date: 5,
    });
  });

  it('assigns a role to the first header that claims it', () => {
    expect(detectColumnRoles(['金額', '合計'])).toEqual({ amount: 0 });
  });
});

describe('KnownLayoutSpreadsheetExtractor', () => {
  it('reads the platform export by fixed columns', async () => {
    const ctx = makeContext(null);
    const result = await knownLayoutSpreadsheetExtractor.extract(
      source('order_export.xlsx', workbookBytes(EXPORT_ROWS)),
      ctx
    );

    expect(result.metadata.layoutId).toBe('french_fnb_export');
    expect(result.records).toEqual([
      {
        vendor: 'French F&B Japan',
        date: '2025-10-05',
        item_name: 'KAVIARI キャビア クリスタル 100g',
        quantity: 2200,
        unit: 'g',
        unit_price: 195,
        amount: 429000,
      },
      {
        vendor: 'French F&B Japan',
        date: '2025-10-05',
        item_name: 'パレット バター 20g',
        quantity: 40,
        unit: 'pc',
        unit_price: 800,
        amount: 32000,
      },
    ]);
    expect(ctx.trace.lines()).toContain(
      'spreadsheet: sheet "Sheet1" matches known layout french_fnb_export'
    );
  });

  it('reports no layout for other workbooks', async () => {
    const ctx = makeContext(null);
    const result = await knownLayoutSpreadsheetExtractor.extract(
      source('produce.xlsx', workbookBytes(GENERIC_ROWS)),
      ctx
    );

    expect(result.metadata.layoutId).toBeUndefined();
    expect(result.records).toEqual([]);
    expect(ctx.trace.lines()).toContain('spreadsheet: no known layout matched');
  });
});

describe('GenericSpreadsheetExtractor', () => {
  it('maps columns from header keywords', async () => {
    const ctx = makeContext(null);
    const result = await genericSpreadsheetExtractor.extract(
      source('produce.xlsx', workbookBytes(GENERIC_ROWS)),
      ctx
    );

    expect(result.records).toEqual([
      {
        vendor: 'Unknown',
        date: '2025-10-05',
        item_name: 'ミニトマト',
        quantity: 3,
        unit: 'pack',
        unit_price: 450,
        amount: 1350,
      },
      {
        vendor: 'Unknown',
        date: '2025-10-06',
        item_name: 'ルッコラ',
        quantity: 2,
        unit: 'bag',
        unit_price: 300,
        amount: 600,
      },
    ]);
    expect(ctx.trace.lines()).toContain(
      'spreadsheet: sheet "Sheet1" column roles {date=0, item=1, quantity=2, unit=3, unit_price=4, amount=5}'
    );
  });

  it('reads UTF-8 CSV with a byte-order mark', async () => {
    const csv = Buffer.from('﻿品名,数量,金額\nバター,2,"1,600"\n', 'utf8');
    const result = await genericSpreadsheetExtractor.extract(source('stock.csv', csv), makeContext(null));

    expect(result.records).toEqual([
      {
        vendor: 'Unknown',
        date: '2025-10-01',
        item_name: 'バター',
        quantity: 2,
        unit: 'pc',
        unit_price: 800,
        amount: 1600,
      },
    ]);
  });

  it('skips a sheet without an amount column', async () => {
    const ctx = makeContext(null);
    const result = await genericSpreadsheetExtractor.extract(
      source('notes.xlsx', workbookBytes([['商品名', 'メモ'], ['バター', '冷蔵']])),
      ctx
    );

    expect(result.records).toEqual([]);
    expect(ctx.trace.lines()).toContain('spreadsheet: sheet "Sheet1" skipped, no item or amount column');
  });
});
