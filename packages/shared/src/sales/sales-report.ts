/**
 * POS Sales Report Extraction
 *
 * Reads the item sales CSV exported by the POS system into sales rows. The
 * export has a free-form header block (report period, outlet), then a
 * `Code,Name,...` header row, then item rows interleaved with department
 * headings and subtotal lines.
 */

import { logger } from '../logger';
import { parseAmount } from '../numbers';
import { cellText, readSheets, type Row } from '../extractors/spreadsheet/workbook';
import type { SalesRecord } from '../types';

const HEADER_SCAN_LINES = 10;
const MIN_HEADER_FIELDS = 8;
const MIN_DATA_FIELDS = 11;

const SKIP_MARKERS = [
  'Total:',
  'Sub Total:',
  'Outlet Total:',
  'Shop Total:',
  'Grand Total',
  'END OF REPORT',
  'Department:',
  'Outlet:',
  'Check Type:',
];

const COLUMNS = {
  code: 0,
  name: 1,
  category: 3,
  price: 5,
  quantity: 6,
  gross: 7,
  discount: 8,
  net: 10,
} as const;

/** Cells up to the last non-empty one */
function fields(row: Row): string[] {
  const texts = row.map((cell) => cellText(cell));
  let end = texts.length;
  while (end > 0 && texts[end - 1] === '') end--;
  return texts.slice(0, end);
}

/**
 * Report month (YYYY-MM) from the first YYYY-MM-DD in the header block.
 */
export function findReportMonth(rows: Row[]): string | null {
  for (const row of rows.slice(0, HEADER_SCAN_LINES)) {
    const m = /(\d{4})-(\d{2})-\d{2}/.exec(fields(row).join(','));
    if (m) return `${m[1]}-${m[2]}`;
  }
  return null;
}

function isHeaderRow(f: string[]): boolean {
  return f.length >= MIN_HEADER_FIELDS && f[0].includes('Code') && f[1].includes('Name');
}

/** Empty cells count as zero; anything else must be numeric */
function numberField(value: string): number | null {
  if (value === '') return 0;
  return parseAmount(value);
}

function toSalesRecord(f: string[], month: string | null): SalesRecord | null {
  const code = f[COLUMNS.code];
  const name = f[COLUMNS.name];
  if (!code || !name || code === 'Code') return null;

  const price = numberField(f[COLUMNS.price]);
  const quantity = numberField(f[COLUMNS.quantity]);
  const gross = numberField(f[COLUMNS.gross]);
  const discount = numberField(f[COLUMNS.discount]);
  const net = numberField(f[COLUMNS.net]);
  if (price === null || quantity === null || gross === null || discount === null || net === null) {
    return null;
  }

  return {
    code,
    name,
    category: f[COLUMNS.category] ?? '',
    quantity,
    price,
    gross_total: gross,
    discount,
    net_total: net,
    month,
  };
}

/**
 * Parse a POS sales CSV. An unreadable file yields an empty list.
 */
export function extractSalesReport(bytes: Buffer, filename = 'sales.csv'): SalesRecord[] {
  let rows: Row[];
  try {
    rows = readSheets(bytes, filename)[0]?.rows ?? [];
  } catch (error) {
    logger.warn('Sales report could not be read', {
      filename,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  const month = findReportMonth(rows);
  const records: SalesRecord[] = [];
  let inDataSection = false;

  for (const row of rows) {
    const f = fields(row);

    if (isHeaderRow(f)) {
      inDataSection = true;
      continue;
    }
    if (!inDataSection) continue;

    const joined = f.join(' ');
    if (SKIP_MARKERS.some((marker) => joined.includes(marker))) continue;
    if (f.length < MIN_DATA_FIELDS) continue;

    const record = toSalesRecord(f, month);
    if (record) records.push(record);
  }

  logger.info('Sales report parsed', { filename, month, record_count: records.length });
  return records;
}
