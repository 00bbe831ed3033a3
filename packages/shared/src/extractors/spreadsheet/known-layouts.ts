/**
 * Known Spreadsheet Layouts
 *
 * Vendor exports with fixed column positions. These take precedence over
 * header auto-detection and are recognized by filename or a header cell.
 */

import { cellText, type Row } from './workbook';

export interface KnownLayoutColumns {
  date: number;
  item: number;
  unitPrice: number;
  quantity: number;
  unit: number;
  amount: number;
}

export interface KnownLayout {
  id: string;
  vendorName: string;
  columns: KnownLayoutColumns;
  /** Item names containing any of these are freight, not goods */
  skipItemKeywords: string[];
  matches(filename: string, header: Row): boolean;
}

/**
 * French F&B Japan B2B platform export: '[商品名]' style bracketed headers,
 * 36+ columns.
 */
export const FRENCH_FNB_EXPORT: KnownLayout = {
  id: 'french_fnb_export',
  vendorName: 'French F&B Japan',
  columns: { date: 15, item: 30, unitPrice: 32, quantity: 33, unit: 34, amount: 35 },
  skipItemKeywords: ['運賃'],
  matches(filename, header) {
    const lower = filename.toLowerCase();
    if (lower.includes('french') || lower.includes('fnb')) return true;
    return header.some((cell) => cellText(cell).includes('[商品名]'));
  },
};

export const KNOWN_LAYOUTS: readonly KnownLayout[] = [FRENCH_FNB_EXPORT];

export function findKnownLayout(filename: string, header: Row): KnownLayout | null {
  return KNOWN_LAYOUTS.find((layout) => layout.matches(filename, header)) ?? null;
}
