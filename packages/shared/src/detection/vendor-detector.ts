/**
 * Vendor Detector & Strategy Selector
 *
 * First-match-wins lookup over the ordered vendor table, and the mapping
 * from file kind and vendor onto an ExtractionPlan. Both are pure.
 */

import type { VendorTable } from '../reference/vendor-table';
import type { ExtractionPlan, VendorEntry } from '../types';

export const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls', '.csv'] as const;

export function isSpreadsheetFilename(filename: string): boolean {
  const lower = filename.toLowerCase();
  return SPREADSHEET_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * First vendor, in table order, with a detection substring inside
 * lower(filename + " " + text). No scoring.
 */
export function detectVendor(
  filename: string,
  text: string,
  table: VendorTable
): VendorEntry | null {
  const haystack = `${filename} ${text}`.toLowerCase();

  for (const vendor of table.vendors) {
    if (vendor.patterns.some((pattern) => haystack.includes(pattern.toLowerCase()))) {
      return vendor;
    }
  }
  return null;
}

export interface StrategyInput {
  filename: string;
  /** Text layer of a PDF; empty for spreadsheets and unreadable documents */
  text: string;
}

/**
 * Choose the extraction plan for a document.
 *
 * Spreadsheets are routed by extension; their vendor is looked up by
 * filename only and used for labeling. Everything else goes by vendor
 * strategy, with unmatched documents sent to vision.
 */
export function selectStrategy(input: StrategyInput, table: VendorTable): ExtractionPlan {
  if (isSpreadsheetFilename(input.filename)) {
    return { kind: 'spreadsheet', vendor: detectVendor(input.filename, '', table) };
  }

  const vendor = detectVendor(input.filename, input.text, table);
  if (!vendor) {
    return { kind: 'vision', vendor: null };
  }

  switch (vendor.strategy) {
    case 'hirayama':
    case 'french_fnb':
    case 'maruyata':
      return { kind: 'regex', parser: vendor.strategy, vendor };
    case 'ai':
      return { kind: 'vision', vendor };
  }
}
