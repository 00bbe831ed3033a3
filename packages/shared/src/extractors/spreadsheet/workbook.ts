/**
 * Workbook reading (SheetJS)
 *
 * Turns an .xlsx/.xls/.csv upload into row grids, one per sheet. CSV is
 * decoded as UTF-8 text first so Japanese headers survive.
 */

import * as XLSX from 'xlsx';

export type Cell = string | number | boolean | Date | null;
export type Row = Cell[];

export interface SheetRows {
  name: string;
  rows: Row[];
}

function isCell(value: unknown): value is Cell {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

function toRow(value: unknown): Row {
  if (!Array.isArray(value)) return [];
  return value.map((cell: unknown) => (isCell(cell) ? cell : null));
}

export function readWorkbook(bytes: Buffer, filename: string): XLSX.WorkBook {
  if (filename.toLowerCase().endsWith('.csv')) {
    const text = bytes.toString('utf8').replace(/^\uFEFF/, '');
    return XLSX.read(text, { type: 'string', cellDates: true, raw: true });
  }
  return XLSX.read(bytes, { type: 'buffer', cellDates: true });
}

/**
 * Every sheet as an array of rows (header: 1), blank rows dropped.
 *
 * @throws Error if the bytes are not a readable workbook
 */
export function readSheets(bytes: Buffer, filename: string): SheetRows[] {
  const workbook = readWorkbook(bytes, filename);

  return workbook.SheetNames.map((name) => {
    const sheet = workbook.Sheets[name];
    const rows = sheet
      ? XLSX.utils
          .sheet_to_json<unknown>(sheet, { header: 1, raw: true, defval: null, blankrows: false })
          .map(toRow)
      : [];
    return { name, rows };
  });
}

export function cellText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return '';
  if (cell instanceof Date) return cell.toISOString();
  return String(cell).trim();
}
