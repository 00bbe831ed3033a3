/**
 * Maruyata Extraction Patterns
 *
 * Delivery lines:
 *   10/03 本まぐろ赤身 1.2 kg 8,000 9,600
 *   10月3日 真鯛 2 尾 3,500 7,000
 * i.e. an optional MM/DD or M月D日 date, item text, quantity, unit token,
 * unit price, amount. The year comes from the statement header.
 */

/** Leading MM/DD or M月D日 date */
export const LINE_DATE_PATTERN = /^\s*(?:(\d{1,2})\/(\d{1,2})|(\d{1,2})月\s*(\d{1,2})日)/;

/** item, quantity, unit token, unit price, amount */
export const ITEM_LINE_PATTERN =
  /^\s*(.+?)\s+(\d+(?:\.\d+)?)\s*([^\s\d,.]+)\s+([\d,]+(?:\.\d+)?)\s+([\d,]+(?:\.\d+)?)\s*$/;

export interface LineDate {
  month: number;
  day: number;
  /** Remainder of the line after the date token */
  rest: string;
}

export function lineDate(line: string): LineDate | null {
  const m = LINE_DATE_PATTERN.exec(line);
  if (!m) return null;
  const month = Number(m[1] ?? m[3]);
  const day = Number(m[2] ?? m[4]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return { month, day, rest: line.slice(m[0].length) };
}

export interface ItemLine {
  itemName: string;
  quantity: string;
  unit: string;
  unitPrice: string;
  amount: string;
}

export function itemLine(text: string): ItemLine | null {
  const m = ITEM_LINE_PATTERN.exec(text);
  if (!m) return null;
  return { itemName: m[1].trim(), quantity: m[2], unit: m[3], unitPrice: m[4], amount: m[5] };
}
