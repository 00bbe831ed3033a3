/**
 * Meat Shop Hirayama Extraction Patterns
 *
 * Delivery lines look like (OCR text, '|' column rules included):
 *   25/10/09 002077 |和牛ヒレ | 8% 6.30 kg 12,000 75,600
 * i.e. YY/MM/DD, slip number, item, tax rate, quantity in kg, unit price,
 * amount. Undated lines belong to the last date seen.
 */

/** YY/MM/DD delivery date */
export const LINE_DATE_PATTERN = /(\d{2})\/(\d{2})\/(\d{2})/;

/** Decimal quantity in kg, with the OCR misread 'ke' */
export const QUANTITY_PATTERN = /(\d+\.\d+)\s*(?:kg|ke)/gi;

/** Money-like numbers: grouped thousands or plain digits */
const NUMBER_TOKEN_PATTERN = /\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?/g;

export const ITEM_NAME = '和牛ヒレ';

export function lineDate(line: string): string | null {
  const m = LINE_DATE_PATTERN.exec(line);
  if (!m) return null;
  return `20${m[1]}-${m[2]}-${m[3]}`;
}

export interface QuantityMatch {
  quantity: number;
  /** Text after the quantity token */
  rest: string;
}

/**
 * Every kg quantity on a line, in order, with the text that follows it.
 */
export function quantityMatches(line: string): QuantityMatch[] {
  const matches: QuantityMatch[] = [];
  for (const m of line.matchAll(QUANTITY_PATTERN)) {
    const index = m.index ?? 0;
    matches.push({
      quantity: Number(m[1]),
      rest: line.slice(index + m[0].length),
    });
  }
  return matches;
}

/**
 * Numeric tokens in a text fragment, as printed.
 */
export function numberTokens(fragment: string): string[] {
  return Array.from(fragment.matchAll(NUMBER_TOKEN_PATTERN), (m) => m[0]);
}
