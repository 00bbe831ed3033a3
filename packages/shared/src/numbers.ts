/**
 * Numeric parsing for invoice amounts and quantities.
 *
 * Amounts on yen invoices use ',' only as a thousands separator and carry a
 * currency mark in several spellings (¥, ￥, \, 円).
 */

function stripNbsp(s: string): string {
  return s.replace(/\u00A0/g, ' ');
}

/**
 * Fold full-width digits and symbols to ASCII (NFKC), so '４２９，０００'
 * and '429,000' parse the same.
 */
export function foldWidth(s: string): string {
  return s.normalize('NFKC');
}

/**
 * Parse a money-like or quantity-like value.
 *
 * Accepts finite numbers as-is. Strings may carry a currency mark,
 * thousands commas, surrounding whitespace, a leading minus, a leading '▲'
 * (Japanese negative marker) or accounting parentheses.
 *
 * @returns the number, or null when the input is not numeric
 */
export function parseAmount(input: unknown): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }
  if (typeof input !== 'string') return null;

  let s = foldWidth(stripNbsp(input)).trim();
  let negative = false;

  if (/^\(.*\)$/.test(s)) {
    negative = true;
    s = s.slice(1, -1).trim();
  }
  if (s.startsWith('▲') || s.startsWith('△')) {
    negative = true;
    s = s.slice(1).trim();
  }

  const cleaned = s
    .replace(/[¥\\$円]/g, '')
    .replace(/,/g, '')
    .replace(/\s+/g, '');

  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return null;

  const n = Number(cleaned);
  if (!Number.isFinite(n)) return null;
  return negative ? -Math.abs(n) : n;
}

/**
 * Round to a fixed number of decimals (default 2).
 */
export function roundTo(n: number, dp = 2): number {
  const p = Math.pow(10, dp);
  return Math.round(n * p) / p;
}
