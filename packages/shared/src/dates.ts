/**
 * Calendar date helpers. All dates leave this module as YYYY-MM-DD strings.
 */

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDate(year: number, month: number, day: number): string {
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * True for a YYYY-MM-DD string naming a real calendar day.
 */
export function isIsoDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function firstOfCurrentMonth(now: Date = new Date()): string {
  return formatDate(now.getFullYear(), now.getMonth() + 1, 1);
}

/**
 * Document-level year and month from a `YYYY年M月` header, or null.
 */
export function findHeaderMonth(text: string): { year: number; month: number } | null {
  const m = /(\d{4})年\s*(\d{1,2})月/.exec(text);
  if (!m) return null;
  const month = Number(m[2]);
  if (month < 1 || month > 12) return null;
  return { year: Number(m[1]), month };
}

/**
 * Fallback date for a document: the first of the header month, else the
 * first of the current month.
 */
export function headerFallbackDate(text: string, now: Date = new Date()): string {
  const header = findHeaderMonth(text);
  return header ? formatDate(header.year, header.month, 1) : firstOfCurrentMonth(now);
}

/**
 * Normalize a date-like cell or field to YYYY-MM-DD.
 *
 * Accepts Date objects, ISO strings with an optional time part,
 * `YYYY/M/D`, `YYYY.M.D` and `YYYY年M月D日`. Anything else gives null.
 */
export function toIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return formatDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }
  if (typeof value !== 'string') return null;

  const s = value.normalize('NFKC').trim();
  const m =
    /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T\s].*)?$/.exec(s) ??
    /^(\d{4})年\s*(\d{1,2})月\s*(\d{1,2})日/.exec(s);
  if (!m) return null;

  const iso = formatDate(Number(m[1]), Number(m[2]), Number(m[3]));
  return isIsoDate(iso) ? iso : null;
}
