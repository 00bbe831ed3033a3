import { isIsoDate, type DateRange } from '@ledgerline/shared';

export type RangeResult = { ok: true; range: DateRange } | { ok: false; message: string };

function single(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read `start` and `end` (YYYY-MM-DD, inclusive) from a query string.
 */
export function parseDateRange(query: Record<string, unknown>): RangeResult {
  const start = single(query.start);
  const end = single(query.end);

  if (!start || !end) {
    return { ok: false, message: 'start and end are required (YYYY-MM-DD)' };
  }
  if (!isIsoDate(start) || !isIsoDate(end)) {
    return { ok: false, message: 'start and end must be dates in YYYY-MM-DD form' };
  }
  if (start > end) {
    return { ok: false, message: 'start must not be after end' };
  }
  return { ok: true, range: { start, end } };
}
