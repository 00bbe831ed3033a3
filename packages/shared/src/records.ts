/**
 * Record finalization
 *
 * The single place where document-level defaults are applied to raw line
 * items, and where zero and credit lines are filtered out.
 */

import { isIsoDate, toIsoDate } from './dates';
import { roundTo } from './numbers';
import { normalizeVendorName } from './reference/vendor-table';
import { normalizeUnit } from './units/normalizer';
import type { CanonicalRecord, FinalizeOptions, RawLineItem, RecordDefaults } from './types';

function finiteOrNull(n: number | null | undefined): number | null {
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

/**
 * Convert one raw item into a canonical record.
 *
 * Returns null when the item has no name or no finite amount. Missing
 * vendor and date come from `defaults`; unit defaults to 'pc' (unknown
 * tokens too), quantity to 1, and a missing or zero unit price is
 * back-computed as amount / quantity.
 */
export function fillDefaults(raw: RawLineItem, defaults: RecordDefaults): CanonicalRecord | null {
  const itemName = (raw.item_name ?? '').trim();
  if (!itemName) return null;

  const amount = finiteOrNull(raw.amount);
  if (amount === null) return null;

  const quantity = finiteOrNull(raw.quantity) ?? 1;
  const givenPrice = finiteOrNull(raw.unit_price);
  const unitPrice =
    givenPrice !== null && givenPrice !== 0
      ? givenPrice
      : quantity !== 0
        ? roundTo(amount / quantity, 2)
        : amount;

  const rawDate = raw.date ? toIsoDate(raw.date) : null;

  return {
    vendor: normalizeVendorName(raw.vendor || defaults.vendor),
    date: rawDate && isIsoDate(rawDate) ? rawDate : defaults.date,
    item_name: itemName,
    quantity,
    unit: normalizeUnit(raw.unit) ?? 'pc',
    unit_price: unitPrice,
    amount,
  };
}

/**
 * Fill defaults on every raw item, then drop zero-amount and zero-quantity
 * records. Negative amounts are credits: dropped unless `keepCredits`, in
 * which case the quantity is made non-negative. Order is preserved.
 */
export function finalizeRecords(
  items: readonly RawLineItem[],
  defaults: RecordDefaults,
  options: FinalizeOptions = {}
): CanonicalRecord[] {
  const records: CanonicalRecord[] = [];

  for (const item of items) {
    const record = fillDefaults(item, defaults);
    if (!record) continue;
    if (record.amount === 0 || record.quantity === 0) continue;

    if (record.amount < 0 && !options.keepCredits) continue;
    records.push(record.quantity < 0 ? { ...record, quantity: Math.abs(record.quantity) } : record);
  }

  return records;
}

/**
 * Composite-key set for dropping repeated lines within one parse. Create one
 * per call; never share across documents.
 */
export class DedupKeySet {
  private readonly seen = new Set<string>();

  /**
   * True the first time a key is seen, false for every repeat.
   */
  accept(...parts: Array<string | number | null | undefined>): boolean {
    const key = parts.map((p) => (p === null || p === undefined ? '' : String(p))).join('|');
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
