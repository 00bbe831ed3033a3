/**
 * Number/date parsing and record finalization tests
 */

import {
  DedupKeySet,
  fillDefaults,
  finalizeRecords,
  headerFallbackDate,
  normalizeVendorName,
  parseAmount,
  toIsoDate,
  type RecordDefaults,
} from '@ledgerline/shared';

const DEFAULTS: RecordDefaults = { vendor: 'Maruyata', date: '2025-10-01' };

describe('parseAmount', () => {
  it('parses yen amounts with marks and thousands separators', () => {
    expect(parseAmount('¥429,000')).toBe(429000);
    expect(parseAmount('\\12,000')).toBe(12000);
    expect(parseAmount('7,000円')).toBe(7000);
    expect(parseAmount('４２９，０００')).toBe(429000);
    expect(parseAmount(' 1.5 ')).toBe(1.5);
  });

  it('reads negative markers', () => {
    expect(parseAmount('▲1,200')).toBe(-1200);
    expect(parseAmount('(500)')).toBe(-500);
    expect(parseAmount('-30')).toBe(-30);
  });

  it('rejects non-numeric input', () => {
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('')).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount(Number.NaN)).toBeNull();
  });
});

describe('dates', () => {
  it('normalizes common invoice date spellings', () => {
    expect(toIsoDate('2025/10/3')).toBe('2025-10-03');
    expect(toIsoDate('2025-10-03T09:00:00Z')).toBe('2025-10-03');
    expect(toIsoDate('2025年10月3日')).toBe('2025-10-03');
    expect(toIsoDate(new Date(2025, 9, 3))).toBe('2025-10-03');
  });

  it('rejects impossible or unrecognized dates', () => {
    expect(toIsoDate('2025-02-30')).toBeNull();
    expect(toIsoDate('10/03')).toBeNull();
    expect(toIsoDate(20251003)).toBeNull();
  });

  it('falls back to the header month, then the current month', () => {
    expect(headerFallbackDate('請求書 2025年 9月分')).toBe('2025-09-01');
    expect(headerFallbackDate('no header here', new Date(2026, 2, 17))).toBe('2026-03-01');
  });
});

describe('normalizeVendorName', () => {
  it('maps raw names to display names by exact match, then containment', () => {
    expect(normalizeVendorName('有限会社浅見水産')).toBe('Asami Suisan');
    expect(normalizeVendorName('French F&B Japan')).toBe('French F&B Japan');
    expect(normalizeVendorName('株式会社ミートショップひら山 本店')).toBe('Meat Shop Hirayama');
  });

  it('passes unknown names through and labels empty ones', () => {
    expect(normalizeVendorName('  Corner Bakery ')).toBe('Corner Bakery');
    expect(normalizeVendorName('')).toBe('Unknown');
    expect(normalizeVendorName(null)).toBe('Unknown');
  });
});

describe('fillDefaults', () => {
  it('fills vendor, date, quantity and unit, and back-computes unit price', () => {
    const record = fillDefaults({ item_name: ' 真鯛 ', amount: 7000, quantity: 2 }, DEFAULTS);

    expect(record).toEqual({
      vendor: 'Maruyata',
      date: '2025-10-01',
      item_name: '真鯛',
      quantity: 2,
      unit: 'pc',
      unit_price: 3500,
      amount: 7000,
    });
  });

  it('keeps the item date and a non-zero unit price', () => {
    const record = fillDefaults(
      { item_name: 'x', amount: 100, quantity: 3, unit_price: 40, unit: 'kg', date: '2025/10/09' },
      DEFAULTS
    );

    expect(record?.date).toBe('2025-10-09');
    expect(record?.unit_price).toBe(40);
    expect(record?.unit).toBe('kg');
  });

  it('rounds a back-computed unit price to two decimals', () => {
    const record = fillDefaults({ item_name: 'x', amount: 100, quantity: 3, unit_price: 0 }, DEFAULTS);
    expect(record?.unit_price).toBe(33.33);
  });

  it('maps unknown unit tokens to pc', () => {
    expect(fillDefaults({ item_name: 'x', amount: 1, unit: 'smidgen' }, DEFAULTS)?.unit).toBe('pc');
  });

  it('rejects items without a name or an amount', () => {
    expect(fillDefaults({ item_name: '', amount: 100 }, DEFAULTS)).toBeNull();
    expect(fillDefaults({ item_name: 'x', amount: null }, DEFAULTS)).toBeNull();
  });
});

describe('finalizeRecords', () => {
  const items = [
    { item_name: 'a', amount: 100 },
    { item_name: 'zero', amount: 0 },
    { item_name: 'no qty', amount: 100, quantity: 0 },
    { item_name: 'credit', amount: -500, quantity: -1 },
    { item_name: 'b', amount: 200 },
  ];

  it('drops zero-amount, zero-quantity and credit lines, preserving order', () => {
    const records = finalizeRecords(items, DEFAULTS);
    expect(records.map((r) => r.item_name)).toEqual(['a', 'b']);
  });

  it('keeps credits on request with a non-negative quantity', () => {
    const records = finalizeRecords(items, DEFAULTS, { keepCredits: true });
    const credit = records.find((r) => r.item_name === 'credit');

    expect(records.map((r) => r.item_name)).toEqual(['a', 'credit', 'b']);
    expect(credit?.amount).toBe(-500);
    expect(credit?.quantity).toBe(1);
  });

  it('never emits a zero amount', () => {
    const records = finalizeRecords(items, DEFAULTS, { keepCredits: true });
    expect(records.every((r) => r.amount !== 0)).toBe(true);
  });
});

describe('DedupKeySet', () => {
  it('accepts a key once', () => {
    const seen = new DedupKeySet();

    expect(seen.accept('2025-10-09', 6.3, 75600)).toBe(true);
    expect(seen.accept('2025-10-09', 6.3, 75600)).toBe(false);
    expect(seen.accept('2025-10-09', 6.3, 75601)).toBe(true);
    expect(seen.size).toBe(2);
  });
});
