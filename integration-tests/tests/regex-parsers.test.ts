/**
 * Vendor Regex Parser Tests
 *
 * Hirayama, French F&B and Maruyata parsers over text-layer samples.
 */

import {
  frenchFnbExtractor,
  hirayamaExtractor,
  maruyataExtractor,
  type DocumentSource,
} from '@ledgerline/shared';
import { makeContext, textLayerOf } from './helpers';

function pdfSource(text: string): DocumentSource {
  return { filename: 'invoice.pdf', bytes: Buffer.alloc(0), textLayer: textLayerOf(text) };
}

describe('HirayamaExtractor', () => {
  const STATEMENT = [
    'ミートショップひら山',
    '2025年10月 御請求書',
    '25/10/09 002077 |和牛ヒレ | 8% 6.30 kg 12,000 75,600',
    '25/10/09 002077 |和牛ヒレ | 8% 6.30 kg 12,000 75,600',
    '25/10/16 002080 和牛ヒレ 8% 5.85kg 70,200',
    '25/10/23 002091 和牛ヒレ 8% 7.10 ke',
    '合計 12.50 kg 221,000',
  ].join('\n');

  it('parses dated kg lines and drops the doubled one', async () => {
    const ctx = makeContext('Meat Shop Hirayama');
    const result = await hirayamaExtractor.extract(pdfSource(STATEMENT), ctx);

    expect(result.records).toEqual([
      {
        vendor: 'Meat Shop Hirayama',
        date: '2025-10-09',
        item_name: '和牛ヒレ',
        quantity: 6.3,
        unit: 'kg',
        unit_price: 12000,
        amount: 75600,
      },
      {
        vendor: 'Meat Shop Hirayama',
        date: '2025-10-16',
        item_name: '和牛ヒレ',
        quantity: 5.85,
        unit: 'kg',
        unit_price: 12000,
        amount: 70200,
      },
      {
        vendor: 'Meat Shop Hirayama',
        date: '2025-10-23',
        item_name: '和牛ヒレ',
        quantity: 7.1,
        unit: 'kg',
        unit_price: 12000,
        amount: 85200,
      },
    ]);
    expect(ctx.trace.lines()).toContain('hirayama: 1 duplicate line(s) dropped');
    expect(ctx.trace.lines()).toContain('hirayama: 3 raw item(s), 3 record(s) kept');
  });

  it('keeps one record when the same beef line repeats in OCR noise', async () => {
    const noisy = '~~ 6.30 kg ... 75,600 ~~\n### 6.30 kg ... 75,600';
    const result = await hirayamaExtractor.extract(pdfSource(noisy), makeContext('Meat Shop Hirayama'));

    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({
      date: '2025-10-01',
      quantity: 6.3,
      unit_price: 12000,
      amount: 75600,
    });
  });

  it('takes the plausible range from vendor tuning', () => {
    const ctx = makeContext(null);
    ctx.vendor = {
      name: 'Meat Shop Hirayama',
      patterns: ['ひら山'],
      strategy: 'hirayama',
      tuning: { plausibleQuantity: { min: 10, max: 20 }, defaultUnitPrice: 1000 },
    };

    const raw = hirayamaExtractor.parseText('12.50 kg\n6.30 kg 75,600', ctx);

    expect(raw.items).toEqual([
      { date: '2025-10-01', item_name: '和牛ヒレ', quantity: 12.5, unit: 'kg', unit_price: 1000, amount: 12500 },
    ]);
  });

  it('is deterministic', () => {
    const first = hirayamaExtractor.parseText(STATEMENT, makeContext('Meat Shop Hirayama'));
    const second = hirayamaExtractor.parseText(STATEMENT, makeContext('Meat Shop Hirayama'));
    expect(second).toEqual(first);
  });

  it('finds nothing in unrelated text', async () => {
    const result = await hirayamaExtractor.extract(
      pdfSource('御請求書\n品名 数量 金額'),
      makeContext('Meat Shop Hirayama')
    );
    expect(result.records).toEqual([]);
  });
});

describe('FrenchFnbExtractor', () => {
  const SUMMARY = [
    'フレンチ・エフ・アンド・ビー・ジャパン株式会社',
    '商品別金額表 2025年10月',
    'KAVIARI キャビア 22缶 ¥429,000',
    'パレット バター 20g',
    '40PC ¥32,000',
    '生 スモールジロール 1.5kg ¥18,000',
    'シャンパン ヴィネガー 500ml 6本 ¥9,600',
    '送料 ¥1,100',
  ].join('\n');

  it('converts caviar cans to grams', async () => {
    const result = await frenchFnbExtractor.extract(
      pdfSource('KAVIARI キャビア 22缶 ¥429,000'),
      makeContext('French F&B Japan')
    );

    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({
      vendor: 'French F&B Japan',
      item_name: 'KAVIARI キャビア クリスタル 100g',
      quantity: 2200,
      unit: 'g',
      unit_price: 195,
      amount: 429000,
    });
  });

  it('reads every product rule, including a count wrapped onto the next line', async () => {
    const result = await frenchFnbExtractor.extract(pdfSource(SUMMARY), makeContext('French F&B Japan'));

    expect(
      result.records.map((r) => [r.item_name, r.quantity, r.unit, r.unit_price, r.amount, r.date])
    ).toEqual([
      ['KAVIARI キャビア クリスタル 100g', 2200, 'g', 195, 429000, '2025-10-01'],
      ['パレット バター 20g', 40, 'pc', 800, 32000, '2025-10-01'],
      ['生 スモールジロール', 1.5, 'kg', 12000, 18000, '2025-10-01'],
      ['シャンパン ヴィネガー 500ml', 6, 'bottle', 1600, 9600, '2025-10-01'],
    ]);
  });

  it('falls back to one piece at the trailing amount for invoice lines', async () => {
    const result = await frenchFnbExtractor.extract(
      pdfSource('2025/10/05 ブール ドゥ バラット 1,850'),
      makeContext('French F&B Japan')
    );

    expect(result.records).toEqual([
      {
        vendor: 'French F&B Japan',
        date: '2025-10-05',
        item_name: 'パレット バター 20g',
        quantity: 1,
        unit: 'pc',
        unit_price: 1850,
        amount: 1850,
      },
    ]);
  });

  it('drops a repeated product line', () => {
    const raw = frenchFnbExtractor.parseText(
      'KAVIARI キャビア 22缶 ¥429,000\nKAVIARI キャビア 22缶 ¥429,000',
      makeContext('French F&B Japan')
    );
    expect(raw.items).toHaveLength(1);
  });
});

describe('MaruyataExtractor', () => {
  const STATEMENT = [
    '株式会社 丸弥太 納品書',
    '2025年10月',
    '10/03 本まぐろ赤身 1.2 kg 8,000 9,600',
    '10月3日 真鯛 2 尾 3,500 7,000',
    '      甘えび 3 パック 1,200 3,600',
    '10/05 ほうれん草 5 束 200 1,000',
  ].join('\n');

  it('parses dated lines with the header year and skips unknown units', async () => {
    const ctx = makeContext('Maruyata');
    const result = await maruyataExtractor.extract(pdfSource(STATEMENT), ctx);

    expect(result.records).toEqual([
      {
        vendor: 'Maruyata',
        date: '2025-10-03',
        item_name: '本まぐろ赤身',
        quantity: 1.2,
        unit: 'kg',
        unit_price: 8000,
        amount: 9600,
      },
      {
        vendor: 'Maruyata',
        date: '2025-10-03',
        item_name: '真鯛',
        quantity: 2,
        unit: 'pc',
        unit_price: 3500,
        amount: 7000,
      },
      {
        vendor: 'Maruyata',
        date: '2025-10-03',
        item_name: '甘えび',
        quantity: 3,
        unit: 'pack',
        unit_price: 1200,
        amount: 3600,
      },
    ]);
    expect(ctx.trace.lines()).toContain('maruyata: 3 raw item(s), 3 record(s) kept');
  });
});
