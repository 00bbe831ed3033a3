/**
 * French F&B Japan Extraction Patterns
 *
 * Product summary lines (商品別金額表) carry a count token and an amount:
 *   KAVIARI キャビア クリスタル 100g 22缶 ¥429,000
 * The count token sometimes wraps onto the next line. Plain invoice lines
 * end in an amount with no count at all.
 */

import type { Unit } from '../../types';

export interface ProductRule {
  /** Canonical item name for the product */
  itemName: string;
  /** Line matches when it contains any of these */
  anyOf: string[];
  /** ...and, if present, all of these */
  allOf?: string[];
  /** `<count><unit token> <amount>` */
  countPattern: RegExp;
  unit: Unit;
  /** Count is in cans that convert to grams */
  cansToGrams?: boolean;
}

const AMOUNT = String.raw`\s*[¥\\]?\s*([\d,]+)`;

export const CAVIAR_KEYWORDS = ['キャビア', 'KAVIARI', 'キャヴィア'];

export const PRODUCT_RULES: readonly ProductRule[] = [
  {
    itemName: 'KAVIARI キャビア クリスタル 100g',
    anyOf: CAVIAR_KEYWORDS,
    countPattern: new RegExp(String.raw`(\d+)\s*缶` + AMOUNT),
    unit: 'can',
    cansToGrams: true,
  },
  {
    itemName: 'パレット バター 20g',
    anyOf: ['パレット', 'バター', 'ブール'],
    countPattern: new RegExp(String.raw`(\d+)\s*PC` + AMOUNT, 'i'),
    unit: 'pc',
  },
  {
    itemName: '生 スモールジロール',
    anyOf: ['ジロール'],
    countPattern: new RegExp(String.raw`(\d+(?:\.\d+)?)\s*kg` + AMOUNT, 'i'),
    unit: 'kg',
  },
  {
    itemName: 'シャンパン ヴィネガー 500ml',
    anyOf: ['ヴィネガー', 'ビネガー'],
    allOf: ['シャンパン'],
    countPattern: new RegExp(String.raw`(\d+)\s*本` + AMOUNT),
    unit: 'bottle',
  },
];

/** Invoice-format line ending in an amount */
export const TRAILING_AMOUNT_PATTERN = /[¥\\]\s*([\d,]+)\s*$|\s([\d,]{3,})\s*$/;

/** YYYY/MM/DD date token */
export const LINE_DATE_PATTERN = /(\d{4})\/(\d{1,2})\/(\d{1,2})/;

export function matchProduct(line: string): ProductRule | null {
  return (
    PRODUCT_RULES.find(
      (rule) =>
        rule.anyOf.some((k) => line.includes(k)) &&
        (rule.allOf ?? []).every((k) => line.includes(k))
    ) ?? null
  );
}

export function isCaviar(name: string): boolean {
  return CAVIAR_KEYWORDS.some((k) => name.includes(k));
}
