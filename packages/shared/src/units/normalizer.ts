/**
 * Unit & Quantity Normalizer
 *
 * Maps localized unit spellings onto the fixed unit vocabulary and converts
 * quantities to and from grams. Unknown and container units convert through a
 * caller-supplied grams-per-unit default rather than as one gram each.
 */

import { readJsonAsset } from '../assets';
import { CONTAINER_UNITS, VOLUME_UNITS, WEIGHT_UNITS } from '../types';
import type { Unit, WeightUnit } from '../types';

const ALL_UNITS: readonly string[] = [...WEIGHT_UNITS, ...VOLUME_UNITS, ...CONTAINER_UNITS];

export function isUnit(value: string): value is Unit {
  return ALL_UNITS.includes(value);
}

export function isWeightUnit(unit: string): unit is WeightUnit {
  const weightUnits: readonly string[] = WEIGHT_UNITS;
  return weightUnits.includes(unit);
}

const GRAMS_PER_WEIGHT_UNIT: Record<WeightUnit, number> = {
  kg: 1000,
  '100g': 100,
  g: 1,
};

let synonyms: Map<string, Unit> | null = null;

function getSynonyms(): Map<string, Unit> {
  if (!synonyms) {
    const table = readJsonAsset('data', 'units.json');
    const map = new Map<string, Unit>();
    if (typeof table === 'object' && table !== null) {
      for (const [spelling, unit] of Object.entries(table)) {
        if (typeof unit === 'string' && isUnit(unit)) {
          map.set(spelling.toLowerCase(), unit);
        }
      }
    }
    synonyms = map;
  }
  return synonyms;
}

/**
 * Canonical unit for a raw token, or null when the token is not in the
 * synonym table. Matching is exact after trimming and lower-casing.
 */
export function normalizeUnit(raw: string | null | undefined): Unit | null {
  if (!raw) return null;
  const key = raw.trim().toLowerCase();
  if (!key) return null;
  return getSynonyms().get(key) ?? null;
}

function gramsPerUnit(unit: string, defaultGramsPerUnit: number): number {
  const canonical = normalizeUnit(unit);
  if (canonical && isWeightUnit(canonical)) {
    return GRAMS_PER_WEIGHT_UNIT[canonical];
  }
  return defaultGramsPerUnit;
}

/**
 * Quantity in grams. Anything that is not a weight unit (containers, volumes,
 * unknown tokens) is multiplied by `defaultGramsPerUnit`.
 */
export function toGrams(quantity: number, unit: string, defaultGramsPerUnit: number): number {
  return quantity * gramsPerUnit(unit, defaultGramsPerUnit);
}

/**
 * Inverse of toGrams for the same unit and default.
 */
export function fromGrams(grams: number, unit: string, defaultGramsPerUnit: number): number {
  return grams / gramsPerUnit(unit, defaultGramsPerUnit);
}
