/**
 * Vendor Reference Tables
 *
 * Read-only reference data consumed by the detector, the regex parsers and
 * record finalization:
 * - data/vendors.json: ordered vendor list with detection substrings,
 *   strategy id and parser tuning
 * - data/vendor-names.json: raw vendor strings to display names
 */

import { readJsonAsset } from '../assets';
import { isVendorTableFile, validateVendorTable } from '../schemas';
import type { VendorEntry, VendorTuning } from '../types';

export class VendorTable {
  constructor(readonly vendors: readonly VendorEntry[]) {}

  /**
   * Build a table from parsed JSON, validating it against
   * vendor_table.schema.json.
   *
   * @throws Error if the data does not match the schema
   */
  static fromJson(data: unknown): VendorTable {
    if (!isVendorTableFile(data)) {
      const result = validateVendorTable(data);
      throw new Error(`Invalid vendor table: ${(result.errors ?? []).join('; ')}`);
    }
    return new VendorTable(data.vendors);
  }

  findByName(name: string): VendorEntry | undefined {
    return this.vendors.find((v) => v.name === name);
  }

  tuningFor(name: string): VendorTuning {
    return this.findByName(name)?.tuning ?? {};
  }
}

let defaultTable: VendorTable | null = null;

/**
 * The packaged vendor table, loaded and validated on first use.
 */
export function getVendorTable(): VendorTable {
  if (!defaultTable) {
    defaultTable = VendorTable.fromJson(readJsonAsset('data', 'vendors.json'));
  }
  return defaultTable;
}

// ============================================================================
// Display names
// ============================================================================

let displayNames: Array<[string, string]> | null = null;

function getDisplayNames(): Array<[string, string]> {
  if (!displayNames) {
    const table = readJsonAsset('data', 'vendor-names.json');
    const entries: Array<[string, string]> = [];
    if (typeof table === 'object' && table !== null) {
      for (const [raw, display] of Object.entries(table)) {
        if (typeof display === 'string') entries.push([raw, display]);
      }
    }
    displayNames = entries;
  }
  return displayNames;
}

/**
 * Map a raw vendor string (often Japanese, as printed on the invoice) to its
 * display name.
 *
 * Exact lookup first, then containment either way. Unmatched names pass
 * through trimmed; empty input gives 'Unknown'.
 */
export function normalizeVendorName(raw: string | null | undefined): string {
  const name = (raw ?? '').trim();
  if (!name) return 'Unknown';

  const names = getDisplayNames();
  const exact = names.find(([key]) => key === name);
  if (exact) return exact[1];

  const partial = names.find(([key]) => name.includes(key) || key.includes(name));
  if (partial) return partial[1];

  return name;
}
