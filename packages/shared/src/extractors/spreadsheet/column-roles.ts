/**
 * Column-role detection for spreadsheets of unknown layout.
 *
 * Each header is tested against the keyword groups in data/column-keywords.json
 * in priority order and takes the first role that matches and is still free.
 */

import { readJsonAsset } from '../../assets';
import { parseAmount } from '../../numbers';
import { cellText, type Row } from './workbook';

export const COLUMN_ROLES = ['item', 'unit_price', 'quantity', 'unit', 'amount', 'date'] as const;
export type ColumnRole = (typeof COLUMN_ROLES)[number];

export type ColumnMap = Partial<Record<ColumnRole, number>>;

export interface ColumnKeywords {
  priority: ColumnRole[];
  keywords: Record<ColumnRole, string[]>;
}

function isColumnRole(value: unknown): value is ColumnRole {
  return typeof value === 'string' && (COLUMN_ROLES as readonly string[]).includes(value);
}

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

let cached: ColumnKeywords | null = null;

export function getColumnKeywords(): ColumnKeywords {
  if (cached) return cached;

  const data = readJsonAsset('data', 'column-keywords.json');
  const priority: ColumnRole[] = [];
  const keywords: Record<ColumnRole, string[]> = {
    item: [],
    unit_price: [],
    quantity: [],
    unit: [],
    amount: [],
    date: [],
  };

  if (typeof data === 'object' && data !== null) {
    if ('priority' in data && Array.isArray(data.priority)) {
      for (const role of data.priority) {
        if (isColumnRole(role) && !priority.includes(role)) priority.push(role);
      }
    }
    if ('keywords' in data && typeof data.keywords === 'object' && data.keywords !== null) {
      for (const [role, list] of Object.entries(data.keywords)) {
        if (isColumnRole(role)) keywords[role] = toStringList(list).map((k) => k.toLowerCase());
      }
    }
  }

  cached = { priority: priority.length > 0 ? priority : [...COLUMN_ROLES], keywords };
  return cached;
}

/**
 * Assign roles to header cells. A header takes at most one role, and each
 * role goes to the first header that claims it.
 */
export function detectColumnRoles(
  header: Row,
  table: ColumnKeywords = getColumnKeywords()
): ColumnMap {
  const roles: ColumnMap = {};

  header.forEach((cell, index) => {
    const text = cellText(cell).toLowerCase();
    if (!text) return;

    for (const role of table.priority) {
      if (roles[role] !== undefined) continue;
      if (table.keywords[role].some((keyword) => text.includes(keyword))) {
        roles[role] = index;
        break;
      }
    }
  });

  return roles;
}

/**
 * Item column fallback: the first unassigned column whose cell in the first
 * data row is non-numeric text.
 */
export function fallbackItemColumn(roles: ColumnMap, firstDataRow: Row | undefined): number | null {
  if (!firstDataRow) return null;
  const assigned = new Set(Object.values(roles));

  for (let index = 0; index < firstDataRow.length; index++) {
    if (assigned.has(index)) continue;
    const cell = firstDataRow[index];
    if (typeof cell !== 'string') continue;
    const text = cell.trim();
    if (text && parseAmount(text) === null) return index;
  }
  return null;
}
