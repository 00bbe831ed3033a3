/**
 * Database Queries
 *
 * Date-range reads and deletes over invoice_records and sales_records.
 */

import {
  dbQueryDurationHistogram,
  isRow,
  isUnit,
  logger,
  numericColumn,
  textColumn,
  type CanonicalRecord,
  type DateRange,
  type DbRow,
  type Queryable,
  type SalesRecord,
} from '@ledgerline/shared';

async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

function rowsOf(rows: unknown[]): DbRow[] {
  return rows.filter(isRow);
}

export function toCanonicalRecord(row: DbRow): CanonicalRecord {
  const unit = textColumn(row, 'unit');
  return {
    vendor: textColumn(row, 'vendor'),
    date: textColumn(row, 'date'),
    item_name: textColumn(row, 'item_name'),
    quantity: numericColumn(row, 'quantity'),
    unit: isUnit(unit) ? unit : 'pc',
    unit_price: numericColumn(row, 'unit_price'),
    amount: numericColumn(row, 'amount'),
  };
}

export function toSalesRecord(row: DbRow): SalesRecord {
  return {
    code: textColumn(row, 'code'),
    name: textColumn(row, 'item_name'),
    category: textColumn(row, 'category'),
    quantity: numericColumn(row, 'quantity'),
    price: numericColumn(row, 'price'),
    gross_total: numericColumn(row, 'gross_total'),
    discount: numericColumn(row, 'discount'),
    net_total: numericColumn(row, 'net_total'),
    month: textColumn(row, 'month'),
  };
}

/**
 * Invoice records dated within range (inclusive), optionally filtered by a
 * case-insensitive vendor substring.
 */
export async function loadInvoiceRecords(
  db: Queryable,
  range: DateRange,
  vendor?: string
): Promise<CanonicalRecord[]> {
  const params: unknown[] = [range.start, range.end];
  let where = 'invoice_date BETWEEN $1 AND $2';
  if (vendor) {
    params.push(`%${vendor}%`);
    where += ` AND vendor ILIKE $${params.length}`;
  }

  const result = await timed('load_invoices', () =>
    db.query(
      `SELECT vendor, to_char(invoice_date, 'YYYY-MM-DD') AS date, item_name,
              quantity, unit, unit_price, amount
       FROM invoice_records
       WHERE ${where}
       ORDER BY invoice_date, id`,
      params
    )
  );
  return rowsOf(result.rows).map(toCanonicalRecord);
}

export async function deleteInvoiceRecords(db: Queryable, range: DateRange): Promise<number> {
  const result = await timed('delete_invoices', () =>
    db.query('DELETE FROM invoice_records WHERE invoice_date BETWEEN $1 AND $2', [
      range.start,
      range.end,
    ])
  );
  const deleted = result.rowCount ?? 0;
  logger.info('Deleted invoice records', { ...range, deleted });
  return deleted;
}

/**
 * Sales rows whose report month starts within range, optionally filtered by
 * a case-insensitive item-name substring.
 */
export async function loadSalesRecords(
  db: Queryable,
  range: DateRange,
  item?: string
): Promise<SalesRecord[]> {
  const params: unknown[] = [range.start, range.end];
  let where = 'sale_date BETWEEN $1 AND $2';
  if (item) {
    params.push(`%${item}%`);
    where += ` AND item_name ILIKE $${params.length}`;
  }

  const result = await timed('load_sales', () =>
    db.query(
      `SELECT code, item_name, category, quantity, price, gross_total, discount,
              net_total, to_char(sale_date, 'YYYY-MM') AS month
       FROM sales_records
       WHERE ${where}
       ORDER BY sale_date, code`,
      params
    )
  );
  return rowsOf(result.rows).map(toSalesRecord);
}

export async function deleteSalesRecords(db: Queryable, range: DateRange): Promise<number> {
  const result = await timed('delete_sales', () =>
    db.query('DELETE FROM sales_records WHERE sale_date BETWEEN $1 AND $2', [range.start, range.end])
  );
  const deleted = result.rowCount ?? 0;
  logger.info('Deleted sales records', { ...range, deleted });
  return deleted;
}
