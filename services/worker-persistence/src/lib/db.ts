/**
 * Database Operations
 *
 * Upserts for invoice line items and POS sales rows. Invoice rows are keyed
 * on (vendor, invoice_date, item_name, amount), so re-uploading a document
 * updates rather than duplicates. Sales rows are keyed on (code, sale_date).
 */

import {
  logger,
  config,
  dbQueryDurationHistogram,
  validateRecord,
  type CanonicalRecord,
  type Database,
  type Queryable,
  type SalesRecord,
} from '@ledgerline/shared';

export interface InvoiceSource {
  documentId: string;
  sessionId: string | null;
  filename: string;
  correlationId: string;
}

export interface SalesSource {
  documentId: string;
  filename: string;
  correlationId: string;
}

const INVOICE_COLUMNS = [
  'vendor',
  'invoice_date',
  'item_name',
  'quantity',
  'unit',
  'unit_price',
  'amount',
  'document_id',
  'session_id',
  'source_filename',
  'correlation_id',
] as const;

const SALES_COLUMNS = [
  'sale_date',
  'code',
  'item_name',
  'category',
  'quantity',
  'price',
  'gross_total',
  'discount',
  'net_total',
  'document_id',
  'source_filename',
  'correlation_id',
] as const;

/**
 * `($1, $2, ...), ($n+1, ...)` for a multi-row VALUES clause
 */
export function valuesPlaceholders(rowCount: number, columnCount: number): string {
  const groups: string[] = [];
  for (let r = 0; r < rowCount; r++) {
    const params: string[] = [];
    for (let c = 1; c <= columnCount; c++) {
      params.push(`$${r * columnCount + c}`);
    }
    groups.push(`(${params.join(', ')})`);
  }
  return groups.join(', ');
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Last occurrence wins; a single INSERT ... ON CONFLICT cannot touch one key twice.
 */
function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const item of items) {
    byKey.set(key(item), item);
  }
  return [...byKey.values()];
}

export function invoiceKey(record: CanonicalRecord): string {
  return [record.vendor, record.date, record.item_name, record.amount].join('\u0000');
}

/**
 * Upsert invoice records in chunks inside one transaction.
 * Returns the number of rows written.
 */
export async function saveInvoiceRecords(
  db: Database,
  records: readonly CanonicalRecord[],
  source: InvoiceSource,
  chunkSize: number = config.persistChunkSize
): Promise<number> {
  const valid = records.filter((record, index) => {
    const result = validateRecord(record);
    if (!result.valid) {
      logger.warn('Skipping invalid invoice record', { index, errors: result.errors });
    }
    return result.valid;
  });
  const rows = uniqueBy(valid, invoiceKey);
  if (rows.length === 0) return 0;

  const startTime = Date.now();
  const saved = await db.transaction(async (tx) => {
    let count = 0;
    for (const part of chunk(rows, chunkSize)) {
      count += await upsertInvoiceChunk(tx, part, source);
    }
    return count;
  });

  const duration = (Date.now() - startTime) / 1000;
  dbQueryDurationHistogram.observe({ operation: 'save_invoices' }, duration);
  logger.info('Saved invoice records', {
    document_id: source.documentId,
    received: records.length,
    saved,
    duration_seconds: duration,
  });
  return saved;
}

async function upsertInvoiceChunk(
  tx: Queryable,
  records: readonly CanonicalRecord[],
  source: InvoiceSource
): Promise<number> {
  const values = records.flatMap((r) => [
    r.vendor,
    r.date,
    r.item_name,
    r.quantity,
    r.unit,
    r.unit_price,
    r.amount,
    source.documentId,
    source.sessionId,
    source.filename,
    source.correlationId,
  ]);

  const result = await tx.query(
    `INSERT INTO invoice_records (${INVOICE_COLUMNS.join(', ')})
     VALUES ${valuesPlaceholders(records.length, INVOICE_COLUMNS.length)}
     ON CONFLICT (vendor, invoice_date, item_name, amount) DO UPDATE SET
       quantity = EXCLUDED.quantity,
       unit = EXCLUDED.unit,
       unit_price = EXCLUDED.unit_price,
       document_id = EXCLUDED.document_id,
       session_id = EXCLUDED.session_id,
       source_filename = EXCLUDED.source_filename,
       correlation_id = EXCLUDED.correlation_id,
       updated_at = NOW()`,
    values
  );
  return result.rowCount ?? records.length;
}

/**
 * Upsert POS sales rows. Rows without a report month have no sale date and
 * are skipped.
 */
export async function saveSalesRecords(
  db: Database,
  records: readonly SalesRecord[],
  source: SalesSource,
  chunkSize: number = config.persistChunkSize
): Promise<number> {
  const dated = records.filter((r) => r.month !== null);
  if (dated.length < records.length) {
    logger.warn('Skipping sales rows without a report month', {
      skipped: records.length - dated.length,
    });
  }
  const rows = uniqueBy(dated, (r) => `${r.code}\u0000${r.month}`);
  if (rows.length === 0) return 0;

  const startTime = Date.now();
  const saved = await db.transaction(async (tx) => {
    let count = 0;
    for (const part of chunk(rows, chunkSize)) {
      const values = part.flatMap((r) => [
        `${r.month}-01`,
        r.code,
        r.name,
        r.category,
        r.quantity,
        r.price,
        r.gross_total,
        r.discount,
        r.net_total,
        source.documentId,
        source.filename,
        source.correlationId,
      ]);
      const result = await tx.query(
        `INSERT INTO sales_records (${SALES_COLUMNS.join(', ')})
         VALUES ${valuesPlaceholders(part.length, SALES_COLUMNS.length)}
         ON CONFLICT (code, sale_date) DO UPDATE SET
           item_name = EXCLUDED.item_name,
           category = EXCLUDED.category,
           quantity = EXCLUDED.quantity,
           price = EXCLUDED.price,
           gross_total = EXCLUDED.gross_total,
           discount = EXCLUDED.discount,
           net_total = EXCLUDED.net_total,
           document_id = EXCLUDED.document_id,
           source_filename = EXCLUDED.source_filename,
           correlation_id = EXCLUDED.correlation_id,
           updated_at = NOW()`,
        values
      );
      count += result.rowCount ?? part.length;
    }
    return count;
  });

  const duration = (Date.now() - startTime) / 1000;
  dbQueryDurationHistogram.observe({ operation: 'save_sales' }, duration);
  logger.info('Saved sales records', {
    document_id: source.documentId,
    received: records.length,
    saved,
    duration_seconds: duration,
  });
  return saved;
}
