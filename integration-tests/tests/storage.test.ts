/**
 * Storage Tests
 *
 * Persistence upserts and query-api reads against an in-process Database
 * fake, the file object store in a scratch directory, and the request
 * helpers of the HTTP services.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  documentIdFor,
  readStoredDocument,
  storeDocument,
  type CanonicalRecord,
  type Database,
  type Queryable,
  type QueryRows,
  type SalesRecord,
} from '@ledgerline/shared';
import {
  chunk,
  saveInvoiceRecords,
  saveSalesRecords,
  valuesPlaceholders,
} from '../../services/worker-persistence/src/lib/db';
import {
  deleteInvoiceRecords,
  loadInvoiceRecords,
  loadSalesRecords,
} from '../../services/query-api/src/lib/db';
import { SCHEMA_PATH, applySchema, schemaStatements } from '../../services/worker-persistence/src/init-db';
import { parseDateRange } from '../../services/query-api/src/lib/range';
import { errorStatus, uploadBytes, uploadFilename } from '../../services/intake-api/src/lib/request';

type Responder = (text: string, values: unknown[]) => QueryRows;

class FakeDatabase implements Database {
  queries: Array<{ text: string; values: unknown[] }> = [];
  transactions = 0;

  constructor(private readonly respond: Responder = () => ({ rows: [], rowCount: null })) {}

  async query(text: string, values: unknown[] = []): Promise<QueryRows> {
    this.queries.push({ text, values });
    return this.respond(text, values);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    this.transactions++;
    return fn(this);
  }

  async close(): Promise<void> {}
}

function invoice(item_name: string, amount: number, quantity = 1): CanonicalRecord {
  return {
    vendor: 'Maruyata',
    date: '2025-10-03',
    item_name,
    quantity,
    unit: 'pc',
    unit_price: amount / quantity,
    amount,
  };
}

function sale(code: string, month: string | null): SalesRecord {
  return {
    code,
    name: `Item ${code}`,
    category: 'Main',
    quantity: 2,
    price: 1000,
    gross_total: 2000,
    discount: 0,
    net_total: 2000,
    month,
  };
}

const INVOICE_SOURCE = {
  documentId: 'sha256:abc',
  sessionId: 'session-1',
  filename: 'maruyata.pdf',
  correlationId: 'corr-1',
};

describe('valuesPlaceholders and chunk', () => {
  it('numbers parameters row by row', () => {
    expect(valuesPlaceholders(2, 3)).toBe('($1, $2, $3), ($4, $5, $6)');
  });

  it('splits into fixed-size parts', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('saveInvoiceRecords', () => {
  it('upserts valid records in chunks within one transaction', async () => {
    const db = new FakeDatabase();
    const records = [
      invoice('真鯛', 3600, 2),
      invoice('甘えび', 2400, 3),
      invoice('本まぐろ赤身', 9600),
      invoice('真鯛', 3600, 3),
      invoice('おまけ', 0),
    ];

    const saved = await saveInvoiceRecords(db, records, INVOICE_SOURCE, 2);

    expect(saved).toBe(3);
    expect(db.transactions).toBe(1);
    expect(db.queries).toHaveLength(2);
    expect(db.queries[0].text).toContain('VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11), ($12,');
    expect(db.queries[0].text).toContain('ON CONFLICT (vendor, invoice_date, item_name, amount) DO UPDATE');
    expect(db.queries[0].values.slice(0, 11)).toEqual([
      'Maruyata',
      '2025-10-03',
      '真鯛',
      3,
      'pc',
      1200,
      3600,
      'sha256:abc',
      'session-1',
      'maruyata.pdf',
      'corr-1',
    ]);
    expect(db.queries[1].values[2]).toBe('本まぐろ赤身');
  });

  it('writes nothing when no record is valid', async () => {
    const db = new FakeDatabase();

    expect(await saveInvoiceRecords(db, [invoice('おまけ', 0)], INVOICE_SOURCE)).toBe(0);
    expect(db.transactions).toBe(0);
  });
});

describe('saveSalesRecords', () => {
  it('dates rows on the first of the report month and skips undated rows', async () => {
    const db = new FakeDatabase(() => ({ rows: [], rowCount: 2 }));

    const saved = await saveSalesRecords(
      db,
      [sale('A001', '2025-10'), sale('A002', null), sale('A003', '2025-10')],
      { documentId: 'sha256:def', filename: 'sales.csv', correlationId: 'corr-2' }
    );

    expect(saved).toBe(2);
    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].text).toContain('ON CONFLICT (code, sale_date) DO UPDATE');
    expect(db.queries[0].values.slice(0, 12)).toEqual([
      '2025-10-01',
      'A001',
      'Item A001',
      'Main',
      2,
      1000,
      2000,
      0,
      2000,
      'sha256:def',
      'sales.csv',
      'corr-2',
    ]);
    expect(db.queries[0].values[13]).toBe('A003');
  });
});

describe('query-api reads', () => {
  const range = { start: '2025-10-01', end: '2025-10-31' };

  it('maps NUMERIC strings and filters by vendor substring', async () => {
    const db = new FakeDatabase(() => ({
      rows: [
        {
          vendor: 'Meat Shop Hirayama',
          date: '2025-10-09',
          item_name: '和牛ヒレ',
          quantity: '6.30',
          unit: 'kg',
          unit_price: '12000.00',
          amount: '75600.00',
        },
        {
          vendor: 'Meat Shop Hirayama',
          date: '2025-10-16',
          item_name: '和牛ヒレ',
          quantity: '1',
          unit: 'slab',
          unit_price: '500',
          amount: '500',
        },
      ],
      rowCount: 2,
    }));

    const records = await loadInvoiceRecords(db, range, 'hirayama');

    expect(db.queries[0].values).toEqual(['2025-10-01', '2025-10-31', '%hirayama%']);
    expect(db.queries[0].text).toContain('vendor ILIKE $3');
    expect(records).toEqual([
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
        quantity: 1,
        unit: 'pc',
        unit_price: 500,
        amount: 500,
      },
    ]);
  });

  it('reads sales months without an item filter', async () => {
    const db = new FakeDatabase(() => ({
      rows: [
        {
          code: 'A001',
          item_name: 'Wagyu Tenderloin',
          category: 'Main',
          quantity: '12',
          price: '6800',
          gross_total: '81600',
          discount: '0',
          net_total: '81600',
          month: '2025-10',
        },
      ],
      rowCount: 1,
    }));

    const records = await loadSalesRecords(db, range);

    expect(db.queries[0].values).toEqual(['2025-10-01', '2025-10-31']);
    expect(records).toEqual([
      {
        code: 'A001',
        name: 'Wagyu Tenderloin',
        category: 'Main',
        quantity: 12,
        price: 6800,
        gross_total: 81600,
        discount: 0,
        net_total: 81600,
        month: '2025-10',
      },
    ]);
  });

  it('returns the deleted row count', async () => {
    const db = new FakeDatabase(() => ({ rows: [], rowCount: 4 }));

    expect(await deleteInvoiceRecords(db, range)).toBe(4);
    expect(db.queries[0].text).toBe('DELETE FROM invoice_records WHERE invoice_date BETWEEN $1 AND $2');
  });
});

describe('schema setup', () => {
  it('splits the schema file into statements without comments', () => {
    expect(schemaStatements('-- note\nCREATE TABLE a (x INT);\n\nCREATE INDEX b ON a (x);\n')).toEqual([
      'CREATE TABLE a (x INT)',
      'CREATE INDEX b ON a (x)',
    ]);
  });

  it('applies init.sql in one transaction', async () => {
    const db = new FakeDatabase();

    const count = await applySchema(db, await fs.readFile(SCHEMA_PATH, 'utf-8'));

    expect(count).toBe(5);
    expect(db.transactions).toBe(1);
    expect(db.queries[0].text.startsWith('CREATE TABLE IF NOT EXISTS invoice_records (')).toBe(true);
    expect(db.queries[4].text).toBe(
      'CREATE INDEX IF NOT EXISTS idx_sales_records_date ON sales_records (sale_date)'
    );
  });
});

describe('parseDateRange', () => {
  it('accepts an inclusive range', () => {
    expect(parseDateRange({ start: '2025-10-01', end: '2025-10-31' })).toEqual({
      ok: true,
      range: { start: '2025-10-01', end: '2025-10-31' },
    });
  });

  it('rejects missing, malformed and reversed ranges', () => {
    expect(parseDateRange({ start: '2025-10-01' })).toEqual({
      ok: false,
      message: 'start and end are required (YYYY-MM-DD)',
    });
    expect(parseDateRange({ start: '2025-02-30', end: '2025-03-01' })).toEqual({
      ok: false,
      message: 'start and end must be dates in YYYY-MM-DD form',
    });
    expect(parseDateRange({ start: '2025-10-31', end: '2025-10-01' })).toEqual({
      ok: false,
      message: 'start must not be after end',
    });
  });
});

describe('object store', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'object-store-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stores uploads by content hash and reads them back', async () => {
    const bytes = Buffer.from('abc');

    const stored = await storeDocument(bytes, 'Invoice.PDF', root);

    const hex = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
    expect(stored.documentId).toBe(`sha256:${hex}`);
    expect(documentIdFor(bytes)).toBe(stored.documentId);
    expect(stored.rawUri).toBe(`file://${path.join(root, 'raw', `${hex}.pdf`)}`);
    expect((await readStoredDocument(stored.rawUri)).toString()).toBe('abc');
  });

  it('falls back to .bin for odd extensions', async () => {
    const stored = await storeDocument(Buffer.from('abc'), 'notes.tar.gz~', root);

    expect(path.extname(stored.rawUri)).toBe('.bin');
  });

  it('rejects URIs outside the file store', async () => {
    await expect(readStoredDocument('s3://bucket/key')).rejects.toThrow('Unsupported raw_uri: s3://bucket/key');
  });
});

describe('intake request helpers', () => {
  it('reduces the filename to its base name', () => {
    expect(uploadFilename({ filename: 'C:\\scans\\hirayama.pdf' })).toBe('hirayama.pdf');
    expect(uploadFilename({ filename: '../../etc/passwd' })).toBe('passwd');
    expect(uploadFilename({ filename: '..' })).toBeNull();
    expect(uploadFilename({})).toBeNull();
  });

  it('accepts only non-empty buffers', () => {
    expect(uploadBytes(Buffer.from('x'))?.toString()).toBe('x');
    expect(uploadBytes(Buffer.alloc(0))).toBeNull();
    expect(uploadBytes({})).toBeNull();
  });

  it('takes the status of body-parser errors', () => {
    expect(errorStatus(Object.assign(new Error('too large'), { status: 413 }))).toBe(413);
    expect(errorStatus(new Error('boom'))).toBe(500);
  });
});
