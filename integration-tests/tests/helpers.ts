/**
 * Test Helpers
 *
 * In-process fakes for the page renderer, vision model and text-layer reader,
 * plus context builders for calling extractors directly and a workbook
 * builder for spreadsheet uploads.
 */

import * as XLSX from 'xlsx';
import {
  ExtractionTrace,
  getVendorTable,
  type ExtractionContext,
  type ExtractionServices,
  type PageRenderer,
  type RenderedPage,
  type TextLayer,
  type VisionModelClient,
  type VisionRequest,
  type VisionResponse,
} from '@ledgerline/shared';

/** Fixed clock: 20 Oct 2025, local time */
export const NOW = new Date(2025, 9, 20);

export class FakePageRenderer implements PageRenderer {
  calls: Array<{ pageCount: number; maxPages: number }> = [];

  constructor(private readonly pages = 1) {}

  async render(bytes: Buffer, pageCount: number, maxPages: number): Promise<RenderedPage[]> {
    this.calls.push({ pageCount, maxPages });
    const count = Math.min(this.pages, maxPages);
    return Array.from({ length: count }, (_, i) => ({
      pageNumber: i + 1,
      png: Buffer.from(`png-${i + 1}`),
    }));
  }
}

export class FakeVisionClient implements VisionModelClient {
  readonly model = 'fake-vision';
  requests: VisionRequest[] = [];

  constructor(
    private readonly answer: string | Error,
    private readonly configured = true
  ) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async complete(request: VisionRequest): Promise<VisionResponse> {
    this.requests.push(request);
    if (this.answer instanceof Error) throw this.answer;
    return { text: this.answer, requestId: 'req-test-1', model: this.model };
  }
}

export function textLayerOf(text: string, isScanned = false, pageCount = 1): TextLayer {
  return { text, pages: [{ pageNumber: 1, text }], pageCount, isScanned };
}

/** Text reader that ignores the bytes and returns a fixed layer */
export function fixedTextReader(layer: TextLayer): ExtractionServices['textLayerReader'] {
  return async (_bytes, trace) => {
    trace.add(`text layer: ${layer.pageCount} page(s), fake reader`);
    return layer;
  };
}

export function makeContext(
  vendorName: string | null,
  services: Partial<ExtractionServices> = {}
): ExtractionContext {
  return {
    trace: new ExtractionTrace('test-session'),
    vendor: vendorName ? (getVendorTable().findByName(vendorName) ?? null) : null,
    services: {
      pageRenderer: services.pageRenderer ?? new FakePageRenderer(),
      visionClient: services.visionClient ?? new FakeVisionClient('{"items": []}', false),
    },
    now: NOW,
  };
}

export type CellValue = string | number | null;

/** One-sheet .xlsx workbook as upload bytes */
export function workbookBytes(rows: CellValue[][], sheetName = 'Sheet1'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('expected a buffer');
  return out;
}

/** 36-column platform export row with the given cells set */
export function exportRow(cells: Record<number, CellValue>): CellValue[] {
  const row: CellValue[] = new Array<CellValue>(36).fill(null);
  for (const [index, value] of Object.entries(cells)) {
    row[Number(index)] = value;
  }
  return row;
}
