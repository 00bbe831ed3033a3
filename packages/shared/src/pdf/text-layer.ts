/**
 * PDF Text Layer & Scan Detection
 *
 * Reads the embedded text of a PDF page by page with pdfjs-dist. A page that
 * fails to yield text counts as empty; a document with less than
 * SCAN_TEXT_THRESHOLD characters overall is flagged as scanned.
 */

import path from 'path';
import { config } from '../config';
import { logger } from '../logger';
import type { PDFDocumentProxy } from 'pdfjs-dist';
import type { ExtractionTrace } from '../trace';
import type { PageText, TextLayer } from '../types';

export type PageTextLoader = (pageNumber: number) => Promise<string>;

/**
 * Assemble a text layer from a page count and a per-page loader.
 *
 * Pages are joined with newlines. A loader failure is recorded in the trace
 * and the page contributes no text.
 */
export async function assembleTextLayer(
  pageCount: number,
  loadPageText: PageTextLoader,
  trace: ExtractionTrace,
  threshold: number = config.scanTextThreshold
): Promise<TextLayer> {
  const pages: PageText[] = [];

  for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
    let text = '';
    try {
      text = await loadPageText(pageNumber);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      trace.add(`text layer: page ${pageNumber} failed (${message}), treated as empty`);
    }
    pages.push({ pageNumber, text });
  }

  const text = pages.map((p) => p.text).join('\n');
  const extractedLength = pages.reduce((sum, p) => sum + p.text.trim().length, 0);
  const isScanned = extractedLength < threshold;

  trace.add(
    `text layer: ${pageCount} page(s), ${extractedLength} chars, ` +
      (isScanned ? `scanned (< ${threshold})` : 'has text layer')
  );

  return { text, pages, pageCount, isScanned };
}

// ============================================================================
// pdfjs-dist reader
// ============================================================================

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Group text items by Y position to keep visual lines together, top to
 * bottom, left to right within a line.
 */
export function linesFromTextItems(items: ReadonlyArray<{ str: string; transform: number[] }>): string {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    // Text on one visual line can drift by a fraction of a point
    const y = Math.round(item.transform[5] ?? 0);
    const x = Math.round(item.transform[4] ?? 0);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  return Array.from(itemsByY.keys())
    .sort((a, b) => b - a)
    .map((y) =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line.length > 0)
    .join('\n');
}

let workerConfigured = false;

async function loadPdfjs(): Promise<typeof import('pdfjs-dist')> {
  const pdfjsLib = await import('pdfjs-dist');
  if (!workerConfigured) {
    pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
      path.dirname(require.resolve('pdfjs-dist/package.json')),
      'build/pdf.worker.js'
    );
    workerConfigured = true;
  }
  return pdfjsLib;
}

/**
 * Read the text layer of a PDF. Never throws: a document that cannot be
 * opened yields empty text, zero pages, and the scanned flag.
 */
export async function readPdfTextLayer(bytes: Buffer, trace: ExtractionTrace): Promise<TextLayer> {
  let pdf: PDFDocumentProxy;

  try {
    const pdfjsLib = await loadPdfjs();
    pdf = await pdfjsLib.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    }).promise;
  } catch (error) {
    logger.warn('PDF could not be opened for text extraction', {
      error: error instanceof Error ? error.message : String(error),
    });
    trace.add('text layer: document could not be opened, treated as scanned');
    return { text: '', pages: [], pageCount: 0, isScanned: true };
  }

  try {
    return await assembleTextLayer(
      pdf.numPages,
      async (pageNumber) => {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const items: Array<{ str: string; transform: number[] }> = [];
        for (const item of content.items) {
          if ('str' in item) {
            items.push({ str: item.str, transform: item.transform.map(Number) });
          }
        }
        return linesFromTextItems(items);
      },
      trace
    );
  } finally {
    await pdf.destroy().catch((error: unknown) => {
      logger.debug('PDF handle cleanup failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
