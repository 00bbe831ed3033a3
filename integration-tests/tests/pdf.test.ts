/**
 * PDF Tests
 *
 * Text-layer assembly and scan detection, visual line grouping, and the
 * pdftoppm renderer driven through a fake exec.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ExtractionTrace,
  PdftoppmRenderer,
  assembleTextLayer,
  linesFromTextItems,
  readPdfTextLayer,
  type ExecFileFn,
} from '@ledgerline/shared';

describe('assembleTextLayer', () => {
  it('joins pages and flags a document with text', async () => {
    const trace = new ExtractionTrace('t');
    const pages = ['請求書 ミートショップひら山', '合計 231,000'];

    const layer = await assembleTextLayer(2, async (n) => pages[n - 1], trace, 20);

    expect(layer.text).toBe('請求書 ミートショップひら山\n合計 231,000');
    expect(layer.pageCount).toBe(2);
    expect(layer.isScanned).toBe(false);
    expect(trace.lines()).toEqual(['text layer: 2 page(s), 24 chars, has text layer']);
  });

  it('treats a failing page as empty and flags short text as scanned', async () => {
    const trace = new ExtractionTrace('t');

    const layer = await assembleTextLayer(
      2,
      async (n) => {
        if (n === 2) throw new Error('boom');
        return '  page one  ';
      },
      trace,
      100
    );

    expect(layer.pages).toEqual([
      { pageNumber: 1, text: '  page one  ' },
      { pageNumber: 2, text: '' },
    ]);
    expect(layer.isScanned).toBe(true);
    expect(trace.lines()).toEqual([
      'text layer: page 2 failed (boom), treated as empty',
      'text layer: 2 page(s), 8 chars, scanned (< 100)',
    ]);
  });
});

describe('linesFromTextItems', () => {
  it('groups items by rounded Y, top to bottom, left to right', () => {
    const text = linesFromTextItems([
      { str: '75,600', transform: [1, 0, 0, 1, 400, 700.2] },
      { str: '10/9', transform: [1, 0, 0, 1, 50, 700] },
      { str: '   ', transform: [1, 0, 0, 1, 60, 650] },
      { str: '請求書', transform: [1, 0, 0, 1, 50, 800] },
      { str: '和牛ヒレ', transform: [1, 0, 0, 1, 120, 699.8] },
    ]);

    expect(text).toBe('請求書\n10/9 和牛ヒレ 75,600');
  });
});

describe('readPdfTextLayer', () => {
  it('flags bytes that are not a PDF as scanned', async () => {
    const trace = new ExtractionTrace('t');

    const layer = await readPdfTextLayer(Buffer.from('not a pdf'), trace);

    expect(layer).toEqual({ text: '', pages: [], pageCount: 0, isScanned: true });
    expect(trace.lines()).toEqual(['text layer: document could not be opened, treated as scanned']);
  });
});

describe('PdftoppmRenderer', () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'render-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  function fakeExec(calls: string[][], failingPage?: string): ExecFileFn {
    return async (file, args) => {
      calls.push([file, ...args]);
      if (args[4] === failingPage) throw new Error('bad page');
      await fs.writeFile(`${args[args.length - 1]}.png`, `png ${args[4]}`);
      return { stdout: '', stderr: '' };
    };
  }

  it('renders each page with pdftoppm and removes the scratch directory', async () => {
    const calls: string[][] = [];
    const renderer = new PdftoppmRenderer({ command: 'pdftoppm', dpi: 150, exec: fakeExec(calls), tmpRoot });
    const trace = new ExtractionTrace('t');

    const pages = await renderer.render(Buffer.from('%PDF'), 2, 5, trace);

    expect(pages.map((p) => [p.pageNumber, p.png.toString()])).toEqual([
      [1, 'png 1'],
      [2, 'png 2'],
    ]);
    expect(calls).toHaveLength(2);
    const [command, ...args] = calls[0];
    expect(command).toBe('pdftoppm');
    expect(args.slice(0, 8)).toEqual(['-png', '-r', '150', '-f', '1', '-l', '1', '-singlefile']);
    expect(path.basename(args[8])).toBe('in.pdf');
    expect(path.basename(args[9])).toBe('page-1');
    expect(path.basename(path.dirname(args[9]))).toMatch(/^ledgerline-render-/);
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('skips a failed page and caps unknown page counts at maxPages', async () => {
    const calls: string[][] = [];
    const renderer = new PdftoppmRenderer({ dpi: 150, exec: fakeExec(calls, '2'), tmpRoot });
    const trace = new ExtractionTrace('t');

    const pages = await renderer.render(Buffer.from('%PDF'), 0, 3, trace);

    expect(pages.map((p) => p.pageNumber)).toEqual([1, 3]);
    expect(calls).toHaveLength(3);
    expect(trace.lines()).toEqual(['render: page 2 failed (bad page), skipped']);
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });
});
