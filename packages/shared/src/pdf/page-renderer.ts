/**
 * PDF Page Rendering
 *
 * Renders PDF pages to PNG with poppler's pdftoppm, one page per call, in a
 * scratch directory that is removed on every exit path.
 *
 * Requires poppler-utils in the runtime image (apt-get install -y poppler-utils).
 */

import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { config } from '../config';
import { logger } from '../logger';
import type { ExtractionTrace } from '../trace';

export interface RenderedPage {
  pageNumber: number;
  png: Buffer;
}

export interface PageRenderer {
  /**
   * Render up to `maxPages` pages. `pageCount` is the known page count, or 0
   * when the document could not be opened for text.
   */
  render(
    bytes: Buffer,
    pageCount: number,
    maxPages: number,
    trace: ExtractionTrace
  ): Promise<RenderedPage[]>;
}

export type ExecFileFn = (
  file: string,
  args: string[]
) => Promise<{ stdout: string | Buffer; stderr: string | Buffer }>;

export interface PdftoppmRendererOptions {
  command?: string;
  dpi?: number;
  exec?: ExecFileFn;
  /** Parent of the scratch directory; defaults to the OS temp dir */
  tmpRoot?: string;
}

const execFileAsync: ExecFileFn = promisify(execFile);

export class PdftoppmRenderer implements PageRenderer {
  private readonly command: string;
  private readonly dpi: number;
  private readonly exec: ExecFileFn;
  private readonly tmpRoot: string;

  constructor(options: PdftoppmRendererOptions = {}) {
    this.command = options.command ?? config.pdftoppmCmd;
    this.dpi = options.dpi ?? config.renderDpi;
    this.exec = options.exec ?? execFileAsync;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  async render(
    bytes: Buffer,
    pageCount: number,
    maxPages: number,
    trace: ExtractionTrace
  ): Promise<RenderedPage[]> {
    const pagesToRender = pageCount > 0 ? Math.min(pageCount, maxPages) : maxPages;
    const dir = await fs.mkdtemp(path.join(this.tmpRoot, 'ledgerline-render-'));
    const rendered: RenderedPage[] = [];

    try {
      const inPath = path.join(dir, 'in.pdf');
      await fs.writeFile(inPath, bytes);

      for (let pageNumber = 1; pageNumber <= pagesToRender; pageNumber++) {
        const outPrefix = path.join(dir, `page-${pageNumber}`);
        try {
          await this.exec(this.command, [
            '-png',
            '-r',
            String(this.dpi),
            '-f',
            String(pageNumber),
            '-l',
            String(pageNumber),
            '-singlefile',
            inPath,
            outPrefix,
          ]);
          rendered.push({ pageNumber, png: await fs.readFile(`${outPrefix}.png`) });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          trace.add(`render: page ${pageNumber} failed (${message}), skipped`);
        }
      }
    } finally {
      await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Scratch directory cleanup failed', { dir, error: message });
        trace.add(`render: cleanup of ${dir} failed (${message})`);
      });
    }

    return rendered;
  }
}
