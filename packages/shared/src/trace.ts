/**
 * Extraction Trace
 *
 * Append-only, human-readable record of what an extraction session did and
 * why. One instance per session, threaded through every component call and
 * returned to the caller. Entries are mirrored to the debug log.
 */

import { logger } from './logger';

export class ExtractionTrace {
  private readonly entries: string[] = [];

  constructor(readonly sessionId: string) {}

  add(message: string): void {
    this.entries.push(message);
    logger.debug('trace', { session_id: this.sessionId, entry: message });
  }

  /** Number of entries so far */
  get size(): number {
    return this.entries.length;
  }

  lines(): string[] {
    return [...this.entries];
  }
}
