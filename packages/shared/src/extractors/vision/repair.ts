/**
 * Vision Response Repair
 *
 * The model is asked for one JSON object but may wrap it in a code fence or
 * stop mid-stream at the token ceiling. Three independent parsers are tried
 * in order; the first that yields a document wins:
 *   a. direct parse
 *   b. object scan: header fields by pattern, then every complete flat
 *      {..."item_name"...} object parsed on its own
 *   c. bracket closure: cut at the last '},' and close with ']}'
 */

import { isVisionDocument, type VisionDocument } from '../../schemas';

export type RepairStage = 'direct' | 'object_scan' | 'bracket_closure';

export type ResponseParser = (raw: string) => VisionDocument | null;

export interface RepairResult {
  document: VisionDocument;
  stage: RepairStage;
}

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\s*```\s*$/;
const OPEN_FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?/;

/** Complete, flat object containing an item_name key */
const ITEM_OBJECT_PATTERN = /\{[^{}]*"item_name"[^{}]*\}/g;

function tryJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Remove a markdown code-fence wrapper. A fence left open by truncation
 * loses its opening line only.
 */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const closed = FENCE_PATTERN.exec(trimmed);
  if (closed) return closed[1].trim();
  return trimmed.replace(OPEN_FENCE_PATTERN, '').trim();
}

export const parseDirect: ResponseParser = (raw) => {
  const parsed = tryJson(stripCodeFence(raw));
  return isVisionDocument(parsed) ? parsed : null;
};

function stringField(text: string, field: string): string | null {
  const m = new RegExp(`"${field}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`).exec(text);
  if (!m) return null;
  const value = tryJson(`"${m[1]}"`);
  return typeof value === 'string' ? value : null;
}

export const parseByObjectScan: ResponseParser = (raw) => {
  const text = stripCodeFence(raw);
  const items: Array<Record<string, unknown>> = [];

  for (const match of text.matchAll(ITEM_OBJECT_PATTERN)) {
    const parsed = tryJson(match[0]);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      items.push({ ...parsed });
    }
  }

  if (items.length === 0) return null;

  return {
    vendor_name: stringField(text, 'vendor_name'),
    invoice_date: stringField(text, 'invoice_date'),
    items,
  };
};

export const parseByBracketClosure: ResponseParser = (raw) => {
  const text = stripCodeFence(raw);
  const cut = text.lastIndexOf('},');
  if (cut < 0) return null;

  const parsed = tryJson(`${text.slice(0, cut + 1)}]}`);
  return isVisionDocument(parsed) ? parsed : null;
};

const LADDER: ReadonlyArray<[RepairStage, ResponseParser]> = [
  ['direct', parseDirect],
  ['object_scan', parseByObjectScan],
  ['bracket_closure', parseByBracketClosure],
];

/**
 * Run the repair ladder; null when every stage fails.
 */
export function repairVisionResponse(raw: string): RepairResult | null {
  for (const [stage, parse] of LADDER) {
    const document = parse(raw);
    if (document) return { document, stage };
  }
  return null;
}
