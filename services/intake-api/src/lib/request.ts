import path from 'path';

/**
 * Upload filename from `?filename=`, reduced to its base name. Null when
 * missing or empty.
 */
export function uploadFilename(query: Record<string, unknown>): string | null {
  const raw = query.filename;
  if (typeof raw !== 'string') return null;
  const base = path.basename(raw.replace(/\\/g, '/')).trim();
  return base && base !== '.' && base !== '..' ? base : null;
}

/**
 * Raw request body as bytes; null when the body parser produced none.
 */
export function uploadBytes(body: unknown): Buffer | null {
  if (!Buffer.isBuffer(body) || body.length === 0) return null;
  return body;
}

/**
 * HTTP status carried by a body-parser error (413 for oversized uploads).
 */
export function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number' && status >= 400 && status < 600) return status;
  }
  return 500;
}
