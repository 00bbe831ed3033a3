/**
 * Local object store for uploaded documents.
 *
 * Uploads are content-addressed: document_id is `sha256:<hex>` of the bytes
 * and the file lands under `<root>/raw/<hex><ext>`, so a repeated upload
 * reuses the same id and path.
 */

import crypto from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { config } from '../config';
import { logger } from '../logger';

export interface StoredDocument {
  documentId: string;
  rawUri: string;
}

export function documentIdFor(bytes: Buffer): string {
  return `sha256:${crypto.createHash('sha256').update(bytes).digest('hex')}`;
}

function extensionOf(filename: string): string {
  const ext = path.extname(filename).toLowerCase();
  return /^\.[a-z0-9]{1,8}$/.test(ext) ? ext : '.bin';
}

export async function storeDocument(
  bytes: Buffer,
  filename: string,
  root: string = config.objectStorePath
): Promise<StoredDocument> {
  const documentId = documentIdFor(bytes);
  const rawDir = path.join(root, 'raw');
  await mkdir(rawDir, { recursive: true });

  const filePath = path.join(rawDir, `${documentId.replace('sha256:', '')}${extensionOf(filename)}`);
  await writeFile(filePath, bytes);

  const rawUri = `file://${filePath}`;
  logger.info('Stored document', {
    document_id: documentId,
    raw_uri: rawUri,
    size_bytes: bytes.length,
  });
  return { documentId, rawUri };
}

export async function readStoredDocument(rawUri: string): Promise<Buffer> {
  if (!rawUri.startsWith('file://')) {
    throw new Error(`Unsupported raw_uri: ${rawUri}`);
  }
  return readFile(rawUri.slice('file://'.length));
}
