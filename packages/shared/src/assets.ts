/**
 * Package asset resolution for the JSON reference tables (data/) and
 * JSON schemas (schemas/) that ship beside the sources.
 */

import fs from 'fs';
import path from 'path';

export type AssetKind = 'data' | 'schemas';

function candidatePaths(kind: AssetKind, fileName: string): string[] {
  return [
    // packages/shared/src -> packages/shared/<kind>
    path.join(__dirname, '..', kind, fileName),
    // dist/packages/shared/src -> packages/shared/<kind>
    path.join(__dirname, '../../../..', 'packages/shared', kind, fileName),
    // Run from the repository root
    path.join(process.cwd(), 'packages/shared', kind, fileName),
    // Run from inside the package
    path.join(process.cwd(), kind, fileName),
  ];
}

/**
 * Absolute path of a packaged asset, or null when none of the known
 * locations has it.
 */
export function resolveAssetPath(kind: AssetKind, fileName: string): string | null {
  for (const candidate of candidatePaths(kind, fileName)) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Read and parse a packaged JSON asset.
 *
 * @throws Error if the asset cannot be found
 */
export function readJsonAsset(kind: AssetKind, fileName: string): unknown {
  const assetPath = resolveAssetPath(kind, fileName);
  if (!assetPath) {
    throw new Error(`Asset not found: ${kind}/${fileName}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(assetPath, 'utf-8'));
  return parsed;
}
