/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the vendor table, vision-model responses
 * and outgoing canonical records. Schemas live in packages/shared/schemas/.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { readJsonAsset } from './assets';
import { logger } from './logger';
import type { CanonicalRecord, VendorEntry } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

// ============================================================================
// Validated shapes
// ============================================================================

export interface VendorTableFile {
  vendors: VendorEntry[];
}

export interface VisionDocument {
  vendor_name?: string | null;
  invoice_date?: string | null;
  items: Array<Record<string, unknown>>;
}

export interface VisionItem {
  date?: string | null;
  item_name: string;
  quantity?: number | string | null;
  unit?: string | null;
  unit_price?: number | string | null;
  amount: number | string;
}

// ============================================================================
// Compilation (lazy, once per schema)
// ============================================================================

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const schema = readJsonAsset('schemas', schemaName);
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema is not a JSON object: ${schemaName}`);
  }
  return schema;
}

function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let validate: ValidateFunction<T> | null = null;
  return () => {
    if (!validate) {
      validate = ajv.compile<T>(loadSchema(schemaName));
    }
    return validate;
  };
}

const vendorTableValidator = lazyValidator<VendorTableFile>('vendor_table.schema.json');
const visionDocumentValidator = lazyValidator<VisionDocument>('vision_document.schema.json');
const visionItemValidator = lazyValidator<VisionItem>('vision_item.schema.json');
const recordValidator = lazyValidator<CanonicalRecord>('canonical_record.schema.json');

function formatErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

// ============================================================================
// Type guards
// ============================================================================

export function isVendorTableFile(data: unknown): data is VendorTableFile {
  return vendorTableValidator()(data);
}

export function isVisionDocument(data: unknown): data is VisionDocument {
  return visionDocumentValidator()(data);
}

export function isVisionItem(data: unknown): data is VisionItem {
  return visionItemValidator()(data);
}

// ============================================================================
// Validation with error reporting
// ============================================================================

/**
 * Validate the vendor table file against vendor_table.schema.json
 */
export function validateVendorTable(data: unknown): ValidationResult {
  const validate = vendorTableValidator();
  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('Vendor table validation failed', { errors });
    return { valid: false, errors };
  }
  return { valid: true };
}

/**
 * Validate a single canonical record against canonical_record.schema.json
 */
export function validateRecord(data: unknown): ValidationResult {
  const validate = recordValidator();
  if (!validate(data)) {
    return { valid: false, errors: formatErrors(validate) };
  }
  return { valid: true };
}

/**
 * Validate a batch of canonical records; errors are prefixed with the index.
 */
export function validateRecords(records: unknown[]): ValidationResult {
  const errors: string[] = [];
  records.forEach((record, index) => {
    const result = validateRecord(record);
    for (const error of result.errors ?? []) {
      errors.push(`[${index}] ${error}`);
    }
  });

  if (errors.length > 0) {
    logger.warn('Canonical record validation failed', { errors });
    return { valid: false, errors };
  }
  return { valid: true };
}
