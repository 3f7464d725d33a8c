/**
 * JSON Schema validation utilities using Ajv.
 *
 * Provides functions to load and validate data against JSON schemas.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Raw AJV error object (subset of fields we care about).
 */
export interface RawAjvError {
  instancePath: string;
  schemaPath: string;
  keyword: string;
  params: Record<string, unknown>;
  message?: string;
}

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[]; rawErrors: RawAjvError[] };

/** Directory holding the JSON schemas shipped with clipcourier */
export const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (parsed === null || typeof parsed !== 'object') {
      throw new Error('schema is not a JSON object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile<T>(schema: object): ValidateFunction<T> {
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean; verbose?: boolean }) => {
    compile: <S>(schema: object) => ValidateFunction<S>;
  };
  const ajv = new Ajv({
    strict: true,
    allErrors: true,
    verbose: true,
  });
  return ajv.compile<T>(schema);
}

/**
 * Validates data against a JSON schema using Ajv, collecting every error.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile<T>(schema);

  if (validate(data)) {
    return { valid: true, data, errors: [] };
  }

  const rawErrors: RawAjvError[] = (validate.errors ?? []).map((e) => ({
    instancePath: e.instancePath || '',
    schemaPath: e.schemaPath || '',
    keyword: e.keyword || '',
    params: e.params,
    message: e.message,
  }));

  const errors = rawErrors.map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    return `${path ? `${path}: ` : ''}${message}`;
  });

  return { valid: false, data: null, errors, rawErrors };
}
