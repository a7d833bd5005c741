import pkg from 'ajv';
const { default: Ajv } = pkg;
import type { ErrorObject, ValidateFunction } from 'ajv';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { InvalidDataError } from '../engine/errors.js';
import type { CatalogFile, LanguagesFile } from '../types/catalog.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type SchemaName = 'catalog' | 'languages';

const ajv = new Ajv({ allErrors: true, strict: true });
const validators = new Map<SchemaName, ValidateFunction>();

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function schemaPath(name: SchemaName): string {
  const fileName = `${name}.schema.json`;
  const beside = path.join(__dirname, '../schemas', fileName);
  if (existsSync(beside)) return beside;
  // Fallback to source schemas when running from an uncopied build
  return path.resolve(__dirname, '..', '..', 'source', 'schemas', fileName);
}

function getValidator(name: SchemaName): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    const schema: unknown = JSON.parse(readFileSync(schemaPath(name), 'utf-8'));
    if (!isRecord(schema)) {
      throw new Error(`Schema ${name} is not an object`);
    }
    validate = ajv.compile(schema);
    validators.set(name, validate);
  }
  return validate;
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}

/**
 * Schema issues for `data`, empty when it is valid
 */
export function schemaIssues(name: SchemaName, data: unknown): string[] {
  const validate = getValidator(name);
  return validate(data) ? [] : formatSchemaErrors(validate.errors);
}

function isCatalogFile(data: unknown): data is CatalogFile {
  return schemaIssues('catalog', data).length === 0;
}

function isLanguagesFile(data: unknown): data is LanguagesFile {
  return schemaIssues('languages', data).length === 0;
}

export function parseCatalogFile(data: unknown, file: string): CatalogFile {
  if (!isCatalogFile(data)) {
    throw new InvalidDataError(file, schemaIssues('catalog', data));
  }
  return data;
}

export function parseLanguagesFile(data: unknown, file: string): LanguagesFile {
  if (!isLanguagesFile(data)) {
    throw new InvalidDataError(file, schemaIssues('languages', data));
  }
  return data;
}

/**
 * Read a JSON file; a syntax error becomes an InvalidDataError for that file
 */
export function parseJson(content: string, file: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InvalidDataError(file, [error instanceof Error ? error.message : 'Invalid JSON']);
  }
}
