import { promises as fs } from 'node:fs';
import type { CatalogFile, EngineConfig, LanguagesFile } from '../types/catalog.js';
import { parseCatalogFile, parseJson, parseLanguagesFile, schemaIssues } from '../utils/validateSchema.js';
import { isNotFound } from './catalogStore.js';
import type { Logger } from '../utils/logger.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Checks that go beyond the JSON schemas
 */
export function checkConsistency(
  catalog: CatalogFile,
  directory: LanguagesFile,
  config: EngineConfig,
): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  const codes = new Map<string, number>();
  for (const language of directory.languages) {
    codes.set(language.code, (codes.get(language.code) ?? 0) + 1);
  }
  for (const [code, count] of codes) {
    if (count > 1) errors.push(`Duplicate language code '${code}' in directory`);
  }
  if (!codes.has(config.sourceLanguage)) {
    errors.push(`Source language '${config.sourceLanguage}' is not in the directory`);
  }

  const unknownLanguages = new Set<string>();
  for (const [key, byLanguage] of Object.entries(catalog.translations)) {
    if (!Object.hasOwn(byLanguage, config.sourceLanguage) && key !== config.reservedKey) {
      warnings.push(`Key '${key}' has no ${config.sourceLanguage} text and cannot be backfilled`);
    }
    for (const [language, text] of Object.entries(byLanguage)) {
      if (!codes.has(language)) unknownLanguages.add(language);
      if (!text.trim()) warnings.push(`Empty text for key '${key}' in '${language}'`);
    }
  }
  for (const language of [...unknownLanguages].sort()) {
    errors.push(`Catalog uses language '${language}' which is not in the directory`);
  }

  for (const key of Object.keys(catalog.descriptions ?? {})) {
    if (!Object.hasOwn(catalog.translations, key)) {
      warnings.push(`Description for unknown key '${key}'`);
    }
  }

  return { errors, warnings };
}

async function readOptionalJson(filePath: string, label: string, errors: string[]): Promise<unknown> {
  try {
    return parseJson(await fs.readFile(filePath, 'utf-8'), filePath);
  } catch (error) {
    if (!isNotFound(error)) throw error;
    errors.push(`${label} file not found: ${filePath}`);
    return undefined;
  }
}

/**
 * Validate both files against their schemas, then against each other
 */
export async function validateFiles(
  paths: { catalog: string; languages: string },
  config: EngineConfig,
  logger: Logger,
): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];

  const catalogData = await readOptionalJson(paths.catalog, 'Catalog', errors);
  const languagesData = await readOptionalJson(paths.languages, 'Languages', errors);

  const catalogIssues = catalogData === undefined ? [] : schemaIssues('catalog', catalogData);
  const languageIssues = languagesData === undefined ? [] : schemaIssues('languages', languagesData);
  errors.push(...catalogIssues.map(issue => `Schema (catalog): ${issue}`));
  errors.push(...languageIssues.map(issue => `Schema (languages): ${issue}`));

  if (errors.length === 0) {
    const custom = checkConsistency(
      parseCatalogFile(catalogData, paths.catalog),
      parseLanguagesFile(languagesData, paths.languages),
      config,
    );
    errors.push(...custom.errors);
    warnings.push(...custom.warnings);
  }

  logger.info('Validation finished', { errors: errors.length, warnings: warnings.length });
  return { valid: errors.length === 0, errors, warnings };
}
