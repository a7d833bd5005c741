import type {
  CatalogEntry,
  CoverageRecord,
  EngineConfig,
  LanguageDescriptor,
} from '../types/catalog.js';

export type CatalogIndex = Map<string, Map<string, string>>;

/**
 * Group entries as index[key][language] = text
 */
export function buildCatalogIndex(entries: Iterable<CatalogEntry>): CatalogIndex {
  const index: CatalogIndex = new Map();
  for (const entry of entries) {
    let byLanguage = index.get(entry.key);
    if (!byLanguage) {
      byLanguage = new Map();
      index.set(entry.key, byLanguage);
    }
    byLanguage.set(entry.language, entry.text);
  }
  return index;
}

/**
 * Keys with a source-language entry, minus the reserved key. Sorted.
 */
export function canonicalKeys(entries: Iterable<CatalogEntry>, config: EngineConfig): string[] {
  const keys = new Set<string>();
  for (const entry of entries) {
    if (entry.language === config.sourceLanguage && entry.key !== config.reservedKey) {
      keys.add(entry.key);
    }
  }
  return [...keys].sort();
}

/**
 * Coverage of every given language against the canonical key set.
 * Entries for keys outside the canonical set are not counted.
 */
export function computeCoverage(
  entries: CatalogEntry[],
  languages: LanguageDescriptor[],
  config: EngineConfig,
): Record<string, CoverageRecord> {
  const index = buildCatalogIndex(entries);
  const canonical = canonicalKeys(entries, config);
  const total = canonical.length;
  const coverage: Record<string, CoverageRecord> = {};

  for (const language of languages) {
    const filled = language.code === config.sourceLanguage
      ? total
      : canonical.filter(key => index.get(key)?.has(language.code) ?? false).length;

    coverage[language.code] = {
      filledCount: filled,
      missingCount: total - filled,
      totalCanonicalKeys: total,
    };
  }

  return coverage;
}

/**
 * Canonical keys with no entry in the target language
 */
export function missingKeys(
  entries: CatalogEntry[],
  targetLanguage: string,
  config: EngineConfig,
): Set<string> {
  const index = buildCatalogIndex(entries);
  const missing = new Set<string>();
  for (const key of canonicalKeys(entries, config)) {
    if (!index.get(key)?.has(targetLanguage)) {
      missing.add(key);
    }
  }
  return missing;
}

export function usedLanguageCodes(entries: Iterable<CatalogEntry>): Set<string> {
  const used = new Set<string>();
  for (const entry of entries) used.add(entry.language);
  return used;
}

/**
 * Languages without a single catalog entry, in directory order
 */
export function unusedLanguages(
  entries: CatalogEntry[],
  languages: LanguageDescriptor[],
): LanguageDescriptor[] {
  const used = usedLanguageCodes(entries);
  return languages.filter(language => !used.has(language.code));
}
