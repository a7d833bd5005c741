/**
 * TypeScript types for the translation catalog and language directory
 * Based on the JSON schemas defined in schemas/catalog.schema.json and schemas/languages.schema.json
 */

/**
 * A single translated text, identified by the (key, language) pair
 */
export interface CatalogEntry {
  /** Semantic translation key (e.g. "greeting") */
  key: string;

  /** Language code (e.g. "ru", "en") */
  language: string;

  /** Text shown to users */
  text: string;
}

/**
 * A language known to the system
 */
export interface LanguageDescriptor {
  /** Language code used in catalog entries */
  code: string;

  /** Native name of the language */
  name: string;

  /** Name of the language written in the source language; used for ordering */
  nameInSource: string;

  /** Flag glyph for the language, or an empty string */
  emoji: string;

  /** Whether the language may be offered for onboarding */
  available: boolean;
}

/**
 * Per-language completeness against the canonical key set
 */
export interface CoverageRecord {
  filledCount: number;
  missingCount: number;
  totalCanonicalKeys: number;
}

/**
 * Mapping from translation key to text for one language
 */
export type TranslationMap = Record<string, string>;

/**
 * Output of a backfill run; held in memory until committed
 */
export interface BackfillResult {
  /** Target language code */
  language: string;

  /** Translated texts by key. May be partial and may contain empty texts */
  translations: TranslationMap;

  /** Keys that were sent to the translation capability */
  requested: string[];
}

/**
 * Values every engine component receives at construction
 */
export interface EngineConfig {
  /** Canonical language, always 100% complete */
  sourceLanguage: string;

  /** Key excluded from all coverage accounting */
  reservedKey: string;
}

/**
 * On-disk layout of a catalog file
 */
export interface CatalogFile {
  version: 1;

  /** translations[key][language] = text */
  translations: Record<string, Record<string, string>>;

  /** Optional human description of what each key is used for */
  descriptions?: Record<string, string>;
}

/**
 * On-disk layout of a language directory file
 */
export interface LanguagesFile {
  languages: LanguageDescriptor[];
}
