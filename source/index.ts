export type {
  BackfillResult,
  CatalogEntry,
  CatalogFile,
  CoverageRecord,
  EngineConfig,
  LanguageDescriptor,
  LanguagesFile,
  TranslationMap,
} from './types/catalog.js';
export {
  createPlaceholderCodec,
  extractBracePlaceholders,
  FLAG_SENTINEL,
  markerFor,
  markerTable,
  type MarkerEntry,
  type PlaceholderCodec,
} from './engine/placeholderCodec.js';
export {
  buildCatalogIndex,
  canonicalKeys,
  computeCoverage,
  missingKeys,
  unusedLanguages,
  usedLanguageCodes,
} from './engine/coverage.js';
export { BackfillOrchestrator } from './engine/backfill.js';
export { commitTranslations } from './engine/merger.js';
export { editEntry } from './engine/editor.js';
export { selectLanguagesForView } from './engine/selector.js';
export {
  ConfigurationError,
  EntryNotFoundError,
  exitCodeFor,
  ExternalCapabilityError,
  InvalidDataError,
  LanguageUnavailableError,
  LocalizationError,
  UnknownLanguageError,
  type LocalizationErrorCode,
} from './engine/errors.js';
export {
  InMemoryCatalogStore,
  JsonFileCatalogStore,
  type CatalogStore,
} from './services/catalogStore.js';
export {
  InMemoryLanguageDirectory,
  JsonFileLanguageDirectory,
  requireLanguage,
  type LanguageDirectory,
} from './services/languageDirectory.js';
export {
  OpenAiTranslationProvider,
  type OpenAiProviderConfig,
  type TranslationCapability,
  type TranslationRequest,
} from './services/translationProvider.js';
export {
  LocalizationService,
  type CatalogRow,
  type CatalogViewModel,
  type CommitReport,
  type CoverageReport,
  type LocalizationServiceOptions,
} from './services/localizationService.js';
export { checkConsistency, validateFiles, type ValidationResult } from './services/catalogValidator.js';
export { config, loadEngineConfig, loadProviderConfig } from './config/config.js';
export { DualLogger, createSilentLogger, type LogEntry, type LogLevel, type Logger } from './utils/logger.js';
