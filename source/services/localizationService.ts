import type {
  BackfillResult,
  CatalogEntry,
  CoverageRecord,
  EngineConfig,
  LanguageDescriptor,
  TranslationMap,
} from '../types/catalog.js';
import type { CatalogStore } from './catalogStore.js';
import { requireLanguage, type LanguageDirectory } from './languageDirectory.js';
import type { TranslationCapability } from './translationProvider.js';
import { BackfillOrchestrator } from '../engine/backfill.js';
import {
  buildCatalogIndex,
  canonicalKeys,
  computeCoverage,
  missingKeys,
  unusedLanguages,
  usedLanguageCodes,
} from '../engine/coverage.js';
import { editEntry } from '../engine/editor.js';
import { ConfigurationError, LanguageUnavailableError } from '../engine/errors.js';
import { commitTranslations } from '../engine/merger.js';
import { createPlaceholderCodec, markerTable } from '../engine/placeholderCodec.js';
import { selectLanguagesForView } from '../engine/selector.js';
import type { DualLogger, Logger } from '../utils/logger.js';
import { ownValue } from '../utils/records.js';

export interface LocalizationServiceOptions {
  store: CatalogStore;
  directory: LanguageDirectory;
  config: EngineConfig;
  logger: DualLogger;
  /** Required only by preview and backfill operations */
  capability?: TranslationCapability;
}

export interface CoverageReport {
  sourceLanguage: string;
  totalCanonicalKeys: number;
  languages: LanguageDescriptor[];
  records: Record<string, CoverageRecord>;
}

export interface CommitReport {
  language: string;
  attempted: number;
  persisted: number;
}

export interface CatalogRow {
  key: string;
  description?: string;
  /** Text by language code; absent when the language has no entry */
  texts: Record<string, string>;
  /** True when the text for the preview language comes from an uncommitted backfill */
  previewed: boolean;
}

export interface CatalogViewModel {
  sourceLanguage: string;
  languages: LanguageDescriptor[];
  coverage: Record<string, CoverageRecord>;
  rows: CatalogRow[];
  preview: BackfillResult | null;
  unusedLanguages: LanguageDescriptor[];
}

/**
 * Operations exposed to the CLI and to embedding applications
 */
export class LocalizationService {
  private store: CatalogStore;
  private directory: LanguageDirectory;
  private config: EngineConfig;
  private logger: DualLogger;
  private capability?: TranslationCapability;

  constructor(options: LocalizationServiceOptions) {
    this.store = options.store;
    this.directory = options.directory;
    this.config = options.config;
    this.logger = options.logger;
    this.capability = options.capability;
  }

  async computeCoverage(): Promise<CoverageReport> {
    const log = this.logger.startOperation('coverage');
    const [entries, languages] = await Promise.all([this.store.readAll(), this.directory.readAll()]);
    const records = computeCoverage(entries, languages, this.config);
    const totalCanonicalKeys = canonicalKeys(entries, this.config).length;
    log.info('Coverage computed', { languages: languages.length, totalCanonicalKeys });
    return { sourceLanguage: this.config.sourceLanguage, totalCanonicalKeys, languages, records };
  }

  async listMissing(code: string): Promise<string[]> {
    const log = this.logger.startOperation('missing', { language: code });
    await requireLanguage(this.directory, code);
    const entries = await this.store.readAll();
    const missing = [...missingKeys(entries, code, this.config)];
    log.info('Missing keys listed', { language: code, missing: missing.length });
    return missing;
  }

  /**
   * Translate the keys missing for a language without persisting anything
   */
  async previewBackfill(code: string): Promise<BackfillResult> {
    const log = this.logger.startOperation('preview', { language: code });
    const target = await requireLanguage(this.directory, code);
    const entries = await this.store.readAll();
    return this.runBackfill(entries, target, log);
  }

  async commit(code: string, translations: TranslationMap): Promise<CommitReport> {
    const log = this.logger.startOperation('commit', { language: code });
    await requireLanguage(this.directory, code);
    const attempted = Object.keys(translations).length;
    const persisted = await commitTranslations(this.store, code, translations);
    log.info('Translations committed', { language: code, attempted, persisted });
    return { language: code, attempted, persisted };
  }

  /**
   * Preview and commit in one step. A failed translation request writes nothing.
   */
  async backfillAndCommit(code: string): Promise<{ result: BackfillResult; persisted: number }> {
    const log = this.logger.startOperation('backfill', { language: code });
    const target = await requireLanguage(this.directory, code);
    const entries = await this.store.readAll();
    const result = await this.runBackfill(entries, target, log);
    const persisted = await commitTranslations(this.store, code, result.translations);
    log.info('Backfill committed', {
      language: code,
      requested: result.requested.length,
      returned: Object.keys(result.translations).length,
      persisted,
    });
    return { result, persisted };
  }

  async editEntry(key: string, code: string, text: string): Promise<void> {
    const log = this.logger.startOperation('edit', { key, language: code });
    await requireLanguage(this.directory, code);
    await editEntry(this.store, key, code, text);
    log.info('Translation updated', { key, language: code });
  }

  async listLanguages(): Promise<LanguageDescriptor[]> {
    return this.directory.readAll();
  }

  /**
   * Languages that can be onboarded: available and without any catalog entry yet
   */
  async listUnusedLanguages(): Promise<LanguageDescriptor[]> {
    const [entries, languages] = await Promise.all([this.store.readAll(), this.directory.readAll()]);
    return onboardingCandidates(entries, languages);
  }

  async toggleLanguage(code: string): Promise<LanguageDescriptor> {
    const log = this.logger.startOperation('toggle', { language: code });
    const language = await requireLanguage(this.directory, code);
    const updated = await this.directory.setAvailable(code, !language.available);
    log.info('Language availability changed', { language: code, available: updated.available });
    return updated;
  }

  /**
   * Everything the catalog browser shows. With `previewCode` the view switches to
   * onboarding: source language plus the target, with an uncommitted backfill overlaid.
   */
  async buildView(previewCode?: string): Promise<CatalogViewModel> {
    const log = this.logger.startOperation('view', { preview: previewCode ?? null });
    const [entries, allLanguages, descriptions] = await Promise.all([
      this.store.readAll(),
      this.directory.readAll(),
      this.store.readDescriptions(),
    ]);
    const previewTarget = previewCode ? await requireLanguage(this.directory, previewCode) : undefined;

    const languages = selectLanguagesForView(
      allLanguages,
      usedLanguageCodes(entries),
      this.config,
      previewTarget,
    );
    const coverage = computeCoverage(entries, languages, this.config);
    const preview = previewTarget ? await this.runBackfill(entries, previewTarget, log) : null;

    const index = buildCatalogIndex(entries);
    const rows: CatalogRow[] = [...index.keys()].sort().map(key => {
      const texts: Record<string, string> = {};
      for (const language of languages) {
        const text = index.get(key)?.get(language.code);
        if (text !== undefined) texts[language.code] = text;
      }
      let previewed = false;
      if (preview && texts[preview.language] === undefined) {
        const text = ownValue(preview.translations, key);
        if (text !== undefined) {
          texts[preview.language] = text;
          previewed = true;
        }
      }
      const description = ownValue(descriptions, key);
      return description === undefined ? { key, texts, previewed } : { key, description, texts, previewed };
    });

    return {
      sourceLanguage: this.config.sourceLanguage,
      languages,
      coverage,
      rows,
      preview,
      unusedLanguages: onboardingCandidates(entries, allLanguages),
    };
  }

  private async runBackfill(entries: CatalogEntry[], target: LanguageDescriptor, log: Logger): Promise<BackfillResult> {
    if (!this.capability) {
      throw new ConfigurationError('No translation capability configured');
    }
    if (!target.available && !usedLanguageCodes(entries).has(target.code)) {
      throw new LanguageUnavailableError(target.code);
    }
    const languages = await this.directory.readAll();
    const codec = createPlaceholderCodec(markerTable(languages));
    const orchestrator = new BackfillOrchestrator(this.config, this.capability, codec, log);
    return orchestrator.backfill(entries, target, missingKeys(entries, target.code, this.config));
  }
}

function onboardingCandidates(entries: CatalogEntry[], languages: LanguageDescriptor[]): LanguageDescriptor[] {
  return unusedLanguages(entries, languages).filter(language => language.available);
}
