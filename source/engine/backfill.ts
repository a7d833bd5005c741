import type {
  BackfillResult,
  CatalogEntry,
  EngineConfig,
  LanguageDescriptor,
  TranslationMap,
} from '../types/catalog.js';
import type { TranslationCapability, TranslationRequest } from '../services/translationProvider.js';
import type { Logger } from '../utils/logger.js';
import { ownValue, setOwn } from '../utils/records.js';
import { ExternalCapabilityError, LocalizationError } from './errors.js';
import {
  extractBracePlaceholders,
  FLAG_SENTINEL,
  markerFor,
  type PlaceholderCodec,
} from './placeholderCodec.js';

/** Escaped line breaks as they appear in catalog texts */
const NEWLINE_ESCAPES = ['\\n', '\\n\\n'];

/**
 * Turns missing keys into a single translation request and reassembles the answer.
 */
export class BackfillOrchestrator {
  constructor(
    private config: EngineConfig,
    private capability: TranslationCapability,
    private codec: PlaceholderCodec,
    private logger?: Logger,
  ) {}

  /**
   * Source-language texts for the requested keys. Keys without a source entry are dropped.
   */
  buildBatch(entries: CatalogEntry[], keysToTranslate: Iterable<string>): Array<{ key: string; text: string }> {
    const sourceTexts = new Map<string, string>();
    for (const entry of entries) {
      if (entry.language === this.config.sourceLanguage) {
        sourceTexts.set(entry.key, entry.text);
      }
    }

    const batch: Array<{ key: string; text: string }> = [];
    const seen = new Set<string>();
    for (const key of keysToTranslate) {
      if (seen.has(key)) continue;
      seen.add(key);
      const text = sourceTexts.get(key);
      if (text === undefined) {
        this.logger?.debug('Skipping key without source text', { key });
        continue;
      }
      batch.push({ key, text });
    }
    return batch;
  }

  async backfill(
    entries: CatalogEntry[],
    targetLanguage: LanguageDescriptor,
    keysToTranslate: Iterable<string>,
  ): Promise<BackfillResult> {
    const batch = this.buildBatch(entries, keysToTranslate);
    const requested = batch.map(item => item.key);

    if (batch.length === 0) {
      this.logger?.info('Nothing to translate', { language: targetLanguage.code });
      return { language: targetLanguage.code, translations: {}, requested };
    }

    const encoded = batch.map(item => ({ key: item.key, text: this.codec.encode(item.text) }));
    const request: TranslationRequest = {
      entries: encoded,
      target: {
        code: targetLanguage.code,
        name: targetLanguage.nameInSource,
        emoji: targetLanguage.emoji,
      },
      preserve: this.preserveTokens(encoded),
    };

    this.logger?.info('Requesting translations', {
      language: targetLanguage.code,
      provider: this.capability.name,
      keys: batch.length,
    });

    let response: TranslationMap;
    try {
      response = await this.capability.translate(request);
    } catch (error) {
      this.logger?.error('Translation request failed', {
        language: targetLanguage.code,
        error: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof LocalizationError) throw error;
      throw new ExternalCapabilityError(
        error instanceof Error ? error.message : 'Translation request failed',
        { provider: this.capability.name, cause: error },
      );
    }

    const marker = markerFor(targetLanguage);
    const translations: TranslationMap = {};
    for (const key of requested) {
      const text = ownValue(response, key);
      if (typeof text !== 'string') continue;
      setOwn(translations, key, this.codec.decode(text, marker));
    }

    const returned = Object.keys(translations).length;
    if (returned < requested.length) {
      this.logger?.warn('Partial translation response', {
        language: targetLanguage.code,
        requested: requested.length,
        returned,
      });
    } else {
      this.logger?.info('Translations received', { language: targetLanguage.code, returned });
    }

    return { language: targetLanguage.code, translations, requested };
  }

  private preserveTokens(batch: Array<{ text: string }>): string[] {
    const placeholders = new Set<string>();
    for (const item of batch) {
      for (const token of extractBracePlaceholders(item.text)) {
        if (token !== FLAG_SENTINEL) placeholders.add(token);
      }
    }
    return [...placeholders, ...NEWLINE_ESCAPES, FLAG_SENTINEL];
  }
}
