import { describe, expect, it } from 'vitest';
import type { CatalogEntry, EngineConfig, LanguageDescriptor } from '../types/catalog.js';
import { canonicalKeys, computeCoverage, missingKeys, unusedLanguages } from './coverage.js';

const config: EngineConfig = { sourceLanguage: 'ru', reservedKey: 'welcome' };

function language(code: string, nameInSource: string): LanguageDescriptor {
  return { code, name: nameInSource, nameInSource, emoji: '', available: true };
}

const languages = [language('ru', 'Русский'), language('en', 'Английский'), language('pl', 'Польский')];

const entries: CatalogEntry[] = [
  { key: 'welcome', language: 'ru', text: 'Добро пожаловать' },
  { key: 'welcome', language: 'en', text: 'Welcome' },
  { key: 'greeting', language: 'ru', text: 'Привет' },
  { key: 'greeting', language: 'en', text: 'Hello' },
  { key: 'bye', language: 'ru', text: 'Пока' },
  { key: 'orphan', language: 'en', text: 'No source text' },
];

describe('canonicalKeys', () => {
  it('lists source keys without the reserved key', () => {
    expect(canonicalKeys(entries, config)).toEqual(['bye', 'greeting']);
  });
});

describe('computeCoverage', () => {
  it('counts only canonical keys', () => {
    expect(computeCoverage(entries, languages, config)).toEqual({
      ru: { filledCount: 2, missingCount: 0, totalCanonicalKeys: 2 },
      en: { filledCount: 1, missingCount: 1, totalCanonicalKeys: 2 },
      pl: { filledCount: 0, missingCount: 2, totalCanonicalKeys: 2 },
    });
  });

  it('keeps filled + missing equal to the total and the source language complete', () => {
    const coverage = computeCoverage(entries, languages, config);
    for (const record of Object.values(coverage)) {
      expect(record.filledCount + record.missingCount).toBe(record.totalCanonicalKeys);
    }
    expect(coverage['ru']?.missingCount).toBe(0);
  });

  it('does not depend on entry order', () => {
    const reversed = [...entries].reverse();
    expect(computeCoverage(reversed, languages, config)).toEqual(computeCoverage(entries, languages, config));
  });

  it('reports an empty catalog as zero keys', () => {
    expect(computeCoverage([], [language('en', 'Английский')], config)).toEqual({
      en: { filledCount: 0, missingCount: 0, totalCanonicalKeys: 0 },
    });
  });
});

describe('missingKeys', () => {
  it('excludes the reserved key', () => {
    const catalog: CatalogEntry[] = [
      { key: 'welcome', language: 'ru', text: 'Добро пожаловать' },
      { key: 'greeting', language: 'ru', text: 'Привет' },
      { key: 'bye', language: 'ru', text: 'Пока' },
      { key: 'greeting', language: 'en', text: 'Hello' },
    ];
    expect(missingKeys(catalog, 'en', config)).toEqual(new Set(['bye']));
  });

  it('returns every canonical key for an unused language', () => {
    expect([...missingKeys(entries, 'pl', config)]).toEqual(['bye', 'greeting']);
  });
});

describe('unusedLanguages', () => {
  it('returns languages without any entry', () => {
    expect(unusedLanguages(entries, languages).map(item => item.code)).toEqual(['pl']);
  });
});
