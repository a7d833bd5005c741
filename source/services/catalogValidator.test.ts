import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { LanguageDescriptor } from '../types/catalog.js';
import { createSilentLogger } from '../utils/logger.js';
import { checkConsistency, validateFiles } from './catalogValidator.js';

const config = { sourceLanguage: 'ru', reservedKey: 'welcome' };

function language(code: string): LanguageDescriptor {
  return { code, name: code, nameInSource: code, emoji: '', available: true };
}

describe('checkConsistency', () => {
  it('reports directory and catalog problems', () => {
    const result = checkConsistency(
      {
        version: 1,
        translations: {
          welcome: { en: 'Welcome' },
          greeting: { ru: 'Привет', fr: 'Salut', en: ' ' },
          orphan: { en: 'Orphan' },
        },
        descriptions: { gone: 'Removed key' },
      },
      { languages: [language('ru'), language('en'), language('en')] },
      config,
    );

    expect(result.errors).toEqual([
      "Duplicate language code 'en' in directory",
      "Catalog uses language 'fr' which is not in the directory",
    ]);
    expect(result.warnings).toEqual([
      "Empty text for key 'greeting' in 'en'",
      "Key 'orphan' has no ru text and cannot be backfilled",
      "Description for unknown key 'gone'",
    ]);
  });

  it('requires the source language in the directory', () => {
    const result = checkConsistency(
      { version: 1, translations: {} },
      { languages: [language('ru')] },
      { ...config, sourceLanguage: 'pl' },
    );
    expect(result.errors).toEqual(["Source language 'pl' is not in the directory"]);
  });
});

describe('validateFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-validator-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('accepts the bundled sample data', async () => {
    const sample = fileURLToPath(new URL('../../sample/', import.meta.url));

    const result = await validateFiles(
      { catalog: path.join(sample, 'catalog.json'), languages: path.join(sample, 'languages.json') },
      config,
      createSilentLogger(),
    );

    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports missing files', async () => {
    const catalog = path.join(dir, 'catalog.json');
    const languages = path.join(dir, 'languages.json');
    await fs.writeFile(languages, JSON.stringify({ languages: [language('ru')] }));

    const result = await validateFiles({ catalog, languages }, config, createSilentLogger());

    expect(result).toEqual({ valid: false, errors: [`Catalog file not found: ${catalog}`], warnings: [] });
  });

  it('reports schema errors before consistency checks', async () => {
    const catalog = path.join(dir, 'catalog.json');
    const languages = path.join(dir, 'languages.json');
    await fs.writeFile(catalog, JSON.stringify({ version: 1 }));
    await fs.writeFile(languages, JSON.stringify({ languages: [] }));

    const result = await validateFiles({ catalog, languages }, config, createSilentLogger());

    expect(result.errors).toEqual(["Schema (catalog): / must have required property 'translations'"]);
  });
});
