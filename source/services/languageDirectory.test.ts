import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidDataError, UnknownLanguageError } from '../engine/errors.js';
import type { LanguageDescriptor } from '../types/catalog.js';
import { InMemoryLanguageDirectory, JsonFileLanguageDirectory, requireLanguage } from './languageDirectory.js';

const russian: LanguageDescriptor = {
  code: 'ru',
  name: 'Русский',
  nameInSource: 'Русский',
  emoji: '🇷🇺',
  available: true,
};
const ukrainian: LanguageDescriptor = {
  code: 'uk',
  name: 'Українська',
  nameInSource: 'Украинский',
  emoji: '🇺🇦',
  available: false,
};

describe('JsonFileLanguageDirectory', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'language-directory-'));
    filePath = path.join(dir, 'languages.json');
    await fs.writeFile(filePath, JSON.stringify({ languages: [russian, ukrainian] }));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('finds languages by code', async () => {
    const directory = new JsonFileLanguageDirectory(filePath);

    expect(await directory.find('uk')).toEqual(ukrainian);
    expect(await directory.find('xx')).toBeNull();
  });

  it('persists availability changes', async () => {
    const directory = new JsonFileLanguageDirectory(filePath);

    expect(await directory.setAvailable('uk', true)).toEqual({ ...ukrainian, available: true });
    expect(await new JsonFileLanguageDirectory(filePath).find('uk')).toEqual({ ...ukrainian, available: true });
  });

  it('rejects unknown codes when changing availability', async () => {
    const directory = new JsonFileLanguageDirectory(filePath);
    await expect(directory.setAvailable('xx', true)).rejects.toBeInstanceOf(UnknownLanguageError);
  });

  it('rejects a descriptor without a display name', async () => {
    await fs.writeFile(filePath, JSON.stringify({ languages: [{ ...russian, nameInSource: '' }] }));
    const directory = new JsonFileLanguageDirectory(filePath);

    await expect(directory.readAll()).rejects.toBeInstanceOf(InvalidDataError);
  });
});

describe('requireLanguage', () => {
  it('returns the descriptor or throws UnknownLanguageError', async () => {
    const directory = new InMemoryLanguageDirectory([russian]);

    expect(await requireLanguage(directory, 'ru')).toEqual(russian);
    await expect(requireLanguage(directory, 'xx')).rejects.toThrow("Language 'xx' not found");
  });
});
