import { promises as fs } from 'node:fs';
import { UnknownLanguageError } from '../engine/errors.js';
import type { LanguageDescriptor, LanguagesFile } from '../types/catalog.js';
import { parseJson, parseLanguagesFile } from '../utils/validateSchema.js';

export interface LanguageDirectory {
  readAll(): Promise<LanguageDescriptor[]>;
  find(code: string): Promise<LanguageDescriptor | null>;
  /** Set the onboarding flag of a language and return the updated descriptor */
  setAvailable(code: string, available: boolean): Promise<LanguageDescriptor>;
}

/**
 * Look a language up or fail with UnknownLanguageError
 */
export async function requireLanguage(directory: LanguageDirectory, code: string): Promise<LanguageDescriptor> {
  const language = await directory.find(code);
  if (!language) throw new UnknownLanguageError(code);
  return language;
}

export class JsonFileLanguageDirectory implements LanguageDirectory {
  constructor(readonly filePath: string) {}

  private async readFile(): Promise<LanguagesFile> {
    const content = await fs.readFile(this.filePath, 'utf-8');
    return parseLanguagesFile(parseJson(content, this.filePath), this.filePath);
  }

  async readAll(): Promise<LanguageDescriptor[]> {
    return (await this.readFile()).languages;
  }

  async find(code: string): Promise<LanguageDescriptor | null> {
    const languages = await this.readAll();
    return languages.find(language => language.code === code) ?? null;
  }

  async setAvailable(code: string, available: boolean): Promise<LanguageDescriptor> {
    const file = await this.readFile();
    const language = file.languages.find(candidate => candidate.code === code);
    if (!language) throw new UnknownLanguageError(code);
    language.available = available;
    await fs.writeFile(this.filePath, JSON.stringify(file, null, 2) + '\n');
    return { ...language };
  }
}

export class InMemoryLanguageDirectory implements LanguageDirectory {
  private languages: LanguageDescriptor[];

  constructor(languages: LanguageDescriptor[]) {
    this.languages = languages.map(language => ({ ...language }));
  }

  async readAll(): Promise<LanguageDescriptor[]> {
    return this.languages.map(language => ({ ...language }));
  }

  async find(code: string): Promise<LanguageDescriptor | null> {
    const language = this.languages.find(candidate => candidate.code === code);
    return language ? { ...language } : null;
  }

  async setAvailable(code: string, available: boolean): Promise<LanguageDescriptor> {
    const language = this.languages.find(candidate => candidate.code === code);
    if (!language) throw new UnknownLanguageError(code);
    language.available = available;
    return { ...language };
  }
}
