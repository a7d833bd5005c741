import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CatalogEntry, CatalogFile } from '../types/catalog.js';
import { ownValue, setOwn } from '../utils/records.js';
import { parseCatalogFile, parseJson } from '../utils/validateSchema.js';

/**
 * Keyed storage for catalog entries.
 *
 * `insertIfAbsent` must be atomic per (key, language): of several concurrent
 * calls for the same pair exactly one returns true. `update` belongs to the
 * manual-edit path and is never used by backfill.
 */
export interface CatalogStore {
  readAll(): Promise<CatalogEntry[]>;
  insertIfAbsent(key: string, language: string, text: string): Promise<boolean>;
  /** Overwrite an existing entry; false when the pair does not exist */
  update(key: string, language: string, text: string): Promise<boolean>;
  readDescriptions(): Promise<Record<string, string>>;
}

export function catalogFileToEntries(file: CatalogFile): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const [key, byLanguage] of Object.entries(file.translations)) {
    for (const [language, text] of Object.entries(byLanguage)) {
      entries.push({ key, language, text });
    }
  }
  return entries;
}

export function emptyCatalogFile(): CatalogFile {
  return { version: 1, translations: {} };
}

/**
 * Runs tasks one at a time in call order
 */
class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}

/** One queue per resolved file path, shared by every store instance in the process */
const fileQueues = new Map<string, SerialQueue>();

function queueFor(filePath: string): SerialQueue {
  const resolved = path.resolve(filePath);
  let queue = fileQueues.get(resolved);
  if (!queue) {
    queue = new SerialQueue();
    fileQueues.set(resolved, queue);
  }
  return queue;
}

let tmpCounter = 0;

/**
 * Catalog persisted as a single JSON file.
 * Every mutation re-reads the file inside the queue and replaces it through a rename.
 */
export class JsonFileCatalogStore implements CatalogStore {
  private queue: SerialQueue;

  constructor(readonly filePath: string) {
    this.queue = queueFor(filePath);
  }

  async readFile(): Promise<CatalogFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return emptyCatalogFile();
      throw error;
    }
    return parseCatalogFile(parseJson(content, this.filePath), this.filePath);
  }

  async readAll(): Promise<CatalogEntry[]> {
    return catalogFileToEntries(await this.readFile());
  }

  async readDescriptions(): Promise<Record<string, string>> {
    return (await this.readFile()).descriptions ?? {};
  }

  insertIfAbsent(key: string, language: string, text: string): Promise<boolean> {
    return this.queue.run(async () => {
      const file = await this.readFile();
      const byLanguage = ownValue(file.translations, key) ?? {};
      if (Object.hasOwn(byLanguage, language)) return false;
      setOwn(byLanguage, language, text);
      setOwn(file.translations, key, byLanguage);
      await this.writeFile(file);
      return true;
    });
  }

  update(key: string, language: string, text: string): Promise<boolean> {
    return this.queue.run(async () => {
      const file = await this.readFile();
      const byLanguage = ownValue(file.translations, key);
      if (!byLanguage || !Object.hasOwn(byLanguage, language)) return false;
      setOwn(byLanguage, language, text);
      await this.writeFile(file);
      return true;
    });
  }

  private async writeFile(file: CatalogFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.${++tmpCounter}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(file, null, 2) + '\n');
    await fs.rename(tmpPath, this.filePath);
  }
}

/**
 * Catalog held in process memory
 */
export class InMemoryCatalogStore implements CatalogStore {
  private entries = new Map<string, CatalogEntry>();
  private descriptions: Record<string, string>;

  constructor(entries: CatalogEntry[] = [], descriptions: Record<string, string> = {}) {
    for (const entry of entries) {
      this.entries.set(pairId(entry.key, entry.language), { ...entry });
    }
    this.descriptions = { ...descriptions };
  }

  async readAll(): Promise<CatalogEntry[]> {
    return [...this.entries.values()].map(entry => ({ ...entry }));
  }

  async readDescriptions(): Promise<Record<string, string>> {
    return { ...this.descriptions };
  }

  async insertIfAbsent(key: string, language: string, text: string): Promise<boolean> {
    const id = pairId(key, language);
    if (this.entries.has(id)) return false;
    this.entries.set(id, { key, language, text });
    return true;
  }

  async update(key: string, language: string, text: string): Promise<boolean> {
    const id = pairId(key, language);
    if (!this.entries.has(id)) return false;
    this.entries.set(id, { key, language, text });
    return true;
  }
}

function pairId(key: string, language: string): string {
  return JSON.stringify([key, language]);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
