import type { CatalogStore } from '../services/catalogStore.js';
import { EntryNotFoundError } from './errors.js';

/**
 * Manual correction of an existing entry. Unlike commitTranslations this overwrites.
 */
export async function editEntry(store: CatalogStore, key: string, language: string, text: string): Promise<void> {
  const updated = await store.update(key, language, text);
  if (!updated) {
    throw new EntryNotFoundError(key, language);
  }
}
