import type { CatalogStore } from '../services/catalogStore.js';
import type { TranslationMap } from '../types/catalog.js';

/**
 * Insert translations that do not exist yet. Existing (key, language) pairs are
 * left untouched; empty or whitespace-only texts are skipped.
 *
 * @returns number of entries actually added
 */
export async function commitTranslations(
  store: CatalogStore,
  language: string,
  translations: TranslationMap,
): Promise<number> {
  let persisted = 0;
  for (const [key, text] of Object.entries(translations)) {
    if (!text.trim()) continue;
    if (await store.insertIfAbsent(key, language, text)) {
      persisted++;
    }
  }
  return persisted;
}
