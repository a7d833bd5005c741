import type { EngineConfig, LanguageDescriptor } from '../types/catalog.js';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Languages to show in a view, source language first and the rest by their
 * name in the source language.
 *
 * With a preview target only the source language and the target are shown;
 * otherwise every directory language that already has catalog entries.
 */
export function selectLanguagesForView(
  allLanguages: LanguageDescriptor[],
  usedLanguageCodes: ReadonlySet<string>,
  config: Pick<EngineConfig, 'sourceLanguage'>,
  previewTarget?: LanguageDescriptor,
): LanguageDescriptor[] {
  let selected: LanguageDescriptor[];

  if (previewTarget) {
    selected = allLanguages.filter(language => language.code === config.sourceLanguage);
    if (previewTarget.code !== config.sourceLanguage) {
      selected.push(previewTarget);
    }
  } else {
    selected = allLanguages.filter(language => usedLanguageCodes.has(language.code));
  }

  return [...selected].sort((a, b) => {
    const aIsSource = a.code === config.sourceLanguage;
    const bIsSource = b.code === config.sourceLanguage;
    if (aIsSource !== bIsSource) return aIsSource ? -1 : 1;
    return compareNames(a.nameInSource, b.nameInSource);
  });
}
