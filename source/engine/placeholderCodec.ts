import type { LanguageDescriptor } from '../types/catalog.js';

/**
 * Token that stands in for a language flag while a text is out for translation
 */
export const FLAG_SENTINEL = '{flag}';

const BRACE_PLACEHOLDER_PATTERN = /\{[^{}\s]+\}/g;

export interface MarkerEntry {
  code: string;
  emoji: string;
}

export interface PlaceholderCodec {
  encode(text: string): string;
  decode(safeText: string, languageMarker: string): string;
}

/**
 * Build the marker table from the language directory, keeping directory order.
 */
export function markerTable(languages: LanguageDescriptor[]): MarkerEntry[] {
  return languages
    .filter(language => language.emoji.length > 0)
    .map(language => ({ code: language.code, emoji: language.emoji }));
}

/**
 * Flag shown for a language in translated text: its emoji, or its upper-cased code.
 */
export function markerFor(language: Pick<LanguageDescriptor, 'code' | 'emoji'>): string {
  return language.emoji || language.code.toUpperCase();
}

/**
 * Index of the earliest occurrence of `emoji` that is preceded by a space or ends the text.
 */
function firstQualifyingIndex(text: string, emoji: string): number {
  let index = text.indexOf(emoji);
  while (index !== -1) {
    const precededBySpace = index > 0 && text[index - 1] === ' ';
    const endsText = index + emoji.length === text.length;
    if (precededBySpace || endsText) return index;
    index = text.indexOf(emoji, index + 1);
  }
  return -1;
}

/**
 * Swaps at most one flag glyph per text for {@link FLAG_SENTINEL}.
 *
 * Markers are tried in table order and only the first one with a qualifying
 * position is replaced, at its earliest qualifying position. Any other flag
 * occurrences are left as they are.
 */
export function createPlaceholderCodec(markers: MarkerEntry[]): PlaceholderCodec {
  const table = markers.filter(marker => marker.emoji.length > 0);

  return {
    encode(text: string): string {
      for (const { emoji } of table) {
        const index = firstQualifyingIndex(text, emoji);
        if (index !== -1) {
          return text.slice(0, index) + FLAG_SENTINEL + text.slice(index + emoji.length);
        }
      }
      return text;
    },

    decode(safeText: string, languageMarker: string): string {
      return safeText.split(FLAG_SENTINEL).join(languageMarker);
    },
  };
}

/**
 * Distinct brace placeholders such as `{text}` or `{moderator}`, in order of first appearance
 */
export function extractBracePlaceholders(text: string): string[] {
  const found = text.match(BRACE_PLACEHOLDER_PATTERN) ?? [];
  return [...new Set(found)];
}
