import { describe, expect, it, vi } from 'vitest';
import type { TranslationRequest } from '../services/translationProvider.js';
import type { CatalogEntry, LanguageDescriptor, TranslationMap } from '../types/catalog.js';
import { createSilentLogger } from '../utils/logger.js';
import { setOwn } from '../utils/records.js';
import { BackfillOrchestrator } from './backfill.js';
import { ExternalCapabilityError } from './errors.js';
import { createPlaceholderCodec } from './placeholderCodec.js';

const config = { sourceLanguage: 'ru', reservedKey: 'welcome' };
const codec = createPlaceholderCodec([
  { code: 'ru', emoji: '🇷🇺' },
  { code: 'en', emoji: '🇬🇧' },
  { code: 'de', emoji: '🇩🇪' },
]);

const german: LanguageDescriptor = {
  code: 'de',
  name: 'Deutsch',
  nameInSource: 'Немецкий',
  emoji: '🇩🇪',
  available: true,
};

const entries: CatalogEntry[] = [
  { key: 'greeting', language: 'ru', text: 'Привет, {text}! 🇷🇺' },
  { key: 'bye', language: 'ru', text: 'Пока' },
  { key: 'thanks', language: 'ru', text: 'Спасибо\\nещё раз' },
  { key: 'greeting', language: 'en', text: 'Hello, {text}! 🇬🇧' },
];

function fakeCapability(respond: (request: TranslationRequest) => Promise<TranslationMap>) {
  const translate = vi.fn(respond);
  return { capability: { name: 'fake', translate }, translate };
}

describe('BackfillOrchestrator', () => {
  it('sends one encoded request and decodes the answer for the target', async () => {
    const { capability, translate } = fakeCapability(async () => ({
      greeting: 'Hallo, {text}! {flag}',
      bye: 'Tschüss',
      thanks: 'Danke\\nnochmal',
    }));
    const orchestrator = new BackfillOrchestrator(config, capability, codec, createSilentLogger());

    const result = await orchestrator.backfill(entries, german, ['greeting', 'bye', 'thanks']);

    expect(translate).toHaveBeenCalledTimes(1);
    expect(translate).toHaveBeenCalledWith({
      entries: [
        { key: 'greeting', text: 'Привет, {text}! {flag}' },
        { key: 'bye', text: 'Пока' },
        { key: 'thanks', text: 'Спасибо\\nещё раз' },
      ],
      target: { code: 'de', name: 'Немецкий', emoji: '🇩🇪' },
      preserve: ['{text}', '\\n', '\\n\\n', '{flag}'],
    });
    expect(result).toEqual({
      language: 'de',
      translations: {
        greeting: 'Hallo, {text}! 🇩🇪',
        bye: 'Tschüss',
        thanks: 'Danke\\nnochmal',
      },
      requested: ['greeting', 'bye', 'thanks'],
    });
  });

  it('returns only the keys the capability answered', async () => {
    const { capability } = fakeCapability(async () => ({ greeting: 'Hallo', bye: 'Tschüss' }));
    const logger = createSilentLogger();
    const orchestrator = new BackfillOrchestrator(config, capability, codec, logger);

    const result = await orchestrator.backfill(entries, german, ['greeting', 'bye', 'thanks']);

    expect(result.translations).toEqual({ greeting: 'Hallo', bye: 'Tschüss' });
    expect(result.requested).toEqual(['greeting', 'bye', 'thanks']);
    expect(logger.getLogs('warn').map(entry => entry.message)).toEqual(['Partial translation response']);
  });

  it('drops keys that were not requested', async () => {
    const { capability } = fakeCapability(async () => ({ bye: 'Tschüss', extra: 'Zusätzlich' }));
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(entries, german, ['bye']);

    expect(result.translations).toEqual({ bye: 'Tschüss' });
  });

  it('leaves out keys without a source text', async () => {
    const { capability, translate } = fakeCapability(async () => ({ bye: 'Tschüss' }));
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(entries, german, ['bye', 'ghost', 'bye']);

    expect(result.requested).toEqual(['bye']);
    expect(translate.mock.calls[0]?.[0].entries).toEqual([{ key: 'bye', text: 'Пока' }]);
  });

  it('does not call the capability for an empty batch', async () => {
    const { capability, translate } = fakeCapability(async () => ({}));
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(entries, german, ['ghost']);

    expect(translate).not.toHaveBeenCalled();
    expect(result).toEqual({ language: 'de', translations: {}, requested: [] });
  });

  it('keeps whitespace-only answers for the merger to skip', async () => {
    const { capability } = fakeCapability(async () => ({ bye: '   ' }));
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(entries, german, ['bye']);

    expect(result.translations).toEqual({ bye: '   ' });
  });

  it('uses the upper-cased code for a target without emoji', async () => {
    const kazakh: LanguageDescriptor = { ...german, code: 'kk', nameInSource: 'Казахский', emoji: '' };
    const { capability } = fakeCapability(async () => ({ greeting: 'Сәлем, {text}! {flag}' }));
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(entries, kazakh, ['greeting']);

    expect(result.translations).toEqual({ greeting: 'Сәлем, {text}! KK' });
  });

  it('keeps keys named after Object.prototype members as own entries', async () => {
    const catalog: CatalogEntry[] = [
      { key: '__proto__', language: 'ru', text: 'Прото' },
      { key: 'toString', language: 'ru', text: 'Строка' },
    ];
    const { capability } = fakeCapability(async () => {
      const response: TranslationMap = {};
      setOwn(response, '__proto__', 'Proto');
      return response;
    });
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const result = await orchestrator.backfill(catalog, german, ['__proto__', 'toString']);

    expect(Object.entries(result.translations)).toEqual([['__proto__', 'Proto']]);
    expect(Object.getPrototypeOf(result.translations)).toBe(Object.prototype);
  });

  it('wraps capability failures', async () => {
    const { capability } = fakeCapability(async () => {
      throw new Error('socket hang up');
    });
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    const failure = orchestrator.backfill(entries, german, ['bye']);

    await expect(failure).rejects.toBeInstanceOf(ExternalCapabilityError);
    await expect(failure).rejects.toThrow('socket hang up');
  });

  it('passes capability errors through unchanged', async () => {
    const original = new ExternalCapabilityError('Server error 503: Service Unavailable', {
      provider: 'fake',
      status: 503,
    });
    const { capability } = fakeCapability(async () => {
      throw original;
    });
    const orchestrator = new BackfillOrchestrator(config, capability, codec);

    await expect(orchestrator.backfill(entries, german, ['bye'])).rejects.toBe(original);
  });
});
