import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../engine/errors.js';
import { config, loadEngineConfig, loadProviderConfig } from './config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('config', () => {
  it('reads the engine settings from the environment', () => {
    vi.stubEnv('SOURCE_LANGUAGE', 'en');
    vi.stubEnv('RESERVED_KEY', 'start');

    expect(loadEngineConfig()).toEqual({ sourceLanguage: 'en', reservedKey: 'start' });
    expect(loadEngineConfig({ sourceLanguage: 'de' })).toEqual({ sourceLanguage: 'de', reservedKey: 'start' });
  });

  it('rejects non-numeric timeouts', () => {
    vi.stubEnv('REQUEST_TIMEOUT', 'soon');
    expect(() => config.getRequestTimeout()).toThrow(ConfigurationError);
  });

  it('requires an API key for the provider', () => {
    expect(() => loadProviderConfig({ apiKey: '' })).toThrow('OPENAI_API_KEY is not set');
  });

  it('builds the provider settings', () => {
    vi.stubEnv('OPENAI_MODEL', 'test-model');
    vi.stubEnv('OPENAI_TEMPERATURE', '0');
    vi.stubEnv('REQUEST_TIMEOUT', '5000');

    expect(loadProviderConfig({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' })).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://llm.test/v1',
      model: 'test-model',
      temperature: 0,
      timeoutMs: 5000,
    });
  });
});
