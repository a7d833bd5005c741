import dotenv from 'dotenv';
import path from 'node:path';
import fs from 'node:fs';
import type { EngineConfig } from '../types/catalog.js';
import type { OpenAiProviderConfig } from '../services/translationProvider.js';
import { ConfigurationError } from '../engine/errors.js';

// Load .env file if it exists
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

/**
 * Configuration for the CLI
 */
export const config = {
  getCatalogPath(): string {
    return process.env['CATALOG_PATH'] || './catalog.json';
  },

  getLanguagesPath(): string {
    return process.env['LANGUAGES_PATH'] || './languages.json';
  },

  /**
   * Canonical language every other language is measured against
   */
  getSourceLanguage(): string {
    return process.env['SOURCE_LANGUAGE'] || 'ru';
  },

  /**
   * Key left out of coverage (the first-contact greeting)
   */
  getReservedKey(): string {
    return process.env['RESERVED_KEY'] || 'welcome';
  },

  getOpenAiApiKey(): string {
    return process.env['OPENAI_API_KEY'] || '';
  },

  getOpenAiBaseUrl(): string {
    return process.env['OPENAI_BASE_URL'] || 'https://api.openai.com/v1';
  },

  getOpenAiModel(): string {
    return process.env['OPENAI_MODEL'] || 'gpt-4o';
  },

  getTemperature(): number {
    return readNumber('OPENAI_TEMPERATURE', 0.2);
  },

  /**
   * Timeout for translation requests (in milliseconds)
   */
  getRequestTimeout(): number {
    return readNumber('REQUEST_TIMEOUT', 60000); // Default 60 seconds
  },

  getLogFile(): string | undefined {
    return process.env['LOG_FILE'] || undefined;
  },
};

export function loadEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    sourceLanguage: overrides.sourceLanguage ?? config.getSourceLanguage(),
    reservedKey: overrides.reservedKey ?? config.getReservedKey(),
  };
}

/**
 * Provider settings; fails when no API key is configured
 */
export function loadProviderConfig(overrides: Partial<OpenAiProviderConfig> = {}): OpenAiProviderConfig {
  const apiKey = overrides.apiKey ?? config.getOpenAiApiKey();
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set');
  }
  return {
    apiKey,
    baseUrl: overrides.baseUrl ?? config.getOpenAiBaseUrl(),
    model: overrides.model ?? config.getOpenAiModel(),
    temperature: overrides.temperature ?? config.getTemperature(),
    timeoutMs: overrides.timeoutMs ?? config.getRequestTimeout(),
  };
}
