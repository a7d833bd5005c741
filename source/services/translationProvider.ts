import axios, { type AxiosInstance } from 'axios';
import { ExternalCapabilityError } from '../engine/errors.js';
import type { TranslationMap } from '../types/catalog.js';
import { setOwn } from '../utils/records.js';

export interface TranslationRequest {
  /** Source texts, already passed through the placeholder codec */
  entries: Array<{ key: string; text: string }>;
  target: {
    code: string;
    /** Display name of the target language, written in the source language */
    name: string;
    emoji: string;
  };
  /** Tokens the translation must reproduce verbatim */
  preserve: string[];
}

/**
 * Anything that can turn a batch of source texts into target-language texts.
 * The returned map may cover only part of the batch.
 */
export interface TranslationCapability {
  readonly name: string;
  translate(request: TranslationRequest): Promise<TranslationMap>;
}

export interface OpenAiProviderConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

export function buildSystemPrompt(request: TranslationRequest): string {
  const { target } = request;
  const label = [target.name, target.emoji].filter(Boolean).join(' ');
  return [
    'You are a professional translator of user interface strings.',
    `Translate the text to the right of the colon on every line into ${label}.`,
    'Keep the key to the left of the colon unchanged.',
    `Keep these tokens exactly as written: ${request.preserve.join(', ')}.`,
    'Answer with one line per input line in the format: key: translated text',
  ].join('\n');
}

export function buildUserPrompt(request: TranslationRequest): string {
  return request.entries.map(entry => `${entry.key}: ${entry.text}`).join('\n');
}

/**
 * Parse `key: text` lines. Lines without a colon are ignored; the text is split at the first colon.
 */
export function parseTranslationLines(raw: string): TranslationMap {
  const result: TranslationMap = {};
  for (const line of raw.trim().split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const key = line.slice(0, colon).trim();
    if (!key) continue;
    setOwn(result, key, line.slice(colon + 1).trim());
  }
  return result;
}

/**
 * Translation through an OpenAI-compatible chat completions endpoint
 */
export class OpenAiTranslationProvider implements TranslationCapability {
  readonly name = 'openai';
  private http: AxiosInstance;

  constructor(private config: OpenAiProviderConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create();
  }

  async translate(request: TranslationRequest): Promise<TranslationMap> {
    const content = await this.complete(request);
    const parsed = parseTranslationLines(content);

    if (Object.keys(parsed).length === 0) {
      throw new ExternalCapabilityError('Unparseable translation response', { provider: this.name });
    }

    return parsed;
  }

  private async complete(request: TranslationRequest): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`;
    let data: ChatCompletionResponse;

    try {
      const response = await this.http.post<ChatCompletionResponse>(
        url,
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: buildSystemPrompt(request) },
            { role: 'user', content: buildUserPrompt(request) },
          ],
          temperature: this.config.temperature,
        },
        {
          timeout: this.config.timeoutMs,
          headers: {
            'Authorization': `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
        },
      );
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new ExternalCapabilityError(`Request timed out after ${this.config.timeoutMs}ms`, {
            provider: this.name,
            cause: error,
          });
        }
        if (error.response) {
          throw new ExternalCapabilityError(
            `Server error ${error.response.status}: ${error.response.statusText}`,
            { provider: this.name, status: error.response.status, cause: error },
          );
        }
        throw new ExternalCapabilityError(`No response from server: ${error.message}`, {
          provider: this.name,
          cause: error,
        });
      }
      throw new ExternalCapabilityError('Request failed', { provider: this.name, cause: error });
    }

    const content = data?.choices?.[0]?.message?.content;
    if (typeof content !== 'string' || !content.trim()) {
      throw new ExternalCapabilityError('Empty model response', { provider: this.name });
    }
    return content;
  }
}
