import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  EntryNotFoundError,
  exitCodeFor,
  ExternalCapabilityError,
  InvalidDataError,
  LanguageUnavailableError,
  UnknownLanguageError,
} from './errors.js';

describe('errors', () => {
  it('carries a code and a readable message', () => {
    const error = new UnknownLanguageError('xx');
    expect(error.code).toBe('UNKNOWN_LANGUAGE');
    expect(error.name).toBe('UnknownLanguageError');
    expect(error.message).toBe("Language 'xx' not found");
  });

  it('joins data issues into the message', () => {
    const error = new InvalidDataError('catalog.json', ['/version must be equal to constant', '/ bad']);
    expect(error.message).toBe('Invalid data in catalog.json: /version must be equal to constant; / bad');
  });

  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new UnknownLanguageError('xx'))).toBe(2);
    expect(exitCodeFor(new EntryNotFoundError('greeting', 'en'))).toBe(2);
    expect(exitCodeFor(new ExternalCapabilityError('down', { provider: 'fake' }))).toBe(3);
    expect(exitCodeFor(new ConfigurationError('missing key'))).toBe(4);
    expect(exitCodeFor(new LanguageUnavailableError('uk'))).toBe(4);
    expect(exitCodeFor(new InvalidDataError('x.json', []))).toBe(4);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
