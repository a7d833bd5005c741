export type LocalizationErrorCode =
  | 'UNKNOWN_LANGUAGE'
  | 'LANGUAGE_UNAVAILABLE'
  | 'EXTERNAL_CAPABILITY_FAILURE'
  | 'ENTRY_NOT_FOUND'
  | 'CONFIGURATION'
  | 'INVALID_DATA';

export class LocalizationError extends Error {
  readonly code: LocalizationErrorCode;

  constructor(code: LocalizationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownLanguageError extends LocalizationError {
  readonly language: string;

  constructor(language: string) {
    super('UNKNOWN_LANGUAGE', `Language '${language}' not found`);
    this.language = language;
  }
}

/**
 * The language exists but is switched off for onboarding and has no entries yet
 */
export class LanguageUnavailableError extends LocalizationError {
  readonly language: string;

  constructor(language: string) {
    super('LANGUAGE_UNAVAILABLE', `Language '${language}' is not available for onboarding`);
    this.language = language;
  }
}

export class ExternalCapabilityError extends LocalizationError {
  readonly provider: string;
  readonly status: number | null;

  constructor(message: string, details: { provider: string; status?: number; cause?: unknown }) {
    super('EXTERNAL_CAPABILITY_FAILURE', message, { cause: details.cause });
    this.provider = details.provider;
    this.status = details.status ?? null;
  }
}

export class EntryNotFoundError extends LocalizationError {
  constructor(readonly key: string, readonly language: string) {
    super('ENTRY_NOT_FOUND', `Translation not found for key='${key}', lang='${language}'`);
  }
}

export class ConfigurationError extends LocalizationError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class InvalidDataError extends LocalizationError {
  constructor(readonly file: string, readonly issues: string[]) {
    super('INVALID_DATA', `Invalid data in ${file}: ${issues.join('; ')}`);
  }
}

/**
 * Process exit code for an error surfaced by a CLI command.
 * 2 = not found, 3 = retryable upstream failure, 4 = bad configuration, data or language state.
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof LocalizationError)) return 1;
  switch (error.code) {
    case 'UNKNOWN_LANGUAGE':
    case 'ENTRY_NOT_FOUND':
      return 2;
    case 'EXTERNAL_CAPABILITY_FAILURE':
      return 3;
    case 'LANGUAGE_UNAVAILABLE':
    case 'CONFIGURATION':
    case 'INVALID_DATA':
      return 4;
  }
}
