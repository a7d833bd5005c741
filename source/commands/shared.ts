import type { Command } from 'commander';
import chalk from 'chalk';
import { config, loadEngineConfig, loadProviderConfig } from '../config/config.js';
import { exitCodeFor, InvalidDataError, LocalizationError } from '../engine/errors.js';
import { JsonFileCatalogStore } from '../services/catalogStore.js';
import { JsonFileLanguageDirectory } from '../services/languageDirectory.js';
import { LocalizationService } from '../services/localizationService.js';
import { OpenAiTranslationProvider } from '../services/translationProvider.js';
import type { EngineConfig, TranslationMap } from '../types/catalog.js';
import { DualLogger } from '../utils/logger.js';
import { setOwn } from '../utils/records.js';
import { isRecord } from '../utils/validateSchema.js';

export interface GlobalOptions {
  catalog?: string;
  languages?: string;
  source?: string;
  logFile?: string;
  verbose?: boolean;
}

export interface CommandContext {
  service: LocalizationService;
  logger: DualLogger;
  engineConfig: EngineConfig;
  catalogPath: string;
  languagesPath: string;
}

/**
 * Wire the file stores, logger and (when asked for) the translation provider
 */
export function createContext(
  options: GlobalOptions,
  { withTranslation = false, silent = false }: ContextOptions = {},
): CommandContext {
  const catalogPath = options.catalog ?? config.getCatalogPath();
  const languagesPath = options.languages ?? config.getLanguagesPath();
  const logger = new DualLogger({
    logFile: options.logFile ?? config.getLogFile(),
    verbose: options.verbose ?? false,
    silent,
  });
  const engineConfig = loadEngineConfig(options.source ? { sourceLanguage: options.source } : {});
  const capability = withTranslation ? new OpenAiTranslationProvider(loadProviderConfig()) : undefined;

  const service = new LocalizationService({
    store: new JsonFileCatalogStore(catalogPath),
    directory: new JsonFileLanguageDirectory(languagesPath),
    config: engineConfig,
    logger,
    capability,
  });

  return { service, logger, engineConfig, catalogPath, languagesPath };
}

export interface ContextOptions {
  withTranslation?: boolean;
  silent?: boolean;
}

/**
 * Build the context, run a command body, report failures and set the exit code
 */
export async function runCommand(
  command: Command,
  contextOptions: ContextOptions,
  body: (context: CommandContext, options: GlobalOptions) => Promise<void>,
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  let logger: DualLogger | undefined;
  try {
    const context = createContext(options, contextOptions);
    logger = context.logger;
    await body(context, options);
  } catch (error) {
    reportError(error, options.verbose ?? false);
    process.exitCode = exitCodeFor(error);
  } finally {
    await logger?.close();
  }
}

export function reportError(error: unknown, verbose: boolean): void {
  if (error instanceof LocalizationError) {
    console.error(chalk.red(`❌ ${error.message}`));
    if (error instanceof InvalidDataError) {
      for (const issue of error.issues) console.error(chalk.yellow(`  - ${issue}`));
    }
    return;
  }
  console.error(chalk.red('❌ Unexpected error:'), error instanceof Error ? error.message : error);
  if (verbose && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Accept a JSON object whose values are all strings
 */
export function parseTranslationMap(data: unknown, file: string): TranslationMap {
  if (!isRecord(data)) {
    throw new InvalidDataError(file, ['/ must be an object of key to text']);
  }
  const translations: TranslationMap = {};
  const issues: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string') {
      setOwn(translations, key, value);
    } else {
      issues.push(`/${key} must be string`);
    }
  }
  if (issues.length > 0) throw new InvalidDataError(file, issues);
  return translations;
}
