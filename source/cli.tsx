#!/usr/bin/env node
import { Command } from 'commander';
import React from 'react';
import {render} from 'ink';
import App from './app.js';
import { runCommand } from './commands/shared.js';
import { createCoverageCommand } from './commands/coverageCommand.js';
import { createMissingCommand } from './commands/missingCommand.js';
import { createPreviewCommand } from './commands/previewCommand.js';
import { createCommitCommand } from './commands/commitCommand.js';
import { createBackfillCommand } from './commands/backfillCommand.js';
import { createEditCommand } from './commands/editCommand.js';
import { createLanguagesCommand } from './commands/languagesCommand.js';
import { createValidateCommand } from './commands/validateCommand.js';

const program = new Command()
  .name('l10n-backfill')
  .description('Translation coverage and machine backfill for a multi-language catalog')
  .version('1.0.0')
  .option('-c, --catalog <path>', 'Path to the catalog JSON file (default: $CATALOG_PATH or ./catalog.json)')
  .option('-L, --languages <path>', 'Path to the language directory JSON file (default: $LANGUAGES_PATH or ./languages.json)')
  .option('-s, --source <code>', 'Source language code (default: $SOURCE_LANGUAGE or ru)')
  .option('--log-file <file>', 'Append JSON log lines to a file')
  .option('-v, --verbose', 'Show detailed log lines in terminal', false);

// View command (default)
program
  .command('view', { isDefault: true })
  .description('Browse the catalog in the terminal')
  .option('-a, --add <lang>', 'Onboard a language: show the source language and a translated preview (nothing is saved)')
  .option('-l, --language <lang>', 'Language to show first')
  .addHelpText('after', `
  Keyboard Shortcuts:
    ↑/↓       Move between keys
    ←/→       Switch language
    h         Show help
    i         Show coverage
    q         Quit
  `)
  .action(async (options: { add?: string; language?: string }, command: Command) => {
    await runCommand(command, { withTranslation: Boolean(options.add), silent: true }, async ({ service }) => {
      const instance = render(<App service={service} previewLanguage={options.add} language={options.language} />);
      await instance.waitUntilExit();
    });
  });

program.addCommand(createCoverageCommand());
program.addCommand(createMissingCommand());
program.addCommand(createPreviewCommand());
program.addCommand(createCommitCommand());
program.addCommand(createBackfillCommand());
program.addCommand(createEditCommand());
program.addCommand(createLanguagesCommand());
program.addCommand(createValidateCommand());

await program.parseAsync();
