import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './shared.js';
import { formatLanguage } from '../utils/format.js';

export function createLanguagesCommand() {
  const cmd = new Command('languages')
    .description('List the language directory')
    .option('--unused', 'Only languages that can be onboarded: available and without translations', false)
    .action(async (options: { unused: boolean }, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        const languages = options.unused
          ? await service.listUnusedLanguages()
          : await service.listLanguages();
        if (languages.length === 0) {
          console.log(chalk.gray(options.unused ? 'No language is waiting to be onboarded' : 'No languages configured'));
          return;
        }
        for (const language of languages) console.log(formatLanguage(language));
      });
    });

  cmd
    .command('toggle')
    .description('Switch whether a language is offered for onboarding')
    .argument('<code>', 'Language code')
    .action(async (code: string, _options: unknown, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        const language = await service.toggleLanguage(code);
        console.log(formatLanguage(language));
      });
    });

  return cmd;
}
