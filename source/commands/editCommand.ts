import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './shared.js';

export function createEditCommand() {
  const cmd = new Command('edit')
    .description('Overwrite the text of an existing translation')
    .argument('<key>', 'Translation key')
    .argument('<lang>', 'Language code')
    .argument('<text>', 'New text')
    .action(async (key: string, lang: string, text: string, _options: unknown, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        await service.editEntry(key, lang, text);
        console.log(chalk.green(`✅ Updated ${key} (${lang.toUpperCase()})`));
      });
    });

  return cmd;
}
