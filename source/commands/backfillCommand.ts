import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './shared.js';

export function createBackfillCommand() {
  const cmd = new Command('backfill')
    .description('Machine-translate the missing keys of a language and save them')
    .argument('<lang>', 'Language code')
    .action(async (lang: string, _options: unknown, command: Command) => {
      await runCommand(command, { withTranslation: true }, async ({ service }) => {
        const { result, persisted } = await service.backfillAndCommit(lang);
        const returned = Object.keys(result.translations).length;
        console.log(chalk.green(`✅ Added ${persisted} translations for ${lang.toUpperCase()}`));
        if (returned < result.requested.length) {
          console.log(chalk.yellow(`⚠️ ${result.requested.length - returned} keys came back untranslated; run backfill again to retry them`));
        }
      });
    });

  return cmd;
}
