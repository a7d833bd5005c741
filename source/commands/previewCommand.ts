import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { runCommand } from './shared.js';
import { formatTranslations } from '../utils/format.js';

export function createPreviewCommand() {
  const cmd = new Command('preview')
    .description('Machine-translate the missing keys of a language without saving them')
    .argument('<lang>', 'Language code')
    .option('--json', 'Print the translations as JSON', false)
    .option('-o, --out <file>', 'Write the translations to a JSON file that "commit" accepts')
    .action(async (lang: string, options: { json: boolean; out?: string }, command: Command) => {
      await runCommand(command, { withTranslation: true }, async ({ service }) => {
        const result = await service.previewBackfill(lang);
        const returned = Object.keys(result.translations).length;

        if (options.out) {
          await fs.mkdir(path.dirname(path.resolve(options.out)), { recursive: true });
          await fs.writeFile(options.out, JSON.stringify(result.translations, null, 2) + '\n');
        }

        if (options.json) {
          console.log(JSON.stringify(result.translations, null, 2));
          return;
        }

        console.log(chalk.bold(`Preview for ${lang.toUpperCase()}: ${returned} of ${result.requested.length} keys translated (not saved)`));
        for (const line of formatTranslations(result.translations)) console.log(`  ${line}`);
        if (options.out) {
          console.log(chalk.gray(`\nSaved to ${options.out}. Run "commit ${lang} ${options.out}" to keep it.`));
        }
      });
    });

  return cmd;
}
