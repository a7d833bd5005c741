import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './shared.js';

export function createMissingCommand() {
  const cmd = new Command('missing')
    .description('List canonical keys that have no translation in a language')
    .argument('<lang>', 'Language code')
    .option('--json', 'Print the keys as a JSON array', false)
    .action(async (lang: string, options: { json: boolean }, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        const missing = await service.listMissing(lang);
        if (options.json) {
          console.log(JSON.stringify(missing, null, 2));
          return;
        }
        if (missing.length === 0) {
          console.log(chalk.green(`✅ ${lang.toUpperCase()} has every key`));
          return;
        }
        console.log(chalk.bold(`${missing.length} keys missing for ${lang.toUpperCase()}:`));
        for (const key of missing) console.log(`  - ${key}`);
      });
    });

  return cmd;
}
