import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './shared.js';
import { validateFiles } from '../services/catalogValidator.js';

export function createValidateCommand() {
  const cmd = new Command('validate')
    .description('Validate the catalog and language files against their schemas with extra checks')
    .option('--strict', 'Exit with failure code on validation errors', false)
    .action(async (options: { strict: boolean }, command: Command) => {
      await runCommand(command, {}, async ({ logger, engineConfig, catalogPath, languagesPath }) => {
        const result = await validateFiles(
          { catalog: catalogPath, languages: languagesPath },
          engineConfig,
          logger,
        );

        if (result.valid) {
          console.log(chalk.green('✅ catalog and languages are valid'));
        } else {
          console.error(chalk.red('❌ Validation failed:'));
          for (const err of result.errors) console.error(chalk.red(' -'), err);
        }
        if (result.warnings.length > 0) {
          console.log(chalk.yellow(`⚠️ ${result.warnings.length} warnings:`));
          for (const warning of result.warnings) console.log(chalk.yellow(' -'), warning);
        }

        if (options.strict && !result.valid) process.exitCode = 1;
      });
    });

  return cmd;
}
