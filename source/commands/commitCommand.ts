import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { parseTranslationMap, runCommand } from './shared.js';
import { parseJson } from '../utils/validateSchema.js';

export function createCommitCommand() {
  const cmd = new Command('commit')
    .description('Add translations from a JSON file; existing entries are never overwritten')
    .argument('<lang>', 'Language code')
    .argument('<file>', 'JSON object of key to text')
    .action(async (lang: string, file: string, _options: unknown, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        const filePath = path.resolve(file);
        const translations = parseTranslationMap(parseJson(await fs.readFile(filePath, 'utf-8'), file), file);
        const report = await service.commit(lang, translations);
        console.log(chalk.green(`✅ Added ${report.persisted} of ${report.attempted} translations for ${lang.toUpperCase()}`));
      });
    });

  return cmd;
}
