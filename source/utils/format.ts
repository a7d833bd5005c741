import chalk from 'chalk';
import { selectLanguagesForView } from '../engine/selector.js';
import type { CoverageReport } from '../services/localizationService.js';
import type { CoverageRecord, LanguageDescriptor, TranslationMap } from '../types/catalog.js';

export function coveragePercent(record: CoverageRecord): number {
  if (record.totalCanonicalKeys === 0) return 100;
  return Math.round((record.filledCount / record.totalCanonicalKeys) * 100);
}

function colorFor(record: CoverageRecord) {
  if (record.missingCount === 0) return chalk.green;
  return coveragePercent(record) >= 50 ? chalk.yellow : chalk.red;
}

/**
 * One line per language, source language first
 */
export function formatCoverageReport(report: CoverageReport): string[] {
  const lines = [
    chalk.bold(`Coverage against ${report.sourceLanguage.toUpperCase()} (${report.totalCanonicalKeys} keys)`),
  ];
  const ordered = selectLanguagesForView(
    report.languages,
    new Set(report.languages.map(language => language.code)),
    { sourceLanguage: report.sourceLanguage },
  );
  const width = Math.max(0, ...ordered.map(language => language.nameInSource.length));

  for (const language of ordered) {
    const record = report.records[language.code];
    if (!record) continue;
    const counts = colorFor(record)(`${record.filledCount}/${record.totalCanonicalKeys}`);
    let line = `  ${language.code.padEnd(5)} ${language.nameInSource.padEnd(width)}  ${counts} (${coveragePercent(record)}%)`;
    if (record.missingCount > 0) {
      line += chalk.gray(`, ${record.missingCount} missing`);
    }
    lines.push(line);
  }

  return lines;
}

export function formatTranslations(translations: TranslationMap): string[] {
  return Object.entries(translations).map(([key, text]) =>
    text.trim() ? `${chalk.cyan(key)}: ${text}` : `${chalk.cyan(key)}: ${chalk.gray('(empty)')}`,
  );
}

export function formatLanguage(language: LanguageDescriptor): string {
  const flag = language.emoji ? `${language.emoji} ` : '';
  const status = language.available ? chalk.green('available') : chalk.gray('unavailable');
  return `${flag}${language.code.padEnd(5)} ${language.name} (${language.nameInSource}) ${status}`;
}
