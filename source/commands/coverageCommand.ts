import { Command } from 'commander';
import { runCommand } from './shared.js';
import { formatCoverageReport } from '../utils/format.js';

export function createCoverageCommand() {
  const cmd = new Command('coverage')
    .description('Show how many canonical keys every language has translated')
    .option('--json', 'Print the report as JSON', false)
    .action(async (options: { json: boolean }, command: Command) => {
      await runCommand(command, {}, async ({ service }) => {
        const report = await service.computeCoverage();
        if (options.json) {
          console.log(JSON.stringify(report.records, null, 2));
          return;
        }
        for (const line of formatCoverageReport(report)) console.log(line);
      });
    });

  return cmd;
}
