import { Command } from 'commander';
import { loadSmokeCases, runSmokeSuite } from '@refract/core';
import { createCliRuntime } from '../setup.js';
import { formatSmokeReport } from '../output/formatter.js';

export const evalCommand = new Command('eval')
  .description('Run the smoke suite against the configured model')
  .option('--cases <path>', 'JSON file with smoke cases (defaults to the bundled suite)')
  .action(async (options: { cases?: string }, command: Command) => {
    const cases = await loadSmokeCases(options.cases);
    // single attempt per call, no previews
    const { agents, context } = await createCliRuntime(command, { agents: { maxRetries: 1, verbose: false } });
    const report = await runSmokeSuite(agents, cases, context.logger);
    console.log(formatSmokeReport(report));
    if (report.passed < report.total) {
      process.exitCode = 1;
    }
  });
