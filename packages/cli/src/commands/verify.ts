import { Command } from 'commander';
import chalk from 'chalk';
import {
  renderVerificationJSON,
  renderVerificationMarkdown,
  writeReport,
} from '@corroborate/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { assertPrimaryKey, createAggregator } from '../verifier.js';
import { printVerificationReport } from '../output.js';

interface VerifyOptions {
  models?: string[];
  output?: string;
  save?: boolean;
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Ask several judge models whether a response answers a query correctly')
    .argument('<query>', 'The question that was asked')
    .argument('<response>', 'The answer to verify')
    .option('-m, --models <ids...>', 'Judge models (default: verification.judges from config)')
    .option('-o, --output <dir>', 'Directory for saved reports (implies --save)')
    .option('--save', 'Save the report to the output directory')
    .action(async (query: string, response: string, options: VerifyOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const models = options.models ?? config.verification.judges;

      assertPrimaryKey(config, models);

      const aggregator = createAggregator({ config, verbose: globalOpts.verbose });

      if (!globalOpts.json) {
        console.error(chalk.blue(`Verifying with ${models.length} judge(s): ${models.join(', ')}`));
      }

      const report = await aggregator.verify(query, response, models);

      if (globalOpts.json) {
        console.log(renderVerificationJSON(report, query));
      } else {
        printVerificationReport(report);
      }

      if (options.save || options.output) {
        const format = globalOpts.json ? 'json' : config.output.format;
        const path = writeReport({
          outputDir: options.output ?? config.output.dir,
          kind: 'verification',
          format,
          content: format === 'json'
            ? renderVerificationJSON(report, query)
            : renderVerificationMarkdown(report, query),
        });
        console.error(chalk.dim(`Report saved to ${path}`));
      }
    });
}
