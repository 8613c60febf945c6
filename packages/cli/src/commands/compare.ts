import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import {
  analyzeConsensus,
  parseCandidateResponses,
  renderConsensusJSON,
  renderConsensusMarkdown,
  writeReport,
} from '@corroborate/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { printConsensus } from '../output.js';

interface CompareOptions {
  output?: string;
  save?: boolean;
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Measure agreement among independently generated responses')
    .argument('<file>', 'JSON array of responses ({ "model", "response", "verified" } or { "id", "text", "verified" })')
    .option('-o, --output <dir>', 'Directory for saved reports (implies --save)')
    .option('--save', 'Save the analysis to the output directory')
    .action(async (file: string, options: CompareOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      let content: string;
      try {
        content = readFileSync(file, 'utf-8');
      } catch {
        console.error(chalk.red(`Cannot read responses file: ${file}`));
        process.exit(1);
      }

      const analysis = analyzeConsensus(parseCandidateResponses(content));

      if (globalOpts.json) {
        console.log(renderConsensusJSON(analysis));
      } else {
        printConsensus(analysis);
      }

      if (options.save || options.output) {
        const format = globalOpts.json ? 'json' : config.output.format;
        const path = writeReport({
          outputDir: options.output ?? config.output.dir,
          kind: 'consensus',
          format,
          content: format === 'json' ? renderConsensusJSON(analysis) : renderConsensusMarkdown(analysis),
        });
        console.error(chalk.dim(`Report saved to ${path}`));
      }
    });
}
