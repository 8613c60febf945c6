import chalk from 'chalk';
import {
  RECOMMENDATION_LABELS,
  formatPercent,
  isErrorMarker,
  type ConsensusAnalysis,
  type VerificationReport,
} from '@corroborate/core';

type Log = (...args: unknown[]) => void;

export function printVerificationReport(report: VerificationReport, log: Log = console.log): void {
  log('');
  log(`Agreement: ${chalk.bold(formatPercent(report.agreementRatio))}`);
  log(report.verified
    ? chalk.green.bold('✓ Verified')
    : chalk.red.bold('✗ Not verified'));
  log('');
  log(chalk.bold('Feedback:'));

  report.details.forEach((outcome, i) => {
    const line = `  ${report.feedback[i]}`;
    if (isErrorMarker(outcome)) {
      log(chalk.red(line));
    } else if (outcome.verified) {
      log(chalk.green(line));
    } else {
      log(chalk.yellow(line));
    }
  });

  if (report.usage.costUsd > 0) {
    log('');
    log(chalk.dim(`  Cost: $${report.usage.costUsd.toFixed(4)}  Tokens: ${report.usage.inputTokens} in / ${report.usage.outputTokens} out`));
  }
  log('');
}

export function printConsensus(analysis: ConsensusAnalysis, log: Log = console.log): void {
  const { summary, similarities } = analysis;

  log('');
  log(chalk.bold('Consensus:'));
  log(`  Responses: ${summary.totalResponses}`);
  log(`  Verified: ${summary.verifiedCount}`);
  log(`  Consensus ratio: ${chalk.bold(formatPercent(summary.consensusRatio))}`);

  const label = RECOMMENDATION_LABELS[summary.recommendation];
  log(`  Recommendation: ${summary.recommendation === 'USE_WITH_CONFIDENCE' ? chalk.green.bold(label) : chalk.yellow.bold(label)}`);

  if (similarities.length > 0) {
    log('');
    log(chalk.bold('Similarity:'));
    for (const pair of similarities) {
      log(`  ${pair.sourceA} vs ${pair.sourceB}: ${pair.similarity.toFixed(2)}`);
    }
  }
  log('');
}
