/**
 * Verification reporter: renders verification and consensus results as
 * markdown or JSON documents.
 */

import {
  RECOMMENDATION_LABELS,
  isErrorMarker,
  type ConsensusAnalysis,
  type VerificationReport,
} from './types.js';

/** Ratio as a percentage with two decimals, e.g. 0.5 -> "50.00%". */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function renderVerificationMarkdown(report: VerificationReport, query?: string): string {
  const lines: string[] = [];

  lines.push('## Verification Summary\n');
  if (query) {
    lines.push(`**Query**: ${query}\n`);
  }
  lines.push(`> ${report.originalResponse}\n`);
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Judges | ${report.models.length} |`);
  lines.push(`| Agreement Ratio | ${formatPercent(report.agreementRatio)} |`);
  lines.push(`| Verified | ${report.verified ? 'yes' : 'no'} |`);
  if (report.usage.costUsd > 0) {
    lines.push(`| Cost | $${report.usage.costUsd.toFixed(4)} |`);
  }
  lines.push('');

  lines.push('## Judge Feedback\n');
  report.details.forEach((outcome, i) => {
    const judgeId = report.models[i];
    if (isErrorMarker(outcome)) {
      lines.push(`### [ERROR] ${judgeId}\n`);
      lines.push(`- **Error**: ${outcome.error}`);
      lines.push('');
      return;
    }
    lines.push(`### ${outcome.verified ? '[VERIFIED]' : '[REJECTED]'} ${judgeId}\n`);
    lines.push(`- **Feedback**: ${outcome.feedback}`);
    if (outcome.confidence !== undefined) {
      lines.push(`- **Confidence**: ${Math.round(outcome.confidence * 100)}%`);
    }
    for (const correction of outcome.corrections) {
      lines.push(`- **Correction**: ${correction}`);
    }
    lines.push('');
  });

  return lines.join('\n');
}

export function renderConsensusMarkdown(analysis: ConsensusAnalysis): string {
  const { summary, similarities } = analysis;
  const lines: string[] = [];

  lines.push('## Consensus Summary\n');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Responses | ${summary.totalResponses} |`);
  lines.push(`| Verified | ${summary.verifiedCount} |`);
  lines.push(`| Consensus Ratio | ${formatPercent(summary.consensusRatio)} |`);
  lines.push(`| Recommendation | ${RECOMMENDATION_LABELS[summary.recommendation]} |`);
  lines.push('');

  if (similarities.length > 0) {
    lines.push('## Pairwise Similarity\n');
    lines.push('| Model A | Model B | Similarity |');
    lines.push('|---------|---------|------------|');
    for (const pair of similarities) {
      lines.push(`| ${pair.sourceA} | ${pair.sourceB} | ${pair.similarity.toFixed(2)} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function renderVerificationJSON(report: VerificationReport, query?: string): string {
  return JSON.stringify({
    ...(query !== undefined ? { query } : {}),
    originalResponse: report.originalResponse,
    agreementRatio: report.agreementRatio,
    verified: report.verified,
    feedback: report.feedback,
    details: report.details,
    models: report.models,
    usage: report.usage,
  }, null, 2);
}

export function renderConsensusJSON(analysis: ConsensusAnalysis): string {
  return JSON.stringify({
    summary: analysis.summary,
    similarities: analysis.similarities,
    responses: analysis.responses,
  }, null, 2);
}
