import { describe, it, expect } from 'vitest';
import {
  formatPercent,
  renderVerificationMarkdown,
  renderConsensusMarkdown,
  renderVerificationJSON,
  renderConsensusJSON,
} from './reporter.js';
import type { ConsensusAnalysis, VerificationReport } from './types.js';

function makeReport(overrides: Partial<VerificationReport> = {}): VerificationReport {
  return {
    originalResponse: '4',
    agreementRatio: 0.5,
    verified: false,
    feedback: ['primary: Correct.', 'gpt-4o: Error - 503 Service Unavailable'],
    details: [
      { sourceId: 'primary', verified: true, confidence: 0.9, feedback: 'Correct.', corrections: ['Say "four" too'] },
      { sourceId: 'gpt-4o', error: '503 Service Unavailable' },
    ],
    models: ['primary', 'gpt-4o'],
    usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
    ...overrides,
  };
}

const analysis: ConsensusAnalysis = {
  summary: { totalResponses: 2, verifiedCount: 1, consensusRatio: 0.5, recommendation: 'VERIFY_FURTHER' },
  similarities: [{ sourceA: 'model_0', sourceB: 'model_1', similarity: 1 / 3 }],
  responses: [
    { text: 'a b', verified: true },
    { text: 'b c', verified: false },
  ],
};

describe('formatPercent', () => {
  it('renders two decimals', () => {
    expect(formatPercent(0.5)).toBe('50.00%');
    expect(formatPercent(2 / 3)).toBe('66.67%');
    expect(formatPercent(1)).toBe('100.00%');
  });
});

describe('renderVerificationMarkdown', () => {
  it('renders the summary table', () => {
    const md = renderVerificationMarkdown(makeReport(), 'What is 2+2?');
    const lines = md.split('\n');
    expect(lines).toContain('**Query**: What is 2+2?');
    expect(lines).toContain('> 4');
    expect(lines).toContain('| Judges | 2 |');
    expect(lines).toContain('| Agreement Ratio | 50.00% |');
    expect(lines).toContain('| Verified | no |');
  });

  it('renders one section per judge in request order', () => {
    const lines = renderVerificationMarkdown(makeReport()).split('\n');
    const verifiedAt = lines.indexOf('### [VERIFIED] primary');
    const errorAt = lines.indexOf('### [ERROR] gpt-4o');
    expect(verifiedAt).toBeGreaterThan(-1);
    expect(errorAt).toBeGreaterThan(verifiedAt);
    expect(lines).toContain('- **Confidence**: 90%');
    expect(lines).toContain('- **Correction**: Say "four" too');
    expect(lines).toContain('- **Error**: 503 Service Unavailable');
  });

  it('shows cost only when there was spend', () => {
    expect(renderVerificationMarkdown(makeReport())).not.toContain('| Cost |');
    const md = renderVerificationMarkdown(makeReport({ usage: { inputTokens: 10, outputTokens: 5, costUsd: 0.00125 } }));
    expect(md.split('\n')).toContain('| Cost | $0.0013 |');
  });
});

describe('renderConsensusMarkdown', () => {
  it('renders summary and similarity tables', () => {
    const lines = renderConsensusMarkdown(analysis).split('\n');
    expect(lines).toContain('| Consensus Ratio | 50.00% |');
    expect(lines).toContain('| Recommendation | Verify further |');
    expect(lines).toContain('| model_0 | model_1 | 0.33 |');
  });
});

describe('JSON renderers', () => {
  it('serializes the verification report', () => {
    const parsed: unknown = JSON.parse(renderVerificationJSON(makeReport(), 'What is 2+2?'));
    expect(parsed).toMatchObject({
      query: 'What is 2+2?',
      agreementRatio: 0.5,
      verified: false,
      models: ['primary', 'gpt-4o'],
    });
  });

  it('omits the query when not given', () => {
    expect(JSON.parse(renderVerificationJSON(makeReport()))).not.toHaveProperty('query');
  });

  it('serializes the consensus analysis', () => {
    const parsed: unknown = JSON.parse(renderConsensusJSON(analysis));
    expect(parsed).toEqual({
      summary: analysis.summary,
      similarities: analysis.similarities,
      responses: analysis.responses,
    });
  });
});
