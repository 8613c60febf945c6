// Types
export {
  type Verdict,
  type ErrorMarker,
  type JudgeOutcome,
  type UsageSummary,
  type VerificationReport,
  type CandidateResponse,
  type SimilarityPair,
  type Recommendation,
  type ConsensusSummary,
  type ConsensusAnalysis,
  isErrorMarker,
  RECOMMENDATION_LABELS,
} from './types.js';

// Errors
export { AdapterError, InvalidInputError } from './errors.js';

// Prompts and reply parsing
export { FACT_CHECK_SYSTEM_PROMPT, buildFactCheckPrompt } from './prompts.js';
export { VerdictReplySchema, parseVerdictReply } from './parser.js';

// Judges
export {
  type SecondaryProvider,
  type JudgeTarget,
  PRIMARY_ALIAS,
  DEFAULT_PRIMARY_MODEL,
  DEFAULT_JUDGES,
  resolveJudge,
} from './judges.js';

// Adapters
export {
  type JudgeCallContext,
  type ModelAdapter,
  type JudgeCallSettings,
  type LLMJudgeAdapterOptions,
  type AdapterDeps,
  type AdapterFactory,
  LLMJudgeAdapter,
  UnsupportedJudgeAdapter,
  createAdapter,
  createAdapterFactory,
} from './adapter.js';

// Aggregator
export {
  type JudgeStartEvent,
  type JudgeCompleteEvent,
  type JudgeErrorEvent,
  type VerificationEvents,
  type VerificationAggregatorOptions,
  type VerifyOptions,
  AGREEMENT_THRESHOLD,
  VerificationAggregator,
} from './aggregator.js';

// Consensus
export {
  analyzeConsensus,
  summarizeConsensus,
  parseCandidateResponses,
} from './consensus.js';

// Reporter
export {
  formatPercent,
  renderVerificationMarkdown,
  renderConsensusMarkdown,
  renderVerificationJSON,
  renderConsensusJSON,
} from './reporter.js';
