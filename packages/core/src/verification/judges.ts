import { detectProvider, type ProviderId } from '../router/providers.js';

/** Identifier that always selects the primary backend's configured model. */
export const PRIMARY_ALIAS = 'primary';

export const DEFAULT_PRIMARY_MODEL = 'deepseek-chat';

/** Judges asked when the caller does not name any. */
export const DEFAULT_JUDGES: readonly string[] = [
  DEFAULT_PRIMARY_MODEL,
  'gpt-4o',
  'claude-sonnet-4-20250514',
];

export type SecondaryProvider = 'openai' | 'anthropic' | 'google';

/**
 * What a judge identifier refers to, resolved once per verification call.
 *
 * - `primary`: the backend that generated the answers (DeepSeek), acting as self-judge
 * - `secondary`: another hosted provider
 * - `unsupported`: nothing we can call; still occupies a slot in the report
 */
export type JudgeTarget =
  | { kind: 'primary'; judgeId: string; modelId: string }
  | { kind: 'secondary'; judgeId: string; provider: SecondaryProvider; modelId: string }
  | { kind: 'unsupported'; judgeId: string };

export function resolveJudge(judgeId: string, primaryModel: string = DEFAULT_PRIMARY_MODEL): JudgeTarget {
  if (judgeId === PRIMARY_ALIAS || judgeId === primaryModel) {
    return { kind: 'primary', judgeId, modelId: primaryModel };
  }

  let provider: ProviderId;
  try {
    provider = detectProvider(judgeId);
  } catch {
    return { kind: 'unsupported', judgeId };
  }

  if (provider === 'deepseek') {
    return { kind: 'primary', judgeId, modelId: judgeId };
  }
  return { kind: 'secondary', judgeId, provider, modelId: judgeId };
}
