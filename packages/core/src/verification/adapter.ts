/**
 * Judge adapters: each one turns a (query, response) pair into a Verdict
 * from a single backend.
 */

import { callLLM } from '../router/llm.js';
import type { CostTracker } from '../router/cost.js';
import { jsonModeOptions, type ProviderId, type ProviderRegistry } from '../router/providers.js';
import type { RetryConfig } from '../router/retry.js';
import { AdapterError, InvalidInputError } from './errors.js';
import { resolveJudge, DEFAULT_PRIMARY_MODEL, type JudgeTarget } from './judges.js';
import { VerdictReplySchema, parseVerdictReply } from './parser.js';
import { FACT_CHECK_SYSTEM_PROMPT, buildFactCheckPrompt } from './prompts.js';
import type { Verdict } from './types.js';

export interface JudgeCallContext {
  abortSignal?: AbortSignal;
  /** Receives token usage of successful LLM calls. */
  costTracker?: CostTracker;
}

export interface ModelAdapter {
  readonly sourceId: string;
  /**
   * Resolves with a Verdict or rejects with AdapterError. Must settle soon
   * after `context.abortSignal` aborts.
   */
  verify(query: string, response: string, context?: JudgeCallContext): Promise<Verdict>;
}

export interface JudgeCallSettings {
  temperature?: number;
  maxOutputTokens?: number;
  /** Transport retry policy; judges make one attempt when omitted. */
  retry?: RetryConfig;
}

export interface LLMJudgeAdapterOptions extends JudgeCallSettings {
  sourceId: string;
  modelId: string;
  provider: ProviderId;
  registry: ProviderRegistry;
}

/** Asks a chat model, in JSON mode, to fact-check the response and reply with a verdict. */
export class LLMJudgeAdapter implements ModelAdapter {
  readonly sourceId: string;
  private readonly options: LLMJudgeAdapterOptions;

  constructor(options: LLMJudgeAdapterOptions) {
    this.sourceId = options.sourceId;
    this.options = options;
  }

  async verify(query: string, response: string, context: JudgeCallContext = {}): Promise<Verdict> {
    if (!query.trim()) throw new AdapterError(this.sourceId, new InvalidInputError('query must not be empty'));
    if (!response.trim()) throw new AdapterError(this.sourceId, new InvalidInputError('response must not be empty'));

    const { modelId, provider, registry, temperature, maxOutputTokens, retry } = this.options;

    try {
      const result = await callLLM({
        model: registry.getModel(modelId, provider),
        modelId,
        system: FACT_CHECK_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildFactCheckPrompt(query, response) }],
        temperature,
        maxOutputTokens,
        jsonSchema: VerdictReplySchema,
        providerOptions: jsonModeOptions(provider),
        retry: retry ?? { maxRetries: 0 },
        abortSignal: context.abortSignal,
      });
      context.costTracker?.add(result.usage);
      return parseVerdictReply(this.sourceId, result.content);
    } catch (err) {
      throw new AdapterError(this.sourceId, err);
    }
  }
}

/** Stands in for identifiers no backend recognises; never calls out. */
export class UnsupportedJudgeAdapter implements ModelAdapter {
  constructor(readonly sourceId: string) {}

  async verify(): Promise<Verdict> {
    return {
      sourceId: this.sourceId,
      verified: false,
      feedback: `Unsupported model: ${this.sourceId}`,
      corrections: [],
    };
  }
}

export interface AdapterDeps {
  registry: ProviderRegistry;
  settings?: JudgeCallSettings;
}

export function createAdapter(target: JudgeTarget, deps: AdapterDeps): ModelAdapter {
  switch (target.kind) {
    case 'primary':
      return new LLMJudgeAdapter({
        ...deps.settings,
        sourceId: target.judgeId,
        modelId: target.modelId,
        provider: 'deepseek',
        registry: deps.registry,
      });
    case 'secondary':
      return new LLMJudgeAdapter({
        ...deps.settings,
        sourceId: target.judgeId,
        modelId: target.modelId,
        provider: target.provider,
        registry: deps.registry,
      });
    case 'unsupported':
      return new UnsupportedJudgeAdapter(target.judgeId);
  }
}

export type AdapterFactory = (judgeId: string) => ModelAdapter;

export function createAdapterFactory(deps: AdapterDeps & { primaryModel?: string }): AdapterFactory {
  const primaryModel = deps.primaryModel ?? DEFAULT_PRIMARY_MODEL;
  return (judgeId) => createAdapter(resolveJudge(judgeId, primaryModel), deps);
}
