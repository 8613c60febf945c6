import { generateText, Output, type LanguageModel, type ModelMessage } from 'ai';
import type { z } from 'zod';
import { calculateCost } from './cost.js';
import { withRetry, type RetryConfig } from './retry.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  /** Raw model-id string (for cost look-up). */
  modelId: string;
  system: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /**
   * Request JSON mode with this reply shape. The raw reply text is still
   * returned; validating it is left to the caller.
   */
  jsonSchema?: z.ZodType<unknown>;
  /** Per-provider request options, keyed by provider name. */
  providerOptions?: ProviderCallOptions;
  /** Retry policy; a single attempt when omitted. */
  retry?: RetryConfig;
  abortSignal?: AbortSignal;
}

export type ProviderCallOptions = Record<string, Record<string, string | number | boolean>>;

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number; costUsd: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts: number;
}

/**
 * Single-shot chat completion. Retries only when `options.retry` allows it.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const { result, attempts } = await withRetry(
    async () => {
      const result = await generateText({
        model: options.model,
        system: options.system,
        messages: options.messages,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: options.abortSignal,
        providerOptions: options.providerOptions,
        experimental_output: options.jsonSchema ? Output.object({ schema: options.jsonSchema }) : undefined,
      });

      const inputTokens = result.usage.inputTokens ?? 0;
      const outputTokens = result.usage.outputTokens ?? 0;

      return {
        content: result.text,
        usage: {
          inputTokens,
          outputTokens,
          costUsd: calculateCost(options.modelId, inputTokens, outputTokens),
        },
      };
    },
    { ...options.retry, abortSignal: options.abortSignal },
  );

  return { ...result, attempts };
}
