import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';
import type { ProviderCallOptions } from './llm.js';

export type ProviderId = 'deepseek' | 'openai' | 'anthropic' | 'google';

export const DEFAULT_DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

export interface ProviderConfig {
  providers: {
    deepseek?: { apiKey?: string; baseUrl?: string };
    openai?: { apiKey?: string };
    anthropic?: { apiKey?: string };
    google?: { apiKey?: string };
  };
}

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('deepseek-')) return 'deepseek';
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/**
 * Provider options a JSON-mode call needs. DeepSeek's OpenAI-compatible
 * endpoint accepts `json_object` replies but not `json_schema` ones.
 */
export function jsonModeOptions(providerId: ProviderId): ProviderCallOptions | undefined {
  return providerId === 'deepseek' ? { openai: { structuredOutputs: false } } : undefined;
}

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * LanguageModel instances by model-id string.
 */
export class ProviderRegistry {
  private config: ProviderConfig;
  private deepseekProvider: ReturnType<typeof createOpenAI> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /**
   * Return a LanguageModel for the given model-id, creating the provider lazily.
   * Pass `providerId` to skip prefix detection (custom DeepSeek model names).
   */
  getModel(modelId: string, providerId: ProviderId = detectProvider(modelId)): LanguageModel {
    switch (providerId) {
      case 'deepseek': {
        if (!this.deepseekProvider) {
          const apiKey = this.config.providers.deepseek?.apiKey;
          if (!apiKey) {
            throw new Error(
              'DeepSeek API key not configured. Set providers.deepseek.api_key in ~/.corroborate/config.yaml or export DEEPSEEK_API_KEY',
            );
          }
          this.deepseekProvider = createOpenAI({
            apiKey,
            baseURL: this.config.providers.deepseek?.baseUrl ?? DEFAULT_DEEPSEEK_BASE_URL,
          });
        }
        // DeepSeek only speaks the chat-completions API
        return this.deepseekProvider.chat(modelId);
      }
      case 'openai': {
        if (!this.openaiProvider) {
          const apiKey = this.config.providers.openai?.apiKey;
          if (!apiKey) {
            throw new Error(
              'OpenAI API key not configured. Set providers.openai.api_key in ~/.corroborate/config.yaml or export OPENAI_API_KEY',
            );
          }
          this.openaiProvider = createOpenAI({ apiKey });
        }
        return this.openaiProvider(modelId);
      }
      case 'anthropic': {
        if (!this.anthropicProvider) {
          const apiKey = this.config.providers.anthropic?.apiKey;
          if (!apiKey) {
            throw new Error(
              'Anthropic API key not configured. Set providers.anthropic.api_key in ~/.corroborate/config.yaml or export ANTHROPIC_API_KEY',
            );
          }
          this.anthropicProvider = createAnthropic({ apiKey });
        }
        return this.anthropicProvider(modelId);
      }
      case 'google': {
        if (!this.googleProvider) {
          const apiKey = this.config.providers.google?.apiKey;
          if (!apiKey) {
            throw new Error(
              'Google API key not configured. Set providers.google.api_key in ~/.corroborate/config.yaml or export GEMINI_API_KEY',
            );
          }
          this.googleProvider = createGoogleGenerativeAI({ apiKey });
        }
        return this.googleProvider(modelId);
      }
    }
  }
}
