export {
  type ModelPricing,
  type UsageTotals,
  MODEL_PRICING,
  getModelPricing,
  calculateCost,
  CostTracker,
} from './cost.js';

export {
  type ProviderId,
  type ProviderConfig,
  DEFAULT_DEEPSEEK_BASE_URL,
  detectProvider,
  jsonModeOptions,
  ProviderRegistry,
} from './providers.js';

export {
  type LLMCallOptions,
  type LLMResponse,
  type ProviderCallOptions,
  callLLM,
} from './llm.js';

export {
  type ErrorCategory,
  type RetryConfig,
  type RetryResult,
  classifyError,
  withRetry,
  withTimeout,
  sleep,
  TimeoutError,
  AbortError,
} from './retry.js';
