export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

// Pricing table for common judge models (USD per million tokens)
export const MODEL_PRICING: Record<string, ModelPricing> = {
  // DeepSeek
  'deepseek-chat':                  { inputPerMillion: 0.27, outputPerMillion: 1.10 },
  'deepseek-reasoner':              { inputPerMillion: 0.55, outputPerMillion: 2.19 },
  // Anthropic
  'claude-sonnet-4-20250514':       { inputPerMillion: 3.0,  outputPerMillion: 15.0 },
  'claude-haiku-3-5-20241022':      { inputPerMillion: 0.80, outputPerMillion: 4.0 },
  // OpenAI
  'gpt-4o':                         { inputPerMillion: 2.50, outputPerMillion: 10.0 },
  'gpt-4o-mini':                    { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  // Google Gemini
  'gemini-2.5-pro':                 { inputPerMillion: 1.25, outputPerMillion: 10.0 },
  'gemini-2.5-flash':               { inputPerMillion: 0.15, outputPerMillion: 0.60 },
};

// Conservative fallback pricing (sonnet-level) for unknown models
const FALLBACK_PRICING: ModelPricing = { inputPerMillion: 3.0, outputPerMillion: 15.0 };

export function getModelPricing(model: string): ModelPricing {
  return MODEL_PRICING[model] ?? FALLBACK_PRICING;
}

export function calculateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = getModelPricing(model);
  return (inputTokens * pricing.inputPerMillion + outputTokens * pricing.outputPerMillion) / 1_000_000;
}

export interface UsageTotals {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

/** Accumulates token usage and spend across a batch of LLM calls. */
export class CostTracker {
  private _input = 0;
  private _output = 0;
  private _spent = 0;

  add(usage: UsageTotals): void {
    this._input += usage.inputTokens;
    this._output += usage.outputTokens;
    this._spent += usage.costUsd;
  }

  totals(): UsageTotals {
    return { inputTokens: this._input, outputTokens: this._output, costUsd: this._spent };
  }
}
