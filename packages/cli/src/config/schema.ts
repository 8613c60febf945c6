import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const apiKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: apiKeySchema.optional(),
  default_model: z.string().min(1).optional(),
}).strict();

const deepseekConfigSchema = providerConfigSchema.extend({
  base_url: z.string().min(1).optional(),
}).strict();

const providersSchema = z.object({
  deepseek: deepseekConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  anthropic: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const verificationSchema = z.object({
  judges: z.array(z.string().min(1)).min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  timeout_ms: z.number().int().min(0).optional(),
  max_concurrency: z.number().int().min(0).optional(),
  retries: z.number().int().min(0).max(10).optional(),
}).strict();

const outputSchema = z.object({
  format: z.enum(['markdown', 'json']).optional(),
  dir: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  verification: verificationSchema.optional(),
  output: outputSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type ProviderName = 'deepseek' | 'openai' | 'anthropic' | 'google';
export type OutputFormat = 'markdown' | 'json';

export interface ResolvedProviderConfig {
  api_key?: string;
  default_model: string;
}

export interface ResolvedDeepSeekConfig extends ResolvedProviderConfig {
  base_url: string;
}

export interface VerificationConfig {
  judges: string[];
  temperature: number;
  max_tokens: number;
  /** Per-judge deadline in milliseconds. 0 disables it. */
  timeout_ms: number;
  /** Judges in flight at once. 0 means all of them. */
  max_concurrency: number;
  retries: number;
}

export interface Config {
  providers: {
    deepseek: ResolvedDeepSeekConfig;
    openai: ResolvedProviderConfig;
    anthropic: ResolvedProviderConfig;
    google: ResolvedProviderConfig;
  };
  verification: VerificationConfig;
  output: {
    format: OutputFormat;
    dir: string;
  };
}

export const ConfigDefaults: Config = {
  providers: {
    deepseek: {
      base_url: 'https://api.deepseek.com',
      default_model: 'deepseek-chat',
    },
    openai: {
      default_model: 'gpt-4o',
    },
    anthropic: {
      default_model: 'claude-sonnet-4-20250514',
    },
    google: {
      default_model: 'gemini-2.5-flash',
    },
  },
  verification: {
    judges: ['deepseek-chat', 'gpt-4o', 'claude-sonnet-4-20250514'],
    temperature: 0.1,
    max_tokens: 1000,
    timeout_ms: 0,
    max_concurrency: 0,
    retries: 0,
  },
  output: {
    format: 'markdown',
    dir: './reports',
  },
};

export { ConfigSchema };
