import chalk from 'chalk';
import {
  ProviderRegistry,
  VerificationAggregator,
  createAdapterFactory,
  resolveJudge,
  type RetryConfig,
  type VerificationEvents,
} from '@corroborate/core';
import { ConfigError, type Config } from './config/index.js';

export interface AggregatorSetup {
  config: Config;
  /** Log judge progress to stderr. */
  verbose?: boolean;
  logger?: (...args: unknown[]) => void;
}

/** Judges from the list that route to the primary (DeepSeek) backend. */
export function primaryJudges(models: readonly string[], primaryModel: string): string[] {
  return models.filter(id => resolveJudge(id, primaryModel).kind === 'primary');
}

/**
 * Fails fast when a primary judge is requested without a DeepSeek key.
 * Missing keys for other providers are reported per judge instead.
 */
export function assertPrimaryKey(config: Config, models: readonly string[]): void {
  const deepseek = config.providers.deepseek;
  if (deepseek.api_key) return;
  const wanted = primaryJudges(models, deepseek.default_model);
  if (wanted.length > 0) {
    throw new ConfigError(
      `DeepSeek API key required for judge(s) ${wanted.join(', ')}. ` +
      'Set providers.deepseek.api_key or export DEEPSEEK_API_KEY.',
    );
  }
}

export function createRegistry(config: Config): ProviderRegistry {
  const { deepseek, openai, anthropic, google } = config.providers;
  return new ProviderRegistry({
    providers: {
      deepseek: { apiKey: deepseek.api_key, baseUrl: deepseek.base_url },
      openai: { apiKey: openai.api_key },
      anthropic: { apiKey: anthropic.api_key },
      google: { apiKey: google.api_key },
    },
  });
}

export function createAggregator(setup: AggregatorSetup): VerificationAggregator {
  const { config } = setup;
  const { verification } = config;
  const log = setup.logger ?? console.error;

  const aggregator = new VerificationAggregator({
    adapterFactory: createAdapterFactory({
      registry: createRegistry(config),
      primaryModel: config.providers.deepseek.default_model,
      settings: {
        temperature: verification.temperature,
        maxOutputTokens: verification.max_tokens,
        retry: {
          maxRetries: verification.retries,
          ...(setup.verbose ? { onRetry: retryLogger(log) } : {}),
        },
      },
    }),
    defaultJudges: verification.judges,
    timeoutMs: verification.timeout_ms,
    maxConcurrency: verification.max_concurrency,
  });

  if (setup.verbose) {
    attachProgressLogging(aggregator, log);
  }
  return aggregator;
}

function retryLogger(log: (...args: unknown[]) => void): NonNullable<RetryConfig['onRetry']> {
  return (attempt, error, category, delayMs) => {
    log(chalk.yellow(`  retry ${attempt} after ${category}: ${error.message}`) + chalk.dim(`  in ${(delayMs / 1000).toFixed(1)}s`));
  };
}

function attachProgressLogging(
  aggregator: VerificationAggregator,
  log: (...args: unknown[]) => void,
): void {
  const onStart: VerificationEvents['judge:start'] = (event) => {
    log(chalk.dim(`  [${event.index + 1}/${event.total}] ${event.judgeId} ...`));
  };
  const onComplete: VerificationEvents['judge:complete'] = (event) => {
    const verdict = event.verdict.verified ? chalk.green('verified') : chalk.yellow('not verified');
    log(`  ${chalk.bold(event.judgeId)} ${verdict}` + chalk.dim(`  ${(event.durationMs / 1000).toFixed(1)}s`));
  };
  const onError: VerificationEvents['judge:error'] = (event) => {
    log(`  ${chalk.bold(event.judgeId)} ${chalk.red(event.error.message)}` + chalk.dim(`  ${(event.durationMs / 1000).toFixed(1)}s`));
  };

  aggregator.on('judge:start', onStart);
  aggregator.on('judge:complete', onComplete);
  aggregator.on('judge:error', onError);
}
