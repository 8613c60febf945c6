import { describe, it, expect, vi } from 'vitest';

vi.mock('@corroborate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@corroborate/core')>();
  return { ...actual, createAdapterFactory: vi.fn(actual.createAdapterFactory) };
});

import { createAdapterFactory } from '@corroborate/core';
import { ConfigDefaults, ConfigError, type Config } from './config/index.js';
import { assertPrimaryKey, createAggregator, primaryJudges } from './verifier.js';

function makeConfig(deepseekKey?: string): Config {
  const config = structuredClone(ConfigDefaults);
  config.providers.deepseek.api_key = deepseekKey;
  return config;
}

describe('primaryJudges', () => {
  it('selects the alias, the configured model and other deepseek models', () => {
    expect(primaryJudges(['primary', 'deepseek-chat', 'deepseek-reasoner', 'gpt-4o', 'mystery'], 'deepseek-chat'))
      .toEqual(['primary', 'deepseek-chat', 'deepseek-reasoner']);
  });

  it('treats a custom primary model name as primary', () => {
    expect(primaryJudges(['my-finetune', 'gpt-4o'], 'my-finetune')).toEqual(['my-finetune']);
  });
});

describe('assertPrimaryKey', () => {
  it('throws when a primary judge is requested without a key', () => {
    expect(() => assertPrimaryKey(makeConfig(), ['deepseek-chat', 'gpt-4o'])).toThrow(ConfigError);
  });

  it('passes when only secondary judges are requested', () => {
    expect(() => assertPrimaryKey(makeConfig(), ['gpt-4o', 'gemini-2.5-pro'])).not.toThrow();
  });

  it('passes when the key is configured', () => {
    expect(() => assertPrimaryKey(makeConfig('test-secret'), ['primary'])).not.toThrow();
  });
});

describe('createAggregator', () => {
  it('uses the configured judges by default', async () => {
    const config = makeConfig();
    config.verification.judges = ['mystery-model'];

    const report = await createAggregator({ config }).verify('q', 'a');

    expect(report.models).toEqual(['mystery-model']);
    expect(report.feedback).toEqual(['mystery-model: Unsupported model: mystery-model']);
  });

  it('logs judge progress when verbose', async () => {
    const logger = vi.fn();
    const aggregator = createAggregator({ config: makeConfig(), verbose: true, logger });

    await aggregator.verify('q', 'a', ['mystery-model']);

    expect(logger).toHaveBeenCalledTimes(2);
    expect(logger.mock.calls[0][0]).toContain('[1/1] mystery-model');
    expect(logger.mock.calls[1][0]).toContain('not verified');
  });

  it('passes the configured retry count to the judges', () => {
    const config = makeConfig();
    config.verification.retries = 2;

    createAggregator({ config });

    const settings = vi.mocked(createAdapterFactory).mock.calls[0][0].settings;
    expect(settings?.retry).toEqual({ maxRetries: 2 });
  });

  it('logs transport retries when verbose', () => {
    const logger = vi.fn();
    createAggregator({ config: makeConfig(), verbose: true, logger });

    const onRetry = vi.mocked(createAdapterFactory).mock.calls[0][0].settings?.retry?.onRetry;
    expect(onRetry).toBeDefined();
    onRetry?.(1, new Error('503 Service Unavailable'), 'server_error', 1500);

    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger.mock.calls[0][0]).toContain('retry 1 after server_error: 503 Service Unavailable');
    expect(logger.mock.calls[0][0]).toContain('in 1.5s');
  });
});
