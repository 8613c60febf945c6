import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readdirSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { tmpdir } from 'os';
import { createProgram } from './program.js';
import { ConfigError } from './config/index.js';

function findCommand(name: string) {
  const cmd = createProgram().commands.find(c => c.name() === name);
  if (!cmd) throw new Error(`command ${name} not registered`);
  return cmd;
}

describe('CLI command structure', () => {
  it('creates a program with correct name', () => {
    expect(createProgram().name()).toBe('corroborate');
  });

  it('registers all top-level commands', () => {
    const names = createProgram().commands.map(c => c.name());
    expect(names).toEqual(['verify', 'compare', 'config']);
  });

  it('has all global options', () => {
    const optLongs = createProgram().options.map(o => o.long);
    expect(optLongs).toContain('--verbose');
    expect(optLongs).toContain('--json');
    expect(optLongs).toContain('--config');
  });

  describe('verify command', () => {
    it('takes query and response arguments', () => {
      const cmd = findCommand('verify');
      expect(cmd.registeredArguments.map(a => a.name())).toEqual(['query', 'response']);
      expect(cmd.registeredArguments.every(a => a.required)).toBe(true);
    });

    it('has all options', () => {
      const optLongs = findCommand('verify').options.map(o => o.long);
      expect(optLongs).toEqual(['--models', '--output', '--save']);
    });
  });

  describe('compare command', () => {
    it('takes a file argument', () => {
      const cmd = findCommand('compare');
      expect(cmd.registeredArguments).toHaveLength(1);
      expect(cmd.registeredArguments[0].name()).toBe('file');
    });
  });

  describe('config subcommands', () => {
    it('registers init, show and set', () => {
      const names = findCommand('config').commands.map(c => c.name());
      expect(names).toEqual(['init', 'show', 'set']);
    });
  });
});

describe('CLI actions', () => {
  let testDir = '';
  let configPath = '';
  let stdout: string[] = [];

  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'corroborate-cli-'));
    configPath = resolve(testDir, 'config.yaml');
    for (const key of ['DEEPSEEK_API_KEY', 'OPENAI_API_KEY', 'ANTHROPIC_API_KEY', 'GEMINI_API_KEY', 'GOOGLE_API_KEY']) {
      vi.stubEnv(key, '');
    }
    stdout = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram().exitOverride();
    await program.parseAsync(['node', 'corroborate', '-c', configPath, ...args]);
  }

  it('verify reports unsupported judges without calling out', async () => {
    await run('--json', 'verify', 'What is 2+2?', '4', '-m', 'llama-3');

    const report: unknown = JSON.parse(stdout.join('\n'));
    expect(report).toEqual({
      query: 'What is 2+2?',
      originalResponse: '4',
      agreementRatio: 0,
      verified: false,
      feedback: ['llama-3: Unsupported model: llama-3'],
      details: [{ sourceId: 'llama-3', verified: false, feedback: 'Unsupported model: llama-3', corrections: [] }],
      models: ['llama-3'],
      usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
    });
  });

  it('verify requires the DeepSeek key when a primary judge is requested', async () => {
    await expect(run('verify', 'What is 2+2?', '4', '-m', 'primary', 'llama-3')).rejects.toThrow(ConfigError);
    await expect(run('verify', 'What is 2+2?', '4', '-m', 'primary')).rejects.toThrow('DeepSeek API key required for judge(s) primary');
  });

  it('verify surfaces a missing secondary key as judge feedback', async () => {
    await run('--json', 'verify', 'What is 2+2?', '4', '-m', 'gpt-4o');

    const report: unknown = JSON.parse(stdout.join('\n'));
    expect(report).toMatchObject({
      agreementRatio: 0,
      verified: false,
      feedback: [expect.stringMatching(/^gpt-4o: Error - OpenAI API key not configured/)],
    });
  });

  it('verify --save writes a timestamped report', async () => {
    const outDir = resolve(testDir, 'reports');
    await run('--json', 'verify', 'What is 2+2?', '4', '--save', '-o', outDir, '-m', 'llama-3');

    const files = readdirSync(outDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^verification_\d{8}_\d{6}\.json$/);
    expect(JSON.parse(readFileSync(resolve(outDir, files[0]), 'utf-8'))).toMatchObject({ models: ['llama-3'] });
  });

  it('compare analyzes a responses file', async () => {
    const file = resolve(testDir, 'responses.json');
    writeFileSync(file, JSON.stringify([
      { model: 'deepseek-chat', response: 'Paris is the capital', verified: true },
      { model: 'gpt-4o', response: 'paris is the capital', verified: true },
      { response: 'Lyon', verified: false },
    ]));

    await run('--json', 'compare', file);

    const analysis: unknown = JSON.parse(stdout.join('\n'));
    expect(analysis).toMatchObject({
      summary: {
        totalResponses: 3,
        verifiedCount: 2,
        consensusRatio: 2 / 3,
        recommendation: 'USE_WITH_CONFIDENCE',
      },
      similarities: [
        { sourceA: 'deepseek-chat', sourceB: 'gpt-4o', similarity: 1 },
        { sourceA: 'deepseek-chat', sourceB: 'model_2', similarity: 0 },
        { sourceA: 'gpt-4o', sourceB: 'model_2', similarity: 0 },
      ],
    });
  });

  it('config show masks API keys', async () => {
    vi.stubEnv('DEEPSEEK_API_KEY', 'test-secret-value');

    await run('--json', 'config', 'show');

    const shown: unknown = JSON.parse(stdout.join('\n'));
    expect(shown).toMatchObject({ providers: { deepseek: { api_key: 'test...alue' } } });
  });
});
