import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.corroborate', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# corroborate configuration

providers:
  deepseek:
    # Primary judge. Use "env:DEEPSEEK_API_KEY" or "$DEEPSEEK_API_KEY" to read from env
    api_key: env:DEEPSEEK_API_KEY
    base_url: https://api.deepseek.com
    default_model: deepseek-chat

  openai:
    api_key: env:OPENAI_API_KEY

  anthropic:
    api_key: env:ANTHROPIC_API_KEY

  google:
    api_key: env:GEMINI_API_KEY

verification:
  # "primary" is an alias for providers.deepseek.default_model
  judges:
    - deepseek-chat
    - gpt-4o
    - claude-sonnet-4-20250514
  temperature: 0.1
  max_tokens: 1000
  timeout_ms: 0          # per-judge deadline, 0 = none
  max_concurrency: 0     # judges in flight at once, 0 = all
  retries: 0             # transport retries per judge

output:
  format: markdown       # markdown | json
  dir: ./reports
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Add your API keys or set environment variables');
  log('  3. Run', chalk.green('corroborate verify "What is 2+2?" "4"'));
}
