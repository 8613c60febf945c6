import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, type Config } from '../config/index.js';

function maskKey(key: string | undefined): string | undefined {
  if (!key) return key;
  return key.length <= 8 ? '****' : `${key.slice(0, 4)}...${key.slice(-4)}`;
}

/** Copy of the config with API keys masked for display. */
export function redactConfig(config: Config): Config {
  const { deepseek, openai, anthropic, google } = config.providers;
  return {
    ...config,
    providers: {
      deepseek: { ...deepseek, api_key: maskKey(deepseek.api_key) },
      openai: { ...openai, api_key: maskKey(openai.api_key) },
      anthropic: { ...anthropic, api_key: maskKey(anthropic.api_key) },
      google: { ...google, api_key: maskKey(google.api_key) },
    },
  };
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage corroborate configuration');

  config
    .command('init')
    .description('Create a starter config in ~/.corroborate/')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show current configuration (API keys masked)')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = redactConfig(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(cfg));
      }
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. verification.timeout_ms)')
    .argument('<value>', 'Value to set; lists use [a, b] syntax')
    .action(async (key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      setConfigValue(key, value, { configPath: globalOpts.config });

      const configPath = getConfigPath(globalOpts.config);
      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${configPath}`));
    });
}
