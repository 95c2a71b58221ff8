/**
 * Config Command
 * 設定指令 - 管理 ~/.config/acc-bi/config.json
 */

import { Command } from 'commander';
import { ConfigError } from '../lib/errors.js';
import { getConfigService, isConfigKey, CONFIG_KEYS } from '../services/config.js';
import { formatConfig, maskSecret } from '../utils/output.js';
import type { ConfigKey } from '../types/config.js';
import { resolveFormat, runAction } from './auth.js';

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key: ${key} (valid keys: ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

export const configCommand = new Command('config')
  .description('Manage persistent settings (environment variables take precedence)');

configCommand
  .command('list')
  .description('Show all stored settings')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(async () => {
      console.log(formatConfig(getConfigService().getAll(), resolveFormat(cmd)));
    });
  });

configCommand
  .command('get <key>')
  .description('Show one stored setting')
  .action(async (key: string) => {
    await runAction(async () => {
      const configKey = requireKey(key);
      const value = getConfigService().get(configKey);
      if (value === undefined) {
        console.error(`${configKey} is not set`);
        return;
      }
      console.log(configKey === 'clientSecret' ? maskSecret(String(value)) : String(value));
    });
  });

configCommand
  .command('set <key> <value>')
  .description('Store a setting')
  .action(async (key: string, value: string) => {
    await runAction(async () => {
      const configKey = requireKey(key);
      getConfigService().setFromString(configKey, value);
      console.error(`✓ ${configKey} saved`);
    });
  });

configCommand
  .command('unset <key>')
  .description('Remove a stored setting')
  .action(async (key: string) => {
    await runAction(async () => {
      const configKey = requireKey(key);
      getConfigService().delete(configKey);
      console.error(`✓ ${configKey} removed`);
    });
  });

configCommand
  .command('path')
  .description('Print the config file path')
  .action(async () => {
    await runAction(async () => {
      console.log(getConfigService().getConfigPath());
    });
  });
