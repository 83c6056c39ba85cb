/**
 * Config CLI コマンド
 */

import { Command } from 'commander';
import { ConfigManager } from '../../config';
import { GlobalOptions } from '../session';

/**
 * コマンドラインの値をパース
 */
export function parseConfigValue(value: string): unknown {
  // 真偽値
  if (value === 'true') return true;
  if (value === 'false') return false;
  // 数値
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  // オブジェクト / 配列
  if (value.startsWith('{') || value.startsWith('[')) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }
  return value;
}

function managerFor(command: Command): ConfigManager {
  return new ConfigManager({ configPath: command.optsWithGlobals<GlobalOptions>().config });
}

/**
 * Config コマンドを作成
 */
export function createConfigCommand(): Command {
  const config = new Command('config');
  config.description('Manage xvpn configuration');

  // config list
  config
    .command('list')
    .description('List all configuration values')
    .action(async (_options: unknown, command: Command) => {
      const manager = managerFor(command);
      const cfg = await manager.load();

      console.log('Current configuration:');
      console.log('');
      console.log(`manifestName: ${cfg.manifestName ?? '(default)'}`);
      console.log(`maxMessageSize: ${cfg.maxMessageSize}`);
      console.log(`timeouts.response: ${cfg.timeouts.response}`);
      console.log(`timeouts.handshake: ${cfg.timeouts.handshake}`);
      console.log(`timeouts.connect: ${cfg.timeouts.connect}`);
      console.log(`timeouts.disconnect: ${cfg.timeouts.disconnect}`);
      console.log(`polling.dispatch: ${cfg.polling.dispatch}`);
      console.log(`polling.connect: ${cfg.polling.connect}`);
      console.log(`polling.disconnect: ${cfg.polling.disconnect}`);
      console.log(`log.level: ${cfg.log.level}`);
      if (cfg.log.dir !== undefined) {
        console.log(`log.dir: ${cfg.log.dir}`);
      }
    });

  // config get <key>
  config
    .command('get <key>')
    .description('Get a configuration value')
    .action(async (key: string, _options: unknown, command: Command) => {
      const manager = managerFor(command);
      await manager.load();

      const value = manager.getNested(key);
      if (value === undefined) {
        console.error(`Key not found: ${key}`);
        process.exitCode = 1;
        return;
      }

      if (typeof value === 'object') {
        console.log(JSON.stringify(value, null, 2));
      } else {
        console.log(value);
      }
    });

  // config set <key> <value>
  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action(async (key: string, value: string, _options: unknown, command: Command) => {
      const manager = managerFor(command);
      await manager.load();

      const parsedValue = parseConfigValue(value);
      try {
        await manager.setNested(key, parsedValue);
        console.log(`✓ ${key} set to: ${JSON.stringify(parsedValue)}`);
      } catch (error) {
        console.error(`✗ Failed to set ${key}: ${error instanceof Error ? error.message : 'Unknown error'}`);
        process.exitCode = 1;
      }
    });

  // config reset
  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async (_options: unknown, command: Command) => {
      await managerFor(command).reset();
      console.log('✓ Config reset to defaults');
    });

  // config path
  config
    .command('path')
    .description('Show configuration file path')
    .action((_options: unknown, command: Command) => {
      console.log(managerFor(command).getConfigPath());
    });

  return config;
}
