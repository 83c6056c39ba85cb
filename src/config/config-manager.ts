/**
 * Config Manager
 *
 * 設定ファイルの読み込みと保存
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { XvpnConfig } from './schema';
import { DEFAULT_CONFIG, mergeConfig } from './defaults';
import { assertValidConfig } from './validator';
import { ClientError, ErrorCodes } from '../types';

/**
 * ConfigManager オプション
 */
export interface ConfigManagerOptions {
  /** 設定ファイルパス */
  configPath?: string;
}

/**
 * OS ごとの設定ディレクトリ
 */
export function getConfigDir(platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'xvpn-cli');
  } else if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'xvpn-cli');
  }
  return path.join(process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'xvpn-cli');
}

/**
 * Config Manager
 */
export class ConfigManager {
  private readonly configPath: string;
  private config: XvpnConfig = DEFAULT_CONFIG;

  constructor(options: ConfigManagerOptions = {}) {
    this.configPath = options.configPath || path.join(getConfigDir(), 'config.json');
  }

  /**
   * 設定を読み込み
   */
  async load(): Promise<XvpnConfig> {
    let data: string;
    try {
      data = await fs.promises.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト
        this.config = DEFAULT_CONFIG;
        return this.config;
      }
      throw new ClientError(
        `Failed to load config: ${error instanceof Error ? error.message : 'Unknown error'}`,
        ErrorCodes.CONFIG_NOT_FOUND,
        true,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new ClientError(
        'Invalid JSON in config file',
        ErrorCodes.CONFIG_INVALID,
        true,
        error instanceof Error ? error : undefined
      );
    }

    assertValidConfig(parsed);
    this.config = mergeConfig(DEFAULT_CONFIG, parsed);
    return this.config;
  }

  /**
   * 設定を保存
   */
  async save(config: XvpnConfig): Promise<void> {
    assertValidConfig(config);
    this.config = config;

    await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.promises.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf8');
  }

  /**
   * ネストした設定値を取得
   */
  getNested(dotPath: string): unknown {
    let current: unknown = this.config;

    for (const part of dotPath.split('.')) {
      if (typeof current !== 'object' || current === null) {
        return undefined;
      }
      current = Reflect.get(current, part);
    }

    return current;
  }

  /**
   * ネストした設定値を変更
   */
  async setNested(dotPath: string, value: unknown): Promise<void> {
    const parts = dotPath.split('.');
    const lastKey = parts.pop();
    if (!lastKey) {
      throw new ClientError('Empty config key', ErrorCodes.CONFIG_INVALID, true);
    }

    // 深いコピーを作成
    const copy: unknown = JSON.parse(JSON.stringify(this.config));
    if (!isPlainObject(copy)) {
      throw new ClientError('Config is not an object', ErrorCodes.CONFIG_INVALID, true);
    }

    let current = copy;
    for (const part of parts) {
      const next = current[part];
      if (isPlainObject(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    current[lastKey] = value;

    assertValidConfig(copy);
    await this.save(mergeConfig(DEFAULT_CONFIG, copy));
  }

  /**
   * 設定をリセット
   */
  async reset(): Promise<void> {
    await this.save(DEFAULT_CONFIG);
  }

  /**
   * 設定ファイルパスを取得
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 現在の設定を取得
   */
  getConfig(): XvpnConfig {
    return this.config;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
