/**
 * CLI セッション
 *
 * 設定読み込み → マニフェスト解決 → ヘルパー起動 → ハンドシェイク → 状態取得
 */

import { Command, InvalidArgumentError } from 'commander';
import { ConfigManager, XvpnConfig } from '../config';
import { Logger, LogLevel } from '../logger';
import { getDefaultManifestName, resolveManifest } from '../manifest';
import { NativeMessagingClient } from '../transport';
import { XvpnClient } from '../client';

/**
 * グローバルオプション
 */
export type GlobalOptions = {
  verbose: number;
  quiet?: boolean;
  timeout?: number;
  manifest?: string;
  config?: string;
};

/**
 * -v の回数を数える
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * 整数オプションのパース
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * フラグと設定からログレベルを決定
 */
export function resolveLogLevel(options: GlobalOptions, config: XvpnConfig): LogLevel {
  if (options.quiet) return 'error';
  if (options.verbose >= 2) return 'debug';
  if (options.verbose === 1) return 'info';
  return config.log.level;
}

/**
 * 開いているセッション
 */
export class Session {
  constructor(
    readonly client: XvpnClient,
    readonly logger: Logger,
    readonly config: XvpnConfig,
    readonly options: GlobalOptions
  ) {}

  /** 接続 / 切断の待機時間 (-t 指定を優先) */
  get connectTimeout(): number {
    return this.options.timeout ?? this.config.timeouts.connect;
  }

  get disconnectTimeout(): number {
    return this.options.timeout ?? this.config.timeouts.disconnect;
  }

  /**
   * ヘルパーを終了してログを閉じる
   */
  async close(): Promise<void> {
    await this.client.stop();
    await this.logger.close();
  }
}

/**
 * セッションを開く
 */
export async function openSession(options: GlobalOptions): Promise<Session> {
  const configManager = new ConfigManager({ configPath: options.config });
  const config = await configManager.load();

  const logger = new Logger({
    level: resolveLogLevel(options, config),
    logDir: config.log.dir,
  });
  await logger.init();

  const manifestName = options.manifest ?? config.manifestName ?? getDefaultManifestName();
  const manifest = await resolveManifest(manifestName).catch(async (error: unknown) => {
    await logger.close();
    throw error;
  });
  logger.info(`Manifest loaded for ${manifest.name} with helper at: ${manifest.path}`);

  const transport = new NativeMessagingClient(manifest, {
    maxMessageSize: config.maxMessageSize,
    logger,
  });
  const client = new XvpnClient(transport, {
    responseTimeout: config.timeouts.response,
    handshakeTimeout: config.timeouts.handshake,
    connectTimeout: config.timeouts.connect,
    disconnectTimeout: config.timeouts.disconnect,
    dispatchInterval: config.polling.dispatch,
    connectPollInterval: config.polling.connect,
    disconnectPollInterval: config.polling.disconnect,
    logger,
  });

  const session = new Session(client, logger, config, options);
  try {
    client.start();
    await client.waitForConnection();
    logger.info(`Connected to ExpressVPN version ${client.appVersion ?? 'unknown'}`);
    await client.refreshStatus();
  } catch (error) {
    await session.close();
    throw error;
  }

  return session;
}

/**
 * セッション内でコマンドを実行し、必ず閉じる
 */
export async function withSession(command: Command, fn: (session: Session) => Promise<void>): Promise<void> {
  const session = await openSession(command.optsWithGlobals<GlobalOptions>());
  try {
    await fn(session);
  } finally {
    await session.close();
  }
}
