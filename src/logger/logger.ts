/**
 * Logger
 *
 * クライアントの動作とヘルパーとの通信内容を記録
 */

import { JsonlWriter } from './jsonl-writer';

/**
 * ログレベル
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LogLevels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * ログエントリ
 */
export interface LogEntry extends Record<string, unknown> {
  /** タイムスタンプ */
  ts: string;
  /** ログレベル */
  level: LogLevel;
  /** イベント名 */
  event: string;
  /** 追加データ */
  data?: unknown;
  /** エラー情報 */
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

/**
 * Logger オプション
 */
export interface LoggerOptions {
  /** ログレベル */
  level?: LogLevel;
  /** JSONL 出力先ディレクトリ (未指定ならファイル出力しない) */
  logDir?: string;
  /** 最大ファイルサイズ (bytes) */
  maxFileSize?: number;
  /** 最大ファイル数 */
  maxFiles?: number;
  /** stderr への出力 */
  console?: boolean;
}

/**
 * ログレベルの優先度
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger
 *
 * stderr と (指定時) JSONL ファイルに出力
 */
export class Logger {
  private readonly writer: JsonlWriter | null;
  private readonly level: LogLevel;
  private readonly console: boolean;
  private initialized = false;

  constructor(options: LoggerOptions = {}) {
    this.writer = options.logDir
      ? new JsonlWriter({
          logDir: options.logDir,
          filePrefix: 'xvpn',
          maxFileSize: options.maxFileSize,
          maxFiles: options.maxFiles,
        })
      : null;
    this.level = options.level || 'warn';
    this.console = options.console ?? true;
  }

  /**
   * ロガーを初期化
   */
  async init(): Promise<void> {
    if (this.writer) {
      await this.writer.init();
    }
    this.initialized = true;
  }

  /**
   * ロガーを閉じる
   */
  async close(): Promise<void> {
    if (this.writer) {
      await this.writer.close();
    }
    this.initialized = false;
  }

  /**
   * 指定レベルが出力対象か
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  debug(event: string, data?: unknown): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: unknown): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: unknown): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: unknown, error?: Error): void {
    this.log('error', event, data, error);
  }

  /**
   * ログを出力
   */
  private log(level: LogLevel, event: string, data?: unknown, error?: Error): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      event,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: readErrorCode(error),
      };
    }

    if (this.writer && this.initialized) {
      this.writer.write(entry).catch((writeError: unknown) => {
        process.stderr.write(
          `[ERROR] Failed to write log file: ${writeError instanceof Error ? writeError.message : String(writeError)}\n`
        );
      });
    }

    if (this.console) {
      process.stderr.write(formatLine(entry) + '\n');
    }
  }
}

/**
 * コンソール出力用の1行を生成
 */
export function formatLine(entry: LogEntry): string {
  let line = `[${entry.level.toUpperCase()}] ${entry.event}`;
  if (entry.data !== undefined) {
    line += ` ${typeof entry.data === 'string' ? entry.data : JSON.stringify(entry.data)}`;
  }
  if (entry.error) {
    line += ` (${entry.error.code ? `${entry.error.code}: ` : ''}${entry.error.message})`;
  }
  return line;
}

function readErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}
