/**
 * JSONL Writer
 *
 * JSONL 形式でログをファイルに出力
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * JSONL Writer オプション
 */
export interface JsonlWriterOptions {
  /** ログディレクトリ */
  logDir: string;
  /** ファイル名プレフィックス */
  filePrefix?: string;
  /** 最大ファイルサイズ (bytes) */
  maxFileSize?: number;
  /** 最大ファイル数 */
  maxFiles?: number;
}

/**
 * JSONL Writer
 *
 * 書き込みは直列化され、サイズ上限でファイルをローテートする
 */
export class JsonlWriter {
  private readonly logDir: string;
  private readonly filePrefix: string;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;

  private writeStream: fs.WriteStream | null = null;
  private currentSize = 0;
  private fileCounter = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: JsonlWriterOptions) {
    this.logDir = options.logDir;
    this.filePrefix = options.filePrefix || 'xvpn';
    this.maxFileSize = options.maxFileSize || 10 * 1024 * 1024; // 10MB
    this.maxFiles = options.maxFiles || 5;
  }

  /**
   * ログディレクトリを初期化
   */
  async init(): Promise<void> {
    await fs.promises.mkdir(this.logDir, { recursive: true });
    await this.removeOldFiles();
  }

  /**
   * ログエントリを書き込み
   */
  write(entry: Record<string, unknown>): Promise<void> {
    const line = JSON.stringify(entry) + '\n';
    const next = this.pending.then(() => this.append(Buffer.from(line, 'utf8')));
    // 失敗しても後続の書き込みは継続する
    this.pending = next.catch(() => undefined);
    return next;
  }

  /**
   * ストリームを閉じる
   */
  async close(): Promise<void> {
    await this.pending;
    await this.endStream();
  }

  private async append(buffer: Buffer): Promise<void> {
    const stream = await this.ensureStream();
    await writeToStream(stream, buffer);
    this.currentSize += buffer.length;

    if (this.currentSize >= this.maxFileSize) {
      await this.endStream();
      await this.removeOldFiles();
    }
  }

  /**
   * 書き込みストリームを確保
   */
  private async ensureStream(): Promise<fs.WriteStream> {
    if (this.writeStream) {
      return this.writeStream;
    }

    const filePath = path.join(this.logDir, this.generateFileName());
    const stream = fs.createWriteStream(filePath, { flags: 'a' });
    this.writeStream = stream;
    this.currentSize = 0;

    try {
      const stats = await fs.promises.stat(filePath);
      this.currentSize = stats.size;
    } catch {
      // まだ作成されていない
    }

    return stream;
  }

  private async endStream(): Promise<void> {
    const stream = this.writeStream;
    if (!stream) {
      return;
    }
    this.writeStream = null;
    await new Promise<void>((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  /**
   * 上限を超えた古いファイルを削除
   */
  private async removeOldFiles(): Promise<void> {
    const files = await this.getLogFiles();

    while (files.length >= this.maxFiles) {
      const oldest = files.shift();
      if (oldest === undefined) {
        break;
      }
      await fs.promises.unlink(path.join(this.logDir, oldest)).catch(() => undefined);
    }
  }

  /**
   * ログファイル一覧を取得（古い順）
   */
  private async getLogFiles(): Promise<string[]> {
    try {
      const files = await fs.promises.readdir(this.logDir);
      return files
        .filter((f) => f.startsWith(this.filePrefix) && f.endsWith('.jsonl'))
        .sort();
    } catch {
      return [];
    }
  }

  /**
   * ファイル名を生成
   */
  private generateFileName(): string {
    const now = new Date();
    const date = now.toISOString().slice(0, 10).replace(/-/g, '');
    const time = now.toISOString().slice(11, 19).replace(/:/g, '');
    this.fileCounter += 1;
    return `${this.filePrefix}-${date}-${time}-${String(this.fileCounter).padStart(3, '0')}.jsonl`;
  }
}

function writeToStream(stream: fs.WriteStream, buffer: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(buffer, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
