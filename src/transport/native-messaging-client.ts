/**
 * Native Messaging Client
 *
 * ヘルパープロセスを起動し、stdin/stdout で長さプレフィックス付き JSON を送受信する
 */

import { EventEmitter } from 'events';
import {
  ClientError,
  ErrorCodes,
  HelperProcess,
  HelperSpawner,
  MessageTransport,
  NativeMessagingConstants,
  ResolvedManifest,
  toClientError,
} from '../types';
import { Logger } from '../logger';
import { MessageParser } from './message-parser';
import { spawnHelper } from './helper-process';

const { LENGTH_PREFIX_SIZE } = NativeMessagingConstants;

/**
 * NativeMessagingClient オプション
 */
export interface NativeMessagingClientOptions {
  /** 受信メッセージサイズ上限 */
  maxMessageSize?: number;
  /** ヘルパー起動関数 (テスト用DI) */
  spawn?: HelperSpawner;
  logger?: Logger;
}

/**
 * NativeMessagingClient イベント
 */
export interface NativeMessagingClientEvents {
  error: (error: ClientError) => void;
  exit: (code: number | null) => void;
}

/**
 * 書き込み待ちのフレーム
 */
interface PendingWrite {
  frame: Buffer;
  resolve: () => void;
  reject: (error: ClientError) => void;
}

/**
 * Native Messaging Client
 *
 * 受信したメッセージは FIFO キューに積まれ、tryReceive() で取り出す
 */
export class NativeMessagingClient extends EventEmitter implements MessageTransport {
  private readonly parser: MessageParser;
  private readonly spawnHelper: HelperSpawner;
  private readonly logger: Logger;
  private helper: HelperProcess | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private readonly inbox: string[] = [];
  private writeQueue: PendingWrite[] = [];
  private isWriting = false;
  private reading = false;
  private exited = false;
  private stopped = false;
  private failure: ClientError | null = null;

  constructor(
    private readonly manifest: ResolvedManifest,
    options: NativeMessagingClientOptions = {}
  ) {
    super();
    this.parser = new MessageParser(options.maxMessageSize);
    this.spawnHelper = options.spawn ?? spawnHelper;
    this.logger = options.logger ?? new Logger({ console: false });
    // リスナー未登録でも unhandled error にしない
    this.on('error', (error) => {
      this.logger.error('Transport error', undefined, error);
    });
  }

  /**
   * ヘルパーを起動して受信を開始
   *
   * @throws {ClientError} 起動できない場合
   */
  start(): void {
    if (this.helper) {
      return;
    }

    const args = [this.manifest.manifestPath, this.manifest.allowed_extensions[0]];

    let helper: HelperProcess;
    try {
      helper = this.spawnHelper(this.manifest.path, args);
    } catch (error) {
      throw new ClientError(
        `Failed to launch helper ${this.manifest.path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        ErrorCodes.SPAWN_FAILED,
        false,
        error instanceof Error ? error : undefined
      );
    }

    this.helper = helper;
    this.reading = true;

    helper.stdout.on('data', this.handleData);
    helper.stdout.on('end', this.handleEnd);
    helper.stderr?.on('data', (chunk: Buffer | string) => {
      this.logger.debug('Helper stderr', chunk.toString().trim());
    });
    helper.onExit((code) => this.handleExit(code));
    helper.onError((error) => {
      this.fail(
        new ClientError(`Helper process error: ${error.message}`, ErrorCodes.SPAWN_FAILED, false, error)
      );
    });

    this.logger.info('Helper started', { path: this.manifest.path, args });
  }

  /**
   * JSON テキストを送信
   *
   * 書き込みはキューで直列化され、呼び出し順にフレーム単位で書き出される
   */
  send(json: string): Promise<void> {
    const helper = this.helper;
    if (this.failure || this.exited || this.stopped || !helper) {
      return Promise.reject(
        new ClientError('Helper is not running', ErrorCodes.TRANSPORT_CLOSED, false, this.failure ?? undefined)
      );
    }

    let frame: Buffer;
    try {
      frame = this.parser.encode(json);
    } catch (error) {
      return Promise.reject(toClientError(error, ErrorCodes.SEND_FAILED));
    }

    this.logger.debug(`-> ${json}`);

    return new Promise<void>((resolve, reject) => {
      this.writeQueue.push({ frame, resolve, reject });
      this.flushNext(helper);
    });
  }

  /**
   * 受信キューから1件取り出す
   */
  tryReceive(): string | undefined {
    return this.inbox.shift();
  }

  /**
   * 受信キューの件数
   */
  get pendingCount(): number {
    return this.inbox.length;
  }

  /**
   * 受信ループが動作中か
   */
  isReading(): boolean {
    return this.reading;
  }

  onError(handler: (error: ClientError) => void): void {
    this.on('error', handler);
  }

  onExit(handler: (code: number | null) => void): void {
    this.on('exit', handler);
  }

  /**
   * ヘルパーを停止
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.stopReading();
    this.rejectPendingWrites(new ClientError('Transport stopped', ErrorCodes.TRANSPORT_CLOSED, false));
    if (this.helper && !this.exited) {
      this.helper.kill();
    }
  }

  /**
   * stdout からのデータを処理
   */
  private readonly handleData = (chunk: Buffer | string): void => {
    if (!this.reading) {
      return;
    }

    const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = Buffer.concat([this.buffer, data]);

    // 1件ずつキューに積み、途中でエラーになってもそれ以前のメッセージは残す
    try {
      let result = this.parser.decode(this.buffer);
      while (result !== null) {
        this.buffer = result.remaining;
        this.logger.debug(`<- ${result.text}`);
        this.inbox.push(result.text);
        result = this.parser.decode(this.buffer);
      }
    } catch (error) {
      this.fail(toClientError(error, ErrorCodes.PARSE_ERROR));
    }
  };

  /**
   * stdout 終了を処理
   */
  private readonly handleEnd = (): void => {
    if (!this.reading) {
      return;
    }

    const buffered = this.buffer.length;
    if (buffered > 0) {
      const expected =
        buffered < LENGTH_PREFIX_SIZE
          ? LENGTH_PREFIX_SIZE
          : LENGTH_PREFIX_SIZE + this.buffer.readUInt32LE(0);
      this.fail(
        new ClientError(
          `Reached end of stream but expected ${expected - buffered} more bytes`,
          ErrorCodes.PREMATURE_EOF,
          false
        )
      );
      return;
    }

    this.stopReading();
  };

  /**
   * ヘルパー終了を処理
   */
  private handleExit(code: number | null): void {
    this.exited = true;
    this.stopReading();

    // stop() による終了は異常扱いしない
    if (code === 0 || this.stopped) {
      this.logger.info(`Helper has exited with code ${code}`);
    } else {
      this.logger.error(`Helper has exited with code ${code}`);
    }

    this.rejectPendingWrites(new ClientError('Helper has exited', ErrorCodes.TRANSPORT_CLOSED, false));
    this.emit('exit', code);
  }

  /**
   * 致命的エラー: 受信を止めてオーナーに通知
   */
  private fail(error: ClientError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.stopReading();
    this.rejectPendingWrites(
      new ClientError('Transport failed', ErrorCodes.TRANSPORT_CLOSED, false, error)
    );
    this.emit('error', error);
  }

  private stopReading(): void {
    this.reading = false;
    this.buffer = Buffer.alloc(0);
    if (this.helper) {
      this.helper.stdout.removeListener('data', this.handleData);
      this.helper.stdout.removeListener('end', this.handleEnd);
    }
  }

  /**
   * 書き込みキューを1件ずつ処理
   */
  private flushNext(helper: HelperProcess): void {
    if (this.isWriting) {
      return;
    }

    const next = this.writeQueue.shift();
    if (!next) {
      return;
    }

    this.isWriting = true;
    helper.stdin.write(next.frame, (error) => {
      this.isWriting = false;
      if (error) {
        next.reject(new ClientError(`Send failed: ${error.message}`, ErrorCodes.SEND_FAILED, true, error));
      } else {
        next.resolve();
      }
      this.flushNext(helper);
    });
  }

  private rejectPendingWrites(error: ClientError): void {
    const pending = this.writeQueue;
    this.writeQueue = [];
    for (const write of pending) {
      write.reject(error);
    }
  }
}

// EventEmitter の型付けを強化
export interface NativeMessagingClient {
  on<K extends keyof NativeMessagingClientEvents>(
    event: K,
    listener: NativeMessagingClientEvents[K]
  ): this;
  emit<K extends keyof NativeMessagingClientEvents>(
    event: K,
    ...args: Parameters<NativeMessagingClientEvents[K]>
  ): boolean;
}
