/**
 * Native Messaging Protocol 関連の型定義
 * ヘルパープロセスとの通信に使用
 */

import { ClientError } from './common';

/**
 * Native Messaging マニフェストの内容
 */
export interface NativeMessagingManifest {
  name: string;
  description: string;
  /** ヘルパー実行ファイルパス */
  path: string;
  /** 通信方式 (stdio のみ対応) */
  type: string;
  allowed_extensions: string[];
}

/**
 * 読み込み済みマニフェスト
 */
export interface ResolvedManifest extends NativeMessagingManifest {
  /** マニフェストファイル自体のパス (ヘルパーの第1引数) */
  manifestPath: string;
}

/**
 * ヘルパープロセス
 *
 * child_process を直接扱わずに済むよう必要な操作だけを切り出したもの
 */
export interface HelperProcess {
  readonly stdin: NodeJS.WritableStream;
  readonly stdout: NodeJS.ReadableStream;
  /** 診断出力 (任意) */
  readonly stderr?: NodeJS.ReadableStream | null;
  /** 終了ハンドラ登録 */
  onExit(handler: (code: number | null) => void): void;
  /** 起動 / 実行時エラーハンドラ登録 */
  onError(handler: (error: Error) => void): void;
  kill(): void;
}

/**
 * ヘルパー起動関数 (テスト用DI)
 */
export type HelperSpawner = (command: string, args: string[]) => HelperProcess;

/**
 * メッセージトランスポート
 *
 * クライアントはこのインターフェースだけに依存する
 */
export interface MessageTransport {
  /** ヘルパーを起動して受信を開始 */
  start(): void;
  /** JSON テキストを1フレームとして送信 */
  send(json: string): Promise<void>;
  /** 受信キューから1件取り出す (空なら undefined) */
  tryReceive(): string | undefined;
  /** 致命的エラーハンドラ登録 */
  onError(handler: (error: ClientError) => void): void;
  /** ヘルパー終了ハンドラ登録 */
  onExit(handler: (code: number | null) => void): void;
  /** ヘルパーを停止 */
  stop(): Promise<void>;
}

/**
 * Native Messaging Protocol 定数
 */
export const NativeMessagingConstants = {
  /** 受信メッセージサイズ上限 (256KB) */
  MAX_MESSAGE_SIZE: 262144,
  /** 長さプレフィックスのバイト数 */
  LENGTH_PREFIX_SIZE: 4,
  /** 対応する通信方式 */
  PROTOCOL_TYPE: 'stdio',
} as const;
