/**
 * 設定スキーマ定義
 */

import { LogLevel } from '../logger';

/**
 * クライアント設定
 */
export interface XvpnConfig {
  /** ヘルパーのマニフェスト名 (未指定なら OS ごとのデフォルト) */
  manifestName?: string;

  /** 受信メッセージサイズ上限 (bytes) */
  maxMessageSize: number;

  /** タイムアウト設定（ms） */
  timeouts: {
    /** 要求に対する通知の待機 */
    response: number;
    /** ヘルパーとのハンドシェイク */
    handshake: number;
    /** 接続完了 */
    connect: number;
    /** 切断完了 */
    disconnect: number;
  };

  /** ポーリング間隔（ms） */
  polling: {
    /** 受信キューの処理 */
    dispatch: number;
    /** 接続中の状態確認 */
    connect: number;
    /** 切断中の状態確認 */
    disconnect: number;
  };

  /** ログ設定 */
  log: {
    /** ログレベル */
    level: LogLevel;
    /** JSONL 出力先ディレクトリ */
    dir?: string;
  };
}

/**
 * 設定の部分型
 */
export type PartialXvpnConfig = Partial<{
  manifestName: XvpnConfig['manifestName'];
  maxMessageSize: XvpnConfig['maxMessageSize'];
  timeouts: Partial<XvpnConfig['timeouts']>;
  polling: Partial<XvpnConfig['polling']>;
  log: Partial<XvpnConfig['log']>;
}>;
