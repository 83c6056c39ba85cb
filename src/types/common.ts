/**
 * 共通型定義
 * トランスポート / クライアント / CLI で共通して使用する基本型
 */

/**
 * エラーコード体系
 * - C0xx: 共通エラー
 * - M0xx: マニフェストエラー
 * - N0xx: Native Messaging (フレーミング) エラー
 * - X0xx: VPN クライアントエラー
 * - R0xx: 設定エラー
 */
export const ErrorCodes = {
  // 共通 (C0xx)
  UNKNOWN: 'C001',

  // Manifest (M0xx)
  MANIFEST_NOT_FOUND: 'M001',
  MANIFEST_INVALID: 'M002',
  UNSUPPORTED_PROTOCOL: 'M003',
  HELPER_NOT_FOUND: 'M004',

  // Native Messaging (N0xx)
  PARSE_ERROR: 'N001',
  SIZE_EXCEEDED: 'N002',
  PREMATURE_EOF: 'N003',
  SPAWN_FAILED: 'N004',
  SEND_FAILED: 'N005',
  TRANSPORT_CLOSED: 'N006',

  // VPN client (X0xx)
  HELPER_NOT_CONNECTED: 'X001',
  TIMEOUT: 'X002',
  CONNECTION_FAILED: 'X003',
  NOT_CONNECTED: 'X004',
  LOCATIONS_NOT_LOADED: 'X005',
  LOCATION_NOT_FOUND: 'X006',

  // Config (R0xx)
  CONFIG_INVALID: 'R001',
  CONFIG_NOT_FOUND: 'R002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * クライアントエラー基底クラス
 */
export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

/**
 * 待機 / ポーリングの期限切れ
 *
 * 呼び出し側が終端状態の失敗と区別できるよう専用の型にする
 */
export class TimeoutError extends ClientError {
  constructor(message: string) {
    super(message, ErrorCodes.TIMEOUT, true);
    this.name = 'TimeoutError';
  }
}

/**
 * 接続 / 切断ワークフローが想定外の状態で終了した
 */
export class ConnectionFailedError extends ClientError {
  constructor(
    message: string,
    public readonly state: string | null
  ) {
    super(message, ErrorCodes.CONNECTION_FAILED, true);
    this.name = 'ConnectionFailedError';
  }
}

/**
 * 任意の例外を ClientError に変換
 */
export function toClientError(error: unknown, code: ErrorCode = ErrorCodes.UNKNOWN): ClientError {
  if (error instanceof ClientError) {
    return error;
  }
  return new ClientError(
    error instanceof Error ? error.message : 'Unknown error',
    code,
    false,
    error instanceof Error ? error : undefined
  );
}
