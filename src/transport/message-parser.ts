/**
 * Native Messaging Protocol メッセージパーサー
 *
 * ヘルパーとのバイナリフォーマットを処理:
 * - 4byte Little Endian 長さプレフィックス
 * - UTF-8 エンコードされた JSON テキスト
 *
 * JSON の解釈はディスパッチャ側で行うため、ここではテキストのまま扱う
 */

import { ClientError, ErrorCodes, NativeMessagingConstants } from '../types';

const { LENGTH_PREFIX_SIZE } = NativeMessagingConstants;

/**
 * デコード結果
 */
export interface DecodeResult {
  /** デコードされた JSON テキスト */
  text: string;
  /** 残りのバッファ */
  remaining: Buffer;
}

/**
 * Native Messaging メッセージパーサー
 */
export class MessageParser {
  constructor(
    private readonly maxMessageSize: number = NativeMessagingConstants.MAX_MESSAGE_SIZE
  ) {}

  /**
   * バイナリバッファからメッセージを1件デコード
   *
   * @returns デコード結果、またはデータ不足の場合 null
   * @throws {ClientError} サイズ超過
   */
  decode(buffer: Buffer): DecodeResult | null {
    // 長さプレフィックスが揃うまで待機
    if (buffer.length < LENGTH_PREFIX_SIZE) {
      return null;
    }

    const messageLength = buffer.readUInt32LE(0);

    if (messageLength > this.maxMessageSize) {
      throw new ClientError(
        `Message size ${messageLength} exceeds maximum ${this.maxMessageSize}`,
        ErrorCodes.SIZE_EXCEEDED,
        false
      );
    }

    // メッセージ本体が揃うまで待機
    const totalLength = LENGTH_PREFIX_SIZE + messageLength;
    if (buffer.length < totalLength) {
      return null;
    }

    const text = buffer.subarray(LENGTH_PREFIX_SIZE, totalLength).toString('utf8');
    const remaining = buffer.subarray(totalLength);

    return { text, remaining };
  }

  /**
   * JSON テキストをバイナリフォーマットにエンコード
   *
   * @throws {ClientError} サイズ超過
   */
  encode(text: string): Buffer {
    const body = Buffer.from(text, 'utf8');

    if (body.length > this.maxMessageSize) {
      throw new ClientError(
        `Message size ${body.length} exceeds maximum ${this.maxMessageSize}`,
        ErrorCodes.SIZE_EXCEEDED,
        false
      );
    }

    const lengthBuffer = Buffer.alloc(LENGTH_PREFIX_SIZE);
    lengthBuffer.writeUInt32LE(body.length, 0);

    return Buffer.concat([lengthBuffer, body]);
  }
}
