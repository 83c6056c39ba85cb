/**
 * ヘルパーから受け取った JSON 値の読み取りヘルパー
 */

import { ClientError, ErrorCodes } from '../types';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON テキストをオブジェクトとしてパース
 *
 * @throws {ClientError} 不正な JSON、またはオブジェクト以外
 */
export function parseObject(text: string): JsonObject {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ClientError(
      `Failed to parse JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      ErrorCodes.PARSE_ERROR,
      true,
      error instanceof Error ? error : undefined
    );
  }

  if (!isRecord(value)) {
    throw new ClientError('Message is not a JSON object', ErrorCodes.PARSE_ERROR, true);
  }
  return value;
}

/**
 * 必須のオブジェクトフィールドを取得
 */
export function requireObject(obj: JsonObject, key: string, context: string): JsonObject {
  const value = obj[key];
  if (!isRecord(value)) {
    throw new ClientError(`Missing object '${key}' in ${context}`, ErrorCodes.PARSE_ERROR, true);
  }
  return value;
}

export function readString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' ? value : null;
}

export function readBoolean(obj: JsonObject, key: string): boolean {
  return obj[key] === true;
}

export function readNumber(obj: JsonObject, key: string): number | null {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readStringArray(obj: JsonObject, key: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * 日時フィールド (ISO 文字列 / epoch) を Date に変換
 */
export function readDate(obj: JsonObject, key: string): Date | null {
  const value = obj[key];
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
