/**
 * 設定バリデーション
 */

import { ClientError, ErrorCodes } from '../types';
import { LogLevels } from '../logger';
import { PartialXvpnConfig } from './schema';

/**
 * バリデーションエラー
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * バリデーション結果
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 数値項目のグループを検証
 */
function validateNumbers(
  group: string,
  value: unknown,
  keys: string[],
  min: number,
  errors: ValidationError[]
): void {
  if (value === undefined) {
    return;
  }
  if (!isObject(value)) {
    errors.push({ path: group, message: 'Must be an object' });
    return;
  }
  for (const key of keys) {
    const v = value[key];
    if (v !== undefined && (typeof v !== 'number' || !Number.isFinite(v) || v < min)) {
      errors.push({
        path: `${group}.${key}`,
        message: min > 0 ? `Must be a number >= ${min}` : 'Must be a non-negative number',
      });
    }
  }
}

/**
 * 設定をバリデート
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isObject(config)) {
    return { valid: false, errors: [{ path: '', message: 'Config must be an object' }] };
  }

  // manifestName
  if (config.manifestName !== undefined) {
    if (typeof config.manifestName !== 'string' || config.manifestName === '') {
      errors.push({ path: 'manifestName', message: 'Must be a non-empty string' });
    }
  }

  // maxMessageSize
  if (config.maxMessageSize !== undefined) {
    const size = config.maxMessageSize;
    if (typeof size !== 'number' || !Number.isInteger(size) || size < 1 || size > 0xffffffff) {
      errors.push({ path: 'maxMessageSize', message: 'Must be an integer between 1 and 4294967295' });
    }
  }

  validateNumbers('timeouts', config.timeouts, ['response', 'handshake', 'connect', 'disconnect'], 0, errors);
  validateNumbers('polling', config.polling, ['dispatch', 'connect', 'disconnect'], 1, errors);

  // log
  if (config.log !== undefined) {
    if (!isObject(config.log)) {
      errors.push({ path: 'log', message: 'Must be an object' });
    } else {
      const level = config.log.level;
      if (level !== undefined && !LogLevels.some((l) => l === level)) {
        errors.push({ path: 'log.level', message: `Must be one of ${LogLevels.join(', ')}` });
      }
      const dir = config.log.dir;
      if (dir !== undefined && typeof dir !== 'string') {
        errors.push({ path: 'log.dir', message: 'Must be a string' });
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * バリデーションエラーを ClientError に変換
 */
export function toConfigError(result: ValidationResult): ClientError {
  const messages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
  return new ClientError(`Invalid configuration: ${messages}`, ErrorCodes.CONFIG_INVALID, true);
}

/**
 * 設定をバリデートし、エラーがあればスロー
 */
export function assertValidConfig(config: unknown): asserts config is PartialXvpnConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    throw toConfigError(result);
  }
}
