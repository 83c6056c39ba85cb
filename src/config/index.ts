/**
 * Config モジュール
 */

export * from './schema';
export * from './defaults';
export * from './validator';
export * from './config-manager';
