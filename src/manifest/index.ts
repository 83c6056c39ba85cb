/**
 * Manifest モジュール
 */

export * from './manifest-locator';
