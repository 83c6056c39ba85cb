/**
 * Transport モジュール
 */

export * from './message-parser';
export * from './helper-process';
export * from './native-messaging-client';
