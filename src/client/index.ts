/**
 * Client モジュール
 */

export * from './json';
export * from './status-reducer';
export * from './message-classifier';
export * from './pending-wait';
export * from './xvpn-client';
