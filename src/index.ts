/**
 * xvpn - エントリーポイント
 * ExpressVPN ブラウザ拡張用ヘルパーと Native Messaging で通信するクライアント
 */

// Types
export * from './types';

// Transport (Native Messaging)
export * from './transport';

// Client
export * from './client';

// Manifest
export * from './manifest';

// Config
export * from './config';

// Logger
export * from './logger';
