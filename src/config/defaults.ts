/**
 * デフォルト設定
 */

import { NativeMessagingConstants } from '../types';
import { PartialXvpnConfig, XvpnConfig } from './schema';

/**
 * デフォルト設定値
 */
export const DEFAULT_CONFIG: XvpnConfig = {
  maxMessageSize: NativeMessagingConstants.MAX_MESSAGE_SIZE,
  timeouts: {
    response: 500,
    handshake: 1000,
    connect: 10000,
    disconnect: 10000,
  },
  polling: {
    dispatch: 20,
    connect: 20,
    disconnect: 200,
  },
  log: {
    level: 'warn',
  },
};

/**
 * 設定をマージ（部分設定を完全な設定に）
 */
export function mergeConfig(base: XvpnConfig, partial: PartialXvpnConfig): XvpnConfig {
  return {
    manifestName: partial.manifestName ?? base.manifestName,
    maxMessageSize: partial.maxMessageSize ?? base.maxMessageSize,
    timeouts: {
      response: partial.timeouts?.response ?? base.timeouts.response,
      handshake: partial.timeouts?.handshake ?? base.timeouts.handshake,
      connect: partial.timeouts?.connect ?? base.timeouts.connect,
      disconnect: partial.timeouts?.disconnect ?? base.timeouts.disconnect,
    },
    polling: {
      dispatch: partial.polling?.dispatch ?? base.polling.dispatch,
      connect: partial.polling?.connect ?? base.polling.connect,
      disconnect: partial.polling?.disconnect ?? base.polling.disconnect,
    },
    log: {
      level: partial.log?.level ?? base.log.level,
      dir: partial.log?.dir ?? base.log.dir,
    },
  };
}
