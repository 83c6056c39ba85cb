/**
 * CLI コマンドエクスポート
 */

export { createStatusCommand } from './status';
export { createLocationsCommand } from './locations';
export { createConnectCommand, createDisconnectCommand } from './connect';
export { createAlfredCommand } from './alfred';
export { createReplCommand } from './repl';
export { createConfigCommand } from './config';
