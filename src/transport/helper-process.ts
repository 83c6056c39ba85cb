/**
 * Helper Process
 *
 * マニフェストに記載されたヘルパーを子プロセスとして起動する
 */

import { spawn, ChildProcess } from 'child_process';
import { ClientError, ErrorCodes, HelperProcess } from '../types';

/**
 * ChildProcess を HelperProcess として扱うラッパー
 */
class ChildHelperProcess implements HelperProcess {
  readonly stdin: NodeJS.WritableStream;
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream | null;

  constructor(private readonly child: ChildProcess) {
    if (!child.stdin || !child.stdout) {
      throw new ClientError(
        'Helper process was started without stdio pipes',
        ErrorCodes.SPAWN_FAILED,
        false
      );
    }
    this.stdin = child.stdin;
    this.stdout = child.stdout;
    this.stderr = child.stderr;
  }

  onExit(handler: (code: number | null) => void): void {
    // stdio がすべて閉じた後に発火するので、受信データは取りこぼさない
    this.child.on('close', (code) => handler(code));
  }

  onError(handler: (error: Error) => void): void {
    this.child.on('error', handler);
    // 終了したヘルパーへの書き込み (EPIPE) もここに流す
    this.stdin.on('error', handler);
  }

  kill(): void {
    this.child.kill();
  }
}

/**
 * ヘルパーを起動
 *
 * 引数はシェルを介さず配列で渡す
 */
export function spawnHelper(command: string, args: string[]): HelperProcess {
  const isWindows = process.platform === 'win32';
  const isBatchFile = command.toLowerCase().endsWith('.bat');

  // Windows の .bat ファイルは cmd.exe 経由で実行
  const child =
    isWindows && isBatchFile
      ? spawn('cmd.exe', ['/c', command, ...args], {
          stdio: ['pipe', 'pipe', 'pipe'],
          windowsHide: true,
        })
      : spawn(command, args, {
          stdio: ['pipe', 'pipe', 'pipe'],
          windowsHide: true,
        });

  return new ChildHelperProcess(child);
}
