/**
 * REPL CLI コマンド
 *
 * 標準入力の各行をそのままヘルパーに送り、受信したメッセージを表示する
 */

import * as readline from 'readline';
import { Command } from 'commander';
import { withSession } from '../session';

/**
 * REPL コマンドを作成
 */
export function createReplCommand(): Command {
  const repl = new Command('repl');
  repl.description('Send raw JSON messages to the helper and print every reply');

  repl.action(async (_options: unknown, command: Command) => {
    await withSession(command, async ({ client, logger }) => {
      client.on('message', (text) => {
        console.log(text);
      });

      const rl = readline.createInterface({ input: process.stdin, terminal: false });
      for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;
        try {
          await client.send(trimmed);
        } catch (error) {
          logger.error('Failed to send message', { text: trimmed }, error instanceof Error ? error : undefined);
        }
      }
    });
  });

  return repl;
}
