/**
 * Status CLI コマンド
 */

import { Command } from 'commander';
import { withSession } from '../session';
import { formatStatus } from '../format';

/**
 * Status コマンドを作成
 */
export function createStatusCommand(): Command {
  const status = new Command('status');
  status.description('Show VPN connection status');

  status
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }, command: Command) => {
      await withSession(command, async ({ client }) => {
        if (options.json) {
          console.log(
            JSON.stringify(
              {
                connectedToHelper: client.isConnectedToHelper,
                appVersion: client.appVersion,
                status: client.latestStatus,
              },
              null,
              2
            )
          );
          return;
        }

        for (const line of formatStatus(client.latestStatus, client.appVersion)) {
          console.log(line);
        }
      });
    });

  return status;
}
