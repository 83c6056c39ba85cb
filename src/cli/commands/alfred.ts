/**
 * Alfred CLI コマンド
 */

import { Command } from 'commander';
import { withSession } from '../session';
import { buildAlfredItems, renderAlfred } from '../alfred';

/**
 * Alfred コマンドを作成
 */
export function createAlfredCommand(): Command {
  const alfred = new Command('alfred');
  alfred
    .description('Print Alfred script filter items')
    .option('--locations', 'List every location instead of the main menu');

  alfred.action(async (options: { locations?: boolean }, command: Command) => {
    await withSession(command, async ({ client }) => {
      await client.refreshLocations();

      const items = buildAlfredItems(
        {
          state: client.latestStatus.state,
          currentLocation: client.latestStatus.current_location,
          locations: client.locations ?? [],
          recentLocationIds: client.recentLocationIds,
          defaultLocationId: client.defaultLocationId,
        },
        options.locations === true
      );
      console.log(renderAlfred(items));
    });
  });

  return alfred;
}
