/**
 * Locations CLI コマンド
 */

import { Command } from 'commander';
import { withSession } from '../session';
import { formatLocations } from '../format';

/**
 * Locations コマンドを作成
 */
export function createLocationsCommand(): Command {
  const locations = new Command('locations');
  locations.description('List available VPN locations');

  locations.action(async (_options: unknown, command: Command) => {
    await withSession(command, async ({ client }) => {
      await client.refreshLocations();
      for (const line of formatLocations(client.locations ?? [])) {
        console.log(line);
      }
    });
  });

  return locations;
}
