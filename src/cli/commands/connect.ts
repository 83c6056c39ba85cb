/**
 * Connect / Disconnect CLI コマンド
 */

import { Command } from 'commander';
import { withSession } from '../session';
import { resolveConnectTarget } from '../location-query';

/**
 * Connect コマンドを作成
 */
export function createConnectCommand(): Command {
  const connect = new Command('connect');
  connect
    .description('Connect to a location (default location when omitted)')
    .argument('[location]', 'country, country code, location id or part of a location name');

  connect.action(async (location: string | undefined, _options: unknown, command: Command) => {
    await withSession(command, async (session) => {
      const { client, logger } = session;
      await client.refreshLocations();

      const target = resolveConnectTarget(location, client.locations ?? [], client.defaultLocationId);
      logger.info(target.description);

      await client.connect(target.args, session.connectTimeout);
      await client.refreshStatus();
      console.log(`Connected to '${client.latestStatus.current_location?.name ?? 'unknown'}'`);
    });
  });

  return connect;
}

/**
 * Disconnect コマンドを作成
 */
export function createDisconnectCommand(): Command {
  const disconnect = new Command('disconnect');
  disconnect.description('Disconnect from the VPN');

  disconnect.action(async (_options: unknown, command: Command) => {
    await withSession(command, async (session) => {
      await session.client.disconnect(session.disconnectTimeout);
      console.log('Disconnected');
    });
  });

  return disconnect;
}
