#!/usr/bin/env node
/**
 * xvpn CLI エントリーポイント
 */

import { Command } from 'commander';
import {
  createAlfredCommand,
  createConfigCommand,
  createConnectCommand,
  createDisconnectCommand,
  createLocationsCommand,
  createReplCommand,
  createStatusCommand,
} from './commands';
import { increaseVerbosity, parseInteger } from './session';

const program = new Command();

program
  .name('xvpn')
  .description('Control the ExpressVPN app through its browser helper')
  .version('0.1.0')
  .option('-v, --verbose', 'Verbose logging (repeat for debug output)', increaseVerbosity, 0)
  .option('-q, --quiet', 'Only log errors')
  .option('-t, --timeout <ms>', 'Connect / disconnect timeout in milliseconds', parseInteger)
  .option('--manifest <name>', 'Native messaging helper name')
  .option('-c, --config <path>', 'Configuration file path');

// VPN commands
program.addCommand(createStatusCommand());
program.addCommand(createLocationsCommand());
program.addCommand(createConnectCommand());
program.addCommand(createDisconnectCommand());
program.addCommand(createAlfredCommand());
program.addCommand(createReplCommand());

// Config command
program.addCommand(createConfigCommand());

program.parseAsync().catch((error: unknown) => {
  const verbose = program.opts<{ verbose: number }>().verbose > 0;
  if (error instanceof Error) {
    console.error(verbose && error.stack ? error.stack : `Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exitCode = 1;
});
