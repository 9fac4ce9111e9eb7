#!/usr/bin/env node
import { Command } from 'commander';
import { createLogger, isLogLevel, setLogLevel } from '@lp-builds/shared';
import type { Config } from '@lp-builds/shared';
import { loadConfig } from './config-loader.js';
import { validateCommand } from './commands/validate.js';
import { resolveCommand } from './commands/resolve.js';
import { buildImageCommand } from './commands/image.js';
import { webhookCommand } from './commands/webhook.js';
import {
  snapBuildCommand,
  snapBuildingCommand,
  snapCancelCommand,
  snapCreateCommand,
  snapDeleteCommand,
  snapFindCommand,
  snapStatusCommand,
} from './commands/snap.js';
import { buildersCommand } from './commands/builders.js';
import { listenCommand } from './commands/listen.js';

interface GlobalOptions {
  config?: string;
  logLevel: string;
}

const logger = createLogger('cli');
const program = new Command();

program
  .name('lp-builds')
  .description('Trigger and monitor snap and Ubuntu image builds on Launchpad')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', 'info');

/**
 * Load the config and run a command, turning any failure into a log line
 * and exit code 1.
 */
function withConfig<A extends unknown[]>(
  action: (config: Config, ...args: A) => void | Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const { config: configPath, logLevel } = program.opts<GlobalOptions>();
    if (isLogLevel(logLevel)) {
      setLogLevel(logLevel);
    }
    try {
      await action(loadConfig(configPath), ...args);
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .command('validate')
  .description('Validate the configuration file')
  .action(() => {
    validateCommand(program.opts<GlobalOptions>().config);
  });

program
  .command('resolve <board> <system>')
  .description('Show the Launchpad coordinates of a board and system')
  .option('-a, --arch <arch>', 'Override the architecture')
  .option('--json', 'Print JSON')
  .action(withConfig((config, board: string, system: string, options: { arch?: string; json?: boolean }) =>
    resolveCommand(config, board, system, options),
  ));

program
  .command('build-image <board> <system>')
  .description('Request an Ubuntu image build')
  .option('-s, --snap <name>', 'Extra snap to include (repeatable)', collect, [])
  .requiredOption('--author-name <name>', 'Name of the person requesting the image')
  .requiredOption('--author-email <email>', 'Email of the person requesting the image')
  .option('-a, --arch <arch>', 'Override the architecture')
  .option('--passphrase <passphrase>', 'Passphrase for the author details')
  .option('--json', 'Print JSON')
  .action(withConfig((config, board: string, system: string, options: {
    snap: string[];
    authorName: string;
    authorEmail: string;
    arch?: string;
    passphrase?: string;
    json?: boolean;
  }) => buildImageCommand(config, board, system, options)));

program
  .command('webhook <system> <deliveryUrl>')
  .description('Register or update the build webhook of a system livefs')
  .option('--secret <secret>', 'Webhook secret (defaults to receiver.secret)')
  .action(withConfig((config, system: string, deliveryUrl: string, options: { secret?: string }) =>
    webhookCommand(config, system, deliveryUrl, options),
  ));

const snap = program.command('snap').description('Manage snap recipes and their builds');

snap
  .command('find <storeName>')
  .description('Show the recipe of a snap')
  .option('--json', 'Print JSON')
  .action(withConfig((config, storeName: string, options: { json?: boolean }) =>
    snapFindCommand(config, storeName, options),
  ));

snap
  .command('create <storeName> <gitUrl>')
  .description('Create a recipe and authorize it to upload to the store')
  .requiredOption('-m, --macaroon <macaroon>', 'Store root macaroon')
  .option('--json', 'Print JSON')
  .action(withConfig((config, storeName: string, gitUrl: string, options: { macaroon: string; json?: boolean }) =>
    snapCreateCommand(config, storeName, gitUrl, options),
  ));

snap
  .command('build <storeName>')
  .description('Request builds for every configured architecture')
  .action(withConfig((config, storeName: string) => snapBuildCommand(config, storeName)));

snap
  .command('cancel <storeName>')
  .description('Cancel all pending builds')
  .action(withConfig((config, storeName: string) => snapCancelCommand(config, storeName)));

snap
  .command('delete <storeName>')
  .description('Delete the recipe')
  .action(withConfig((config, storeName: string) => snapDeleteCommand(config, storeName)));

snap
  .command('building <storeName>')
  .description('Print "building" while builds are pending, else "idle"')
  .option('-r, --retries <count>', 'Retries on server errors', '0')
  .action(withConfig((config, storeName: string, options: { retries?: string }) =>
    snapBuildingCommand(config, storeName, options),
  ));

snap
  .command('status <storeName>')
  .description('Show the latest build of each architecture')
  .option('-r, --retries <count>', 'Retries on server errors', '0')
  .option('--json', 'Print JSON')
  .action(withConfig((config, storeName: string, options: { retries?: string; json?: boolean }) =>
    snapStatusCommand(config, storeName, options),
  ));

program
  .command('builders')
  .description('Show builder queues and estimated waits per architecture')
  .option('-r, --retries <count>', 'Retries on server errors', '0')
  .option('--json', 'Print JSON')
  .action(withConfig((config, options: { retries?: string; json?: boolean }) =>
    buildersCommand(config, options),
  ));

program
  .command('listen')
  .description('Receive build notifications from registered webhooks')
  .action(withConfig((config) => listenCommand(config)));

await program.parseAsync();
