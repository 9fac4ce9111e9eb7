import { createLogger } from '@lp-builds/shared';
import type { Config } from '@lp-builds/shared';
import { createLaunchpad, printJson } from '../context.js';
import { formatTarget } from '../format.js';

export interface BuildImageOptions {
  snap: string[];
  authorName: string;
  authorEmail: string;
  arch?: string;
  passphrase?: string;
  json?: boolean;
}

export async function buildImageCommand(
  config: Config,
  board: string,
  system: string,
  options: BuildImageOptions,
): Promise<void> {
  const logger = createLogger('cli');
  const passphrase = options.passphrase ?? config.images.gpgPassphrase;
  if (!passphrase) {
    throw new Error('A GPG passphrase is required (--passphrase or images.gpgPassphrase)');
  }

  const launchpad = createLaunchpad(config);
  const result = await launchpad.requestImageBuild({
    board,
    systemLabel: system,
    snaps: options.snap,
    authorInfo: { name: options.authorName, email: options.authorEmail },
    passphrase,
    architecture: options.arch,
  });

  if (options.json) {
    printJson(result);
    return;
  }
  logger.info('Image build requested');
  for (const line of formatTarget(result.target)) console.log(line);
  console.log(`Build:             ${result.buildUrl ?? '(no location returned)'}`);
}
