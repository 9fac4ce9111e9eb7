import type { Config } from '@lp-builds/shared';
import { createLaunchpad, parseCount, printJson, withRetries } from '../context.js';
import { formatQueueStatus } from '../format.js';

export async function buildersCommand(
  config: Config,
  options: { retries?: string; json?: boolean },
): Promise<void> {
  const launchpad = createLaunchpad(config);
  const status = await withRetries(
    () => launchpad.status.builderQueueStatus(),
    parseCount(options.retries, 0),
  );

  if (options.json) {
    printJson(status);
    return;
  }
  for (const line of formatQueueStatus(status)) console.log(line);
}
