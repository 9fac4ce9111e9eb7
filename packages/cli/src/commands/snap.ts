import type { Config } from '@lp-builds/shared';
import { createLaunchpad, parseCount, printJson, withRetries } from '../context.js';
import { formatBuildStatus, formatRecipe } from '../format.js';

export async function snapFindCommand(config: Config, storeName: string, options: { json?: boolean }): Promise<void> {
  const launchpad = createLaunchpad(config);
  const found = await launchpad.snaps.findByStoreName(storeName);
  const recipe = found ? { ...found, processors: await launchpad.snaps.listProcessors(found) } : null;

  if (options.json) {
    printJson(recipe);
    return;
  }
  if (!recipe) {
    console.log(`No snap recipe for ${storeName}`);
    return;
  }
  for (const line of formatRecipe(recipe)) console.log(line);
}

export async function snapCreateCommand(
  config: Config,
  storeName: string,
  gitUrl: string,
  options: { macaroon: string; json?: boolean },
): Promise<void> {
  const launchpad = createLaunchpad(config);
  const recipe = await launchpad.snaps.create(storeName, gitUrl, options.macaroon);

  if (options.json) {
    printJson(recipe);
    return;
  }
  console.log('Snap recipe created and authorized for store uploads');
  for (const line of formatRecipe(recipe)) console.log(line);
}

export async function snapBuildCommand(config: Config, storeName: string): Promise<void> {
  await createLaunchpad(config).snaps.triggerBuild(storeName);
  console.log(`Builds requested for ${storeName}`);
}

export async function snapCancelCommand(config: Config, storeName: string): Promise<void> {
  await createLaunchpad(config).snaps.cancelPendingBuilds(storeName);
  console.log(`Pending builds cancelled for ${storeName}`);
}

export async function snapDeleteCommand(config: Config, storeName: string): Promise<void> {
  await createLaunchpad(config).snaps.delete(storeName);
  console.log(`Snap recipe deleted for ${storeName}`);
}

export async function snapBuildingCommand(
  config: Config,
  storeName: string,
  options: { retries?: string },
): Promise<void> {
  const launchpad = createLaunchpad(config);
  const building = await withRetries(
    () => launchpad.snaps.isBuilding(storeName),
    parseCount(options.retries, 0),
  );
  console.log(building ? 'building' : 'idle');
}

export async function snapStatusCommand(
  config: Config,
  storeName: string,
  options: { retries?: string; json?: boolean },
): Promise<void> {
  const launchpad = createLaunchpad(config);
  const status = await withRetries(
    () => launchpad.status.buildStatusByArchitecture(storeName),
    parseCount(options.retries, 0),
  );

  if (options.json) {
    printJson(status);
    return;
  }
  for (const line of formatBuildStatus(status)) console.log(line);
}
