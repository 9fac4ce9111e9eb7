import type { Config } from '@lp-builds/shared';
import { createLaunchpad } from '../context.js';

export async function webhookCommand(
  config: Config,
  system: string,
  deliveryUrl: string,
  options: { secret?: string },
): Promise<void> {
  const secret = options.secret ?? config.receiver.secret;
  if (!secret) {
    throw new Error('A webhook secret is required (--secret or receiver.secret)');
  }

  const launchpad = createLaunchpad(config);
  const target = launchpad.resolver.resolveLivefs(system);
  const result = await launchpad.webhooks.upsertBuildWebhook(target, deliveryUrl, secret);

  if (result.outcome === 'created') {
    console.log(`Created webhook for ${deliveryUrl} (${target.codename}/${target.project})`);
    if (result.location) console.log(`  ${result.location}`);
  } else {
    console.log(`Updated secret of existing webhook ${result.selfLink}`);
  }
}
