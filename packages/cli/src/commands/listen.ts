import { createLogger } from '@lp-builds/shared';
import type { Config } from '@lp-builds/shared';
import { WebhookReceiver, type BuildNotification } from '@lp-builds/receiver';

function describe(notification: BuildNotification): string {
  if (notification.kind === 'snap') {
    const upload = notification.storeUploadStatus ? `, upload ${notification.storeUploadStatus}` : '';
    return `snap build ${notification.buildUrl}: ${notification.status}${upload}`;
  }
  return `image build ${notification.buildUrl}: ${notification.status}`;
}

export async function listenCommand(config: Config): Promise<void> {
  const logger = createLogger('cli');
  const secret = config.receiver.secret;
  if (!secret) {
    throw new Error('receiver.secret must be set to verify deliveries');
  }

  const receiver = new WebhookReceiver({
    port: config.receiver.port,
    hostname: config.receiver.hostname,
    secret,
    onEvent: (notification) => {
      logger.info(describe(notification));
    },
  });
  await receiver.start();

  await new Promise<void>((resolve, reject) => {
    const shutdown = () => {
      logger.info('Shutting down...');
      receiver.stop().then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
