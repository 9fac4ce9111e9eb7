import { createLogger, LIVEFS_BUILD_EVENT } from "@lp-builds/shared";
import type { LivefsTarget, Webhook, WebhookResult } from "@lp-builds/shared";
import type { RequestGateway } from "./gateway.js";
import { livefsPath } from "./resolver.js";
import { webhookEntrySchema, type WebhookEntry } from "./wire.js";

function toWebhook(entry: WebhookEntry): Webhook {
  return {
    deliveryUrl: entry.delivery_url,
    eventTypes: entry.event_types,
    active: entry.active,
    selfLink: entry.self_link,
  };
}

/**
 * WebhookManager keeps a single build-notification webhook per delivery URL
 * on a livefs. Registering again with a new secret rotates the secret on the
 * existing webhook instead of creating a second one.
 */
export class WebhookManager {
  private logger = createLogger("webhooks");
  private gateway: RequestGateway;

  constructor(gateway: RequestGateway) {
    this.gateway = gateway;
  }

  async listBuildWebhooks(target: LivefsTarget): Promise<Webhook[]> {
    const path = `${livefsPath(this.gateway.username, target)}/webhooks`;
    const entries = await this.gateway.collection(path, webhookEntrySchema);
    return entries.map(toWebhook);
  }

  async upsertBuildWebhook(
    target: LivefsTarget,
    deliveryUrl: string,
    secret: string,
  ): Promise<WebhookResult> {
    const livefs = livefsPath(this.gateway.username, target);
    const webhooks = await this.listBuildWebhooks(target);

    const existing = webhooks.find(
      (w) => w.deliveryUrl === deliveryUrl && w.eventTypes.includes(LIVEFS_BUILD_EVENT),
    );

    if (existing) {
      await this.gateway.call(existing.selfLink, {
        method: "POST",
        body: { "ws.op": "setSecret", secret },
      });
      this.logger.info(`Updated webhook secret for ${deliveryUrl} on ${livefs}`);
      return { outcome: "updated", selfLink: existing.selfLink };
    }

    const resp = await this.gateway.call(livefs, {
      method: "POST",
      body: {
        "ws.op": "newWebhook",
        delivery_url: deliveryUrl,
        event_types: [LIVEFS_BUILD_EVENT],
        secret,
      },
    });
    this.logger.info(`Created webhook for ${deliveryUrl} on ${livefs}`);
    return { outcome: "created", location: resp.headers.get("location") };
  }
}
