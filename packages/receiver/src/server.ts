import { serve, type ServerType } from "@hono/node-server";
import { createLogger } from "@lp-builds/shared";
import type { Hono } from "hono";
import { createWebhookApp } from "./app.js";
import type { BuildNotification } from "./events.js";

const logger = createLogger("receiver");

export interface WebhookReceiverConfig {
  port: number;
  hostname?: string;
  secret: string;
  onEvent: (notification: BuildNotification) => void | Promise<void>;
}

/**
 * WebhookReceiver serves the webhook app over HTTP until stopped.
 */
export class WebhookReceiver {
  private app: Hono;
  private config: WebhookReceiverConfig;
  private server: ServerType | null = null;

  constructor(config: WebhookReceiverConfig) {
    this.config = config;
    this.app = createWebhookApp({ secret: config.secret, onEvent: config.onEvent });
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.server = serve(
        {
          fetch: this.app.fetch,
          port: this.config.port,
          hostname: this.config.hostname,
        },
        (info) => {
          logger.info(`Receiving webhooks on ${info.address}:${info.port}`);
          resolve();
        }
      );
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          logger.error("Error stopping receiver", err);
          reject(err);
        } else {
          logger.info("Receiver stopped");
          this.server = null;
          resolve();
        }
      });
    });
  }
}
