import { Hono } from "hono";
import { ZodError } from "zod";
import { createLogger } from "@lp-builds/shared";
import { parseNotification, UnsupportedEventError, type BuildNotification } from "./events.js";
import { verifySignature } from "./signature.js";

const logger = createLogger("receiver");

export interface WebhookAppOptions {
  /** The secret the webhook was registered with. */
  secret: string;
  onEvent: (notification: BuildNotification) => void | Promise<void>;
  /** Milliseconds since epoch, reported by /health. */
  startedAt?: number;
}

/**
 * Create the HTTP app that receives Launchpad build notifications.
 *
 *   GET  /health    liveness
 *   POST /webhooks  signed deliveries (livefs and snap build events, pings)
 */
export function createWebhookApp(options: WebhookAppOptions): Hono {
  const app = new Hono();
  const startedAt = options.startedAt ?? Date.now();

  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.debug(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - start}ms`);
  });

  app.get("/health", (c) => c.json({ ok: true, uptimeMs: Date.now() - startedAt }));

  app.post("/webhooks", async (c) => {
    const eventType = c.req.header("x-launchpad-event-type") ?? "";
    const deliveryId = c.req.header("x-launchpad-delivery") ?? null;
    const body = await c.req.text();

    if (!verifySignature(body, c.req.header("x-hub-signature"), options.secret)) {
      logger.warn(`Rejected delivery ${deliveryId ?? "(no id)"}: bad signature`);
      return c.json({ error: "InvalidSignature", message: "Signature does not match" }, 401);
    }

    if (eventType === "ping") {
      return c.json({ ok: true });
    }

    let notification: BuildNotification;
    try {
      notification = parseNotification(eventType, deliveryId, JSON.parse(body));
    } catch (err) {
      if (err instanceof SyntaxError || err instanceof ZodError || err instanceof UnsupportedEventError) {
        const message = err instanceof ZodError ? "Malformed payload" : err.message;
        return c.json({ error: "InvalidRequest", message }, 400);
      }
      throw err;
    }

    await options.onEvent(notification);
    return c.json({ ok: true }, 202);
  });

  app.onError((err, c) => {
    logger.error("Webhook handling failed", err);
    return c.json({ error: "InternalServerError", message: "Failed to handle delivery" }, 500);
  });

  return app;
}
