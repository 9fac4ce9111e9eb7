export { createWebhookApp, type WebhookAppOptions } from "./app.js";
export { WebhookReceiver, type WebhookReceiverConfig } from "./server.js";
export { parseNotification, UnsupportedEventError, type BuildNotification } from "./events.js";
export { signPayload, verifySignature } from "./signature.js";
