export const LIVEFS_BUILD_EVENT = "livefs:build:0.1";
export const SNAP_BUILD_EVENT = "snap:build:0.1";

export interface Webhook {
  deliveryUrl: string;
  eventTypes: string[];
  active: boolean;
  selfLink: string;
}

export type WebhookResult =
  | { outcome: "created"; location: string | null }
  | { outcome: "updated"; selfLink: string };
