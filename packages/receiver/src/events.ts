import { z } from "zod";
import { LIVEFS_BUILD_EVENT, SNAP_BUILD_EVENT } from "@lp-builds/shared";

const livefsBuildPayload = z.object({
  action: z.string(),
  livefs_build: z.string(),
  livefs: z.string(),
  status: z.string(),
});

const snapBuildPayload = z.object({
  action: z.string(),
  snap_build: z.string(),
  snap: z.string(),
  status: z.string(),
  store_upload_status: z.string().nullable().default(null),
});

export type BuildNotification =
  | {
      kind: "livefs";
      deliveryId: string | null;
      action: string;
      buildUrl: string;
      livefsUrl: string;
      status: string;
    }
  | {
      kind: "snap";
      deliveryId: string | null;
      action: string;
      buildUrl: string;
      snapUrl: string;
      status: string;
      storeUploadStatus: string | null;
    };

export class UnsupportedEventError extends Error {
  constructor(eventType: string) {
    super(`Unsupported webhook event type: ${eventType}`);
    this.name = "UnsupportedEventError";
  }
}

/** Turn a delivery body into a notification. Throws on unknown or malformed events. */
export function parseNotification(
  eventType: string,
  deliveryId: string | null,
  payload: unknown
): BuildNotification {
  switch (eventType) {
    case LIVEFS_BUILD_EVENT: {
      const p = livefsBuildPayload.parse(payload);
      return {
        kind: "livefs",
        deliveryId,
        action: p.action,
        buildUrl: p.livefs_build,
        livefsUrl: p.livefs,
        status: p.status,
      };
    }
    case SNAP_BUILD_EVENT: {
      const p = snapBuildPayload.parse(payload);
      return {
        kind: "snap",
        deliveryId,
        action: p.action,
        buildUrl: p.snap_build,
        snapUrl: p.snap,
        status: p.status,
        storeUploadStatus: p.store_upload_status,
      };
    }
    default:
      throw new UnsupportedEventError(eventType);
  }
}
