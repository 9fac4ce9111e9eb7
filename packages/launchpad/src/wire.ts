import { z } from "zod";

// Launchpad JSON representations, reduced to the fields this client reads.

export const snapEntrySchema = z.object({
  self_link: z.string(),
  name: z.string(),
  store_name: z.string().nullable(),
  git_repository_url: z.string().nullable().default(null),
  auto_build_archive_link: z.string().nullable().default(null),
  auto_build_pocket: z.string().nullable().default(null),
  auto_build_channels: z.record(z.string()).nullable().default(null),
  store_series_link: z.string().nullable().default(null),
  builds_collection_link: z.string(),
  pending_builds_collection_link: z.string(),
  completed_builds_collection_link: z.string(),
  processors_collection_link: z.string(),
});

export type SnapEntry = z.infer<typeof snapEntrySchema>;

export const buildEntrySchema = z.object({
  self_link: z.string(),
  arch_tag: z.string(),
  buildstate: z.string(),
  store_upload_status: z.string().nullable().default(null),
  date_created: z.string(),
});

export type BuildEntry = z.infer<typeof buildEntrySchema>;

export const webhookEntrySchema = z.object({
  self_link: z.string(),
  delivery_url: z.string(),
  event_types: z.array(z.string()).default([]),
  active: z.boolean().default(true),
});

export type WebhookEntry = z.infer<typeof webhookEntrySchema>;

export const processorEntrySchema = z.object({
  name: z.string(),
});

const queueSizesSchema = z.record(z.tuple([z.number().int().min(0), z.string().nullable()]));

export const buildQueueSizesSchema = z.object({
  virt: queueSizesSchema.default({}),
  nonvirt: queueSizesSchema.default({}),
});

export interface BuildersForQueue {
  count: number;
  /** Set when the count is not inline and has to be fetched from this link. */
  totalSizeLink: string | null;
}

/**
 * getBuildersForQueue answers with a plain list or a collection envelope.
 * Large envelopes carry `total_size_link` instead of `total_size`, and their
 * `entries` then hold only the first page.
 */
export const buildersForQueueSchema: z.ZodType<BuildersForQueue, z.ZodTypeDef, unknown> = z.union([
  z.array(z.unknown()).transform((builders) => ({ count: builders.length, totalSizeLink: null })),
  z
    .object({
      total_size: z.number().int().optional(),
      total_size_link: z.string().optional(),
      entries: z.array(z.unknown()).default([]),
    })
    .transform((envelope) => ({
      count: envelope.total_size ?? envelope.entries.length,
      totalSizeLink: envelope.total_size === undefined ? (envelope.total_size_link ?? null) : null,
    })),
]);

export const totalSizeSchema = z.number().int().min(0);
