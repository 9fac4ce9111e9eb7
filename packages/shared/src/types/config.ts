import { z } from "zod";

export const DEFAULT_BASE_URL = "https://api.launchpad.net/devel/";

export const DEFAULT_ARCHITECTURES = [
  "amd64",
  "arm64",
  "armhf",
  "i386",
  "ppc64el",
  "s390x",
] as const;

export const configSchema = z.object({
  launchpad: z.object({
    baseUrl: z
      .string()
      .url()
      .default(DEFAULT_BASE_URL)
      .transform((url) => (url.endsWith("/") ? url : `${url}/`)),
    username: z.string().min(1),
    consumerKey: z.string().min(1).optional(),
    token: z.string().min(1),
    secret: z.string().min(1),
  }),
  snaps: z
    .object({
      architectures: z
        .array(z.string().min(1))
        .min(1)
        .default([...DEFAULT_ARCHITECTURES]),
    })
    .default({}),
  images: z
    .object({
      gpgPassphrase: z.string().min(1).optional(),
    })
    .default({}),
  receiver: z
    .object({
      port: z.number().int().min(1).max(65535).default(8080),
      hostname: z.string().optional(),
      secret: z.string().min(1).optional(),
    })
    .default({}),
  catalogPath: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}
