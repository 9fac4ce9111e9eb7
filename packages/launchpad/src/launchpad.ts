import { DEFAULT_ARCHITECTURES, DEFAULT_BASE_URL } from "@lp-builds/shared";
import type { Config, ImageBuildRequest, ImageBuildResult } from "@lp-builds/shared";
import { createAuthContext, type Credentials } from "./auth.js";
import type { BoardCatalog, CodenameTable } from "./catalog.js";
import type { SymmetricEncryptor } from "./encryption.js";
import { LaunchpadError } from "./errors.js";
import { RequestGateway, type FetchLike } from "./gateway.js";
import { ImageBuilder } from "./images.js";
import { BoardResolver } from "./resolver.js";
import { SnapManager } from "./snaps.js";
import { StatusAggregator } from "./status.js";
import { WebhookManager } from "./webhooks.js";

export interface LaunchpadOptions {
  credentials: Credentials;
  baseUrl?: string;
  fetch?: FetchLike;
  /** Needed only for image builds. */
  encryptor?: SymmetricEncryptor;
  catalog?: BoardCatalog;
  codenames?: CodenameTable;
  architectures?: readonly string[];
}

/**
 * Launchpad wires the build-orchestration components around one signed
 * request gateway.
 */
export class Launchpad {
  readonly gateway: RequestGateway;
  readonly resolver: BoardResolver;
  readonly webhooks: WebhookManager;
  readonly snaps: SnapManager;
  readonly status: StatusAggregator;
  private images: ImageBuilder | null;

  constructor(options: LaunchpadOptions) {
    const architectures = options.architectures ?? DEFAULT_ARCHITECTURES;

    this.gateway = new RequestGateway({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      auth: createAuthContext(options.credentials),
      fetch: options.fetch,
    });
    this.resolver = new BoardResolver({
      catalog: options.catalog,
      codenames: options.codenames,
    });
    this.webhooks = new WebhookManager(this.gateway);
    this.snaps = new SnapManager({ gateway: this.gateway, architectures });
    this.status = new StatusAggregator({
      gateway: this.gateway,
      snaps: this.snaps,
      architectures,
    });
    this.images = options.encryptor
      ? new ImageBuilder({
          gateway: this.gateway,
          resolver: this.resolver,
          encryptor: options.encryptor,
        })
      : null;
  }

  static fromConfig(
    config: Config,
    extras: Omit<LaunchpadOptions, "credentials" | "baseUrl" | "architectures"> = {},
  ): Launchpad {
    return new Launchpad({
      ...extras,
      credentials: config.launchpad,
      baseUrl: config.launchpad.baseUrl,
      architectures: config.snaps.architectures,
    });
  }

  async requestImageBuild(request: ImageBuildRequest): Promise<ImageBuildResult> {
    if (!this.images) {
      throw new LaunchpadError("Image builds need an encryptor for the author details");
    }
    return this.images.requestImageBuild(request);
  }
}
