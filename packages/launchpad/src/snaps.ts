import { createHash } from "node:crypto";
import { createLogger, DEFAULT_ARCHITECTURES } from "@lp-builds/shared";
import type { SnapRecipe } from "@lp-builds/shared";
import { NotFoundError } from "./errors.js";
import type { RequestGateway } from "./gateway.js";
import { buildEntrySchema, processorEntrySchema, snapEntrySchema, type SnapEntry } from "./wire.js";

const STORE_SERIES = "/+snappy-series/16";
const AUTO_BUILD_ARCHIVE = "/ubuntu/+archive/primary";
const AUTO_BUILD_POCKET = "Updates";

/** Recipe name for a git URL, so creating twice from one URL hits the same recipe. */
export function snapIdentityHash(gitUrl: string): string {
  return createHash("md5").update(gitUrl, "utf8").digest("hex");
}

export function toSnapRecipe(entry: SnapEntry): SnapRecipe {
  return {
    storeName: entry.store_name ?? "",
    identityHash: entry.name,
    gitUrl: entry.git_repository_url ?? "",
    autoBuildArchive: entry.auto_build_archive_link,
    autoBuildPocket: entry.auto_build_pocket,
    autoBuildChannels: entry.auto_build_channels,
    processors: null,
    storeSeries: entry.store_series_link,
    links: {
      self: entry.self_link,
      builds: entry.builds_collection_link,
      pendingBuilds: entry.pending_builds_collection_link,
      completedBuilds: entry.completed_builds_collection_link,
      processors: entry.processors_collection_link,
    },
  };
}

export interface SnapManagerOptions {
  gateway: RequestGateway;
  /** Processors new recipes are configured to build for. */
  architectures?: readonly string[];
}

/**
 * SnapManager drives the lifecycle of the snap recipes owned by the
 * authenticated user. Recipes are addressed by their store name; lookups
 * that come back with a different store name count as not found.
 */
export class SnapManager {
  private logger = createLogger("snaps");
  private gateway: RequestGateway;
  private architectures: readonly string[];

  constructor(options: SnapManagerOptions) {
    this.gateway = options.gateway;
    this.architectures = options.architectures ?? DEFAULT_ARCHITECTURES;
  }

  private get owner(): string {
    return `/~${this.gateway.username}`;
  }

  async findByStoreName(storeName: string): Promise<SnapRecipe | null> {
    const entries = await this.gateway.collection("+snaps", snapEntrySchema, {
      "ws.op": "findByStoreName",
      owner: this.owner,
      store_name: storeName,
    });

    // The API may match more loosely than we want; only trust the first hit
    // when its store name is exactly the one asked for.
    const first = entries[0];
    if (first && first.store_name === storeName) {
      return toSnapRecipe(first);
    }
    return null;
  }

  async requireByStoreName(storeName: string): Promise<SnapRecipe> {
    const recipe = await this.findByStoreName(storeName);
    if (!recipe) {
      throw new NotFoundError("Snap recipe", storeName);
    }
    return recipe;
  }

  /**
   * Create the recipe, then authorize it to upload to the store with the
   * given macaroon. When the second step fails the recipe is left in place
   * without upload rights and the error is rethrown.
   */
  async create(storeName: string, gitUrl: string, uploadMacaroon: string): Promise<SnapRecipe> {
    const identityHash = snapIdentityHash(gitUrl);
    const processors = this.architectures.map((arch) => `/+processors/${arch}`);

    await this.gateway.call("+snaps", {
      method: "POST",
      body: {
        "ws.op": "new",
        owner: this.owner,
        name: identityHash,
        store_name: storeName,
        git_repository_url: gitUrl,
        git_path: "HEAD",
        auto_build: "false",
        auto_build_archive: AUTO_BUILD_ARCHIVE,
        auto_build_pocket: AUTO_BUILD_POCKET,
        processors,
        store_series: STORE_SERIES,
        store_upload: "true",
        store_channels: ["edge"],
      },
    });
    this.logger.info(`Created snap recipe ${identityHash} for ${storeName}`);

    const selfLink = this.gateway.url(`~${this.gateway.username}/+snap/${identityHash}`);
    try {
      await this.gateway.call(selfLink, {
        method: "POST",
        body: { "ws.op": "completeAuthorization", root_macaroon: uploadMacaroon },
      });
    } catch (err) {
      this.logger.warn(`Snap recipe ${identityHash} created but store upload is not authorized`);
      throw err;
    }

    return {
      storeName,
      identityHash,
      gitUrl,
      autoBuildArchive: this.gateway.url(AUTO_BUILD_ARCHIVE),
      autoBuildPocket: AUTO_BUILD_POCKET,
      autoBuildChannels: null,
      processors: [...this.architectures],
      storeSeries: this.gateway.url(STORE_SERIES),
      links: {
        self: selfLink,
        builds: `${selfLink}/builds`,
        pendingBuilds: `${selfLink}/pending_builds`,
        completedBuilds: `${selfLink}/completed_builds`,
        processors: `${selfLink}/processors`,
      },
    };
  }

  async listProcessors(recipe: SnapRecipe): Promise<string[]> {
    const processors = await this.gateway.collection(recipe.links.processors, processorEntrySchema);
    return processors.map((p) => p.name);
  }

  /** Request builds for every architecture the recipe is configured with. */
  async triggerBuild(storeName: string): Promise<boolean> {
    const recipe = await this.requireByStoreName(storeName);

    await this.gateway.call(recipe.links.self, {
      method: "POST",
      body: {
        "ws.op": "requestBuilds",
        archive: recipe.autoBuildArchive ?? undefined,
        pocket: recipe.autoBuildPocket ?? undefined,
        channels: recipe.autoBuildChannels ? JSON.stringify(recipe.autoBuildChannels) : undefined,
      },
    });
    this.logger.info(`Requested builds for ${storeName}`);
    return true;
  }

  /**
   * Cancel each pending build in turn. Not atomic: if one cancel fails the
   * earlier ones stay cancelled and the error propagates.
   */
  async cancelPendingBuilds(storeName: string): Promise<boolean> {
    const recipe = await this.requireByStoreName(storeName);
    const pending = await this.gateway.collection(recipe.links.pendingBuilds, buildEntrySchema);

    for (const build of pending) {
      await this.gateway.call(build.self_link, {
        method: "POST",
        body: { "ws.op": "cancel" },
      });
    }
    this.logger.info(`Cancelled ${pending.length} pending build(s) for ${storeName}`);
    return true;
  }

  async delete(storeName: string): Promise<boolean> {
    const recipe = await this.requireByStoreName(storeName);
    await this.gateway.call(recipe.links.self, { method: "DELETE" });
    this.logger.info(`Deleted snap recipe for ${storeName}`);
    return true;
  }

  async isBuilding(storeName: string): Promise<boolean> {
    const recipe = await this.requireByStoreName(storeName);
    const pending = await this.gateway.collection(recipe.links.pendingBuilds, buildEntrySchema);
    return pending.length > 0;
  }
}
