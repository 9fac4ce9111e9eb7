import { DEFAULT_ARCHITECTURES, parseDuration } from "@lp-builds/shared";
import type {
  Build,
  BuilderQueueStatus,
  BuildStatusByArchitecture,
} from "@lp-builds/shared";
import type { RequestGateway } from "./gateway.js";
import type { SnapManager } from "./snaps.js";
import {
  buildEntrySchema,
  buildersForQueueSchema,
  buildQueueSizesSchema,
  totalSizeSchema,
  type BuildEntry,
} from "./wire.js";

function toBuild(entry: BuildEntry): Build {
  return {
    selfLink: entry.self_link,
    architectureTag: entry.arch_tag,
    buildState: entry.buildstate,
    storeUploadStatus: entry.store_upload_status,
    dateCreated: entry.date_created,
  };
}

export interface StatusAggregatorOptions {
  gateway: RequestGateway;
  snaps: SnapManager;
  architectures?: readonly string[];
}

/**
 * StatusAggregator reduces snap builds and builder queues to one entry per
 * architecture. Everything is recomputed on each call.
 */
export class StatusAggregator {
  private gateway: RequestGateway;
  private snaps: SnapManager;
  private architectures: readonly string[];

  constructor(options: StatusAggregatorOptions) {
    this.gateway = options.gateway;
    this.snaps = options.snaps;
    this.architectures = options.architectures ?? DEFAULT_ARCHITECTURES;
  }

  /** Pending and completed builds merged, newest first. */
  async recentBuilds(storeName: string, limit = this.architectures.length): Promise<Build[]> {
    const recipe = await this.snaps.requireByStoreName(storeName);
    const params = { "ws.size": limit };

    const pending = await this.gateway.collection(recipe.links.pendingBuilds, buildEntrySchema, params);
    const completed = await this.gateway.collection(recipe.links.completedBuilds, buildEntrySchema, params);

    return [...pending, ...completed]
      .map(toBuild)
      .sort((a, b) => Date.parse(b.dateCreated) - Date.parse(a.dateCreated))
      .slice(0, limit);
  }

  /**
   * State of the most recent build of each architecture. Architectures
   * without a recent build are left out.
   */
  async buildStatusByArchitecture(storeName: string): Promise<BuildStatusByArchitecture> {
    const builds = await this.recentBuilds(storeName);
    const result: BuildStatusByArchitecture = {};

    for (const arch of this.architectures) {
      const latest = builds.find((b) => b.architectureTag === arch);
      if (latest) {
        result[arch] = {
          buildState: latest.buildState,
          storeUploadStatus: latest.storeUploadStatus,
        };
      }
    }
    return result;
  }

  /**
   * Pending virtualized jobs per architecture with the time they would take
   * spread over the builders serving that architecture.
   */
  async builderQueueStatus(): Promise<BuilderQueueStatus> {
    const queues = await this.gateway.json("builders", buildQueueSizesSchema, {
      params: { "ws.op": "getBuildQueueSizes" },
    });

    const result: BuilderQueueStatus = {};
    for (const arch of this.architectures) {
      const builders = await this.gateway.json("builders", buildersForQueueSchema, {
        params: {
          "ws.op": "getBuildersForQueue",
          processor: `/+processors/${arch}`,
          virtualized: "true",
        },
      });
      const totalBuilders = builders.totalSizeLink
        ? await this.gateway.json(builders.totalSizeLink, totalSizeSchema)
        : builders.count;

      const queue = queues.virt[arch];
      if (!queue) {
        result[arch] = { pendingJobs: 0, totalJobsDuration: null, estimatedDuration: null };
        continue;
      }

      const [pendingJobs, duration] = queue;
      const totalJobsDuration = parseDuration(duration);
      result[arch] = {
        pendingJobs,
        totalJobsDuration,
        estimatedDuration:
          totalJobsDuration !== null && totalBuilders > 0 ? totalJobsDuration / totalBuilders : null,
      };
    }
    return result;
  }
}
