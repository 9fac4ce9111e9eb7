export interface SnapRecipeLinks {
  self: string;
  builds: string;
  pendingBuilds: string;
  completedBuilds: string;
  processors: string;
}

export interface SnapRecipe {
  storeName: string;
  /** MD5 of the git URL; also the recipe's Launchpad name. */
  identityHash: string;
  gitUrl: string;
  autoBuildArchive: string | null;
  autoBuildPocket: string | null;
  autoBuildChannels: Record<string, string> | null;
  /** Architecture tags, or null when not fetched. */
  processors: string[] | null;
  storeSeries: string | null;
  links: SnapRecipeLinks;
}

export interface Build {
  selfLink: string;
  architectureTag: string;
  buildState: string;
  storeUploadStatus: string | null;
  dateCreated: string;
}

export interface ArchitectureBuildStatus {
  buildState: string;
  storeUploadStatus: string | null;
}

export type BuildStatusByArchitecture = Record<string, ArchitectureBuildStatus>;

/** Durations are in seconds. */
export interface BuilderQueueSnapshot {
  pendingJobs: number;
  totalJobsDuration: number | null;
  estimatedDuration: number | null;
}

export type BuilderQueueStatus = Record<string, BuilderQueueSnapshot>;
