export type Codename = "xenial" | "bionic";

export type LivefsProject = "ubuntu-core" | "ubuntu-cpc";

/** The part of a build target that addresses a livefs. */
export interface LivefsTarget {
  codename: Codename;
  project: LivefsProject;
}

export interface BuildTarget extends LivefsTarget {
  board: string;
  systemLabel: string;
  architecture: string;
  subArchitecture: string;
}

export interface ArchitectureInfo {
  architecture: string;
  subArchitecture: string;
}

export interface BoardCatalogEntry extends ArchitectureInfo {
  board: string;
  system: string;
}

export interface ImageBuildRequest {
  board: string;
  systemLabel: string;
  snaps: string[];
  authorInfo: Record<string, string>;
  passphrase: string;
  /** Replaces the catalog's architecture for this build. */
  architecture?: string;
}

export interface ImageBuildResult {
  target: BuildTarget;
  buildUrl: string | null;
}
