import type { BuildTarget, LivefsTarget, LivefsProject } from "@lp-builds/shared";
import {
  catalogKey,
  DEFAULT_CATALOG,
  DEFAULT_CODENAMES,
  type BoardCatalog,
  type CodenameTable,
} from "./catalog.js";
import {
  UnknownBoardSystemCombinationError,
  UnknownCodenameError,
  UnrecognizedSystemLabelError,
} from "./errors.js";

const SYSTEM_YEAR_PATTERN = /^[^\d]+(?:64)?(\d{2})(\.\d{2})?$/;

export interface ResolverOptions {
  catalog?: BoardCatalog;
  codenames?: CodenameTable;
}

/**
 * Maps a board and system label such as ("raspberrypi3", "classic6418.04")
 * onto the Launchpad coordinates of the image build. Pure: no remote calls.
 */
export class BoardResolver {
  private catalog: BoardCatalog;
  private codenames: CodenameTable;

  constructor(options: ResolverOptions = {}) {
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.codenames = options.codenames ?? DEFAULT_CODENAMES;
  }

  /** "core16" -> "16", "classic6418.04" -> "18" */
  systemYear(systemLabel: string): string {
    const match = SYSTEM_YEAR_PATTERN.exec(systemLabel);
    const year = match?.[1];
    if (!year) {
      throw new UnrecognizedSystemLabelError(systemLabel);
    }
    return year;
  }

  resolveLivefs(systemLabel: string): LivefsTarget {
    const year = this.systemYear(systemLabel);
    const codename = this.codenames.get(year);
    if (!codename) {
      throw new UnknownCodenameError(systemLabel, year);
    }
    return { codename, project: projectFor(systemLabel) };
  }

  resolve(board: string, systemLabel: string, architectureOverride?: string): BuildTarget {
    const livefs = this.resolveLivefs(systemLabel);
    const info = this.catalog.get(catalogKey(board, systemLabel));
    if (!info) {
      throw new UnknownBoardSystemCombinationError(board, systemLabel);
    }

    return {
      board,
      systemLabel,
      codename: livefs.codename,
      project: livefs.project,
      architecture: architectureOverride ?? info.architecture,
      subArchitecture: info.subArchitecture,
    };
  }
}

export function projectFor(systemLabel: string): LivefsProject {
  return systemLabel.startsWith("classic") ? "ubuntu-cpc" : "ubuntu-core";
}

/** Livefs owners are named after the user with every dot removed. */
export function livefsPath(username: string, target: LivefsTarget): string {
  return `~${username.replaceAll(".", "")}/+livefs/ubuntu/${target.codename}/${target.project}`;
}
