import { z } from "zod";
import type { ArchitectureInfo, BoardCatalogEntry, Codename } from "@lp-builds/shared";

export type BoardCatalog = ReadonlyMap<string, ArchitectureInfo>;

export type CodenameTable = ReadonlyMap<string, Codename>;

export function catalogKey(board: string, system: string): string {
  return `${board}/${system}`;
}

export const DEFAULT_CODENAMES: CodenameTable = new Map<string, Codename>([
  ["16", "xenial"],
  ["18", "bionic"],
]);

const DEFAULT_ENTRIES: BoardCatalogEntry[] = [
  { board: "raspberrypi2", system: "core16", architecture: "armhf", subArchitecture: "raspi2" },
  { board: "raspberrypi2", system: "core18", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi2", system: "classic16.04", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi2", system: "classic18.04", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi3", system: "core16", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi3", system: "core18", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi3", system: "classic16.04", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi3", system: "classic18.04", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi3", system: "classic6418.04", architecture: "arm64", subArchitecture: "raspi3" },
  { board: "raspberrypi4", system: "core18", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi4", system: "classic18.04", architecture: "armhf", subArchitecture: "raspi3" },
  { board: "raspberrypi4", system: "classic6418.04", architecture: "arm64", subArchitecture: "raspi3" },
  { board: "intelnuc", system: "core16", architecture: "amd64", subArchitecture: "" },
  { board: "intelnuc", system: "core18", architecture: "amd64", subArchitecture: "" },
  { board: "snapdragon", system: "core16", architecture: "arm64", subArchitecture: "snapdragon" },
  { board: "snapdragon", system: "core18", architecture: "arm64", subArchitecture: "snapdragon" },
  { board: "cm3", system: "core16", architecture: "armhf", subArchitecture: "cm3" },
  { board: "cm3", system: "core18", architecture: "armhf", subArchitecture: "raspi3" },
];

export function buildCatalog(entries: Iterable<BoardCatalogEntry>): BoardCatalog {
  const catalog = new Map<string, ArchitectureInfo>();
  for (const { board, system, architecture, subArchitecture } of entries) {
    catalog.set(catalogKey(board, system), { architecture, subArchitecture });
  }
  return catalog;
}

export const DEFAULT_CATALOG: BoardCatalog = buildCatalog(DEFAULT_ENTRIES);

export const catalogEntriesSchema = z.array(
  z.object({
    board: z.string().min(1),
    system: z.string().min(1),
    architecture: z.string().min(1),
    subArchitecture: z.string().default(""),
  }),
);

/** Build a catalog from untrusted data, e.g. a parsed JSON file. */
export function parseCatalog(raw: unknown): BoardCatalog {
  return buildCatalog(catalogEntriesSchema.parse(raw));
}
