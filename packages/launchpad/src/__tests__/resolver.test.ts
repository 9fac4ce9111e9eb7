import { describe, it, expect } from "vitest";
import type { Codename } from "@lp-builds/shared";
import { BoardResolver, livefsPath } from "../resolver.js";
import { buildCatalog, parseCatalog } from "../catalog.js";
import {
  UnknownBoardSystemCombinationError,
  UnknownCodenameError,
  UnrecognizedSystemLabelError,
} from "../errors.js";

describe("BoardResolver", () => {
  const resolver = new BoardResolver();

  it("resolves a compute module on core16", () => {
    expect(resolver.resolve("cm3", "core16")).toEqual({
      board: "cm3",
      systemLabel: "core16",
      codename: "xenial",
      project: "ubuntu-core",
      architecture: "armhf",
      subArchitecture: "cm3",
    });
  });

  it("resolves a 64-bit classic system to the cpc project", () => {
    expect(resolver.resolve("raspberrypi3", "classic6418.04")).toEqual({
      board: "raspberrypi3",
      systemLabel: "classic6418.04",
      codename: "bionic",
      project: "ubuntu-cpc",
      architecture: "arm64",
      subArchitecture: "raspi3",
    });
  });

  it("keeps an empty sub-architecture for boards without one", () => {
    const target = resolver.resolve("intelnuc", "core18");
    expect(target.architecture).toBe("amd64");
    expect(target.subArchitecture).toBe("");
  });

  it("returns the same target every time", () => {
    expect(resolver.resolve("snapdragon", "core18")).toEqual(resolver.resolve("snapdragon", "core18"));
  });

  it("applies an architecture override", () => {
    const target = resolver.resolve("raspberrypi4", "classic18.04", "arm64");
    expect(target.architecture).toBe("arm64");
    expect(target.subArchitecture).toBe("raspi3");
  });

  it.each(["core", "classic", "16", "core2016", "core16.4", "classic18.04-beta"])(
    "rejects the system label %s",
    (label) => {
      expect(() => resolver.resolve("raspberrypi3", label)).toThrow(UnrecognizedSystemLabelError);
    },
  );

  it("rejects a year with no codename", () => {
    expect(() => resolver.resolve("raspberrypi3", "core20")).toThrow(UnknownCodenameError);
  });

  it("rejects an unknown board", () => {
    expect(() => resolver.resolve("beaglebone", "core18")).toThrow(
      UnknownBoardSystemCombinationError,
    );
  });

  it("rejects a known board with an unsupported system", () => {
    expect(() => resolver.resolve("intelnuc", "classic18.04")).toThrow(
      "Unsupported board/system combination: intelnuc/classic18.04",
    );
  });

  it("resolves the livefs from the system label alone", () => {
    expect(resolver.resolveLivefs("classic18.04")).toEqual({ codename: "bionic", project: "ubuntu-cpc" });
    expect(resolver.resolveLivefs("core16")).toEqual({ codename: "xenial", project: "ubuntu-core" });
  });

  it("uses a substituted catalog and codename table", () => {
    const custom = new BoardResolver({
      catalog: buildCatalog([
        { board: "devboard", system: "core20", architecture: "riscv64", subArchitecture: "" },
      ]),
      codenames: new Map<string, Codename>([["20", "bionic"]]),
    });

    expect(custom.resolve("devboard", "core20").architecture).toBe("riscv64");
    expect(() => custom.resolve("cm3", "core16")).toThrow(UnknownCodenameError);
  });
});

describe("parseCatalog", () => {
  it("defaults a missing sub-architecture to empty", () => {
    const catalog = parseCatalog([{ board: "pc", system: "core18", architecture: "amd64" }]);
    expect(catalog.get("pc/core18")).toEqual({ architecture: "amd64", subArchitecture: "" });
  });

  it("rejects entries without an architecture", () => {
    expect(() => parseCatalog([{ board: "pc", system: "core18" }])).toThrow();
  });
});

describe("livefsPath", () => {
  it("builds the livefs path for the owner", () => {
    expect(livefsPath("builder", { codename: "bionic", project: "ubuntu-cpc" })).toBe(
      "~builder/+livefs/ubuntu/bionic/ubuntu-cpc",
    );
  });

  it("drops every dot from the owner name", () => {
    expect(livefsPath("image.build.bot", { codename: "xenial", project: "ubuntu-core" })).toBe(
      "~imagebuildbot/+livefs/ubuntu/xenial/ubuntu-core",
    );
  });
});
