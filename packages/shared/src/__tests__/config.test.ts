import { describe, it, expect } from "vitest";
import { parseConfig } from "../types/config.js";

const launchpad = { username: "builder", token: "test-token", secret: "test-secret" };

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({ launchpad });

    expect(config.launchpad.baseUrl).toBe("https://api.launchpad.net/devel/");
    expect(config.snaps.architectures).toEqual(["amd64", "arm64", "armhf", "i386", "ppc64el", "s390x"]);
    expect(config.receiver.port).toBe(8080);
    expect(config.images.gpgPassphrase).toBeUndefined();
  });

  it("adds a trailing slash to the base URL", () => {
    const config = parseConfig({ launchpad: { ...launchpad, baseUrl: "https://api.staging.launchpad.net/devel" } });
    expect(config.launchpad.baseUrl).toBe("https://api.staging.launchpad.net/devel/");
  });

  it("requires credentials", () => {
    expect(() => parseConfig({ launchpad: { username: "builder" } })).toThrow();
  });

  it("rejects an empty architecture list", () => {
    expect(() => parseConfig({ launchpad, snaps: { architectures: [] } })).toThrow();
  });
});
