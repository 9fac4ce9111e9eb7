import { describe, it, expect, beforeEach } from "vitest";
import { FakeLaunchpad, type FakeSnap } from "./fake-launchpad.js";
import { createTestLaunchpad } from "./helpers.js";
import { NotFoundError, RemoteRequestError } from "../errors.js";
import type { Launchpad } from "../launchpad.js";

const ARCHITECTURES = ["amd64", "arm64", "armhf", "i386", "ppc64el", "s390x"];

function at(minute: number): string {
  return new Date(Date.UTC(2024, 4, 1, 12, minute)).toISOString();
}

describe("StatusAggregator", () => {
  let fake: FakeLaunchpad;
  let lp: Launchpad;

  beforeEach(() => {
    fake = new FakeLaunchpad();
    lp = createTestLaunchpad(fake);
  });

  describe("buildStatusByArchitecture", () => {
    let snap: FakeSnap;

    beforeEach(() => {
      snap = fake.addSnap({ name: "abc123", store_name: "toto", processors: ARCHITECTURES });
    });

    it("reports the latest build of each architecture", async () => {
      ARCHITECTURES.forEach((arch, i) => {
        fake.addBuild(snap, "completed", {
          arch_tag: arch,
          buildstate: "Successfully built",
          store_upload_status: "Uploaded",
          date_created: at(10 + i),
        });
      });
      // Older than everything above, for an architecture already covered.
      fake.addBuild(snap, "completed", {
        arch_tag: "amd64",
        buildstate: "Failed to build",
        store_upload_status: "Unscheduled",
        date_created: at(1),
      });

      const status = await lp.status.buildStatusByArchitecture("toto");

      expect(Object.keys(status)).toHaveLength(6);
      for (const arch of ARCHITECTURES) {
        expect(status[arch]).toEqual({ buildState: "Successfully built", storeUploadStatus: "Uploaded" });
      }
    });

    it("prefers a pending build over an older completed one", async () => {
      fake.addBuild(snap, "completed", {
        arch_tag: "amd64",
        buildstate: "Successfully built",
        store_upload_status: "Uploaded",
        date_created: at(1),
      });
      fake.addBuild(snap, "pending", {
        arch_tag: "amd64",
        buildstate: "Currently building",
        store_upload_status: null,
        date_created: at(5),
      });

      expect(await lp.status.buildStatusByArchitecture("toto")).toEqual({
        amd64: { buildState: "Currently building", storeUploadStatus: null },
      });
    });

    it("leaves out architectures without a recent build and unknown tags", async () => {
      fake.addBuild(snap, "completed", {
        arch_tag: "armhf",
        buildstate: "Failed to build",
        store_upload_status: "Unscheduled",
        date_created: at(3),
      });
      fake.addBuild(snap, "completed", {
        arch_tag: "riscv64",
        buildstate: "Successfully built",
        store_upload_status: "Uploaded",
        date_created: at(4),
      });

      expect(await lp.status.buildStatusByArchitecture("toto")).toEqual({
        armhf: { buildState: "Failed to build", storeUploadStatus: "Unscheduled" },
      });
    });

    it("returns an empty map for a recipe that never built", async () => {
      expect(await lp.status.buildStatusByArchitecture("toto")).toEqual({});
    });

    it("asks each collection for as many builds as there are architectures", async () => {
      await lp.status.buildStatusByArchitecture("toto");

      const collections = fake.requestsFor("GET", /_builds$/);
      expect(collections.map((r) => [r.path, r.query["ws.size"]])).toEqual([
        ["~builder/+snap/abc123/pending_builds", "6"],
        ["~builder/+snap/abc123/completed_builds", "6"],
      ]);
    });

    it("fails with NotFoundError for an unknown store name", async () => {
      await expect(lp.status.buildStatusByArchitecture("missing")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("builderQueueStatus", () => {
    beforeEach(() => {
      fake.queueSizes = {
        virt: {
          amd64: [3, "0:30:00"],
          arm64: [1, "1 day, 0:00:00"],
          armhf: [2, "0:10:00"],
        },
        nonvirt: { amd64: [9, "5:00:00"] },
      };
      fake.builders = { amd64: 3, arm64: 0, armhf: 4, i386: 2 };
    });

    it("spreads the queued work over the builders of each architecture", async () => {
      expect(await lp.status.builderQueueStatus()).toEqual({
        amd64: { pendingJobs: 3, totalJobsDuration: 1800, estimatedDuration: 600 },
        arm64: { pendingJobs: 1, totalJobsDuration: 86400, estimatedDuration: null },
        armhf: { pendingJobs: 2, totalJobsDuration: 600, estimatedDuration: 150 },
        i386: { pendingJobs: 0, totalJobsDuration: null, estimatedDuration: null },
        ppc64el: { pendingJobs: 0, totalJobsDuration: null, estimatedDuration: null },
        s390x: { pendingJobs: 0, totalJobsDuration: null, estimatedDuration: null },
      });
    });

    it("fetches queue sizes once, then builders per architecture in order", async () => {
      await lp.status.builderQueueStatus();

      expect(fake.requests.map((r) => r.query["ws.op"])).toEqual([
        "getBuildQueueSizes",
        ...ARCHITECTURES.map(() => "getBuildersForQueue"),
      ]);
      expect(fake.requests.slice(1).map((r) => r.query.processor)).toEqual(
        ARCHITECTURES.map((arch) => `/+processors/${arch}`),
      );
      expect(fake.requests[1]?.query.virtualized).toBe("true");
    });

    it("only covers the configured architectures", async () => {
      const narrow = createTestLaunchpad(fake, { architectures: ["armhf"] });
      expect(await narrow.status.builderQueueStatus()).toEqual({
        armhf: { pendingJobs: 2, totalJobsDuration: 600, estimatedDuration: 150 },
      });
    });

    it("follows total_size_link when the builder list is paged", async () => {
      fake.buildersPageSize = 1;
      const narrow = createTestLaunchpad(fake, { architectures: ["armhf"] });

      expect(await narrow.status.builderQueueStatus()).toEqual({
        armhf: { pendingJobs: 2, totalJobsDuration: 600, estimatedDuration: 150 },
      });
      expect(fake.requests.map((r) => r.query["ws.show"] ?? null)).toEqual([null, null, "total_size"]);
      expect(fake.requests[2]?.query.processor).toBe("/+processors/armhf");
    });

    it("propagates a failed builders query without further calls", async () => {
      fake.fail("GET", /^builders$/, 502, "Bad gateway");
      await expect(lp.status.builderQueueStatus()).rejects.toBeInstanceOf(RemoteRequestError);
      expect(fake.requests).toHaveLength(1);
    });
  });
});
