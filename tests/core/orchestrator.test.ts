import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  buildBackupRequest,
  PartialTagError,
  ProviderError,
  ResolutionError,
  runSnapshots,
} from "../../src/core";
import { FakeClock, FakeProvider, volume } from "../helpers/fake-provider";

describe("runSnapshots", () => {
  let provider: FakeProvider;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    provider = new FakeProvider();
    provider.addInstance("i-1", [
      ["/dev/sda1", volume("vol-root")],
      ["/dev/sdf", volume("vol-data", { Name: "db", "aws:autoscaling:groupName": "asg1" })],
      ["/dev/sdg", volume("vol-logs")],
    ]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("snapshots a device with derived and inherited tags", async () => {
    const result = await runSnapshots(provider, {
      selection: { mode: "device", instanceId: "i-1", devicePath: "/dev/sdf" },
      name: "host1",
      keep: true,
      wait: false,
    });

    expect(provider.callsOf("createSnapshot")).toEqual([
      { op: "createSnapshot", volumeId: "vol-data", description: "host1-snap-vol-data-/dev/sdf" },
    ]);
    expect(provider.callsOf("setTag").map((c) => [c.key, c.value])).toEqual([
      ["Backup:Device", "/dev/sdf"],
      ["Backup:Expires", "Never"],
      ["Name", "db"],
      ["Backup:aws:autoscaling:groupName", "asg1"],
    ]);
    expect(provider.callsOf("getSnapshotStatus")).toHaveLength(0);

    expect(result.failedCount).toBe(0);
    expect(result.dryRun).toBe(false);
    expect(result.volumes).toEqual([
      {
        volumeId: "vol-data",
        device: "/dev/sdf",
        description: "host1-snap-vol-data-/dev/sdf",
        snapshotId: "snap-0001",
        status: "pending",
        tagsWritten: [
          "Backup:Device",
          "Backup:Expires",
          "Name",
          "Backup:aws:autoscaling:groupName",
        ],
        tagError: undefined,
        waited: false,
      },
    ]);
  });

  test("instance run on a host with one data volume", async () => {
    const host = new FakeProvider();
    host.addInstance("i-1223456", [
      ["/dev/sda1", volume("vol-root")],
      ["/dev/sdf", volume("vol-data", { Name: "db", "aws:autoscaling:groupName": "asg1" })],
    ]);

    const result = await runSnapshots(host, {
      selection: { mode: "instance", instanceId: "i-1223456" },
      name: "host1",
      keep: true,
      wait: false,
    });

    expect(host.callsOf("createSnapshot")).toEqual([
      { op: "createSnapshot", volumeId: "vol-data", description: "host1-snap-vol-data-/dev/sdf" },
    ]);
    expect(host.snapshots.get("snap-0001")?.tags).toEqual({
      "Backup:Device": "/dev/sdf",
      "Backup:Expires": "Never",
      Name: "db",
      "Backup:aws:autoscaling:groupName": "asg1",
    });
    expect(result.volumes).toHaveLength(1);
  });

  test("a volume restored from a kept snapshot is not retained without keep", async () => {
    provider.addInstance("i-2", [
      ["/dev/sda1", volume("vol-root-2")],
      ["/dev/sdf", volume("vol-restored", { "Backup:Expires": "2001-01-01", Name: "db" })],
    ]);

    await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-2" },
      name: "host1",
      keep: false,
      wait: false,
    });

    expect(provider.snapshots.get("snap-0001")?.tags).toEqual({
      "Backup:Device": "/dev/sdf",
      Name: "db",
    });
  });

  test("makes no create call when the device does not exist", async () => {
    await expect(
      runSnapshots(provider, {
        selection: { mode: "device", instanceId: "i-1", devicePath: "/dev/sdz" },
        name: "host1",
        keep: false,
        wait: false,
      }),
    ).rejects.toBeInstanceOf(ResolutionError);

    expect(provider.callsOf("createSnapshot")).toHaveLength(0);
  });

  test("instance mode skips the root device", async () => {
    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-1" },
      name: "host1",
      keep: false,
      wait: false,
    });

    expect(result.volumes.map((v) => [v.volumeId, v.description])).toEqual([
      ["vol-data", "host1-snap-vol-data-/dev/sdf"],
      ["vol-logs", "host1-snap-vol-logs-/dev/sdg"],
    ]);
    expect(provider.callsOf("createSnapshot").map((c) => c.volumeId)).toEqual([
      "vol-data",
      "vol-logs",
    ]);
  });

  test("instance with only a root volume yields an empty run", async () => {
    provider.addInstance("i-2", [["/dev/sda1", volume("vol-root-2")]]);

    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-2" },
      name: "host1",
      keep: false,
      wait: false,
    });

    expect(result.volumes).toEqual([]);
    expect(provider.callsOf("createSnapshot")).toHaveLength(0);
  });

  test("detached volumes are labelled Unattached", async () => {
    provider.addVolume(volume("vol-loose"));

    const result = await runSnapshots(provider, {
      selection: { mode: "volume", volumeId: "vol-loose" },
      name: "nightly",
      keep: false,
      wait: false,
    });

    expect(result.volumes[0]?.description).toBe("nightly-snap-vol-loose-Unattached");
    expect(provider.callsOf("setTag").map((c) => [c.key, c.value])).toEqual([
      ["Backup:Device", "Unattached"],
    ]);
  });

  test("waits for completion when asked", async () => {
    provider.statusSequences.set("snap-0001", ["pending", "completed"]);
    const clock = new FakeClock();

    const result = await runSnapshots(provider, {
      selection: { mode: "volume", volumeId: "vol-data" },
      name: "host1",
      keep: false,
      wait: true,
      waitOptions: { clock },
    });

    expect(result.volumes[0]?.status).toBe("completed");
    expect(result.volumes[0]?.waited).toBe(true);
    expect(provider.callsOf("getSnapshotStatus")).toHaveLength(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  test("a tagging failure is kept as a warning", async () => {
    provider.setTagError = (key) => (key === "Name" ? new Error("throttled") : undefined);

    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-1" },
      name: "host1",
      keep: true,
      wait: false,
    });

    expect(result.failedCount).toBe(0);
    const first = result.volumes[0];
    expect(first?.snapshotId).toBe("snap-0001");
    expect(first?.tagsWritten).toEqual(["Backup:Device", "Backup:Expires"]);
    expect(first?.tagError).toBeInstanceOf(PartialTagError);
    expect(result.volumes[1]?.tagError).toBeUndefined();
  });

  test("aborts an instance run at the first failure by default", async () => {
    provider.createSnapshotError = (volumeId) =>
      volumeId === "vol-data" ? new ProviderError("SnapshotLimitExceeded", "limit") : undefined;

    await expect(
      runSnapshots(provider, {
        selection: { mode: "instance", instanceId: "i-1" },
        name: "host1",
        keep: false,
        wait: false,
      }),
    ).rejects.toMatchObject({ code: "SnapshotLimitExceeded" });

    expect(provider.callsOf("createSnapshot").map((c) => c.volumeId)).toEqual(["vol-data"]);
  });

  test("continues past failures when abortOnFirstError is off", async () => {
    provider.createSnapshotError = (volumeId) =>
      volumeId === "vol-data" ? new ProviderError("SnapshotLimitExceeded", "limit") : undefined;

    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-1" },
      name: "host1",
      keep: false,
      wait: false,
      abortOnFirstError: false,
    });

    expect(result.failedCount).toBe(1);
    expect(result.volumes.map((v) => [v.volumeId, v.snapshotId])).toEqual([
      ["vol-data", null],
      ["vol-logs", "snap-0001"],
    ]);
    expect(result.volumes[0]?.error?.message).toBe("limit");
  });

  test("keeps the snapshot id when waiting fails afterwards", async () => {
    provider.statusSequences.set("snap-0001", ["pending"]);

    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-1" },
      name: "host1",
      keep: false,
      wait: true,
      waitOptions: { clock: new FakeClock(), maxAttempts: 2 },
      abortOnFirstError: false,
    });

    expect(result.failedCount).toBe(1);
    expect(result.volumes[0]?.snapshotId).toBe("snap-0001");
    expect(result.volumes[0]?.waited).toBe(false);
    expect(result.volumes[0]?.error?.name).toBe("WaitTimeoutError");
    expect(result.volumes[1]?.status).toBe("completed");
  });

  test("volume mode always propagates failures", async () => {
    provider.createSnapshotError = () => new ProviderError("Throttling", "slow down");

    await expect(
      runSnapshots(provider, {
        selection: { mode: "volume", volumeId: "vol-data" },
        name: "host1",
        keep: false,
        wait: false,
        abortOnFirstError: false,
      }),
    ).rejects.toMatchObject({ code: "Throttling" });
  });

  test("dry run resolves but makes no mutating calls", async () => {
    const result = await runSnapshots(provider, {
      selection: { mode: "instance", instanceId: "i-1" },
      name: "host1",
      keep: true,
      wait: true,
      dryRun: true,
    });

    expect(result.dryRun).toBe(true);
    expect(result.volumes.map((v) => v.snapshotId)).toEqual([null, null]);
    expect(provider.callsOf("createSnapshot")).toHaveLength(0);
    expect(provider.callsOf("setTag")).toHaveLength(0);
    expect(provider.callsOf("getSnapshotStatus")).toHaveLength(0);
  });
});

describe("buildBackupRequest", () => {
  test("carries description, device and retention", () => {
    const vol = {
      volumeId: "vol-1",
      attachment: { device: "/dev/xvdb", instanceId: "i-1" },
      tags: {},
    };

    expect(buildBackupRequest("app", vol, true)).toEqual({
      volume: vol,
      description: "app-snap-vol-1-/dev/xvdb",
      device: "/dev/xvdb",
      retain: true,
      baseName: "app",
    });
  });
});
