import { beforeEach, describe, expect, test } from "vitest";
import { ResolutionError, resolveTargets } from "../../src/core";
import { FakeProvider, volume } from "../helpers/fake-provider";

describe("resolveTargets", () => {
  let provider: FakeProvider;

  beforeEach(() => {
    provider = new FakeProvider();
    provider.addInstance("i-1", [
      ["/dev/sda1", volume("vol-root")],
      ["/dev/sdf", volume("vol-data", { Name: "db" })],
      ["/dev/sdg", volume("vol-logs")],
    ]);
  });

  describe("volume mode", () => {
    test("returns the volume", async () => {
      const volumes = await resolveTargets({ mode: "volume", volumeId: "vol-data" }, provider);

      expect(volumes).toHaveLength(1);
      expect(volumes[0]?.volumeId).toBe("vol-data");
      expect(volumes[0]?.attachment).toEqual({ device: "/dev/sdf", instanceId: "i-1" });
      expect(volumes[0]?.tags).toEqual({ Name: "db" });
    });

    test("accepts detached volumes", async () => {
      provider.addVolume(volume("vol-loose"));

      const volumes = await resolveTargets({ mode: "volume", volumeId: "vol-loose" }, provider);
      expect(volumes[0]?.attachment).toBeNull();
    });

    test("throws NotFound for unknown volumes", async () => {
      const promise = resolveTargets({ mode: "volume", volumeId: "vol-missing" }, provider);

      await expect(promise).rejects.toBeInstanceOf(ResolutionError);
      await expect(promise).rejects.toMatchObject({
        code: "NotFound",
        message: "Volume not found: vol-missing",
      });
    });
  });

  describe("device mode", () => {
    test("returns the volume attached at the device", async () => {
      const volumes = await resolveTargets(
        { mode: "device", instanceId: "i-1", devicePath: "/dev/sdg" },
        provider,
      );

      expect(volumes.map((v) => v.volumeId)).toEqual(["vol-logs"]);
    });

    test("can select the root device explicitly", async () => {
      const volumes = await resolveTargets(
        { mode: "device", instanceId: "i-1", devicePath: "/dev/sda1" },
        provider,
      );

      expect(volumes.map((v) => v.volumeId)).toEqual(["vol-root"]);
    });

    test("labels a multi-attach volume with the selected instance's device", async () => {
      provider.addVolume({
        volumeId: "vol-shared",
        attachment: { device: "/dev/sdf", instanceId: "i-a" },
        tags: {},
      });
      provider.instances.set("i-b", {
        instanceId: "i-b",
        devices: [{ device: "/dev/sdh", volumeId: "vol-shared" }],
      });

      const volumes = await resolveTargets(
        { mode: "device", instanceId: "i-b", devicePath: "/dev/sdh" },
        provider,
      );

      expect(volumes[0]?.attachment).toEqual({ device: "/dev/sdh", instanceId: "i-b" });
    });

    test("throws NoSuchDevice when nothing is mapped at the path", async () => {
      await expect(
        resolveTargets({ mode: "device", instanceId: "i-1", devicePath: "/dev/sdz" }, provider),
      ).rejects.toMatchObject({
        code: "NoSuchDevice",
        message: "No volume attached to device /dev/sdz on instance i-1",
      });
      expect(provider.callsOf("getVolume")).toHaveLength(0);
    });

    test("throws NotFound for unknown instances", async () => {
      await expect(
        resolveTargets({ mode: "device", instanceId: "i-gone", devicePath: "/dev/sdf" }, provider),
      ).rejects.toMatchObject({ code: "NotFound", message: "Instance not found: i-gone" });
    });
  });

  describe("instance mode", () => {
    test("returns every non-root volume in mapping order", async () => {
      const volumes = await resolveTargets({ mode: "instance", instanceId: "i-1" }, provider);

      expect(volumes.map((v) => v.volumeId)).toEqual(["vol-data", "vol-logs"]);
      expect(provider.callsOf("getVolume").map((c) => c.volumeId)).toEqual(["vol-data", "vol-logs"]);
    });

    test("labels every volume with the instance's own mapping", async () => {
      provider.volumes.set("vol-logs", {
        volumeId: "vol-logs",
        attachment: { device: "/dev/xvdz", instanceId: "i-other" },
        tags: {},
      });

      const volumes = await resolveTargets({ mode: "instance", instanceId: "i-1" }, provider);

      expect(volumes.map((v) => v.attachment)).toEqual([
        { device: "/dev/sdf", instanceId: "i-1" },
        { device: "/dev/sdg", instanceId: "i-1" },
      ]);
    });

    test("honours a custom root device", async () => {
      const volumes = await resolveTargets({ mode: "instance", instanceId: "i-1" }, provider, {
        rootDevice: "/dev/sdf",
      });

      expect(volumes.map((v) => v.volumeId)).toEqual(["vol-root", "vol-logs"]);
    });

    test("returns an empty list when only the root volume is attached", async () => {
      provider.addInstance("i-2", [["/dev/sda1", volume("vol-root-2")]]);

      const volumes = await resolveTargets({ mode: "instance", instanceId: "i-2" }, provider);
      expect(volumes).toEqual([]);
    });

    test("throws NotFound when a mapped volume has vanished", async () => {
      provider.volumes.delete("vol-logs");

      await expect(
        resolveTargets({ mode: "instance", instanceId: "i-1" }, provider),
      ).rejects.toMatchObject({ code: "NotFound", message: "Volume not found: vol-logs" });
    });
  });
});
