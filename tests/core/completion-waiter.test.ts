import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SnapshotFailedError, WaitTimeoutError, waitForCompletion } from "../../src/core";
import { FakeClock, FakeProvider } from "../helpers/fake-provider";

describe("waitForCompletion", () => {
  let provider: FakeProvider;
  let clock: FakeClock;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    provider = new FakeProvider();
    clock = new FakeClock();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("returns after the first completed status", async () => {
    provider.statusSequences.set("snap-1", ["pending", "pending", "completed"]);

    const result = await waitForCompletion(provider, "snap-1", { clock });

    expect(result).toEqual({ attempts: 3, elapsedMs: 2000 });
    expect(provider.callsOf("getSnapshotStatus")).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  test("does not sleep when already completed", async () => {
    provider.statusSequences.set("snap-1", ["completed"]);

    const result = await waitForCompletion(provider, "snap-1", { clock });

    expect(result).toEqual({ attempts: 1, elapsedMs: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  test("uses the configured poll interval", async () => {
    provider.statusSequences.set("snap-1", ["pending", "completed"]);

    await waitForCompletion(provider, "snap-1", { clock, pollIntervalMs: 15_000 });

    expect(clock.sleeps).toEqual([15_000]);
  });

  test("keeps polling through the error state by default", async () => {
    provider.statusSequences.set("snap-1", ["error", "pending", "completed"]);

    const result = await waitForCompletion(provider, "snap-1", { clock });

    expect(result.attempts).toBe(3);
  });

  test("throws on the error state with failOnError", async () => {
    provider.statusSequences.set("snap-1", ["pending", "error", "completed"]);

    const promise = waitForCompletion(provider, "snap-1", { clock, failOnError: true });

    await expect(promise).rejects.toBeInstanceOf(SnapshotFailedError);
    await expect(promise).rejects.toMatchObject({ code: "SnapshotFailed", snapshotId: "snap-1" });
    expect(provider.callsOf("getSnapshotStatus")).toHaveLength(2);
  });

  test("gives up after maxAttempts status checks", async () => {
    provider.statusSequences.set("snap-1", ["pending"]);

    const promise = waitForCompletion(provider, "snap-1", { clock, maxAttempts: 4 });

    await expect(promise).rejects.toBeInstanceOf(WaitTimeoutError);
    await expect(promise).rejects.toMatchObject({ attempts: 4, elapsedMs: 3000 });
    expect(clock.sleeps).toHaveLength(3);
  });

  test("gives up before sleeping past the timeout", async () => {
    provider.statusSequences.set("snap-1", ["pending"]);

    const promise = waitForCompletion(provider, "snap-1", { clock, timeoutMs: 2500 });

    await expect(promise).rejects.toThrow(
      "Snapshot snap-1 did not complete after 3 status check(s) (2000ms)",
    );
    expect(clock.current).toBe(2000);
  });

  test("propagates provider failures", async () => {
    provider.getSnapshotStatus = async () => {
      throw new Error("connection reset");
    };

    await expect(waitForCompletion(provider, "snap-1", { clock })).rejects.toThrow(
      "connection reset",
    );
  });
});
