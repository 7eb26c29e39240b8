/**
 * Snapshot completion polling
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ComputeProvider } from "../../types";
import { logger } from "../../utils/logger";
import { SnapshotFailedError, WaitTimeoutError } from "../errors";

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
};

export interface WaitOptions {
  pollIntervalMs?: number;
  /** Stop waiting after this long (default: unbounded) */
  timeoutMs?: number;
  /** Stop waiting after this many status fetches (default: unbounded) */
  maxAttempts?: number;
  /**
   * Throw as soon as the provider reports "error". Off by default, in which
   * case the error state is polled like "pending".
   */
  failOnError?: boolean;
  clock?: Clock;
}

export interface WaitResult {
  attempts: number;
  elapsedMs: number;
}

/**
 * Poll until the snapshot reports "completed"
 */
export async function waitForCompletion(
  provider: ComputeProvider,
  snapshotId: string,
  options: WaitOptions = {},
): Promise<WaitResult> {
  const clock = options.clock ?? systemClock;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const startedAt = clock.now();
  let attempts = 0;

  logger.info(`Waiting for snapshot ${snapshotId} to complete`);

  for (;;) {
    const status = await provider.getSnapshotStatus(snapshotId);
    attempts++;
    const elapsedMs = clock.now() - startedAt;

    if (status === "completed") {
      logger.info(`Snapshot ${snapshotId} completed`, { attempts, elapsedMs });
      return { attempts, elapsedMs };
    }

    if (status === "error") {
      if (options.failOnError) {
        throw new SnapshotFailedError(snapshotId);
      }
      logger.warn(`Snapshot ${snapshotId} reports the error state, still waiting`, { attempts });
    } else {
      logger.debug(`Snapshot ${snapshotId} is ${status}`, { attempts, elapsedMs });
    }

    const attemptsExhausted = options.maxAttempts !== undefined && attempts >= options.maxAttempts;
    const deadlinePassed =
      options.timeoutMs !== undefined && elapsedMs + pollIntervalMs > options.timeoutMs;
    if (attemptsExhausted || deadlinePassed) {
      throw new WaitTimeoutError(snapshotId, attempts, elapsedMs);
    }

    await clock.sleep(pollIntervalMs);
  }
}
