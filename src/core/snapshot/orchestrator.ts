/**
 * Snapshot run orchestration
 */

import type {
  BackupRequest,
  ComputeProvider,
  Selection,
  SnapshotStatus,
  Volume,
} from "../../types";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import type { PartialTagError } from "../errors";
import { waitForCompletion, type WaitOptions } from "./completion-waiter";
import { deriveMetadata } from "./metadata";
import { createVolumeSnapshot } from "./snapshot-creator";
import { buildSnapshotTags, propagateTags } from "./tag-propagator";
import { resolveTargets } from "./target-resolver";

export interface SnapshotRunOptions {
  selection: Selection;
  /** Base name used in every snapshot description */
  name: string;
  /** Write the Backup:Expires retention tag */
  keep: boolean;
  /** Block until each snapshot completes */
  wait: boolean;
  waitOptions?: WaitOptions;
  retainMarker?: string;
  rootDevice?: string;
  /**
   * Instance mode only: stop at the first failing volume (default) or record
   * the failure and carry on with the rest.
   */
  abortOnFirstError?: boolean;
  dryRun?: boolean;
}

export interface VolumeSnapshotResult {
  volumeId: string;
  device: string;
  description: string;
  snapshotId: string | null;
  status: SnapshotStatus | null;
  tagsWritten: string[];
  tagError?: PartialTagError;
  waited: boolean;
  error?: Error;
}

export interface SnapshotRunResult {
  selection: Selection;
  volumes: VolumeSnapshotResult[];
  failedCount: number;
  durationMs: number;
  dryRun: boolean;
}

/**
 * Build the per-volume request
 */
export function buildBackupRequest(name: string, volume: Volume, retain: boolean): BackupRequest {
  const metadata = deriveMetadata(name, volume);
  return {
    volume,
    description: metadata.description,
    device: metadata.device,
    retain,
    baseName: metadata.name,
  };
}

function emptyResult(request: BackupRequest): VolumeSnapshotResult {
  return {
    volumeId: request.volume.volumeId,
    device: request.device,
    description: request.description,
    snapshotId: null,
    status: null,
    tagsWritten: [],
    waited: false,
  };
}

/**
 * Create, tag and optionally wait. Progress is recorded on `result` as it
 * happens so a failure keeps whatever was already done.
 */
async function snapshotVolume(
  provider: ComputeProvider,
  request: BackupRequest,
  options: SnapshotRunOptions,
  result: VolumeSnapshotResult,
): Promise<void> {
  const tags = buildSnapshotTags(request.volume, request.device, {
    retain: request.retain,
    retainMarker: options.retainMarker,
  });

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would snapshot ${request.volume.volumeId}: ${request.description}`, {
      tags: Object.fromEntries(tags),
    });
    return;
  }

  const snapshot = await createVolumeSnapshot(provider, request);
  result.snapshotId = snapshot.snapshotId;
  result.status = snapshot.status;

  const tagResult = await propagateTags(provider, snapshot.snapshotId, tags);
  result.tagsWritten = tagResult.written;
  result.tagError = tagResult.error;

  if (options.wait) {
    await waitForCompletion(provider, snapshot.snapshotId, options.waitOptions);
    result.status = "completed";
    result.waited = true;
  }
}

/**
 * Resolve the selection and snapshot every volume in order
 */
export async function runSnapshots(
  provider: ComputeProvider,
  options: SnapshotRunOptions,
): Promise<SnapshotRunResult> {
  const startTime = Date.now();
  const { selection } = options;
  const isolateFailures = selection.mode === "instance" && options.abortOnFirstError === false;

  logger.info(`Starting snapshot run (${selection.mode} mode)`, selection);

  const volumes = await resolveTargets(selection, provider, { rootDevice: options.rootDevice });

  if (volumes.length === 0) {
    logger.warn("No volumes to snapshot", selection);
  }

  const results: VolumeSnapshotResult[] = [];
  let failedCount = 0;

  for (const volume of volumes) {
    const request = buildBackupRequest(options.name, volume, options.keep);
    const result = emptyResult(request);

    if (!isolateFailures) {
      await snapshotVolume(provider, request, options, result);
      results.push(result);
      continue;
    }

    try {
      await snapshotVolume(provider, request, options, result);
    } catch (err) {
      result.error = err instanceof Error ? err : new Error(String(err));
      logger.error(`Snapshot of ${volume.volumeId} failed, continuing`, result.error);
      failedCount++;
    }
    results.push(result);
  }

  const durationMs = Date.now() - startTime;
  logger.info(
    `Snapshot run finished in ${formatDuration(durationMs)}: ${results.length - failedCount} ok, ${failedCount} failed`,
  );

  return {
    selection,
    volumes: results,
    failedCount,
    durationMs,
    dryRun: options.dryRun ?? false,
  };
}
