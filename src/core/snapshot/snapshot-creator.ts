/**
 * Snapshot creation
 */

import type { BackupRequest, ComputeProvider, Snapshot } from "../../types";
import { logger } from "../../utils/logger";

/**
 * Issue one create-snapshot call. Not idempotent and never retried:
 * calling twice creates two snapshots.
 */
export async function createVolumeSnapshot(
  provider: ComputeProvider,
  request: BackupRequest,
): Promise<Snapshot> {
  logger.info(`Creating snapshot of ${request.volume.volumeId} (${request.device})`, {
    description: request.description,
  });

  const snapshot = await provider.createSnapshot(request.volume.volumeId, request.description);

  logger.info(`Snapshot ${snapshot.snapshotId} started`, {
    volumeId: snapshot.volumeId,
    status: snapshot.status,
  });

  return snapshot;
}
