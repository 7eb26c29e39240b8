/**
 * Compute provider interface definitions
 */

import type { Instance, Snapshot, SnapshotStatus, Volume } from "./snapshot";

export interface ListSnapshotsFilter {
  /** Restrict to snapshots of these volumes */
  volumeIds?: string[];
  /** Only snapshots carrying the Backup:Device tag */
  managedOnly?: boolean;
}

/**
 * Control-plane operations the snapshot pipeline consumes.
 * Every method may reject with a ProviderError.
 */
export interface ComputeProvider {
  /**
   * Fetch an instance and its block-device mapping, or null if it does not exist
   */
  getInstance(instanceId: string): Promise<Instance | null>;

  /**
   * Fetch a volume, or null if it does not exist
   */
  getVolume(volumeId: string): Promise<Volume | null>;

  /**
   * Start a snapshot. Resolves as soon as the provider accepts the request.
   */
  createSnapshot(volumeId: string, description: string): Promise<Snapshot>;

  setTag(resourceId: string, key: string, value: string): Promise<void>;

  getSnapshotStatus(snapshotId: string): Promise<SnapshotStatus>;

  listSnapshots(filter: ListSnapshotsFilter): Promise<Snapshot[]>;
}
