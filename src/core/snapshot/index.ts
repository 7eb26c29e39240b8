/**
 * Snapshot pipeline exports
 */

export {
  type Clock,
  DEFAULT_POLL_INTERVAL_MS,
  systemClock,
  type WaitOptions,
  type WaitResult,
  waitForCompletion,
} from "./completion-waiter";
export { deriveMetadata, UNATTACHED_DEVICE } from "./metadata";
export {
  buildBackupRequest,
  runSnapshots,
  type SnapshotRunOptions,
  type SnapshotRunResult,
  type VolumeSnapshotResult,
} from "./orchestrator";
export { createVolumeSnapshot } from "./snapshot-creator";
export {
  BACKUP_TAG_PREFIX,
  buildSnapshotTags,
  DEFAULT_RETAIN_MARKER,
  DEVICE_TAG,
  EXPIRES_TAG,
  isReservedTagKey,
  propagateTags,
  RESERVED_TAG_PREFIX,
  snapshotTagKey,
  type TagEntry,
  type TagOptions,
  type TagResult,
} from "./tag-propagator";
export { DEFAULT_ROOT_DEVICE, type ResolveOptions, resolveTargets } from "./target-resolver";
