/**
 * Core module exports
 */

// Errors
export {
  PartialTagError,
  ProviderError,
  ResolutionError,
  type ResolutionErrorCode,
  SnapshotFailedError,
  VolsnapError,
  WaitTimeoutError,
} from "./errors";

// Snapshot pipeline
export {
  buildBackupRequest,
  buildSnapshotTags,
  type Clock,
  createVolumeSnapshot,
  DEFAULT_RETAIN_MARKER,
  DEFAULT_ROOT_DEVICE,
  DEVICE_TAG,
  deriveMetadata,
  EXPIRES_TAG,
  isReservedTagKey,
  propagateTags,
  resolveTargets,
  runSnapshots,
  type SnapshotRunOptions,
  type SnapshotRunResult,
  snapshotTagKey,
  type TagEntry,
  UNATTACHED_DEVICE,
  type VolumeSnapshotResult,
  waitForCompletion,
  type WaitOptions,
} from "./snapshot";
