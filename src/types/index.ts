/**
 * Centralized type exports for volsnap
 */

// Config types
export type {
  ConfigOverrides,
  CredentialSource,
  CredentialsConfig,
  VolsnapConfig,
  WaitConfig,
} from "./config";
// Provider types
export type { ComputeProvider, ListSnapshotsFilter } from "./provider";
// Snapshot types
export type {
  BackupRequest,
  DeviceMapping,
  Instance,
  Selection,
  SelectionMode,
  Snapshot,
  SnapshotStatus,
  Volume,
  VolumeAttachment,
  VolumeMetadata,
} from "./snapshot";
