/**
 * Volume, instance and snapshot type definitions
 */

/**
 * What to back up. Exactly one variant is active per run.
 */
export type Selection =
  | { mode: "volume"; volumeId: string }
  | { mode: "device"; instanceId: string; devicePath: string }
  | { mode: "instance"; instanceId: string };

export type SelectionMode = Selection["mode"];

export interface VolumeAttachment {
  device: string;
  instanceId: string;
}

export interface Volume {
  volumeId: string;
  /** Current attachment, or null when the volume is detached */
  attachment: VolumeAttachment | null;
  tags: Record<string, string>;
}

/**
 * One entry of an instance's block-device mapping
 */
export interface DeviceMapping {
  device: string;
  volumeId: string;
}

export interface Instance {
  instanceId: string;
  /** Block-device mapping in the order the provider reports it */
  devices: DeviceMapping[];
}

export type SnapshotStatus = "pending" | "completed" | "error";

export interface Snapshot {
  snapshotId: string;
  volumeId: string;
  status: SnapshotStatus;
  tags: Record<string, string>;
  description?: string;
  startTime?: Date;
}

/**
 * Labels derived from a volume before it is snapshotted
 */
export interface VolumeMetadata {
  name: string;
  volumeId: string;
  device: string;
  description: string;
}

/**
 * Per-volume request built by the orchestrator and consumed immediately
 */
export interface BackupRequest {
  volume: Volume;
  description: string;
  device: string;
  retain: boolean;
  baseName: string;
}
