/**
 * Snapshot description and device label derivation
 */

import type { Volume, VolumeMetadata } from "../../types";

export const UNATTACHED_DEVICE = "Unattached";

export function deriveMetadata(name: string, volume: Volume): VolumeMetadata {
  const device = volume.attachment?.device ?? UNATTACHED_DEVICE;
  return {
    name,
    volumeId: volume.volumeId,
    device,
    description: `${name}-snap-${volume.volumeId}-${device}`,
  };
}
