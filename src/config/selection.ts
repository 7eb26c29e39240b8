/**
 * Selection flags to a Selection
 */

import type { Selection } from "../types";
import { ConfigError } from "./validator";

/** Instance id placeholder for the instance this process runs on */
export const LOCAL_INSTANCE = "self";

export interface SelectionFlags {
  volume?: string;
  device?: string;
  instance?: string;
}

/**
 * Build the selection from --volume / --device / --instance.
 * --device without --instance targets the local instance.
 */
export function parseSelection(flags: SelectionFlags): Selection {
  const { volume, device, instance } = flags;

  if (volume !== undefined) {
    if (device !== undefined || instance !== undefined) {
      throw new ConfigError("--volume cannot be combined with --device or --instance");
    }
    if (volume.trim() === "") {
      throw new ConfigError("--volume requires a volume id");
    }
    return { mode: "volume", volumeId: volume };
  }

  if (device !== undefined) {
    if (device.trim() === "") {
      throw new ConfigError("--device requires a device path");
    }
    return { mode: "device", instanceId: instance || LOCAL_INSTANCE, devicePath: device };
  }

  if (instance !== undefined) {
    return { mode: "instance", instanceId: instance || LOCAL_INSTANCE };
  }

  throw new ConfigError("One of --volume, --device or --instance is required");
}

export function targetsLocalInstance(selection: Selection): boolean {
  return selection.mode !== "volume" && selection.instanceId === LOCAL_INSTANCE;
}

/**
 * Replace the local-instance placeholder with a concrete id
 */
export function withInstanceId(selection: Selection, instanceId: string): Selection {
  return selection.mode === "volume" ? selection : { ...selection, instanceId };
}
