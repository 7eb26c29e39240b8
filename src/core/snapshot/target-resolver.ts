/**
 * Selection to volume resolution
 */

import type { ComputeProvider, DeviceMapping, Instance, Selection, Volume } from "../../types";
import { logger } from "../../utils/logger";
import { ResolutionError } from "../errors";

/** Boot volume slot, excluded from instance-wide runs */
export const DEFAULT_ROOT_DEVICE = "/dev/sda1";

export interface ResolveOptions {
  rootDevice?: string;
}

async function fetchInstance(provider: ComputeProvider, instanceId: string): Promise<Instance> {
  const instance = await provider.getInstance(instanceId);
  if (!instance) {
    throw new ResolutionError("NotFound", `Instance not found: ${instanceId}`);
  }
  return instance;
}

async function fetchVolume(provider: ComputeProvider, volumeId: string): Promise<Volume> {
  const volume = await provider.getVolume(volumeId);
  if (!volume) {
    throw new ResolutionError("NotFound", `Volume not found: ${volumeId}`);
  }
  return volume;
}

/**
 * Fetch a volume reached through an instance's mapping. A multi-attach
 * volume reports several attachments; the selected instance's one is kept.
 */
async function fetchMappedVolume(
  provider: ComputeProvider,
  instance: Instance,
  mapping: DeviceMapping,
): Promise<Volume> {
  const volume = await fetchVolume(provider, mapping.volumeId);
  return {
    ...volume,
    attachment: { device: mapping.device, instanceId: instance.instanceId },
  };
}

/**
 * Turn a selection into the ordered list of volumes to snapshot.
 * Instance mode may legitimately return an empty list.
 */
export async function resolveTargets(
  selection: Selection,
  provider: ComputeProvider,
  options: ResolveOptions = {},
): Promise<Volume[]> {
  switch (selection.mode) {
    case "volume":
      return [await fetchVolume(provider, selection.volumeId)];

    case "device": {
      const instance = await fetchInstance(provider, selection.instanceId);
      const mapping = instance.devices.find((d) => d.device === selection.devicePath);
      if (!mapping) {
        throw new ResolutionError(
          "NoSuchDevice",
          `No volume attached to device ${selection.devicePath} on instance ${selection.instanceId}`,
        );
      }
      return [await fetchMappedVolume(provider, instance, mapping)];
    }

    case "instance": {
      const rootDevice = options.rootDevice ?? DEFAULT_ROOT_DEVICE;
      const instance = await fetchInstance(provider, selection.instanceId);
      const volumes: Volume[] = [];

      for (const mapping of instance.devices) {
        if (mapping.device === rootDevice) {
          logger.debug(`Skipping root volume ${mapping.volumeId} at ${mapping.device}`);
          continue;
        }
        volumes.push(await fetchMappedVolume(provider, instance, mapping));
      }

      return volumes;
    }
  }
}
