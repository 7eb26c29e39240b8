/**
 * Provenance, device, retention and inherited tags for new snapshots
 */

import type { ComputeProvider, Volume } from "../../types";
import { logger } from "../../utils/logger";
import { PartialTagError } from "../errors";

export const BACKUP_TAG_PREFIX = "Backup:";
export const DEVICE_TAG = `${BACKUP_TAG_PREFIX}Device`;
export const EXPIRES_TAG = `${BACKUP_TAG_PREFIX}Expires`;
export const DEFAULT_RETAIN_MARKER = "Never";

/** Keys only ever written from the run itself, never copied from the volume */
const DERIVED_TAGS = new Set([DEVICE_TAG, EXPIRES_TAG]);

/**
 * Provider-reserved namespace. Snapshots reject tags under it, so such
 * source tags are mirrored under Backup:<key>.
 */
export const RESERVED_TAG_PREFIX = "aws:";

export type TagEntry = [key: string, value: string];

export interface TagOptions {
  retain: boolean;
  retainMarker?: string;
}

export interface TagResult {
  written: string[];
  error?: PartialTagError;
}

export function isReservedTagKey(key: string): boolean {
  return key.startsWith(RESERVED_TAG_PREFIX);
}

/**
 * Key a source-volume tag is written under on the snapshot
 */
export function snapshotTagKey(sourceKey: string): string {
  return isReservedTagKey(sourceKey) ? `${BACKUP_TAG_PREFIX}${sourceKey}` : sourceKey;
}

/**
 * Ordered tag list for a snapshot of `volume`, one entry per key.
 * Backup:Device and Backup:Expires are never taken from source tags, so
 * Backup:Expires is present exactly when `retain` is set.
 */
export function buildSnapshotTags(volume: Volume, device: string, options: TagOptions): TagEntry[] {
  const derived = new Map<string, string>([[DEVICE_TAG, device]]);
  if (options.retain) {
    derived.set(EXPIRES_TAG, options.retainMarker ?? DEFAULT_RETAIN_MARKER);
  }

  const tags = new Map(derived);
  for (const [key, value] of Object.entries(volume.tags)) {
    const targetKey = snapshotTagKey(key);
    if (DERIVED_TAGS.has(targetKey)) {
      logger.debug(`Ignoring source tag ${key} on ${volume.volumeId}: ${targetKey} is derived`);
      continue;
    }
    tags.set(targetKey, value);
  }

  return [...tags.entries()];
}

/**
 * Write tags one call at a time. A failure stops the sequence and is
 * returned, not thrown: the snapshot already exists.
 */
export async function propagateTags(
  provider: ComputeProvider,
  snapshotId: string,
  tags: TagEntry[],
): Promise<TagResult> {
  const written: string[] = [];

  for (const [key, value] of tags) {
    try {
      await provider.setTag(snapshotId, key, value);
    } catch (err) {
      const error = new PartialTagError(snapshotId, [...written], key, err);
      logger.warn(error.message, { snapshotId, written, failedKey: key });
      return { written, error };
    }
    written.push(key);
    logger.debug(`Tagged ${snapshotId}: ${key}=${value}`);
  }

  return { written };
}
