/**
 * EC2 compute provider (AWS SDK v3)
 */

import {
  CreateSnapshotCommand,
  type CreateSnapshotCommandInput,
  type CreateSnapshotCommandOutput,
  CreateTagsCommand,
  type CreateTagsCommandInput,
  type CreateTagsCommandOutput,
  DescribeInstancesCommand,
  type DescribeInstancesCommandInput,
  type DescribeInstancesCommandOutput,
  DescribeSnapshotsCommand,
  type DescribeSnapshotsCommandInput,
  type DescribeSnapshotsCommandOutput,
  DescribeVolumesCommand,
  type DescribeVolumesCommandInput,
  type DescribeVolumesCommandOutput,
  EC2Client,
  type Filter,
  type Snapshot as Ec2Snapshot,
  type SnapshotState,
  type Tag,
} from "@aws-sdk/client-ec2";
import { ProviderError } from "../core/errors";
import { DEVICE_TAG } from "../core/snapshot/tag-propagator";
import type {
  ComputeProvider,
  DeviceMapping,
  Instance,
  ListSnapshotsFilter,
  Snapshot,
  SnapshotStatus,
  Volume,
} from "../types";
import { logger } from "../utils/logger";
import type { CredentialProvider } from "./credentials";

// Error codes EC2 answers with when the resource does not exist
const INSTANCE_NOT_FOUND_CODES = new Set([
  "InvalidInstanceID.NotFound",
  "InvalidInstanceID.Malformed",
]);
const VOLUME_NOT_FOUND_CODES = new Set(["InvalidVolume.NotFound", "InvalidVolumeID.Malformed"]);
const SNAPSHOT_NOT_FOUND_CODE = "InvalidSnapshot.NotFound";

/**
 * The EC2 calls the provider makes. Narrow so tests can fake it.
 */
export interface Ec2Api {
  describeInstances(input: DescribeInstancesCommandInput): Promise<DescribeInstancesCommandOutput>;
  describeVolumes(input: DescribeVolumesCommandInput): Promise<DescribeVolumesCommandOutput>;
  createSnapshot(input: CreateSnapshotCommandInput): Promise<CreateSnapshotCommandOutput>;
  createTags(input: CreateTagsCommandInput): Promise<CreateTagsCommandOutput>;
  describeSnapshots(input: DescribeSnapshotsCommandInput): Promise<DescribeSnapshotsCommandOutput>;
}

export function createEc2Api(client: EC2Client): Ec2Api {
  return {
    describeInstances: (input) => client.send(new DescribeInstancesCommand(input)),
    describeVolumes: (input) => client.send(new DescribeVolumesCommand(input)),
    createSnapshot: (input) => client.send(new CreateSnapshotCommand(input)),
    createTags: (input) => client.send(new CreateTagsCommand(input)),
    describeSnapshots: (input) => client.send(new DescribeSnapshotsCommand(input)),
  };
}

export interface Ec2ProviderOptions {
  region: string;
  credentials: CredentialProvider;
  endpoint?: string;
  /** Pre-built API, bypassing client construction */
  api?: Ec2Api;
}

export function errorCode(error: unknown): string {
  if (error instanceof Error && error.name && error.name !== "Error") {
    return error.name;
  }
  return "Unknown";
}

export function tagsToRecord(tags: Tag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      record[tag.Key] = tag.Value ?? "";
    }
  }
  return record;
}

export function toSnapshotStatus(state: SnapshotState | string | undefined): SnapshotStatus {
  switch (state) {
    case "completed":
      return "completed";
    case "error":
      return "error";
    default:
      // pending, recoverable, recovering
      return "pending";
  }
}

function toSnapshot(snapshot: Ec2Snapshot): Snapshot {
  if (!snapshot.SnapshotId) {
    throw new ProviderError("InvalidResponse", "EC2 returned a snapshot without an id");
  }
  return {
    snapshotId: snapshot.SnapshotId,
    volumeId: snapshot.VolumeId ?? "",
    status: toSnapshotStatus(snapshot.State),
    tags: tagsToRecord(snapshot.Tags),
    ...(snapshot.Description !== undefined && { description: snapshot.Description }),
    ...(snapshot.StartTime !== undefined && { startTime: snapshot.StartTime }),
  };
}

export class Ec2Provider implements ComputeProvider {
  readonly region: string;
  private readonly api: Ec2Api;

  constructor(options: Ec2ProviderOptions) {
    this.region = options.region;
    this.api = options.api ?? this.createApi(options);
  }

  private createApi(options: Ec2ProviderOptions): Ec2Api {
    const credentials = options.credentials.resolve();
    logger.debug(`EC2 client for ${options.region} (credentials: ${options.credentials.source})`);

    return createEc2Api(
      new EC2Client({
        region: options.region,
        ...(options.endpoint && { endpoint: options.endpoint }),
        ...(credentials && { credentials }),
      }),
    );
  }

  /**
   * Run an EC2 call, converting failures to ProviderError
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    logger.debug(`EC2 ${operation}`);
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(errorCode(error), `EC2 ${operation} failed: ${message}`, {
        cause: error,
      });
    }
  }

  async getInstance(instanceId: string): Promise<Instance | null> {
    let output: DescribeInstancesCommandOutput;
    try {
      output = await this.call("DescribeInstances", () =>
        this.api.describeInstances({ InstanceIds: [instanceId] }),
      );
    } catch (error) {
      if (error instanceof ProviderError && INSTANCE_NOT_FOUND_CODES.has(error.code)) {
        return null;
      }
      throw error;
    }

    const instance = output.Reservations?.flatMap((r) => r.Instances ?? []).find(
      (i) => i.InstanceId === instanceId,
    );
    if (!instance) {
      return null;
    }

    const devices: DeviceMapping[] = [];
    for (const mapping of instance.BlockDeviceMappings ?? []) {
      const volumeId = mapping.Ebs?.VolumeId;
      if (mapping.DeviceName && volumeId) {
        devices.push({ device: mapping.DeviceName, volumeId });
      }
    }

    return { instanceId, devices };
  }

  async getVolume(volumeId: string): Promise<Volume | null> {
    let output: DescribeVolumesCommandOutput;
    try {
      output = await this.call("DescribeVolumes", () =>
        this.api.describeVolumes({ VolumeIds: [volumeId] }),
      );
    } catch (error) {
      if (error instanceof ProviderError && VOLUME_NOT_FOUND_CODES.has(error.code)) {
        return null;
      }
      throw error;
    }

    const volume = output.Volumes?.find((v) => v.VolumeId === volumeId);
    if (!volume) {
      return null;
    }

    const attachment = volume.Attachments?.find(
      (a) => a.Device && a.InstanceId && a.State !== "detached",
    );

    return {
      volumeId,
      attachment:
        attachment?.Device && attachment.InstanceId
          ? { device: attachment.Device, instanceId: attachment.InstanceId }
          : null,
      tags: tagsToRecord(volume.Tags),
    };
  }

  async createSnapshot(volumeId: string, description: string): Promise<Snapshot> {
    const output = await this.call("CreateSnapshot", () =>
      this.api.createSnapshot({ VolumeId: volumeId, Description: description }),
    );
    return toSnapshot(output);
  }

  async setTag(resourceId: string, key: string, value: string): Promise<void> {
    await this.call("CreateTags", () =>
      this.api.createTags({ Resources: [resourceId], Tags: [{ Key: key, Value: value }] }),
    );
  }

  async getSnapshotStatus(snapshotId: string): Promise<SnapshotStatus> {
    let output: DescribeSnapshotsCommandOutput;
    try {
      output = await this.call("DescribeSnapshots", () =>
        this.api.describeSnapshots({ SnapshotIds: [snapshotId] }),
      );
    } catch (error) {
      // A snapshot can take a moment to become visible after creation
      if (error instanceof ProviderError && error.code === SNAPSHOT_NOT_FOUND_CODE) {
        logger.debug(`Snapshot ${snapshotId} not visible yet`);
        return "pending";
      }
      throw error;
    }

    const snapshot = output.Snapshots?.find((s) => s.SnapshotId === snapshotId);
    return toSnapshotStatus(snapshot?.State);
  }

  async listSnapshots(filter: ListSnapshotsFilter): Promise<Snapshot[]> {
    const filters: Filter[] = [];
    if (filter.volumeIds && filter.volumeIds.length > 0) {
      filters.push({ Name: "volume-id", Values: filter.volumeIds });
    }
    if (filter.managedOnly) {
      filters.push({ Name: "tag-key", Values: [DEVICE_TAG] });
    }

    const snapshots: Snapshot[] = [];
    let nextToken: string | undefined;

    do {
      const token = nextToken;
      const output = await this.call("DescribeSnapshots", () =>
        this.api.describeSnapshots({
          OwnerIds: ["self"],
          ...(filters.length > 0 && { Filters: filters }),
          ...(token && { NextToken: token }),
        }),
      );
      for (const snapshot of output.Snapshots ?? []) {
        snapshots.push(toSnapshot(snapshot));
      }
      nextToken = output.NextToken;
    } while (nextToken);

    return snapshots;
  }
}
