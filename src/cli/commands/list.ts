import { parseArgs } from "node:util";
import {
  buildInlineConfig,
  findAndLoadConfig,
  INLINE_CONFIG_OPTIONS,
  LOCAL_INSTANCE,
} from "../../config";
import { ConfigError } from "../../config/validator";
import { DEVICE_TAG, EXPIRES_TAG } from "../../core/snapshot/tag-propagator";
import { resolveTargets } from "../../core/snapshot/target-resolver";
import { createComputeProvider, resolveLocalInstanceId } from "../../provider";
import type { ComputeProvider, Snapshot, VolsnapConfig } from "../../types";
import { formatTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, formatStatus, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export interface ListCommandDeps {
  createProvider?: (config: VolsnapConfig) => ComputeProvider;
  resolveInstanceId?: () => Promise<string>;
}

const FORMATS = ["table", "json", "csv"];

function parseListArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      volume: { type: "string", multiple: true },
      instance: { type: "string" },
      all: { type: "boolean", default: false },
      format: { type: "string", default: "table" },
      limit: { type: "string", short: "n" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });
}

export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!/^\d+$/.test(value.trim()) || limit < 1) {
    throw new ConfigError(`--limit must be a positive whole number, got "${value}"`);
  }
  return limit;
}

/**
 * Newest first
 */
export function sortSnapshots(snapshots: Snapshot[]): Snapshot[] {
  return [...snapshots].sort(
    (a, b) => (b.startTime?.getTime() ?? 0) - (a.startTime?.getTime() ?? 0),
  );
}

export async function listCommand(args: string[], deps: ListCommandDeps = {}): Promise<number> {
  let parsed: ReturnType<typeof parseListArgs>;
  try {
    parsed = parseListArgs(args);
  } catch (error) {
    ui.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
  const { values } = parsed;

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    if (!FORMATS.includes(values.format)) {
      throw new ConfigError(`--format must be one of: ${FORMATS.join(", ")}`);
    }
    if (values.volume && values.instance !== undefined) {
      throw new ConfigError("--volume cannot be combined with --instance");
    }
    const limit = parseLimit(values.limit);

    const config = await findAndLoadConfig(values.config, buildInlineConfig(values));
    setLogLevel(values.verbose ? "debug" : config.logLevel);

    const provider = (deps.createProvider ?? createComputeProvider)(config);

    let volumeIds = values.volume;
    if (values.instance !== undefined) {
      let instanceId = values.instance || LOCAL_INSTANCE;
      if (instanceId === LOCAL_INSTANCE) {
        instanceId = await (deps.resolveInstanceId ?? (() => resolveLocalInstanceId()))();
      }
      const volumes = await resolveTargets({ mode: "instance", instanceId }, provider, {
        rootDevice: config.rootDevice,
      });
      volumeIds = volumes.map((v) => v.volumeId);
      if (volumeIds.length === 0) {
        ui.info(`Instance ${instanceId} has no volumes besides the root volume`);
        return 0;
      }
    }

    let snapshots = sortSnapshots(
      await provider.listSnapshots({
        ...(volumeIds && { volumeIds }),
        managedOnly: !values.all,
      }),
    );

    if (limit !== undefined) {
      snapshots = snapshots.slice(0, limit);
    }

    // Output based on format - no intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(snapshots, null, 2));
        return 0;
      case "csv":
        printCsv(snapshots);
        return 0;
      default:
        ui.intro("volsnap list");

        if (snapshots.length === 0) {
          ui.info("No snapshots found");
          ui.outro("Done");
          return 0;
        }

        printTable(snapshots);

        ui.outro(`${snapshots.length} snapshot(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(snapshots: Snapshot[]): void {
  const widths = [
    TABLE_WIDTHS.snapshotId,
    TABLE_WIDTHS.volumeId,
    TABLE_WIDTHS.device,
    TABLE_WIDTHS.started,
    TABLE_WIDTHS.expires,
    TABLE_WIDTHS.status,
  ];
  const headers = ["Snapshot", "Volume", "Device", "Started", "Expires", "Status"];

  ui.step("Snapshots:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const snapshot of snapshots) {
    console.log(
      formatTableRow(
        [
          snapshot.snapshotId,
          snapshot.volumeId,
          snapshot.tags[DEVICE_TAG] ?? color.dim("-"),
          formatTimestamp(snapshot.startTime),
          snapshot.tags[EXPIRES_TAG] ?? "",
          formatStatus(snapshot.status),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

export function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function printCsv(snapshots: Snapshot[]): void {
  console.log("snapshot_id,volume_id,device,status,start_time,expires,description");

  for (const snapshot of snapshots) {
    console.log(
      [
        snapshot.snapshotId,
        snapshot.volumeId,
        snapshot.tags[DEVICE_TAG] ?? "",
        snapshot.status,
        snapshot.startTime?.toISOString() ?? "",
        snapshot.tags[EXPIRES_TAG] ?? "",
        snapshot.description ?? "",
      ]
        .map(csvField)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("volsnap list")} - List snapshots created by volsnap

${color.dim("USAGE:")}
  volsnap list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./volsnap.config.yaml)
      --volume <id>       Only snapshots of this volume (can be repeated)
      --instance <id>     Only snapshots of this instance's non-root volumes
                          ("self" for the instance this runs on)
      --all               Include snapshots not created by volsnap
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
      --region <code>     AWS region (default: us-east-1)
      --endpoint <url>    EC2 endpoint override
      --log-level <level> debug, info, warning, error, critical (default: info)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  volsnap list                             # All volsnap snapshots in the region
  volsnap list --instance self             # Snapshots of this host's volumes
  volsnap list --volume vol-0abc -n 5      # Last 5 snapshots of one volume
  volsnap list --format json               # Output as JSON (for scripting)
`);
}
