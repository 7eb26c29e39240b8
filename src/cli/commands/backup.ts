import { parseArgs } from "node:util";
import {
  BACKUP_CONFIG_OPTIONS,
  buildInlineConfig,
  findAndLoadConfig,
  parseSelection,
  targetsLocalInstance,
  withInstanceId,
} from "../../config";
import { type Clock, runSnapshots, type WaitOptions } from "../../core/snapshot";
import { VolsnapError } from "../../core/errors";
import { createComputeProvider, resolveLocalInstanceId } from "../../provider";
import type { ComputeProvider, VolsnapConfig } from "../../types";
import { formatDuration } from "../../utils/format";
import { logger, setLogLevel } from "../../utils/logger";
import { color, formatStatus, formatSummary, type SummaryItem, ui } from "../ui";

/**
 * Seams for tests: the EC2 provider, the local instance lookup and the clock
 */
export interface BackupCommandDeps {
  createProvider?: (config: VolsnapConfig) => ComputeProvider;
  resolveInstanceId?: () => Promise<string>;
  clock?: Clock;
}

export function waitOptionsFromConfig(config: VolsnapConfig, clock?: Clock): WaitOptions {
  const { wait } = config;
  return {
    pollIntervalMs: wait.pollIntervalSeconds * 1000,
    failOnError: wait.failOnError,
    ...(wait.timeoutSeconds !== undefined && { timeoutMs: wait.timeoutSeconds * 1000 }),
    ...(wait.maxAttempts !== undefined && { maxAttempts: wait.maxAttempts }),
    ...(clock && { clock }),
  };
}

function parseBackupArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      volume: { type: "string" },
      device: { type: "string" },
      instance: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      ...BACKUP_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });
}

export async function backupCommand(args: string[], deps: BackupCommandDeps = {}): Promise<number> {
  let parsed: ReturnType<typeof parseBackupArgs>;
  try {
    parsed = parseBackupArgs(args);
  } catch (error) {
    ui.error(error instanceof Error ? error.message : String(error));
    ui.info(`Run ${color.cyan("volsnap backup --help")} for usage`);
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
    const config = await findAndLoadConfig(values.config, buildInlineConfig(values));
    setLogLevel(values.verbose ? "debug" : config.logLevel);

    let selection = parseSelection(values);
    if (targetsLocalInstance(selection)) {
      const resolveInstanceId = deps.resolveInstanceId ?? (() => resolveLocalInstanceId());
      selection = withInstanceId(selection, await resolveInstanceId());
    }

    ui.intro("volsnap backup");

    const provider = (deps.createProvider ?? createComputeProvider)(config);
    const dryRun = values["dry-run"];

    const result = await runSnapshots(provider, {
      selection,
      name: config.name,
      keep: config.keep,
      wait: config.wait.enabled,
      waitOptions: waitOptionsFromConfig(config, deps.clock),
      retainMarker: config.retainMarker,
      rootDevice: config.rootDevice,
      abortOnFirstError: config.abortOnFirstError,
      dryRun,
    });

    if (result.volumes.length === 0) {
      ui.warn("No volumes matched the selection (only the root volume is attached?)");
    }

    for (const volume of result.volumes) {
      const items: SummaryItem[] = [
        { label: "Volume", value: volume.volumeId },
        { label: "Device", value: volume.device },
        { label: "Description", value: volume.description },
        { label: "Snapshot", value: volume.snapshotId },
        { label: "Status", value: volume.snapshotId ? formatStatus(volume.status) : null },
        {
          label: "Tags",
          value: volume.tagsWritten.length > 0 ? volume.tagsWritten.join(", ") : null,
        },
        { label: "Tag warning", value: volume.tagError?.message },
        { label: "Error", value: volume.error?.message },
      ];
      ui.note(formatSummary(items), volume.volumeId);
    }

    ui.note(
      formatSummary([
        { label: "Region", value: config.region },
        { label: "Mode", value: selection.mode },
        { label: "Volumes", value: result.volumes.length },
        { label: "Failed", value: result.failedCount > 0 ? result.failedCount : null },
        { label: "Retention", value: config.keep ? config.retainMarker : "not kept" },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Snapshot Summary",
    );

    if (dryRun) {
      ui.warn("[DRY RUN] No snapshots were created.");
    }

    if (result.failedCount > 0) {
      ui.error(`${result.failedCount} volume(s) failed`);
      return 1;
    }

    ui.outro("Snapshot complete!");
    return 0;
  } catch (error) {
    if (error instanceof VolsnapError) {
      logger.error(error.message, error);
      ui.error(error.message);
    } else {
      ui.error(`Snapshot failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("volsnap backup")} - Snapshot EBS volumes

${color.dim("USAGE:")}
  volsnap backup (--volume <id> | --device <path> [--instance <id>] | --instance <id>) [OPTIONS]

${color.dim("SELECTION (exactly one):")}
      --volume <id>         Snapshot a single volume
      --device <path>       Snapshot the volume attached at <path> (e.g. /dev/sdf)
                            on --instance, or on this instance if omitted
      --instance <id>       Snapshot every non-root volume of an instance
                            ("self" for the instance this runs on)

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./volsnap.config.yaml)
      --region <code>       AWS region (default: us-east-1)
      --endpoint <url>      EC2 endpoint override
      --name <name>         Base name for snapshot descriptions (default: hostname)
      --keep                Tag snapshots with Backup:Expires for the cleanup job
      --wait                Wait for each snapshot to complete
      --poll-interval <s>   Seconds between status checks (default: 1)
      --wait-timeout <s>    Give up waiting after <s> seconds (default: never)
      --max-attempts <n>    Give up waiting after <n> status checks (default: never)
      --fail-on-error       Stop waiting when a snapshot enters the error state
      --continue-on-error   In instance mode, keep going when a volume fails
      --root-device <path>  Device skipped in instance mode (default: /dev/sda1)
      --dry-run             Show what would be snapshotted without doing it
      --log-level <level>   debug, info, warning, error, critical (default: info)
  -v, --verbose             Verbose output (same as --log-level debug)
  -h, --help                Show this help message

${color.dim("EXAMPLES:")}
  volsnap backup --instance self --keep        # All data volumes of this host
  volsnap backup --device /dev/sdf --wait      # One device on this host
  volsnap backup --volume vol-0abc --name db   # One volume by id
  volsnap backup --instance i-0abc --dry-run   # Preview an instance run
`);
}
