/**
 * Command-line overrides for the config file
 */

import type { ConfigOverrides, WaitConfig } from "../types";
import { parseLogLevel } from "../utils/logger";
import { ConfigError } from "./validator";

/**
 * parseArgs option definitions shared by commands that talk to EC2
 */
export const INLINE_CONFIG_OPTIONS = {
  region: { type: "string" as const },
  endpoint: { type: "string" as const },
  "log-level": { type: "string" as const },
} as const;

/**
 * parseArgs option definitions for the backup command
 */
export const BACKUP_CONFIG_OPTIONS = {
  ...INLINE_CONFIG_OPTIONS,
  name: { type: "string" as const },
  keep: { type: "boolean" as const },
  wait: { type: "boolean" as const },
  "wait-timeout": { type: "string" as const },
  "poll-interval": { type: "string" as const },
  "max-attempts": { type: "string" as const },
  "fail-on-error": { type: "boolean" as const },
  "continue-on-error": { type: "boolean" as const },
  "root-device": { type: "string" as const },
} as const;

/**
 * Parsed values of the inline options, as parseArgs returns them
 */
export interface InlineValues {
  region?: string;
  endpoint?: string;
  "log-level"?: string;
  name?: string;
  keep?: boolean;
  wait?: boolean;
  "wait-timeout"?: string;
  "poll-interval"?: string;
  "max-attempts"?: string;
  "fail-on-error"?: boolean;
  "continue-on-error"?: boolean;
  "root-device"?: string;
}

function parseNumberOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`--${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/**
 * Turn parsed CLI values into config overrides. Flags that were not given
 * leave the config file's value in place.
 */
export function buildInlineConfig(values: InlineValues): ConfigOverrides {
  const config: ConfigOverrides = {};

  if (values.region !== undefined) config.region = values.region;
  if (values.endpoint !== undefined) config.endpoint = values.endpoint;
  if (values.name !== undefined) config.name = values.name;
  if (values.keep !== undefined) config.keep = values.keep;
  if (values["root-device"] !== undefined) config.rootDevice = values["root-device"];
  if (values["continue-on-error"]) config.abortOnFirstError = false;

  if (values["log-level"] !== undefined) {
    const level = parseLogLevel(values["log-level"]);
    if (!level) {
      throw new ConfigError(
        `--log-level must be one of: debug, info, warn, warning, error, critical (got "${values["log-level"]}")`,
      );
    }
    config.logLevel = level;
  }

  const wait: Partial<WaitConfig> = {};
  if (values.wait !== undefined) wait.enabled = values.wait;
  if (values["fail-on-error"] !== undefined) wait.failOnError = values["fail-on-error"];

  const timeoutSeconds = parseNumberOption(values["wait-timeout"], "wait-timeout");
  if (timeoutSeconds !== undefined) wait.timeoutSeconds = timeoutSeconds;

  const pollIntervalSeconds = parseNumberOption(values["poll-interval"], "poll-interval");
  if (pollIntervalSeconds !== undefined) wait.pollIntervalSeconds = pollIntervalSeconds;

  const maxAttempts = parseNumberOption(values["max-attempts"], "max-attempts");
  if (maxAttempts !== undefined) {
    if (!Number.isInteger(maxAttempts)) {
      throw new ConfigError(`--max-attempts must be a whole number, got "${values["max-attempts"]}"`);
    }
    wait.maxAttempts = maxAttempts;
  }

  if (Object.keys(wait).length > 0) {
    config.wait = wait;
  }

  return config;
}
