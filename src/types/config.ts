/**
 * Configuration type definitions for volsnap
 */

import type { LogLevel } from "../utils/logger";

export type CredentialSource = "default" | "environment" | "static";

export interface CredentialsConfig {
  source: CredentialSource;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
}

export interface WaitConfig {
  /** Block until each snapshot completes */
  enabled: boolean;
  pollIntervalSeconds: number;
  /** Give up after this many seconds (default: wait forever) */
  timeoutSeconds?: number;
  /** Give up after this many status fetches (default: unbounded) */
  maxAttempts?: number;
  /** Fail as soon as the provider reports the error state instead of polling on */
  failOnError: boolean;
}

export interface VolsnapConfig {
  region: string;
  /** Base name for snapshot descriptions (default: local hostname) */
  name: string;
  /** Tag snapshots with Backup:Expires */
  keep: boolean;
  logLevel: LogLevel;
  /** Device path excluded from instance-wide runs */
  rootDevice: string;
  /** Value written to Backup:Expires */
  retainMarker: string;
  /** In instance mode, stop at the first failing volume */
  abortOnFirstError: boolean;
  /** EC2 endpoint override (e.g. a local emulator) */
  endpoint?: string;
  wait: WaitConfig;
  credentials: CredentialsConfig;
}

/**
 * Config file contents and CLI overrides: any subset of the config
 */
export type ConfigOverrides = {
  [K in keyof VolsnapConfig]?: VolsnapConfig[K] extends object
    ? Partial<VolsnapConfig[K]>
    : VolsnapConfig[K];
};
