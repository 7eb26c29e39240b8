/**
 * Error taxonomy for the snapshot pipeline
 */

export class VolsnapError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VolsnapError";
    this.code = code;
  }
}

export type ResolutionErrorCode = "NotFound" | "NoSuchDevice";

/**
 * The selected volume, instance or device does not exist
 */
export class ResolutionError extends VolsnapError {
  declare readonly code: ResolutionErrorCode;

  constructor(code: ResolutionErrorCode, message: string) {
    super(code, message);
    this.name = "ResolutionError";
  }
}

/**
 * A control-plane call failed (transport, auth, throttling, quota...)
 */
export class ProviderError extends VolsnapError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ProviderError";
  }
}

/**
 * Tagging stopped partway. The snapshot exists and keeps the tags in `written`.
 */
export class PartialTagError extends VolsnapError {
  constructor(
    readonly snapshotId: string,
    readonly written: string[],
    readonly failedKey: string,
    cause: unknown,
  ) {
    super(
      "PartialTag",
      `Tagging ${snapshotId} stopped at "${failedKey}" after ${written.length} tag(s): ${describeCause(cause)}`,
      { cause },
    );
    this.name = "PartialTagError";
  }
}

export class WaitTimeoutError extends VolsnapError {
  constructor(
    readonly snapshotId: string,
    readonly attempts: number,
    readonly elapsedMs: number,
  ) {
    super(
      "WaitTimeout",
      `Snapshot ${snapshotId} did not complete after ${attempts} status check(s) (${elapsedMs}ms)`,
    );
    this.name = "WaitTimeoutError";
  }
}

export class SnapshotFailedError extends VolsnapError {
  constructor(readonly snapshotId: string) {
    super("SnapshotFailed", `Snapshot ${snapshotId} entered the error state`);
    this.name = "SnapshotFailedError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
