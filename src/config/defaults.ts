/**
 * Default configuration values
 */

import * as os from "node:os";
import type { VolsnapConfig } from "../types";

export const DEFAULT_CONFIG: VolsnapConfig = {
  region: "us-east-1",
  // name is filled in from the hostname at load time
  name: "",
  keep: false,
  logLevel: "info",
  rootDevice: "/dev/sda1",
  retainMarker: "Never",
  abortOnFirstError: true,
  wait: {
    enabled: false,
    pollIntervalSeconds: 1,
    failOnError: false,
  },
  credentials: {
    source: "default",
  },
};

export function defaultName(): string {
  return os.hostname();
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target));
  const sourceEntries: [string, unknown][] = Object.entries(source);

  for (const [key, sourceValue] of sourceEntries) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
