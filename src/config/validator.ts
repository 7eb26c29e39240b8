/**
 * Configuration validation
 */

import { VolsnapError } from "../core/errors";
import type { VolsnapConfig } from "../types";
import { isLogLevel } from "../utils/logger";
import { isPlainObject } from "./defaults";

export class ConfigError extends VolsnapError {
  constructor(message: string) {
    super("ConfigError", message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

const CREDENTIAL_SOURCES = ["default", "environment", "static"];

function requireString(value: unknown, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${field} must be a non-empty string`);
  }
}

function requireBoolean(value: unknown, field: string): void {
  if (typeof value !== "boolean") {
    throw new ConfigError(`${field} must be a boolean`);
  }
}

function requirePositiveNumber(value: unknown, field: string): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive number`);
  }
}

const validators: Record<string, Validator> = {
  region: (c) => requireString(c.region, "region"),

  name: (c) => {
    if (typeof c.name !== "string") {
      throw new ConfigError("name must be a string");
    }
  },

  keep: (c) => requireBoolean(c.keep, "keep"),

  logLevel: (c) => {
    if (!isLogLevel(c.logLevel)) {
      throw new ConfigError(
        "logLevel must be one of: debug, info, warn, warning, error, critical",
      );
    }
  },

  rootDevice: (c) => {
    requireString(c.rootDevice, "rootDevice");
    if (typeof c.rootDevice === "string" && !c.rootDevice.startsWith("/dev/")) {
      throw new ConfigError(`rootDevice must be a device path such as /dev/sda1, got "${c.rootDevice}"`);
    }
  },

  retainMarker: (c) => requireString(c.retainMarker, "retainMarker"),

  abortOnFirstError: (c) => requireBoolean(c.abortOnFirstError, "abortOnFirstError"),

  endpoint: (c) => {
    if (c.endpoint === undefined) {
      return;
    }
    requireString(c.endpoint, "endpoint");
    if (typeof c.endpoint === "string" && !URL.canParse(c.endpoint)) {
      throw new ConfigError(`endpoint must be a URL, got "${c.endpoint}"`);
    }
  },

  wait: (c) => {
    const wait = c.wait;
    if (!isPlainObject(wait)) {
      throw new ConfigError("wait must be an object");
    }
    requireBoolean(wait.enabled, "wait.enabled");
    requirePositiveNumber(wait.pollIntervalSeconds, "wait.pollIntervalSeconds");
    requireBoolean(wait.failOnError, "wait.failOnError");
    if (wait.timeoutSeconds !== undefined) {
      requirePositiveNumber(wait.timeoutSeconds, "wait.timeoutSeconds");
    }
    if (
      wait.maxAttempts !== undefined &&
      (typeof wait.maxAttempts !== "number" ||
        !Number.isInteger(wait.maxAttempts) ||
        wait.maxAttempts < 1)
    ) {
      throw new ConfigError("wait.maxAttempts must be a positive integer");
    }
  },

  credentials: (c) => {
    const credentials = c.credentials;
    if (!isPlainObject(credentials)) {
      throw new ConfigError("credentials must be an object");
    }
    if (typeof credentials.source !== "string" || !CREDENTIAL_SOURCES.includes(credentials.source)) {
      throw new ConfigError(
        `credentials.source must be one of: ${CREDENTIAL_SOURCES.join(", ")}`,
      );
    }
    for (const field of ["accessKeyId", "secretAccessKey", "sessionToken"]) {
      if (credentials[field] !== undefined && typeof credentials[field] !== "string") {
        throw new ConfigError(`credentials.${field} must be a string`);
      }
    }
    if (
      credentials.source === "static" &&
      (!credentials.accessKeyId || !credentials.secretAccessKey)
    ) {
      throw new ConfigError(
        "credentials.accessKeyId and credentials.secretAccessKey are required when credentials.source is 'static'",
      );
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is VolsnapConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
