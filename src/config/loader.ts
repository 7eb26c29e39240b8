/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ConfigOverrides, VolsnapConfig } from "../types";
import { logger, parseLogLevel } from "../utils/logger";
import { DEFAULT_CONFIG, deepMerge, defaultName, isPlainObject } from "./defaults";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = ["volsnap.config.yaml", "volsnap.config.yml", "volsnap.config.json"];

export function parseConfigContent(content: string, ext: string): Record<string, unknown> {
  let parsed: unknown;

  if (ext === ".yaml" || ext === ".yml") {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (ext === ".json") {
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
  }

  // An empty YAML document loads as undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config file must contain a mapping at the top level");
  }
  return parsed;
}

/**
 * Read and parse a config file without applying defaults
 */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  return parseConfigContent(content, path.extname(absolutePath).toLowerCase());
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Defaults, then the config file, then overrides; validated as a whole
 */
export function buildConfig(
  fileConfig: Record<string, unknown>,
  overrides: ConfigOverrides = {},
): VolsnapConfig {
  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, fileConfig), overrides);
  // Same severity names as --log-level
  const logLevel = merged.logLevel;
  if (typeof logLevel === "string") {
    merged.logLevel = parseLogLevel(logLevel) ?? logLevel;
  }
  validateConfig(merged);

  return {
    ...merged,
    name: merged.name.trim() === "" ? defaultName() : merged.name,
  };
}

/**
 * Load the config from an explicit path, the working directory, or defaults
 * alone when there is no file
 */
export async function findAndLoadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
): Promise<VolsnapConfig> {
  const found = configPath ?? findConfigFile();

  if (!found) {
    logger.debug("No config file found, using defaults");
    return buildConfig({}, overrides);
  }

  logger.debug(`Loading config from ${found}`);
  return buildConfig(await readConfigFile(found), overrides);
}
