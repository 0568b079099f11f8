/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { flatMap } from "@proplens/metadata";
import type {
  ProplensConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "proplens.json";

const readJson = (configPath: string): Result<unknown, string> => {
  try {
    const value: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

const isStringList = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Validate the parsed file contents
 */
const parseConfig = (data: unknown): Result<ProplensConfig, string> => {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: must be an object` };
  }

  const descriptors: unknown = Reflect.get(data, "descriptors");
  const sources: unknown = Reflect.get(data, "sources");
  const canBypassVisibility: unknown = Reflect.get(data, "canBypassVisibility");

  if (descriptors !== undefined && !isStringList(descriptors)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'descriptors' must be an array of paths`,
    };
  }
  if (sources !== undefined && !isStringList(sources)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'sources' must be an array of paths`,
    };
  }
  if (canBypassVisibility !== undefined && typeof canBypassVisibility !== "boolean") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'canBypassVisibility' must be a boolean`,
    };
  }

  return { ok: true, value: { descriptors, sources, canBypassVisibility } };
};

/**
 * Load proplens.json
 */
export const loadConfig = (
  configPath: string
): Result<ProplensConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  return flatMap(readJson(configPath), parseConfig);
};

/**
 * Find proplens.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find proplens.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Paths from the file are relative to `projectRoot`, paths from the
 * command line to `cwd`; command line inputs follow the file's.
 */
export const resolveConfig = (
  config: ProplensConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string = process.cwd()
): ResolvedConfig => {
  const fromFile = (paths: readonly string[] | undefined): string[] =>
    (paths ?? []).map((p) => resolve(projectRoot, p));
  const fromCli = (paths: readonly string[] | undefined): string[] =>
    (paths ?? []).map((p) => resolve(cwd, p));

  return {
    projectRoot,
    descriptors: [
      ...fromFile(config.descriptors),
      ...fromCli(cliOptions.descriptors),
    ],
    sources: [...fromFile(config.sources), ...fromCli(cliOptions.sources)],
    canBypassVisibility:
      cliOptions.bypassVisibility ?? config.canBypassVisibility ?? true,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
