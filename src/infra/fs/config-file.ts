import fs from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { DEFAULT_CONFIG_FILE } from "../../cli/config/options";
import { ConfigError, isNodeError } from "../../core/errors";

export type FileConfig = {
  path: string;
  make?: string;
  jobs?: number;
  prepareTargets?: string[];
  experimentTarget?: string;
  experimentRoot?: string;
  experiments?: string[];
};

const knownKeys = new Set([
  "make",
  "jobs",
  "prepareTargets",
  "experimentTarget",
  "experimentRoot",
  "experiments",
]);

function readString(
  raw: Record<string, unknown>,
  key: string,
  filePath: string
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return;
  }
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`"${key}" in ${filePath} must be a non-empty string`);
  }
  return value;
}

function readStringList(
  raw: Record<string, unknown>,
  key: string,
  filePath: string
): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return;
  }
  if (
    !Array.isArray(value) ||
    !value.every(
      (entry): entry is string => typeof entry === "string" && entry.length > 0
    )
  ) {
    throw new ConfigError(`"${key}" in ${filePath} must be a list of strings`);
  }
  return value;
}

function readJobs(
  raw: Record<string, unknown>,
  filePath: string
): number | undefined {
  const value = raw.jobs;
  if (value === undefined || value === null) {
    return;
  }
  if (
    typeof value !== "number" ||
    !Number.isSafeInteger(value) ||
    value < 1
  ) {
    throw new ConfigError(`"jobs" in ${filePath} must be a positive integer`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfigFile(source: string, filePath: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(source);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigError(`Invalid YAML in ${filePath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return { path: filePath };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping`);
  }

  for (const key of Object.keys(parsed)) {
    if (!knownKeys.has(key)) {
      throw new ConfigError(`Unknown key "${key}" in ${filePath}`);
    }
  }

  return {
    path: filePath,
    make: readString(parsed, "make", filePath),
    jobs: readJobs(parsed, filePath),
    prepareTargets: readStringList(parsed, "prepareTargets", filePath),
    experimentTarget: readString(parsed, "experimentTarget", filePath),
    experimentRoot: readString(parsed, "experimentRoot", filePath),
    experiments: readStringList(parsed, "experiments", filePath),
  };
}

/**
 * Reads the YAML config. The default file is optional; a path given
 * explicitly must exist.
 */
export async function loadConfigFile(
  cwd: string,
  explicitPath?: string
): Promise<FileConfig | null> {
  const filePath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      if (explicitPath === undefined) {
        return null;
      }
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw error;
  }

  return parseConfigFile(source, filePath);
}
