import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { isExperimentId } from "../../core/experiment-id";
import { isNodeError } from "../../core/errors";

/** Existing `exp-<timestamp>` directories under `root`, newest first. */
export async function listExperimentDirs(
  cwd: string,
  root: string
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.resolve(cwd, root), {
      withFileTypes: true,
    });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isDirectory() && isExperimentId(entry.name))
    .map((entry) => entry.name)
    .sort()
    .reverse()
    .map((name) => path.join(root, name));
}
