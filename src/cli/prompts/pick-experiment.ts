import path from "node:path";

import { ConfigError } from "../../core/errors";
import { listExperimentDirs } from "../../infra/fs/experiments";
import type { ClackUi } from "../ui/clack-ui";

export async function promptPickExperiment(
  ui: ClackUi,
  options: { cwd: string; experimentRoot: string }
): Promise<string | null> {
  const dirs = await listExperimentDirs(options.cwd, options.experimentRoot);
  if (dirs.length === 0) {
    throw new ConfigError(
      `No experiment directories found under ${path.resolve(options.cwd, options.experimentRoot)}`
    );
  }

  return ui.selectOne(
    "Which experiment should run?",
    dirs.map((dir, index) => ({
      value: dir,
      label: dir,
      hint: index === 0 ? "latest" : undefined,
    }))
  );
}
