import path from "node:path";

import { detectCpuCount, parseJobCount } from "../../core/cpu";
import { createExperimentId } from "../../core/experiment-id";
import type { FileConfig } from "../../infra/fs/config-file";
import type { CliFlags } from "./args";
import {
  DEFAULT_EXPERIMENT_ROOT,
  DEFAULT_EXPERIMENT_TARGET,
  DEFAULT_MAKE,
  DEFAULT_PREPARE_TARGETS,
  EXPERIMENT_ENV,
  type JobsSource,
  MAKE_ENV,
  NUM_PROCS_ENV,
  type RunConfig,
} from "./options";

export type Env = Readonly<Record<string, string | undefined>>;

export type ResolveRunConfigOptions = {
  cwd: string;
  flags: CliFlags;
  env: Env;
  fileConfig: FileConfig | null;
  now?: () => Date;
  detectCpus?: () => number;
};

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  if (!value) {
    return;
  }
  return value;
}

function resolveJobs(
  options: ResolveRunConfigOptions
): { jobs: number; jobsSource: JobsSource } {
  if (options.flags.jobs !== undefined) {
    return {
      jobs: parseJobCount(options.flags.jobs, "--jobs"),
      jobsSource: "flag",
    };
  }

  const fromEnv = readEnv(options.env, NUM_PROCS_ENV);
  if (fromEnv !== undefined) {
    return { jobs: parseJobCount(fromEnv, NUM_PROCS_ENV), jobsSource: "env" };
  }

  if (options.fileConfig?.jobs !== undefined) {
    return { jobs: options.fileConfig.jobs, jobsSource: "config" };
  }

  return {
    jobs: detectCpuCount(options.detectCpus),
    jobsSource: "detected",
  };
}

/**
 * With `--pick` or `--new-experiment`, only experiments named by flag are
 * kept; EXPERIMENT and the config file's list are ignored.
 */
function resolveExperiments(
  options: ResolveRunConfigOptions,
  experimentRoot: string
): string[] {
  const { flags } = options;
  const experiments = [...flags.experiments];

  if (experiments.length === 0 && !flags.pick && !flags.newExperiment) {
    const fromEnv = readEnv(options.env, EXPERIMENT_ENV);
    if (fromEnv !== undefined) {
      experiments.push(fromEnv);
    } else if (options.fileConfig?.experiments) {
      experiments.push(...options.fileConfig.experiments);
    }
  }

  if (flags.newExperiment) {
    const now = options.now ?? (() => new Date());
    experiments.push(path.join(experimentRoot, createExperimentId(now())));
  }

  return experiments;
}

export function resolveRunConfig(options: ResolveRunConfigOptions): RunConfig {
  const { flags, fileConfig } = options;

  const experimentRoot =
    flags.experimentRoot ??
    fileConfig?.experimentRoot ??
    DEFAULT_EXPERIMENT_ROOT;

  return {
    cwd: options.cwd,
    make:
      flags.make ??
      readEnv(options.env, MAKE_ENV) ??
      fileConfig?.make ??
      DEFAULT_MAKE,
    ...resolveJobs(options),
    prepareTargets: fileConfig?.prepareTargets ?? [...DEFAULT_PREPARE_TARGETS],
    experimentTarget: fileConfig?.experimentTarget ?? DEFAULT_EXPERIMENT_TARGET,
    experimentRoot,
    experiments: resolveExperiments(options, experimentRoot),
    skipPrepare: flags.skipPrepare,
    keepGoing: flags.keepGoing,
    dryRun: flags.dryRun,
    reportFile: flags.report ?? null,
  };
}
