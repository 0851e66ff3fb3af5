export const VERSION = "0.1.0";

export const DEFAULT_MAKE = "make";
export const DEFAULT_PREPARE_TARGETS = ["extras", "build_ext"] as const;
export const DEFAULT_EXPERIMENT_TARGET = "experiment";
export const DEFAULT_EXPERIMENT_ROOT = "study-preds";
export const DEFAULT_CONFIG_FILE = "run-experiment.yaml";

export const EXPERIMENT_ENV = "EXPERIMENT";
export const NUM_PROCS_ENV = "NUM_PROCS";
export const MAKE_ENV = "MAKE";

export const stepKindValues = ["prepare", "experiment"] as const;
export type StepKind = (typeof stepKindValues)[number];

export const stepStatusValues = [
  "succeeded",
  "failed",
  "skipped",
  "planned",
] as const;
export type StepStatus = (typeof stepStatusValues)[number];

export const jobsSourceValues = ["flag", "env", "config", "detected"] as const;
export type JobsSource = (typeof jobsSourceValues)[number];

export type RunConfig = {
  cwd: string;
  make: string;
  jobs: number;
  jobsSource: JobsSource;
  prepareTargets: readonly string[];
  experimentTarget: string;
  experimentRoot: string;
  experiments: readonly string[];
  skipPrepare: boolean;
  keepGoing: boolean;
  dryRun: boolean;
  reportFile: string | null;
};
