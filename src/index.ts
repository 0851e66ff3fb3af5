export { type RunCliOptions, runCli } from "./cli/run-cli";
export { parseCliArgs, type CliFlags } from "./cli/config/args";
export type { RunConfig, StepKind, StepStatus } from "./cli/config/options";
export { resolveRunConfig } from "./cli/config/resolve";
export {
  type RunExperimentFlowOptions,
  runExperimentFlow,
} from "./cli/flows/experiment-flow";
export {
  buildRunPlan,
  formatCommandLine,
  formatRunSummaryMarkdown,
  type RunStep,
  writeRunReportJson,
} from "./cli/tasks/experiment";
export { detectCpuCount, parseJobCount } from "./core/cpu";
export { ConfigError, UsageError } from "./core/errors";
export { createExperimentId } from "./core/experiment-id";
export type { RunReport, StepReport } from "./core/report/types";
export { formatElapsed } from "./core/timing";
export { loadConfigFile, type FileConfig } from "./infra/fs/config-file";
export { listExperimentDirs } from "./infra/fs/experiments";
export {
  type CommandResult,
  type CommandRunner,
  runCommand,
} from "./infra/process/run-command";
