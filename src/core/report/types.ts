import type {
  JobsSource,
  StepKind,
  StepStatus,
} from "../../cli/config/options";

export type StepReport = {
  kind: StepKind;
  target: string;
  commandLine: string;
  experimentDir: string | null;
  status: StepStatus;
  exitCode: number | null;
  signal: string | null;
  durationMs: number | null;
};

export type RunReport = {
  generatedAt: string;
  cwd: string;
  make: string;
  jobs: number;
  jobsSource: JobsSource;
  dryRun: boolean;
  ok: boolean;
  steps: StepReport[];
};
