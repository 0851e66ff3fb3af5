import {
  EXPERIMENT_ENV,
  type RunConfig,
  type StepKind,
} from "../../config/options";

export type RunStep = {
  kind: StepKind;
  target: string;
  command: string;
  args: readonly string[];
  env: Readonly<Record<string, string>>;
  experimentDir: string | null;
  banner: string | null;
  timed: boolean;
};

export type RunPlanInput = Pick<
  RunConfig,
  | "make"
  | "jobs"
  | "prepareTargets"
  | "experimentTarget"
  | "experiments"
  | "skipPrepare"
>;

export function buildRunPlan(input: RunPlanInput): RunStep[] {
  const steps: RunStep[] = [];

  if (!input.skipPrepare) {
    for (const target of input.prepareTargets) {
      steps.push({
        kind: "prepare",
        target,
        command: input.make,
        args: ["-r", target],
        env: {},
        experimentDir: null,
        banner: null,
        timed: false,
      });
    }
  }

  // No directory given: one run, EXPERIMENT left to the Makefile.
  const experimentDirs: (string | null)[] =
    input.experiments.length > 0 ? [...input.experiments] : [null];

  experimentDirs.forEach((experimentDir, index) => {
    steps.push({
      kind: "experiment",
      target: input.experimentTarget,
      command: input.make,
      args: ["-r", `-j${input.jobs}`, input.experimentTarget],
      env: experimentDir === null ? {} : { [EXPERIMENT_ENV]: experimentDir },
      experimentDir,
      banner: `Experiment ${index + 1} out of ${experimentDirs.length}: running with ${input.jobs} processes`,
      timed: true,
    });
  });

  return steps;
}

export function quoteShellArg(value: string): string {
  if (value === "") {
    return "''";
  }
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

export function formatCommandLine(step: RunStep): string {
  const envAssignments = Object.entries(step.env).map(
    ([name, value]) => `${name}=${quoteShellArg(value)}`
  );
  return [
    ...envAssignments,
    quoteShellArg(step.command),
    ...step.args.map(quoteShellArg),
  ].join(" ");
}
