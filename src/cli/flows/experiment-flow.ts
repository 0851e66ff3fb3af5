import type { RunConfig } from "../config/options";
import type { RunReport, StepReport } from "../../core/report/types";
import { type Clock, formatElapsed, systemClock } from "../../core/timing";
import {
  type CommandRunner,
  runCommand,
} from "../../infra/process/run-command";
import { buildRunPlan, formatCommandLine } from "../tasks/experiment/plan";
import {
  createStepReport,
  describeFailure,
} from "../tasks/experiment/report/build";
import type { ClackUi } from "../ui/clack-ui";

export type RunExperimentFlowOptions = {
  config: RunConfig;
  ui: ClackUi;
  runner?: CommandRunner;
  clock?: Clock;
  now?: () => Date;
};

/**
 * Runs prepare targets, then each experiment, strictly one process at a
 * time. Step failures end up in the report rather than being thrown.
 */
export async function runExperimentFlow(
  options: RunExperimentFlowOptions
): Promise<RunReport> {
  const { config, ui } = options;
  const runner = options.runner ?? runCommand;
  const clock = options.clock ?? systemClock;
  const now = options.now ?? (() => new Date());

  const generatedAt = now().toISOString();
  const steps: StepReport[] = [];
  let halted = false;

  for (const step of buildRunPlan(config)) {
    if (halted) {
      steps.push(createStepReport(step, "skipped"));
      continue;
    }

    if (step.banner !== null) {
      ui.info(step.banner);
    }
    ui.step(formatCommandLine(step));

    if (config.dryRun) {
      steps.push(createStepReport(step, "planned"));
      continue;
    }

    const startedAt = clock();
    const result = await runner(step.command, step.args, {
      cwd: config.cwd,
      env: step.env,
    });
    const durationMs = clock() - startedAt;

    if (step.timed) {
      ui.print(`real\t${formatElapsed(durationMs)}`);
    }

    if (result.exitCode === 0) {
      steps.push(
        createStepReport(step, "succeeded", { result, durationMs })
      );
      continue;
    }

    const report = createStepReport(step, "failed", { result, durationMs });
    steps.push(report);
    ui.error(describeFailure(report, result.message));

    // A failed prepare step halts even with keepGoing.
    if (step.kind === "prepare" || !config.keepGoing) {
      halted = true;
    }
  }

  return {
    generatedAt,
    cwd: config.cwd,
    make: config.make,
    jobs: config.jobs,
    jobsSource: config.jobsSource,
    dryRun: config.dryRun,
    ok: steps.every((step) => step.status !== "failed"),
    steps,
  };
}
