import type { StepStatus } from "../../../config/options";
import type { StepReport } from "../../../../core/report/types";
import type { CommandResult } from "../../../../infra/process/run-command";
import { formatCommandLine, type RunStep } from "../plan";

export function createStepReport(
  step: RunStep,
  status: StepStatus,
  outcome?: { result: CommandResult; durationMs: number }
): StepReport {
  return {
    kind: step.kind,
    target: step.target,
    commandLine: formatCommandLine(step),
    experimentDir: step.experimentDir,
    status,
    exitCode: outcome?.result.exitCode ?? null,
    signal: outcome?.result.signal ?? null,
    durationMs: outcome?.durationMs ?? null,
  };
}

export function describeFailure(
  step: Pick<StepReport, "target" | "exitCode" | "signal">,
  message: string | null = null
): string {
  if (step.exitCode !== null) {
    return `${step.target} failed with exit code ${step.exitCode}`;
  }
  if (step.signal !== null) {
    return `${step.target} was terminated by ${step.signal}`;
  }
  return `${step.target} failed to start: ${message ?? "unknown error"}`;
}
