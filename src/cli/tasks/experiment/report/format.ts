import type { RunReport, StepReport } from "../../../../core/report/types";
import { formatElapsed } from "../../../../core/timing";

export function formatRunSummaryMarkdown(report: RunReport): string {
  const lines: string[] = [
    "# run-experiment",
    "",
    `- Generated at: ${report.generatedAt}`,
    `- Directory: ${report.cwd}`,
    `- Make: ${report.make}`,
    `- Jobs: ${report.jobs} (${report.jobsSource})`,
  ];
  if (report.dryRun) {
    lines.push("- Mode: dry run");
  }
  lines.push("", "## Steps", "");

  for (const step of report.steps) {
    lines.push(formatStepLine(step));
  }

  lines.push("", formatResultLine(report));
  return `${lines.join("\n")}\n`;
}

function formatStepLine(step: StepReport): string {
  const context =
    step.experimentDir === null
      ? step.kind
      : `${step.kind}, EXPERIMENT=${step.experimentDir}`;
  return `- \`${step.target}\` (${context}): ${formatStatus(step)}`;
}

function formatStatus(step: StepReport): string {
  if (step.status === "succeeded") {
    return `succeeded in ${formatElapsed(step.durationMs ?? 0)}`;
  }
  if (step.status === "skipped") {
    return "skipped";
  }
  if (step.status === "planned") {
    return `planned \`${step.commandLine}\``;
  }

  let reason = "failed to start";
  if (step.exitCode !== null) {
    reason = `failed with exit code ${step.exitCode}`;
  } else if (step.signal !== null) {
    reason = `terminated by ${step.signal}`;
  }
  if (step.durationMs === null) {
    return reason;
  }
  return `${reason} after ${formatElapsed(step.durationMs)}`;
}

function formatResultLine(report: RunReport): string {
  if (report.dryRun) {
    return "Result: dry run, nothing was executed.";
  }
  if (report.ok) {
    return "Result: all steps succeeded.";
  }
  const failed = report.steps.filter((step) => step.status === "failed");
  const skipped = report.steps.filter((step) => step.status === "skipped");
  return `Result: ${failed.length} failed, ${skipped.length} skipped.`;
}
