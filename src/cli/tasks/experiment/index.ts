import path from "node:path";

import { writeJsonFile } from "../../../core/json-file";
import type { RunReport } from "../../../core/report/types";
import { formatRunSummaryMarkdown as formatReportMarkdown } from "./report/format";

export { buildRunPlan, formatCommandLine, type RunStep } from "./plan";

export function formatRunSummaryMarkdown(report: RunReport): string {
  return formatReportMarkdown(report);
}

export async function writeRunReportJson(options: {
  cwd: string;
  fileName: string;
  report: RunReport;
}): Promise<string> {
  const outPath = path.resolve(options.cwd, options.fileName);
  await writeJsonFile(outPath, options.report);
  return outPath;
}
