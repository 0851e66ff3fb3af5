import path from "node:path";

import { ConfigError, UsageError, exitCodes } from "../core/errors";
import type { Clock } from "../core/timing";
import { loadConfigFile } from "../infra/fs/config-file";
import type { CommandRunner } from "../infra/process/run-command";
import { type CliFlags, parseCliArgs } from "./config/args";
import { VERSION } from "./config/options";
import { type Env, resolveRunConfig } from "./config/resolve";
import { runExperimentFlow } from "./flows/experiment-flow";
import { promptPickExperiment } from "./prompts/pick-experiment";
import {
  formatRunSummaryMarkdown,
  writeRunReportJson,
} from "./tasks/experiment";
import { type ClackUi, createClackUi, type OutputStream } from "./ui/clack-ui";

export type RunCliOptions = {
  argv: readonly string[];
  stdout?: OutputStream;
  stderr?: OutputStream;
  env?: Env;
  cwd?: string;
  ui?: ClackUi;
  runner?: CommandRunner;
  clock?: Clock;
  now?: () => Date;
  detectCpus?: () => number;
};

const HELP_TEXT = `run-experiment

Builds the prerequisite make targets, then runs the experiment target with
one job per available CPU.

Usage:
  run-experiment [options]
  run-experiment --help
  run-experiment --version

Options:
  -j, --jobs <n>            Job count passed to make (default: NUM_PROCS or CPU count)
  --experiment <dir>        Set EXPERIMENT=<dir> for a run; repeat for several runs
  --new-experiment          Run into a fresh <root>/exp-<timestamp> directory
  --experiment-root <dir>   Root of experiment directories (default: study-preds)
  --pick                    Choose an existing experiment directory
  --make <bin>              Build tool executable (default: MAKE or make)
  --skip-prepare            Do not build the prepare targets
  --keep-going              Run remaining experiments after one fails
  --dry-run                 Print the commands without running them
  --report <file>           Write a JSON run report
  --config <file>           YAML config (default: run-experiment.yaml)
  --cwd <dir>               Directory to run make in
`;

function writeLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

export async function runCli(options: RunCliOptions): Promise<number> {
  const stdout: OutputStream = options.stdout ?? process.stdout;
  const stderr: OutputStream = options.stderr ?? process.stderr;
  const args = options.argv.slice(2);

  let flags: CliFlags;
  try {
    flags = parseCliArgs(args);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      writeLine(stderr, error.message);
      writeLine(stderr, "Run with --help for usage.");
      return error.exitCode;
    }
    throw error;
  }

  if (flags.command === "version") {
    writeLine(stdout, `run-experiment ${VERSION}`);
    return exitCodes.ok;
  }

  if (flags.command === "help") {
    writeLine(stdout, HELP_TEXT);
    return exitCodes.ok;
  }

  try {
    const cwd = path.resolve(options.cwd ?? process.cwd(), flags.cwd ?? ".");
    const fileConfig = await loadConfigFile(cwd, flags.config);
    let config = resolveRunConfig({
      cwd,
      flags,
      env: options.env ?? process.env,
      fileConfig,
      now: options.now,
      detectCpus: options.detectCpus,
    });

    const ui = options.ui ?? createClackUi({ stdout });
    ui.intro("run-experiment");

    if (flags.pick) {
      const picked = await promptPickExperiment(ui, {
        cwd,
        experimentRoot: config.experimentRoot,
      });
      if (picked === null) {
        ui.outro("Cancelled.");
        return exitCodes.ok;
      }
      config = { ...config, experiments: [...config.experiments, picked] };
    }

    const report = await runExperimentFlow({
      config,
      ui,
      runner: options.runner,
      clock: options.clock,
      now: options.now,
    });
    ui.print(formatRunSummaryMarkdown(report));

    if (config.reportFile !== null) {
      const outPath = await writeRunReportJson({
        cwd,
        fileName: config.reportFile,
        report,
      });
      ui.info(`Wrote ${outPath}`);
    }

    if (!report.ok) {
      ui.outro("Failed.");
      return exitCodes.failure;
    }
    ui.outro("Done.");
    return exitCodes.ok;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    writeLine(stderr, message);
    if (error instanceof ConfigError || error instanceof UsageError) {
      return error.exitCode;
    }
    return exitCodes.failure;
  }
}
