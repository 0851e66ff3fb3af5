import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { expect, test } from "vitest";

import { runCli } from "../src/cli/run-cli";
import { createFakeClock, createFakeRunner } from "./helpers/fakes";
import { createRecordingUi } from "./helpers/recording-ui";

function createSink(): { chunks: string[]; write(chunk: string): boolean } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "run-experiment-"));
}

test("runCli prints the version", async () => {
  const stdout = createSink();

  const code = await runCli({ argv: ["node", "run-experiment", "--version"], stdout });

  expect(code).toBe(0);
  expect(stdout.chunks).toEqual(["run-experiment 0.1.0\n"]);
});

test("runCli prints usage for --help", async () => {
  const stdout = createSink();

  const code = await runCli({ argv: ["node", "run-experiment", "-h"], stdout });

  expect(code).toBe(0);
  expect(stdout.chunks.join("")).toContain("  run-experiment [options]\n");
});

test("runCli exits with 2 on an unknown option", async () => {
  const stderr = createSink();

  const code = await runCli({
    argv: ["node", "run-experiment", "--bogus"],
    stderr,
  });

  expect(code).toBe(2);
  expect(stderr.chunks).toEqual([
    "Unknown option: --bogus\n",
    "Run with --help for usage.\n",
  ]);
});

test("runCli exits with 2 on a bad NUM_PROCS", async () => {
  const stderr = createSink();
  const { runner, calls } = createFakeRunner();

  const code = await runCli({
    argv: ["node", "run-experiment"],
    cwd: await makeTempDir(),
    env: { NUM_PROCS: "zero" },
    stderr,
    ui: createRecordingUi(),
    runner,
  });

  expect(code).toBe(2);
  expect(calls).toEqual([]);
  expect(stderr.chunks).toEqual([
    'NUM_PROCS must be a positive integer, got "zero"\n',
  ]);
});

test("runCli runs the whole sequence and writes a report", async () => {
  const cwd = await makeTempDir();
  const ui = createRecordingUi();
  const { runner, calls } = createFakeRunner();

  const code = await runCli({
    argv: [
      "node",
      "run-experiment",
      "--experiment",
      "study-preds/exp-20151111045709",
      "--report",
      "run.json",
    ],
    cwd,
    env: {},
    ui,
    runner,
    clock: createFakeClock(100),
    detectCpus: () => 2,
  });

  expect(code).toBe(0);
  expect(calls.map((call) => [call.args, call.options])).toEqual([
    [["-r", "extras"], { cwd, env: {} }],
    [["-r", "build_ext"], { cwd, env: {} }],
    [
      ["-r", "-j2", "experiment"],
      { cwd, env: { EXPERIMENT: "study-preds/exp-20151111045709" } },
    ],
  ]);
  expect(ui.messages("intro")).toEqual(["run-experiment"]);
  expect(ui.messages("info")).toEqual([
    "Experiment 1 out of 1: running with 2 processes",
    `Wrote ${path.join(cwd, "run.json")}`,
  ]);
  expect(ui.messages("outro")).toEqual(["Done."]);

  const written: unknown = JSON.parse(
    await fs.readFile(path.join(cwd, "run.json"), "utf8")
  );
  expect(written).toMatchObject({
    cwd,
    jobs: 2,
    jobsSource: "detected",
    ok: true,
  });
});

test("runCli exits with 1 when a step fails", async () => {
  const ui = createRecordingUi();
  const { runner } = createFakeRunner(() => ({ exitCode: 2 }));

  const code = await runCli({
    argv: ["node", "run-experiment", "-j", "3"],
    cwd: await makeTempDir(),
    env: {},
    ui,
    runner,
    clock: createFakeClock(100),
  });

  expect(code).toBe(1);
  expect(ui.messages("error")).toEqual(["extras failed with exit code 2"]);
  expect(ui.messages("outro")).toEqual(["Failed."]);
});

test("runCli reads the config file from --cwd", async () => {
  const base = await makeTempDir();
  const project = path.join(base, "project");
  await fs.mkdir(project);
  await fs.writeFile(
    path.join(project, "run-experiment.yaml"),
    ["make: gmake", "jobs: 6", "prepareTargets: []"].join("\n")
  );
  const { runner, calls } = createFakeRunner();

  const code = await runCli({
    argv: ["node", "run-experiment", "--cwd", "project"],
    cwd: base,
    env: {},
    ui: createRecordingUi(),
    runner,
    clock: createFakeClock(100),
  });

  expect(code).toBe(0);
  expect(calls).toEqual([
    {
      command: "gmake",
      args: ["-r", "-j6", "experiment"],
      options: { cwd: project, env: {} },
    },
  ]);
});

test("runCli runs the picked experiment directory", async () => {
  const cwd = await makeTempDir();
  await fs.mkdir(path.join(cwd, "study-preds", "exp-20151111045709"), {
    recursive: true,
  });
  await fs.mkdir(path.join(cwd, "study-preds", "exp-20160101000000"));
  const ui = createRecordingUi({ choose: (values) => values[1] ?? null });
  const { runner, calls } = createFakeRunner();

  const code = await runCli({
    argv: ["node", "run-experiment", "--pick", "--skip-prepare", "-j1"],
    cwd,
    env: { EXPERIMENT: "study-preds/other" },
    ui,
    runner,
    clock: createFakeClock(100),
  });

  expect(code).toBe(0);
  expect(calls.map((call) => call.options.env)).toEqual([
    { EXPERIMENT: path.join("study-preds", "exp-20151111045709") },
  ]);
});

test("runCli runs nothing when the pick is cancelled", async () => {
  const cwd = await makeTempDir();
  await fs.mkdir(path.join(cwd, "study-preds", "exp-20151111045709"), {
    recursive: true,
  });
  const ui = createRecordingUi({ choose: () => null });
  const { runner, calls } = createFakeRunner();

  const code = await runCli({
    argv: ["node", "run-experiment", "--pick"],
    cwd,
    env: {},
    ui,
    runner,
    detectCpus: () => 1,
  });

  expect(code).toBe(0);
  expect(calls).toEqual([]);
  expect(ui.messages("outro")).toEqual(["Cancelled."]);
});

test("runCli exits with 2 when there is nothing to pick", async () => {
  const stderr = createSink();

  const code = await runCli({
    argv: ["node", "run-experiment", "--pick"],
    cwd: await makeTempDir(),
    env: {},
    stderr,
    ui: createRecordingUi(),
    detectCpus: () => 1,
  });

  expect(code).toBe(2);
  expect(stderr.chunks[0]).toMatch(/^No experiment directories found under /);
});
