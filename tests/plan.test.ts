import { expect, test } from "vitest";

import {
  buildRunPlan,
  formatCommandLine,
  quoteShellArg,
} from "../src/cli/tasks/experiment/plan";
import { createRunConfig } from "./helpers/fakes";

test("buildRunPlan builds extras, build_ext, then one experiment", () => {
  const plan = buildRunPlan(createRunConfig({ jobs: 8 }));

  expect(plan.map((step) => [step.kind, step.command, step.args])).toEqual([
    ["prepare", "make", ["-r", "extras"]],
    ["prepare", "make", ["-r", "build_ext"]],
    ["experiment", "make", ["-r", "-j8", "experiment"]],
  ]);
  expect(plan[2].env).toEqual({});
  expect(plan[2].experimentDir).toBeNull();
  expect(plan[2].banner).toBe(
    "Experiment 1 out of 1: running with 8 processes"
  );
  expect(plan.map((step) => step.timed)).toEqual([false, false, true]);
});

test("buildRunPlan sets EXPERIMENT for each experiment directory", () => {
  const plan = buildRunPlan(
    createRunConfig({
      jobs: 2,
      skipPrepare: true,
      experiments: ["study-preds/exp-20151111045709", "study-preds/exp-2"],
    })
  );

  expect(plan).toHaveLength(2);
  expect(plan[0].env).toEqual({
    EXPERIMENT: "study-preds/exp-20151111045709",
  });
  expect(plan[1].env).toEqual({ EXPERIMENT: "study-preds/exp-2" });
  expect(plan.map((step) => step.banner)).toEqual([
    "Experiment 1 out of 2: running with 2 processes",
    "Experiment 2 out of 2: running with 2 processes",
  ]);
});

test("buildRunPlan honours custom make and targets", () => {
  const plan = buildRunPlan(
    createRunConfig({
      make: "gmake",
      prepareTargets: ["deps"],
      experimentTarget: "study",
    })
  );

  expect(plan.map(formatCommandLine)).toEqual([
    "gmake -r deps",
    "gmake -r -j4 study",
  ]);
});

test("formatCommandLine puts the environment override first", () => {
  const [step] = buildRunPlan(
    createRunConfig({
      skipPrepare: true,
      jobs: 8,
      experiments: ["study-preds/exp-20151111045709"],
    })
  );

  expect(formatCommandLine(step)).toBe(
    "EXPERIMENT=study-preds/exp-20151111045709 make -r -j8 experiment"
  );
});

test("quoteShellArg quotes only when needed", () => {
  expect(quoteShellArg("study-preds/exp-1")).toBe("study-preds/exp-1");
  expect(quoteShellArg("my runs")).toBe("'my runs'");
  expect(quoteShellArg("it's")).toBe("'it'\\''s'");
  expect(quoteShellArg("")).toBe("''");
});
