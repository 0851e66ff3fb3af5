import { UsageError } from "../../core/errors";

type CliCommand = "help" | "version" | "run";

export type CliFlags = {
  command: CliCommand;
  jobs?: string;
  experiments: string[];
  newExperiment: boolean;
  experimentRoot?: string;
  pick: boolean;
  make?: string;
  skipPrepare: boolean;
  keepGoing: boolean;
  dryRun: boolean;
  report?: string;
  config?: string;
  cwd?: string;
};

const valueFlags = [
  "--jobs",
  "--experiment",
  "--experiment-root",
  "--make",
  "--report",
  "--config",
  "--cwd",
] as const;
type ValueFlag = (typeof valueFlags)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (valueFlags as readonly string[]).includes(name);
}

function splitInlineValue(arg: string): { name: string; inline?: string } {
  if (!arg.startsWith("--")) {
    return { name: arg };
  }
  const eqIndex = arg.indexOf("=");
  if (eqIndex === -1) {
    return { name: arg };
  }
  return { name: arg.slice(0, eqIndex), inline: arg.slice(eqIndex + 1) };
}

function applyValue(flags: CliFlags, name: ValueFlag, value: string): void {
  if (name === "--jobs") {
    flags.jobs = value;
  } else if (name === "--experiment") {
    flags.experiments.push(value);
  } else if (name === "--experiment-root") {
    flags.experimentRoot = value;
  } else if (name === "--make") {
    flags.make = value;
  } else if (name === "--report") {
    flags.report = value;
  } else if (name === "--config") {
    flags.config = value;
  } else {
    flags.cwd = value;
  }
}

export function parseCliArgs(args: readonly string[]): CliFlags {
  const flags: CliFlags = {
    command: "run",
    experiments: [],
    newExperiment: false,
    pick: false,
    skipPrepare: false,
    keepGoing: false,
    dryRun: false,
  };

  let index = 0;
  while (index < args.length) {
    const arg = args[index];
    index += 1;

    if (arg === "--help" || arg === "-h" || arg === "help") {
      return { ...flags, command: "help" };
    }
    if (arg === "--version" || arg === "-v" || arg === "version") {
      return { ...flags, command: "version" };
    }

    // `-j8` and `-j 8`, as make itself spells it.
    if (arg.startsWith("-j") && !arg.startsWith("--")) {
      const attached = arg.slice(2);
      if (attached.length > 0) {
        flags.jobs = attached;
        continue;
      }
      const next = args[index];
      if (next === undefined) {
        throw new UsageError("Missing value for -j");
      }
      flags.jobs = next;
      index += 1;
      continue;
    }

    const { name, inline } = splitInlineValue(arg);
    if (isValueFlag(name)) {
      let value = inline;
      if (value === undefined) {
        value = args[index];
        index += 1;
      }
      if (value === undefined || value === "") {
        throw new UsageError(`Missing value for ${name}`);
      }
      applyValue(flags, name, value);
      continue;
    }

    if (inline !== undefined) {
      throw new UsageError(`Unknown option: ${name}`);
    }

    switch (arg) {
      case "--new-experiment":
        flags.newExperiment = true;
        break;
      case "--pick":
        flags.pick = true;
        break;
      case "--skip-prepare":
        flags.skipPrepare = true;
        break;
      case "--keep-going":
        flags.keepGoing = true;
        break;
      case "--dry-run":
        flags.dryRun = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return flags;
}
