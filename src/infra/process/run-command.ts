import { ExecaError, execa } from "execa";

export type CommandResult = {
  /** `null` when the process never exited on its own (signal, failed spawn). */
  exitCode: number | null;
  signal: string | null;
  message: string | null;
};

export type RunCommandOptions = {
  cwd: string;
  env?: Readonly<Record<string, string>>;
  stdio?: "inherit" | "ignore";
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunCommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio ?? "inherit",
    });
    return { exitCode: result.exitCode ?? 0, signal: null, message: null };
  } catch (error: unknown) {
    if (error instanceof ExecaError) {
      return {
        exitCode: error.exitCode ?? null,
        signal: error.signal ?? null,
        message: error.shortMessage,
      };
    }
    throw error;
  }
};
