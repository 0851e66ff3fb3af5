export const exitCodes = {
  ok: 0,
  failure: 1,
  usage: 2,
} as const;

/** Bad command line: unknown flag, missing value, stray argument. */
export class UsageError extends Error {
  readonly exitCode = exitCodes.usage;

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** A value from flags, environment or the config file that cannot be used. */
export class ConfigError extends Error {
  readonly exitCode = exitCodes.usage;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
