import os from "node:os";

import { ConfigError } from "./errors";

export type CpuProbe = () => number;

export function detectCpuCount(
  probe: CpuProbe = os.availableParallelism
): number {
  const count = probe();
  if (!Number.isFinite(count) || count < 1) {
    return 1;
  }
  return Math.floor(count);
}

export function parseJobCount(raw: string, source: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
  }

  const value = Number.parseInt(trimmed, 10);
  if (value < 1 || !Number.isSafeInteger(value)) {
    throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
  }
  return value;
}
