export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

/**
 * Renders a duration the way the shell `time` builtin prints `real`,
 * e.g. `1m2.345s`.
 */
export function formatElapsed(ms: number): string {
  const totalMs = Math.max(0, Math.round(ms));
  const minutes = Math.floor(totalMs / 60_000);
  const seconds = (totalMs - minutes * 60_000) / 1000;
  return `${minutes}m${seconds.toFixed(3)}s`;
}
