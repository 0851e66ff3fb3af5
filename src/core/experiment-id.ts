function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// Always UTC.
export function createExperimentId(date: Date): string {
  return [
    "exp-",
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join("");
}

export function isExperimentId(name: string): boolean {
  return /^exp-\d{14}$/.test(name);
}
