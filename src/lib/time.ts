// pattern: Functional Core

/**
 * ISO 8601 UTC timestamp without milliseconds, e.g. `2026-01-31T06:00:00Z`.
 */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
