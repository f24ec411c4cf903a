/*
Duration helpers used when summarizing sync results.
Assumes input values are millisecond durations.
*/

function roundToDecimals(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  return Number(value.toFixed(decimals));
}

export function secondsFromMs(durationMs: number): number {
  return roundToDecimals(durationMs / 1000, 3);
}

export function formatDuration(durationMs: number): string {
  return `${secondsFromMs(durationMs).toFixed(1)}s`;
}
