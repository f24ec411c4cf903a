/*
Pure error helpers shared by the orchestrator.
Assumes callers only need string representations for logs and summaries.
*/

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object" && "signal" in reason && typeof reason.signal === "string") {
    return reason.signal;
  }

  return String(reason);
}
