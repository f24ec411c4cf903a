import { z } from "zod";

import { SYNC_FAILURE_KINDS } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const SyncOutcomeSchema = z.enum(["built", "failed"]);

export type SyncOutcome = z.infer<typeof SyncOutcomeSchema>;

const SyncFailureSchema = z.object({
  kind: z.enum(SYNC_FAILURE_KINDS),
  message: z.string(),
  at: z.string(),
});

export const SyncStateSchema = z.object({
  package: z.string().min(1),
  // Resolved commit of the last successful build; never a branch or tag name.
  last_ref: z.string().min(1),
  requested_ref: z.string().min(1),
  last_sync_at: z.string(),
  last_attempt_at: z.string(),
  last_outcome: SyncOutcomeSchema,
  spec_fingerprint: z.string().optional(),
  output_path: z.string().optional(),
  last_error: SyncFailureSchema.optional(),
});

export type SyncState = z.infer<typeof SyncStateSchema>;
export type SyncFailureRecord = z.infer<typeof SyncFailureSchema>;

// =============================================================================
// TRANSITIONS
// =============================================================================

export function createBuiltState(input: {
  packageName: string;
  resolvedRef: string;
  requestedRef: string;
  specFingerprint: string;
  outputPath: string;
  at: string;
}): SyncState {
  return {
    package: input.packageName,
    last_ref: input.resolvedRef,
    requested_ref: input.requestedRef,
    last_sync_at: input.at,
    last_attempt_at: input.at,
    last_outcome: "built",
    spec_fingerprint: input.specFingerprint,
    output_path: input.outputPath,
  };
}

// A failure only touches the attempt fields; last_ref keeps pointing at what is on disk.
export function recordFailure(previous: SyncState, failure: SyncFailureRecord): SyncState {
  return {
    ...previous,
    last_attempt_at: failure.at,
    last_outcome: "failed",
    last_error: failure,
  };
}
