export class MirrorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MirrorError";
  }
}

export class ConfigError extends MirrorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type GitErrorDetails = {
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  canceled?: boolean;
  cause?: unknown;
};

export class GitError extends MirrorError {
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly canceled: boolean;

  constructor(message: string, details: GitErrorDetails = {}) {
    super(message, details.cause);
    this.name = "GitError";
    this.stdout = details.stdout ?? "";
    this.stderr = details.stderr ?? "";
    this.timedOut = details.timedOut ?? false;
    this.canceled = details.canceled ?? false;
  }
}

// =============================================================================
// SYNC FAILURES
// =============================================================================

export const SYNC_FAILURE_KINDS = [
  "SourceUnavailable",
  "RefNotFound",
  "SubtreeMissing",
  "StagingIOError",
  "CommitIOError",
  "ConfigInvalid",
  "Cancelled",
] as const;

export type SyncFailureKind = (typeof SYNC_FAILURE_KINDS)[number];

const NON_RETRYABLE_KINDS: ReadonlySet<SyncFailureKind> = new Set(["ConfigInvalid"]);

export function isRetryableKind(kind: SyncFailureKind): boolean {
  return !NON_RETRYABLE_KINDS.has(kind);
}

export class SyncError extends MirrorError {
  constructor(
    public readonly kind: SyncFailureKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SyncError";
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

// Errors that escape a step unclassified take the step's kind.
export function toSyncError(error: unknown, fallbackKind: SyncFailureKind): SyncError {
  if (error instanceof SyncError) return error;
  if (error instanceof ConfigError) {
    return new SyncError("ConfigInvalid", error.message, error);
  }
  if (error instanceof GitError && error.canceled) {
    return new SyncError("Cancelled", error.message, error);
  }
  if (error instanceof GitError && error.timedOut) {
    return new SyncError("SourceUnavailable", error.message, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new SyncError(fallbackKind, message, error);
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  sync: "SYNC_ERROR",
  state: "STATE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends MirrorError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
