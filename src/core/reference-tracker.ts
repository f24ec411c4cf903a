import { requestedRef, type MirrorSettings, type PackageSpec } from "./config.js";
import { toSyncError } from "./errors.js";
import type { BackendCallOptions, VersionControlBackend } from "./source-extractor.js";
import type { SyncState } from "./state.js";
import { sha256Hex } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProceedReason =
  | "first_sync"
  | "ref_changed"
  | "spec_changed"
  | "output_missing"
  | "forced";

export type SyncDecision =
  | { action: "skip"; resolvedRef: string }
  | { action: "proceed"; resolvedRef: string; reason: ProceedReason };

export type NeedsSyncOptions = BackendCallOptions & {
  // Settings that shape the generated package take part in the fingerprint.
  settings: MirrorSettings;
  force?: boolean;
  outputPresent?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function needsSync(
  spec: PackageSpec,
  previous: SyncState | null,
  backend: VersionControlBackend,
  options: NeedsSyncOptions,
): Promise<SyncDecision> {
  let resolvedRef: string;
  try {
    resolvedRef = await backend.resolveRef(spec.source, requestedRef(spec.source), {
      signal: options.signal,
    });
  } catch (error) {
    throw toSyncError(error, "SourceUnavailable");
  }

  const reason = resolveProceedReason(spec, previous, resolvedRef, options);
  if (!reason) {
    return { action: "skip", resolvedRef };
  }

  return { action: "proceed", resolvedRef, reason };
}

// Stable digest of the package entry plus every setting that shapes its generated output.
export function fingerprintSpec(spec: PackageSpec, settings: MirrorSettings): string {
  return sha256Hex(stableStringify({ spec, output: outputSettings(settings) }));
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveProceedReason(
  spec: PackageSpec,
  previous: SyncState | null,
  resolvedRef: string,
  options: NeedsSyncOptions,
): ProceedReason | null {
  if (options.force) return "forced";
  if (!previous) return "first_sync";
  if (previous.last_ref !== resolvedRef) return "ref_changed";
  if (
    previous.spec_fingerprint &&
    previous.spec_fingerprint !== fingerprintSpec(spec, options.settings)
  ) {
    return "spec_changed";
  }
  if (options.outputPresent === false) return "output_missing";
  return null;
}

// Paths, parallelism and timeouts change where and how a sync runs, never what it writes.
function outputSettings(settings: MirrorSettings) {
  return {
    build: settings.build,
    unity: settings.unity,
    defaults: settings.defaults,
    registry: settings.registry ?? null,
  };
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }

  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }

  return JSON.stringify(value) ?? "null";
}
