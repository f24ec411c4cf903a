/*
Purpose: drive one package through ref check, extraction, staging, synthesis and atomic commit.
Assumptions: every package owns `<outputDir>/<name>`; staging and backup directories are
  siblings inside `outputDir` so the swap is a same-filesystem rename. The swap is two renames
  (output to backup, staging to output): between them `<outputDir>/<name>` does not exist, so
  a reader polling that path may briefly see ENOENT, but never a partial tree.
Usage: const report = await new PackageOrchestrator({ settings, outputDir, ports }).syncAll(specs).
*/

import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import {
  requestedRef,
  type BuildPolicy,
  type MirrorSettings,
  type PackageSpec,
} from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { SyncError, toSyncError, type SyncFailureKind } from "../../core/errors.js";
import { packageRootToken } from "../../core/identity.js";
import { logRunEvent, logSyncEvent } from "../../core/logger.js";
import {
  discoverNamespace,
  serializeArtifact,
  synthesizeArtifacts,
} from "../../core/manifest.js";
import { writePackageDocs } from "../../core/package-docs.js";
import {
  fingerprintSpec,
  needsSync,
  type ProceedReason,
} from "../../core/reference-tracker.js";
import { withExtractedSource, type ExtractRequest } from "../../core/source-extractor.js";
import { createBuiltState, recordFailure, type SyncState } from "../../core/state.js";
import {
  assertNoIdentityMismatches,
  findIdentityRecordMismatches,
  transformTree,
  type TransformPolicy,
  type TreeDiff,
} from "../../core/tree-transformer.js";

import { normalizeAbortReason } from "./helpers/errors.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { OrchestratorPorts } from "./ports.js";
import type { ResyncQueue } from "./resync-queue.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncFailure = {
  kind: SyncFailureKind;
  message: string;
  retryable: boolean;
};

export type SkippedResult = {
  status: "skipped";
  package: string;
  resolvedRef: string;
};

export type BuiltResult = {
  status: "built";
  package: string;
  resolvedRef: string;
  reason: ProceedReason;
  outputPath: string;
  namespace: string | null;
  identityRecords: number;
  diff: TreeDiff;
  durationMs: number;
};

export type FailedResult = {
  status: "failed";
  package: string;
  error: SyncFailure;
};

export type SyncResult = SkippedResult | BuiltResult | FailedResult;

export type SyncReport = {
  results: SyncResult[];
  counts: { built: number; skipped: number; failed: number };
};

export type CheckResult =
  | { status: "up_to_date"; package: string; resolvedRef: string }
  | { status: "needs_sync"; package: string; resolvedRef: string; reason: ProceedReason }
  | { status: "error"; package: string; error: SyncFailure };

export type SyncOptions = {
  force?: boolean;
  signal?: AbortSignal;
};

export type SyncAllOptions = SyncOptions & {
  maxParallel?: number;
};

export type PackageOrchestratorOptions = {
  settings: MirrorSettings;
  outputDir: string;
  ports: OrchestratorPorts;
  locks?: KeyedMutex;
};

const NUGET_CONTENT_DIR = "Plugins";

type BuildOutcome = {
  namespace: string | null;
  identityRecords: number;
  diff: TreeDiff;
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class PackageOrchestrator {
  private readonly locks: KeyedMutex;
  private readonly policy: TransformPolicy;

  constructor(private readonly options: PackageOrchestratorOptions) {
    this.locks = options.locks ?? new KeyedMutex();
    this.policy = toTransformPolicy(options.settings.build);
  }

  outputPathFor(packageName: string): string {
    return path.join(this.options.outputDir, packageName);
  }

  async sync(spec: PackageSpec, opts: SyncOptions = {}): Promise<SyncResult> {
    return this.locks.runExclusive(spec.name, () => this.syncLocked(spec, opts));
  }

  async syncAll(specs: PackageSpec[], opts: SyncAllOptions = {}): Promise<SyncReport> {
    const { log } = this.options.ports;
    const maxParallel = Math.max(1, opts.maxParallel ?? this.options.settings.max_parallel);

    logRunEvent(log, "run.start", {
      packages: specs.map((spec) => spec.name),
      force: opts.force ?? false,
      max_parallel: maxParallel,
    });

    const results: SyncResult[] = new Array<SyncResult>(specs.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < specs.length) {
        const index = nextIndex;
        nextIndex += 1;
        results[index] = await this.sync(specs[index], opts);
      }
    };

    const workerCount = Math.min(maxParallel, specs.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const report = buildReport(results);
    logRunEvent(log, "run.complete", report.counts);
    return report;
  }

  // Drains the queue once; names not defined in `specs` fail as ConfigInvalid.
  async syncQueued(
    queue: ResyncQueue,
    specs: PackageSpec[],
    opts: SyncAllOptions = {},
  ): Promise<SyncReport> {
    const byName = new Map(specs.map((spec) => [spec.name, spec]));
    const names = queue.drain();

    const known = names.flatMap((name) => {
      const spec = byName.get(name);
      return spec ? [spec] : [];
    });
    const built = await this.syncAll(known, opts);
    const builtByName = new Map(built.results.map((result) => [result.package, result]));

    const results = names.map((name): SyncResult => {
      const result = builtByName.get(name);
      if (result) return result;
      return failedResult(
        name,
        new SyncError("ConfigInvalid", `Package ${name} is not defined in the mirror config.`),
      );
    });

    return buildReport(results);
  }

  async check(specs: PackageSpec[], opts: { signal?: AbortSignal } = {}): Promise<CheckResult[]> {
    const { backend, stateStore } = this.options.ports;
    const results: CheckResult[] = [];

    for (const spec of specs) {
      try {
        const previous = await stateStore.get(spec.name);
        const outputPresent = await fse.pathExists(this.outputPathFor(spec.name));
        const decision = await needsSync(spec, previous, backend, {
          settings: this.options.settings,
          outputPresent,
          signal: opts.signal,
        });
        results.push(
          decision.action === "skip"
            ? { status: "up_to_date", package: spec.name, resolvedRef: decision.resolvedRef }
            : {
                status: "needs_sync",
                package: spec.name,
                resolvedRef: decision.resolvedRef,
                reason: decision.reason,
              },
        );
      } catch (error) {
        const syncError = toSyncError(error, "SourceUnavailable");
        results.push({ status: "error", package: spec.name, error: toFailure(syncError) });
      }
    }

    return results;
  }

  // ---------------------------------------------------------------------------
  // Single package
  // ---------------------------------------------------------------------------

  private async syncLocked(spec: PackageSpec, opts: SyncOptions): Promise<SyncResult> {
    const { backend, stateStore, log, clock } = this.options.ports;
    const startedAt = clock.now().getTime();
    const outputPath = this.outputPathFor(spec.name);

    logSyncEvent(log, "sync.start", spec.name, {
      ref: requestedRef(spec.source),
      force: opts.force ?? false,
    });

    let previous: SyncState | null = null;
    try {
      throwIfCancelled(opts.signal);
      previous = await stateStore.get(spec.name);

      const outputPresent = await fse.pathExists(outputPath);
      const decision = await needsSync(spec, previous, backend, {
        settings: this.options.settings,
        force: opts.force,
        outputPresent,
        signal: opts.signal,
      });

      if (decision.action === "skip") {
        logSyncEvent(log, "sync.skip", spec.name, { resolved_ref: decision.resolvedRef });
        return { status: "skipped", package: spec.name, resolvedRef: decision.resolvedRef };
      }

      throwIfCancelled(opts.signal);
      const outcome = await this.buildAndCommit(spec, decision.resolvedRef, {
        outputPath,
        previousOutputDir: outputPresent ? outputPath : null,
        signal: opts.signal,
      });

      const at = clock.isoNow();
      try {
        await stateStore.put(
          spec.name,
          createBuiltState({
            packageName: spec.name,
            resolvedRef: decision.resolvedRef,
            requestedRef: requestedRef(spec.source),
            specFingerprint: fingerprintSpec(spec, this.options.settings),
            outputPath,
            at,
          }),
        );
      } catch (error) {
        throw new SyncError("CommitIOError", formatErrorMessage(error), error);
      }

      const durationMs = clock.now().getTime() - startedAt;
      logSyncEvent(log, "sync.built", spec.name, {
        resolved_ref: decision.resolvedRef,
        reason: decision.reason,
        added: outcome.diff.added.length,
        updated: outcome.diff.updated.length,
        removed: outcome.diff.removed.length,
        duration_ms: durationMs,
      });

      return {
        status: "built",
        package: spec.name,
        resolvedRef: decision.resolvedRef,
        reason: decision.reason,
        outputPath,
        durationMs,
        ...outcome,
      };
    } catch (error) {
      const syncError = toSyncError(error, "StagingIOError");
      logSyncEvent(log, "sync.failed", spec.name, {
        kind: syncError.kind,
        message: syncError.message,
        retryable: syncError.retryable,
      });
      await this.recordFailedAttempt(spec.name, previous, syncError);
      return failedResult(spec.name, syncError);
    }
  }

  private async buildAndCommit(
    spec: PackageSpec,
    resolvedRef: string,
    target: { outputPath: string; previousOutputDir: string | null; signal?: AbortSignal },
  ): Promise<BuildOutcome> {
    const { backend, log } = this.options.ports;
    const { settings, outputDir } = this.options;

    const policy = this.policyFor(spec);
    const request: ExtractRequest = {
      locator: spec.source,
      resolvedRef,
      subtreePath: spec.extract_path,
      signal: target.signal,
      onReleaseError: (error, tree) => {
        logSyncEvent(log, "sync.release_failed", spec.name, {
          path: tree.root,
          message: formatErrorMessage(error),
        });
      },
    };

    return withExtractedSource(backend, request, async (tree) => {
      logSyncEvent(log, "sync.extract", spec.name, {
        resolved_ref: resolvedRef,
        subtree: tree.subtreePath,
      });
      throwIfCancelled(target.signal);

      await fse.ensureDir(outputDir);
      const stagingDir = path.join(outputDir, `.${spec.name}.staging-${randomUUID()}`);
      let namespace: string | null = spec.namespace ?? null;

      try {
        const staged = await transformTree({
          workspace: tree,
          stagingDir,
          previousOutputDir: target.previousOutputDir,
          rootToken: packageRootToken(spec.name),
          policy,
          augment: async (context) => {
            throwIfCancelled(target.signal);
            if (namespace === null) {
              namespace = await discoverNamespace(path.join(context.stagingDir, context.contentRoot));
            }
            const artifacts = synthesizeArtifacts(spec, settings, namespace, context.contentRoot);
            await fse.writeFile(
              path.join(context.stagingDir, artifacts.manifestPath),
              serializeArtifact(artifacts.manifest),
              "utf8",
            );
            if (artifacts.moduleDefinition) {
              await fse.writeFile(
                path.join(context.stagingDir, artifacts.moduleDefinition.path),
                serializeArtifact(artifacts.moduleDefinition.content),
                "utf8",
              );
            }
            await writePackageDocs({
              spec,
              sourceDir: context.sourceDir,
              stagingDir: context.stagingDir,
              namespace,
              copyLicense: settings.build.copy_license,
              generateReadme: settings.build.generate_readme,
            });
          },
        });

        logSyncEvent(log, "sync.stage", spec.name, {
          entries: staged.entries.length,
          identity_records: staged.identityRecords,
          namespace,
        });

        if (policy.generateIdentityRecords) {
          assertNoIdentityMismatches(await findIdentityRecordMismatches(stagingDir));
        }

        // Last cancellation point; the swap below runs to completion or rolls back.
        throwIfCancelled(target.signal);
        await this.commit(spec.name, stagingDir, target.outputPath);

        return { namespace, identityRecords: staged.identityRecords, diff: staged.diff };
      } finally {
        await fse.remove(stagingDir);
      }
    });
  }

  // Precompiled assemblies always land under Plugins/, whatever the source-tree layout policy.
  private policyFor(spec: PackageSpec): TransformPolicy {
    if (spec.source.type === "nuget") {
      return { ...this.policy, nestContent: true, contentDir: NUGET_CONTENT_DIR };
    }
    return this.policy;
  }

  private async commit(packageName: string, stagingDir: string, outputPath: string): Promise<void> {
    const { log } = this.options.ports;
    const backupPath = path.join(
      path.dirname(outputPath),
      `.${packageName}.backup-${randomUUID()}`,
    );

    let movedPrevious = false;
    try {
      if (await fse.pathExists(outputPath)) {
        await fs.rename(outputPath, backupPath);
        movedPrevious = true;
      }
      await fs.rename(stagingDir, outputPath);
    } catch (error) {
      if (movedPrevious) {
        await rollback(backupPath, outputPath, error);
      }
      throw new SyncError(
        "CommitIOError",
        `Failed to commit ${packageName}: ${formatErrorMessage(error)}`,
        error,
      );
    }

    logSyncEvent(log, "sync.commit", packageName, { output_path: outputPath });

    try {
      await fse.remove(backupPath);
    } catch (error) {
      logSyncEvent(log, "sync.cleanup_failed", packageName, {
        path: backupPath,
        message: formatErrorMessage(error),
      });
    }
  }

  private async recordFailedAttempt(
    packageName: string,
    previous: SyncState | null,
    error: SyncError,
  ): Promise<void> {
    // No state exists before the first successful build, and a cancelled sync leaves it alone.
    if (!previous || error.kind === "Cancelled") return;

    const { stateStore, log, clock } = this.options.ports;
    try {
      await stateStore.put(
        packageName,
        recordFailure(previous, { kind: error.kind, message: error.message, at: clock.isoNow() }),
      );
    } catch (stateError) {
      logSyncEvent(log, "sync.state_error", packageName, {
        message: formatErrorMessage(stateError),
      });
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function buildReport(results: SyncResult[]): SyncReport {
  const counts = { built: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return { results, counts };
}

export function toTransformPolicy(build: BuildPolicy): TransformPolicy {
  return {
    removeProjectFiles: build.remove_project_files,
    nestContent: build.nest_content,
    contentDir: build.content_dir,
    generateIdentityRecords: build.generate_identity_records,
  };
}

function toFailure(error: SyncError): SyncFailure {
  return { kind: error.kind, message: error.message, retryable: error.retryable };
}

function failedResult(packageName: string, error: SyncError): FailedResult {
  return { status: "failed", package: packageName, error: toFailure(error) };
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason = normalizeAbortReason(signal.reason);
  throw new SyncError("Cancelled", reason ? `Sync cancelled: ${reason}` : "Sync cancelled.");
}

async function rollback(backupPath: string, outputPath: string, cause: unknown): Promise<void> {
  try {
    await fse.remove(outputPath);
    await fs.rename(backupPath, outputPath);
  } catch (rollbackError) {
    throw new SyncError(
      "CommitIOError",
      `Commit failed (${formatErrorMessage(cause)}) and rollback from ${backupPath} failed: ${formatErrorMessage(rollbackError)}`,
      rollbackError,
    );
  }
}
