/**
 * Git-backed source backend.
 * Purpose: resolve refs against a remote and materialize one subtree at one commit.
 * Assumptions: git is on PATH; every workspace lives under `workDir` and is removed on release.
 * Usage: createGitSourceBackend({ workDir, timeoutMs }) and inject into the orchestrator.
 */

import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { GitSourceLocator, SourceLocator } from "../../../core/config.js";
import { SyncError, toSyncError } from "../../../core/errors.js";
import type {
  BackendCallOptions,
  VersionControlBackend,
  WorkspaceTree,
} from "../../../core/source-extractor.js";
import {
  checkoutSubtree,
  cloneWithoutCheckout,
  isAbbreviatedSha,
  listRemoteRefs,
  listTreeDirectories,
  objectType,
  revParseCommit,
  selectRemoteRef,
  type GitRunOptions,
} from "../../../git/git.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitSourceBackendOptions = {
  workDir: string;
  // Applies to each remote operation (ls-remote, clone).
  timeoutMs?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitSourceBackend(options: GitSourceBackendOptions): VersionControlBackend {
  const remoteOptions = (callOptions: BackendCallOptions = {}): GitRunOptions => ({
    timeoutMs: options.timeoutMs,
    signal: callOptions.signal,
  });

  return {
    async resolveRef(source, ref, callOptions) {
      const locator = expectGit(source);
      const runOptions = remoteOptions(callOptions);

      let resolved: string | null;
      try {
        const refs = await listRemoteRefs(locator.url, runOptions);
        resolved = selectRemoteRef(refs, ref);
      } catch (error) {
        throw toSyncError(error, "SourceUnavailable");
      }

      if (!resolved && isAbbreviatedSha(ref)) {
        resolved = await resolveAbbreviatedSha(options.workDir, locator, ref, runOptions);
      }
      if (!resolved) {
        throw new SyncError("RefNotFound", `Ref ${ref} not found in ${locator.url}.`);
      }

      return resolved;
    },

    async materialize(source, resolvedRef, subtreePath, callOptions) {
      const locator = expectGit(source);
      const runOptions = remoteOptions(callOptions);
      let root: string;
      try {
        root = await createWorkspace(options.workDir, "extract-");
      } catch (error) {
        throw toSyncError(error, "StagingIOError");
      }
      const tree: WorkspaceTree = {
        root,
        contentRoot: subtreePath === "." ? path.join(root, "tree") : path.join(root, "tree", subtreePath),
        resolvedRef,
        subtreePath,
      };

      try {
        const repoDir = path.join(root, "repo");
        try {
          await cloneWithoutCheckout(locator.url, repoDir, runOptions);
        } catch (error) {
          throw toSyncError(error, "SourceUnavailable");
        }

        const gitDir = path.join(repoDir, ".git");
        const localOptions: GitRunOptions = { signal: callOptions?.signal };
        if (!(await revParseCommit(gitDir, resolvedRef, localOptions))) {
          throw new SyncError("RefNotFound", `Commit ${resolvedRef} not found in ${locator.url}.`);
        }

        await assertSubtreeDirectory(gitDir, resolvedRef, subtreePath, localOptions);

        const workTree = path.join(root, "tree");
        await fse.ensureDir(workTree);
        await checkoutSubtree(gitDir, resolvedRef, subtreePath, workTree, localOptions);

        return tree;
      } catch (error) {
        // Remote failures are classified at the clone; what remains is local workspace I/O.
        await fse.remove(root);
        throw toSyncError(error, "StagingIOError");
      }
    },

    async release(tree) {
      await fse.remove(tree.root);
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function expectGit(locator: SourceLocator): GitSourceLocator {
  if (locator.type !== "git") {
    throw new SyncError("ConfigInvalid", `Source type ${locator.type} is not served by the git backend.`);
  }
  return locator;
}

async function createWorkspace(workDir: string, prefix: string): Promise<string> {
  await fse.ensureDir(workDir);
  return fs.mkdtemp(path.join(workDir, prefix));
}

// Abbreviated hashes are not advertised by the remote; resolve them against a bare clone.
async function resolveAbbreviatedSha(
  workDir: string,
  locator: GitSourceLocator,
  ref: string,
  runOptions: GitRunOptions,
): Promise<string | null> {
  const root = await createWorkspace(workDir, "resolve-");
  try {
    const gitDir = path.join(root, "repo.git");
    try {
      await cloneWithoutCheckout(locator.url, gitDir, { ...runOptions, bare: true });
    } catch (error) {
      throw toSyncError(error, "SourceUnavailable");
    }
    return await revParseCommit(gitDir, ref, { signal: runOptions.signal });
  } finally {
    await fse.remove(root);
  }
}

async function assertSubtreeDirectory(
  gitDir: string,
  commit: string,
  subtreePath: string,
  opts: GitRunOptions,
): Promise<void> {
  if (subtreePath === ".") return;

  const type = await objectType(gitDir, `${commit}:${subtreePath}`, opts);
  if (type === "tree") return;

  if (type === null) {
    const directories = await listTreeDirectories(gitDir, commit, opts);
    const wanted = subtreePath.toLowerCase();
    const caseVariant = directories.find((dir) => dir.toLowerCase() === wanted);
    if (caseVariant) {
      throw new SyncError(
        "ConfigInvalid",
        `extract_path ${subtreePath} differs only in case from ${caseVariant} at ${commit}.`,
      );
    }
  }

  throw new SyncError("SubtreeMissing", `Subtree ${subtreePath} is not a directory at ${commit}.`);
}
