/*
Purpose: scoped access to one subtree of a source repository at an immutable commit.
Assumptions: backends classify their own failures as SyncError kinds; anything else is
  treated as SourceUnavailable. A failed release never changes the outcome of `fn`; it is
  handed to `onReleaseError`.
Usage: await withExtractedSource(backend, request, async (tree) => stage(tree.contentRoot)).
*/

import fse from "fs-extra";

import type { SourceLocator } from "./config.js";
import { SyncError, toSyncError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkspaceTree = {
  // Temporary directory owned by this extraction; removed on release.
  root: string;
  // Directory holding exactly the requested subtree.
  contentRoot: string;
  // Where upstream LICENSE and README files are looked up; defaults to contentRoot.
  docsRoot?: string;
  resolvedRef: string;
  subtreePath: string;
};

export type BackendCallOptions = {
  signal?: AbortSignal;
};

export interface VersionControlBackend {
  resolveRef(locator: SourceLocator, ref: string, options?: BackendCallOptions): Promise<string>;
  materialize(
    locator: SourceLocator,
    resolvedRef: string,
    subtreePath: string,
    options?: BackendCallOptions,
  ): Promise<WorkspaceTree>;
  release(tree: WorkspaceTree): Promise<void>;
}

export type ExtractRequest = {
  locator: SourceLocator;
  resolvedRef: string;
  subtreePath: string;
  signal?: AbortSignal;
  onReleaseError: (error: unknown, tree: WorkspaceTree) => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function withExtractedSource<T>(
  backend: VersionControlBackend,
  request: ExtractRequest,
  fn: (tree: WorkspaceTree) => Promise<T>,
): Promise<T> {
  let tree: WorkspaceTree;
  try {
    tree = await backend.materialize(request.locator, request.resolvedRef, request.subtreePath, {
      signal: request.signal,
    });
  } catch (error) {
    throw toSyncError(error, "SourceUnavailable");
  }

  try {
    await assertSubtreePresent(tree);
    return await fn(tree);
  } finally {
    await releaseWorkspace(backend, tree, request.onReleaseError);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function releaseWorkspace(
  backend: VersionControlBackend,
  tree: WorkspaceTree,
  onReleaseError: ExtractRequest["onReleaseError"],
): Promise<void> {
  try {
    await backend.release(tree);
  } catch (error) {
    onReleaseError(error, tree);
  }
}

async function assertSubtreePresent(tree: WorkspaceTree): Promise<void> {
  const stat = await fse.stat(tree.contentRoot).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new SyncError(
      "SubtreeMissing",
      `Subtree ${tree.subtreePath} is not a directory at ${tree.resolvedRef}.`,
    );
  }
}
