/*
Purpose: build the output-shaped staging tree for one package and attach identity records.
Assumptions: the staging directory is fresh and private to one sync; the previous output is
  only read, never modified, here.
Usage: const staged = await transformTree({ workspace, stagingDir, previousOutputDir, ... }).
*/

import fs from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import { minimatch } from "minimatch";

import { SyncError, toSyncError } from "./errors.js";
import {
  deriveIdentity,
  identityRecordPath,
  isIdentityRecordPath,
  renderIdentityRecord,
  type EntryKind,
} from "./identity.js";
import type { WorkspaceTree } from "./source-extractor.js";

// =============================================================================
// TYPES
// =============================================================================

export type TransformPolicy = {
  removeProjectFiles: boolean;
  nestContent: boolean;
  contentDir: string;
  generateIdentityRecords: boolean;
};

export type TreeEntry = {
  path: string;
  kind: EntryKind;
};

export type TreeDiff = {
  added: string[];
  updated: string[];
  removed: string[];
  unchanged: number;
};

export type StagedOutputTree = {
  dir: string;
  // Output-relative directory that holds the mirrored sources ("" when not nested).
  contentRoot: string;
  entries: TreeEntry[];
  identityRecords: number;
  diff: TreeDiff;
};

export type AugmentContext = {
  stagingDir: string;
  contentRoot: string;
  // Upstream directory holding LICENSE and README candidates.
  sourceDir: string;
};

export type TransformTreeOptions = {
  workspace: WorkspaceTree;
  stagingDir: string;
  previousOutputDir: string | null;
  rootToken: string;
  policy: TransformPolicy;
  // Writes generated artifacts into the staging tree before identity records are attached.
  augment?: (context: AugmentContext) => Promise<void>;
};

// Source-control and IDE project files that have no place in a Unity package.
export const PROJECT_FILE_PATTERNS = [
  "**/*.csproj",
  "**/*.sln",
  "**/*.vcxproj",
  "**/*.vcxproj.filters",
  "**/*.vcxproj.user",
  "**/*.suo",
  "**/*.user",
  "**/.vs",
  "**/.vscode",
  "**/.idea",
  "**/packages.config",
  "**/app.config",
  "**/web.config",
  "**/AssemblyInfo.cs",
  "**/GlobalAssemblyInfo.cs",
  "**/Directory.Build.props",
  "**/Directory.Build.targets",
  "**/.editorconfig",
  "**/.gitignore",
  "**/.gitattributes",
  "**/README.md",
  "**/LICENSE",
  "**/CHANGELOG.md",
  "**/CONTRIBUTING.md",
] as const;

const ALWAYS_EXCLUDED_PATTERNS = ["**/.git", "**/*.meta"] as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function transformTree(options: TransformTreeOptions): Promise<StagedOutputTree> {
  const { workspace, stagingDir, policy } = options;
  const contentRoot = policy.nestContent ? policy.contentDir : "";

  try {
    await fse.ensureDir(stagingDir);
    await stageSourceTree({
      sourceDir: workspace.contentRoot,
      targetDir: path.join(stagingDir, contentRoot),
      removeProjectFiles: policy.removeProjectFiles,
    });

    if (options.augment) {
      await options.augment({
        stagingDir,
        contentRoot,
        sourceDir: workspace.docsRoot ?? workspace.contentRoot,
      });
    }

    const entries = await listTreeEntries(stagingDir);
    const identityRecords = policy.generateIdentityRecords
      ? await writeIdentityRecords(stagingDir, options.rootToken, entries)
      : 0;
    const diff = await reconcileWithPrevious(stagingDir, entries, options.previousOutputDir);

    return { dir: stagingDir, contentRoot, entries, identityRecords, diff };
  } catch (error) {
    await fse.remove(stagingDir);
    throw toSyncError(error, "StagingIOError");
  }
}

export function isExcludedSourcePath(relativePath: string, removeProjectFiles: boolean): boolean {
  const matches = (pattern: string): boolean => minimatch(relativePath, pattern, { dot: true });
  if (ALWAYS_EXCLUDED_PATTERNS.some(matches)) return true;
  return removeProjectFiles && PROJECT_FILE_PATTERNS.some(matches);
}

export async function stageSourceTree(options: {
  sourceDir: string;
  targetDir: string;
  removeProjectFiles: boolean;
}): Promise<string[]> {
  const copied: string[] = [];
  await fse.ensureDir(options.targetDir);
  await copyDirectory(options.sourceDir, options.targetDir, "", options.removeProjectFiles, copied);
  return copied;
}

// Every file and directory below `dir`, sidecars excluded, in sorted order.
export async function listTreeEntries(dir: string): Promise<TreeEntry[]> {
  const raw = await fg("**", {
    cwd: dir,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
    followSymbolicLinks: false,
  });

  return raw
    .map((entry): TreeEntry => {
      const isDirectory = entry.endsWith("/");
      return { path: isDirectory ? entry.slice(0, -1) : entry, kind: isDirectory ? "directory" : "file" };
    })
    .filter((entry) => !isIdentityRecordPath(entry.path))
    .sort((a, b) => compareStrings(a.path, b.path));
}

export async function writeIdentityRecords(
  dir: string,
  rootToken: string,
  entries: TreeEntry[],
): Promise<number> {
  const all: TreeEntry[] = [{ path: "", kind: "directory" }, ...entries];

  for (const entry of all) {
    const token = deriveIdentity(rootToken, entry.path);
    const recordPath = path.join(dir, identityRecordPath(entry.path));
    await fs.writeFile(recordPath, renderIdentityRecord(token, entry.path, entry.kind), "utf8");
  }

  return all.length;
}

// Sidecars must pair one-to-one with entries, root included.
export async function findIdentityRecordMismatches(
  dir: string,
): Promise<{ missing: string[]; orphaned: string[] }> {
  const entries = await listTreeEntries(dir);
  const expected = new Set([identityRecordPath(""), ...entries.map((e) => identityRecordPath(e.path))]);

  const records = await fg(["**/*.meta", ".meta"], { cwd: dir, dot: true, onlyFiles: true });
  const actual = new Set(records);

  return {
    missing: [...expected].filter((record) => !actual.has(record)).sort(compareStrings),
    orphaned: [...actual].filter((record) => !expected.has(record)).sort(compareStrings),
  };
}

export async function reconcileWithPrevious(
  stagingDir: string,
  stagedEntries: TreeEntry[],
  previousOutputDir: string | null,
): Promise<TreeDiff> {
  const previousEntries =
    previousOutputDir && (await fse.pathExists(previousOutputDir))
      ? await listTreeEntries(previousOutputDir)
      : [];
  const previousByPath = new Map(previousEntries.map((entry) => [entry.path, entry]));
  const stagedPaths = new Set(stagedEntries.map((entry) => entry.path));

  const diff: TreeDiff = { added: [], updated: [], removed: [], unchanged: 0 };

  for (const entry of stagedEntries) {
    const previous = previousByPath.get(entry.path);
    if (!previous || previous.kind !== entry.kind) {
      diff.added.push(entry.path);
      continue;
    }
    if (entry.kind === "directory" || previousOutputDir === null) {
      diff.unchanged += 1;
      continue;
    }

    const same = await filesEqual(
      path.join(stagingDir, entry.path),
      path.join(previousOutputDir, entry.path),
    );
    if (same) {
      diff.unchanged += 1;
    } else {
      diff.updated.push(entry.path);
    }
  }

  diff.removed = previousEntries
    .filter((entry) => !stagedPaths.has(entry.path))
    .map((entry) => entry.path);

  return diff;
}

export function assertNoIdentityMismatches(mismatches: {
  missing: string[];
  orphaned: string[];
}): void {
  if (mismatches.missing.length === 0 && mismatches.orphaned.length === 0) return;
  throw new SyncError(
    "StagingIOError",
    `Identity records out of sync (missing: ${mismatches.missing.join(", ") || "none"}; orphaned: ${
      mismatches.orphaned.join(", ") || "none"
    }).`,
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

async function copyDirectory(
  sourceDir: string,
  targetDir: string,
  relativeDir: string,
  removeProjectFiles: boolean,
  copied: string[],
): Promise<void> {
  const dirents = await fs.readdir(sourceDir, { withFileTypes: true });
  dirents.sort((a, b) => compareStrings(a.name, b.name));

  for (const dirent of dirents) {
    const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;
    if (isExcludedSourcePath(relativePath, removeProjectFiles)) continue;

    const sourcePath = path.join(sourceDir, dirent.name);
    const targetPath = path.join(targetDir, dirent.name);

    if (dirent.isDirectory()) {
      await fse.ensureDir(targetPath);
      await copyDirectory(sourcePath, targetPath, relativePath, removeProjectFiles, copied);
      continue;
    }

    if (dirent.isFile() || dirent.isSymbolicLink()) {
      await fse.copy(sourcePath, targetPath, { dereference: false, preserveTimestamps: false });
      copied.push(relativePath);
    }
  }
}

async function filesEqual(a: string, b: string): Promise<boolean> {
  const [leftStat, rightStat] = await Promise.all([fs.lstat(a), fs.lstat(b)]);
  if (leftStat.isSymbolicLink() || rightStat.isSymbolicLink()) {
    if (!leftStat.isSymbolicLink() || !rightStat.isSymbolicLink()) return false;
    const [leftTarget, rightTarget] = await Promise.all([fs.readlink(a), fs.readlink(b)]);
    return leftTarget === rightTarget;
  }
  if (leftStat.size !== rightStat.size) return false;

  const [left, right] = await Promise.all([fs.readFile(a), fs.readFile(b)]);
  return left.equals(right);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
