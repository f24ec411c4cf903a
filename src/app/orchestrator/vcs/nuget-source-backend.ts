/**
 * NuGet-backed source backend.
 * Purpose: resolve a package version on a feed and lay out its managed assemblies for one
 *   target framework as a workspace tree.
 * Assumptions: only `lib/<framework>/*.dll` is mirrored; the archive root is kept as the
 *   docs root so LICENSE and README files are found there.
 * Usage: createNugetSourceBackend({ workDir, client: createHttpNugetFeedClient() }).
 */

import fs from "node:fs/promises";
import path from "node:path";

import AdmZip from "adm-zip";
import fse from "fs-extra";

import type { NugetSourceLocator, SourceLocator } from "../../../core/config.js";
import { SyncError, toSyncError } from "../../../core/errors.js";
import type { VersionControlBackend, WorkspaceTree } from "../../../core/source-extractor.js";

import type { NugetFeedClient } from "./nuget-feed-client.js";

// =============================================================================
// TYPES
// =============================================================================

export type NugetSourceBackendOptions = {
  workDir: string;
  client: NugetFeedClient;
};

// Tried in order after the configured framework.
const FALLBACK_FRAMEWORKS = ["netstandard2.0", "netstandard20", "net6.0", "net5.0", "netcoreapp3.1"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createNugetSourceBackend(options: NugetSourceBackendOptions): VersionControlBackend {
  const { client } = options;

  return {
    async resolveRef(locator, ref, callOptions) {
      const nuget = expectNuget(locator);
      const versions = await client.listVersions(nuget, callOptions);
      const wanted = ref.toLowerCase();
      const match = versions.find((version) => version.toLowerCase() === wanted);
      if (!match) {
        throw new SyncError("RefNotFound", `Version ${ref} of ${nuget.id} not found in ${nuget.feed}.`);
      }
      return match.toLowerCase();
    },

    async materialize(locator, resolvedRef, subtreePath, callOptions) {
      const nuget = expectNuget(locator);

      let root: string;
      try {
        await fse.ensureDir(options.workDir);
        root = await fs.mkdtemp(path.join(options.workDir, "nuget-"));
      } catch (error) {
        throw toSyncError(error, "StagingIOError");
      }

      try {
        const archive = await client.download(nuget, resolvedRef, callOptions);
        const packageDir = path.join(root, "package");
        extractArchive(archive, packageDir, `${nuget.id} ${resolvedRef}`);

        const libDir = await selectFrameworkDir(packageDir, nuget, resolvedRef);
        const pluginsDir = path.join(root, "plugins");
        await copyAssemblies(libDir, pluginsDir);

        const tree: WorkspaceTree = {
          root,
          contentRoot: pluginsDir,
          docsRoot: packageDir,
          resolvedRef,
          subtreePath,
        };
        return tree;
      } catch (error) {
        await fse.remove(root);
        throw toSyncError(error, "StagingIOError");
      }
    },

    async release(tree) {
      await fse.remove(tree.root);
    },
  };
}

// Candidate `lib/` subdirectories for a framework, most specific first, without duplicates.
export function frameworkCandidates(framework: string): string[] {
  const candidates = [framework, framework.replace(/\./g, ""), ...FALLBACK_FRAMEWORKS].map(
    (name) => `lib/${name}`,
  );
  candidates.push("lib");
  return [...new Set(candidates)];
}

// =============================================================================
// INTERNALS
// =============================================================================

function expectNuget(locator: SourceLocator): NugetSourceLocator {
  if (locator.type !== "nuget") {
    throw new SyncError("ConfigInvalid", `Source type ${locator.type} is not served by the NuGet backend.`);
  }
  return locator;
}

function extractArchive(archive: Buffer, targetDir: string, subject: string): void {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archive);
  } catch (error) {
    throw new SyncError("SourceUnavailable", `Package ${subject} is not a valid archive.`, error);
  }
  zip.extractAllTo(targetDir, true);
}

async function selectFrameworkDir(
  packageDir: string,
  locator: NugetSourceLocator,
  version: string,
): Promise<string> {
  for (const candidate of frameworkCandidates(locator.framework)) {
    const dir = path.join(packageDir, candidate);
    if ((await listAssemblies(dir)).length > 0) return dir;
  }

  const available = await listDirectories(path.join(packageDir, "lib"));
  throw new SyncError(
    "SubtreeMissing",
    `No assemblies for ${locator.framework} in ${locator.id} ${version} (available: ${
      available.join(", ") || "none"
    }).`,
  );
}

async function copyAssemblies(libDir: string, targetDir: string): Promise<void> {
  await fse.ensureDir(targetDir);
  for (const name of await listAssemblies(libDir)) {
    await fse.copy(path.join(libDir, name), path.join(targetDir, name));
  }
}

async function listAssemblies(dir: string): Promise<string[]> {
  if (!(await fse.pathExists(dir))) return [];
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  return dirents
    .filter((dirent) => dirent.isFile() && dirent.name.toLowerCase().endsWith(".dll"))
    .map((dirent) => dirent.name)
    .sort();
}

async function listDirectories(dir: string): Promise<string[]> {
  if (!(await fse.pathExists(dir))) return [];
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  return dirents
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name)
    .sort();
}
