import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type TempGitRepo = {
  // Scratch directory beside the repository; removed by cleanup.
  tempRoot: string;
  repoDir: string;
  writeFile: (relPath: string, contents: string) => Promise<void>;
  rm: (relPath: string) => Promise<void>;
  commit: (message: string) => Promise<string>;
  tag: (name: string, options?: { annotated?: boolean }) => Promise<void>;
  git: (args: string[]) => Promise<string>;
  cleanup: () => Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createTempGitRepo(): Promise<TempGitRepo> {
  const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "upm-mirror-git-"));
  const repoDir = path.join(tempRoot, "repo");

  await fs.mkdir(repoDir, { recursive: true });
  await initGitRepo(repoDir);

  const git = async (args: string[]): Promise<string> => {
    const result = await execa("git", ["-C", repoDir, ...args]);
    return result.stdout;
  };

  const writeFile = async (relPath: string, contents: string): Promise<void> => {
    const absolutePath = path.join(repoDir, relPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    const normalizedContents = normalizeLineEndings(contents);
    await fs.writeFile(absolutePath, normalizedContents, "utf8");
  };

  const rm = async (relPath: string): Promise<void> => {
    const absolutePath = path.join(repoDir, relPath);
    await fs.rm(absolutePath, { recursive: true, force: true });
  };

  const commit = async (message: string): Promise<string> => {
    await git(["add", "-A"]);
    await git(["commit", "-m", message]);
    const sha = await git(["rev-parse", "HEAD"]);
    return sha.trim();
  };

  const tag = async (name: string, options: { annotated?: boolean } = {}): Promise<void> => {
    await git(options.annotated ? ["tag", "-a", name, "-m", name] : ["tag", name]);
  };

  const cleanup = async (): Promise<void> => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  };

  return { tempRoot, repoDir, writeFile, rm, commit, tag, git, cleanup };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function initGitRepo(repoDir: string): Promise<void> {
  await execa("git", ["init", "--quiet"], { cwd: repoDir });
  await execa("git", ["config", "user.name", "mirror-test"], { cwd: repoDir });
  await execa("git", ["config", "user.email", "mirror-test@example.com"], {
    cwd: repoDir,
  });
  await execa("git", ["config", "commit.gpgsign", "false"], { cwd: repoDir });
  await execa("git", ["config", "tag.gpgsign", "false"], { cwd: repoDir });
}

function normalizeLineEndings(contents: string): string {
  return contents.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}
