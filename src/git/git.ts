import { execa } from "execa";

import { GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitRunOptions = {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type RemoteRef = {
  sha: string;
  ref: string;
};

const FULL_SHA = /^[0-9a-f]{40}$/i;
const ABBREVIATED_SHA = /^[0-9a-f]{4,39}$/i;

// =============================================================================
// COMMAND RUNNER
// =============================================================================

export async function git(args: string[], opts: GitRunOptions = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd: opts.cwd,
      stdio: "pipe",
      timeout: opts.timeoutMs,
      signal: opts.signal,
      // Never block on a credential prompt.
      env: { GIT_TERMINAL_PROMPT: "0" },
    });
    return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode };
  } catch (err) {
    throw buildGitErrorFromCommand(args, opts.cwd, err);
  }
}

// Like `git`, but a non-zero exit is returned instead of thrown.
export async function gitProbe(args: string[], opts: GitRunOptions = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd: opts.cwd,
      stdio: "pipe",
      timeout: opts.timeoutMs,
      signal: opts.signal,
      env: { GIT_TERMINAL_PROMPT: "0" },
      reject: false,
    });
    if (res.timedOut || res.isCanceled) {
      throw buildGitErrorFromCommand(args, opts.cwd, res);
    }
    return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode };
  } catch (err) {
    if (err instanceof GitError) throw err;
    throw buildGitErrorFromCommand(args, opts.cwd, err);
  }
}

// =============================================================================
// REMOTE REFS
// =============================================================================

export async function listRemoteRefs(url: string, opts: GitRunOptions = {}): Promise<RemoteRef[]> {
  const res = await git(["ls-remote", url], opts);
  return parseLsRemote(res.stdout);
}

export function parseLsRemote(output: string): RemoteRef[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [sha = "", ref = ""] = line.split(/\s+/);
      return { sha: sha.toLowerCase(), ref };
    })
    .filter((entry) => FULL_SHA.test(entry.sha) && entry.ref.length > 0);
}

// Peeled tags first, then tags, branches, fully-qualified refs and HEAD.
export function selectRemoteRef(refs: RemoteRef[], ref: string): string | null {
  if (FULL_SHA.test(ref)) return ref.toLowerCase();

  const byName = new Map(refs.map((entry) => [entry.ref, entry.sha]));
  const candidates = [
    `refs/tags/${ref}^{}`,
    `refs/tags/${ref}`,
    `refs/heads/${ref}`,
    `${ref}^{}`,
    ref,
  ];

  for (const candidate of candidates) {
    const sha = byName.get(candidate);
    if (sha) return sha;
  }

  return null;
}

export function isAbbreviatedSha(ref: string): boolean {
  return ABBREVIATED_SHA.test(ref);
}

// =============================================================================
// LOCAL REPOSITORY
// =============================================================================

export async function cloneWithoutCheckout(
  url: string,
  destDir: string,
  opts: GitRunOptions & { bare?: boolean } = {},
): Promise<void> {
  const args = ["clone", opts.bare ? "--bare" : "--no-checkout", "--quiet", url, destDir];
  await git(args, opts);
}

export async function revParseCommit(
  gitDir: string,
  ref: string,
  opts: GitRunOptions = {},
): Promise<string | null> {
  const res = await gitProbe(
    [`--git-dir=${gitDir}`, "rev-parse", "--verify", "--quiet", `${ref}^{commit}`],
    opts,
  );
  const sha = res.stdout.trim().toLowerCase();
  return res.exitCode === 0 && FULL_SHA.test(sha) ? sha : null;
}

export async function objectType(
  gitDir: string,
  object: string,
  opts: GitRunOptions = {},
): Promise<string | null> {
  const res = await gitProbe([`--git-dir=${gitDir}`, "cat-file", "-t", object], opts);
  return res.exitCode === 0 ? res.stdout.trim() : null;
}

export async function listTreeDirectories(
  gitDir: string,
  commit: string,
  opts: GitRunOptions = {},
): Promise<string[]> {
  const res = await git(
    [`--git-dir=${gitDir}`, "ls-tree", "-r", "-d", "--name-only", "-z", commit],
    opts,
  );
  return res.stdout.split("\0").filter((entry) => entry.length > 0);
}

// Writes `subtree` as of `commit` into `workTree`; nothing else from the commit is written.
export async function checkoutSubtree(
  gitDir: string,
  commit: string,
  subtree: string,
  workTree: string,
  opts: GitRunOptions = {},
): Promise<void> {
  await git(
    [
      "-c",
      "core.autocrlf=false",
      `--git-dir=${gitDir}`,
      `--work-tree=${workTree}`,
      "checkout",
      commit,
      "--",
      subtree,
    ],
    opts,
  );
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function buildGitErrorFromCommand(args: string[], cwd: string | undefined, err: unknown): GitError {
  const stdout = readStringField(err, "stdout");
  const stderr = readStringField(err, "stderr").trim();
  const timedOut = readBooleanField(err, "timedOut");
  const canceled = readBooleanField(err, "isCanceled");
  const message = err instanceof Error ? err.message : readStringField(err, "message");

  const detail = timedOut
    ? "timed out"
    : canceled
      ? "canceled"
      : stderr || message || "Unknown git error.";
  const location = cwd ? ` (cwd=${cwd})` : "";

  return new GitError(`git ${args.join(" ")} failed${location}: ${detail}`, {
    stdout,
    stderr,
    timedOut,
    canceled,
    cause: err,
  });
}

function readStringField(value: unknown, key: string): string {
  if (!value || typeof value !== "object" || !(key in value)) return "";
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : "";
}

function readBooleanField(value: unknown, key: string): boolean {
  if (!value || typeof value !== "object" || !(key in value)) return false;
  return Reflect.get(value, key) === true;
}
