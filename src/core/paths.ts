import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  mirrorHome: string;
};

export type ResolveMirrorHomeOptions = {
  mirrorHome?: string;
  configDir?: string;
};

export const MIRROR_HOME_ENV = "UPM_MIRROR_HOME";
export const MIRROR_HOME_DIRNAME = ".upm-mirror";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveMirrorHome(opts: ResolveMirrorHomeOptions = {}): string {
  if (opts.mirrorHome) {
    return path.resolve(opts.mirrorHome);
  }

  const envHome = process.env[MIRROR_HOME_ENV];
  if (envHome) {
    return path.resolve(envHome);
  }

  if (opts.configDir) {
    return path.join(path.resolve(opts.configDir), MIRROR_HOME_DIRNAME);
  }

  return path.join(os.homedir(), MIRROR_HOME_DIRNAME);
}

export function createPathsContext(opts: ResolveMirrorHomeOptions): PathsContext {
  return { mirrorHome: resolveMirrorHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function stateDir(paths: PathsContext): string {
  return path.join(paths.mirrorHome, "state");
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.mirrorHome, "logs");
}

export function runLogPath(paths: PathsContext, runId: string): string {
  return path.join(logsDir(paths), `run-${runId}.jsonl`);
}

export function defaultWorkDir(paths: PathsContext): string {
  return path.join(paths.mirrorHome, "tmp");
}
