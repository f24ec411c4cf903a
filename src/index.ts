import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli, type GlobalOptions } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return program.opts<GlobalOptions>().debug;
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError && Number.isFinite(error.exitCode)) {
    return error.exitCode;
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// LIBRARY SURFACE
// =============================================================================

export { PackageOrchestrator } from "./app/orchestrator/package-orchestrator.js";
export type {
  CheckResult,
  SyncReport,
  SyncResult,
} from "./app/orchestrator/package-orchestrator.js";
export { ResyncQueue } from "./app/orchestrator/resync-queue.js";
export { createGitSourceBackend } from "./app/orchestrator/vcs/git-source-backend.js";
export { createHttpNugetFeedClient } from "./app/orchestrator/vcs/nuget-feed-client.js";
export type { NugetFeedClient } from "./app/orchestrator/vcs/nuget-feed-client.js";
export { createNugetSourceBackend } from "./app/orchestrator/vcs/nuget-source-backend.js";
export { createSourceRouter } from "./app/orchestrator/vcs/source-router.js";
export { parseMirrorConfig, loadMirrorConfig } from "./core/config-loader.js";
export { deriveIdentity, packageRootToken } from "./core/identity.js";
export { SyncStateStore } from "./core/state-store.js";
