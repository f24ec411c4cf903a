import type { AppContext } from "../context.js";
import type { LogSink } from "../../core/logger.js";
import { stateDir } from "../../core/paths.js";
import { SyncStateStore } from "../../core/state-store.js";

import { PackageOrchestrator } from "./package-orchestrator.js";
import { systemClock, type OrchestratorPorts } from "./ports.js";
import { createGitSourceBackend } from "./vcs/git-source-backend.js";
import { createHttpNugetFeedClient } from "./vcs/nuget-feed-client.js";
import { createNugetSourceBackend } from "./vcs/nuget-source-backend.js";
import { createSourceRouter } from "./vcs/source-router.js";

export function createDefaultPorts(appContext: AppContext, log: LogSink): OrchestratorPorts {
  const { settings } = appContext.config;

  return {
    backend: createSourceRouter({
      git: createGitSourceBackend({
        workDir: appContext.workDir,
        timeoutMs: settings.git_timeout_seconds * 1000,
      }),
      nuget: createNugetSourceBackend({
        workDir: appContext.workDir,
        client: createHttpNugetFeedClient({ timeoutMs: settings.nuget_timeout_seconds * 1000 }),
      }),
    }),
    stateStore: new SyncStateStore(stateDir(appContext.paths)),
    log,
    clock: systemClock,
  };
}

export function createOrchestrator(appContext: AppContext, log: LogSink): PackageOrchestrator {
  return new PackageOrchestrator({
    settings: appContext.config.settings,
    outputDir: appContext.outputDir,
    ports: createDefaultPorts(appContext, log),
  });
}
