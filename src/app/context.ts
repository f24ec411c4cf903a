/**
 * AppContext resolves config-scoped paths without mutating globals.
 * Purpose: make the output, work and home directories explicit for CLI and orchestrator.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { MirrorConfig } from "../core/config.js";
import { createPathsContext, defaultWorkDir, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: MirrorConfig;
  outputDir: string;
  workDir: string;
  mirrorHome: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: MirrorConfig;
  outputDir?: string;
  mirrorHome?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const configPath = path.resolve(input.configPath);
  const { settings } = input.config;

  const paths = createPathsContext({
    mirrorHome: input.mirrorHome ?? settings.home_dir,
    configDir: path.dirname(configPath),
  });

  return {
    configPath,
    config: input.config,
    outputDir: path.resolve(input.outputDir ?? settings.output_dir),
    workDir: settings.work_dir ?? defaultWorkDir(paths),
    mirrorHome: paths.mirrorHome,
    paths,
  };
}
