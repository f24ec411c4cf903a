/**
 * loadAppContext resolves the mirror config and paths for app entrypoints.
 * Purpose: centralize config discovery without mutating process.env.
 * Assumptions: config loader validates schema and anchors relative settings paths.
 * Usage: const { appContext } = loadAppContext({ explicitConfigPath }).
 */

import { resolveMirrorConfigPath, type ConfigSource } from "../../core/config-discovery.js";
import { loadMirrorConfig } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  outputDir?: string;
  mirrorHome?: string;
  cwd?: string;
};

export type LoadAppContextResult = {
  appContext: AppContext;
  source: ConfigSource;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAppContext(args: LoadAppContextArgs = {}): LoadAppContextResult {
  const resolved = resolveMirrorConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
  });

  const config = loadMirrorConfig(resolved.configPath);
  const appContext = createAppContext({
    configPath: resolved.configPath,
    config,
    outputDir: args.outputDir,
    mirrorHome: args.mirrorHome,
  });

  return { appContext, source: resolved.source };
}
