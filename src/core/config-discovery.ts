import fs from "node:fs";
import path from "node:path";

import { DEFAULT_CONFIG_FILENAME } from "./config-loader.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "discovered" | "default";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

// =============================================================================
// PUBLIC API
// =============================================================================

// Explicit path wins; otherwise the nearest upm-mirror.yaml at or above cwd.
export function resolveMirrorConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = path.resolve(args.cwd ?? process.cwd());

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const discovered = findConfigUpwards(cwd);
  if (discovered) {
    return { configPath: discovered, source: "discovered" };
  }

  return { configPath: path.join(cwd, DEFAULT_CONFIG_FILENAME), source: "default" };
}

export function findConfigUpwards(startDir: string): string | null {
  let current = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(current, DEFAULT_CONFIG_FILENAME);
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
