import fs from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import type { MirrorSettings, PackageSpec } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

// Explicit extra fields may replace any computed value, name and version included.
export type PackageManifest = Record<string, unknown>;

export type ModuleDefinition = Record<string, unknown>;

export type SynthesizedArtifacts = {
  manifest: PackageManifest;
  // Output-relative location of package.json.
  manifestPath: string;
  // Null for packages of precompiled assemblies, which carry no module definition.
  moduleDefinition: { path: string; content: ModuleDefinition } | null;
};

export const MANIFEST_FILENAME = "package.json";
export const MODULE_DEFINITION_EXTENSION = ".asmdef";

const NAMESPACE_DECLARATION = /^\s*namespace\s+([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)/m;

// =============================================================================
// SYNTHESIS
// =============================================================================

export function resolveModuleName(spec: PackageSpec): string {
  return spec.asmdef_name ?? spec.name.replace(/\./g, "_");
}

export function synthesizeArtifacts(
  spec: PackageSpec,
  settings: MirrorSettings,
  discoveredNamespace: string | null,
  contentRoot: string,
): SynthesizedArtifacts {
  const namespace = spec.namespace ?? discoveredNamespace ?? null;
  const manifest = buildManifest(spec, settings, namespace);

  if (spec.source.type === "nuget") {
    return { manifest, manifestPath: MANIFEST_FILENAME, moduleDefinition: null };
  }

  const moduleName = resolveModuleName(spec);
  const moduleFile = `${moduleName}${MODULE_DEFINITION_EXTENSION}`;

  return {
    manifest,
    manifestPath: MANIFEST_FILENAME,
    moduleDefinition: {
      path: contentRoot ? `${contentRoot}/${moduleFile}` : moduleFile,
      content: buildModuleDefinition(spec, moduleName, namespace),
    },
  };
}

export function buildManifest(
  spec: PackageSpec,
  settings: MirrorSettings,
  namespace: string | null,
): PackageManifest {
  const defaults: PackageManifest = {
    name: spec.name,
    displayName: spec.display_name ?? spec.name,
    version: spec.version,
    description: spec.description,
    author: spec.author ?? settings.defaults.author,
    unity: settings.unity.version,
    unityRelease: settings.unity.release,
    keywords: [...spec.keywords],
    dependencies: { ...spec.dependencies },
    type: "library",
  };

  if (namespace) {
    defaults.namespace = namespace;
  }
  if (settings.registry) {
    defaults.publishConfig = { registry: settings.registry.url };
  }

  return { ...defaults, ...spec.package_json_extra };
}

export function buildModuleDefinition(
  spec: PackageSpec,
  moduleName: string,
  namespace: string | null,
): ModuleDefinition {
  const definition: ModuleDefinition = {
    name: moduleName,
    ...(namespace ? { rootNamespace: namespace } : {}),
    references: [...spec.assembly_references],
    includePlatforms: [...spec.platforms],
    excludePlatforms: [...spec.exclude_platforms],
    allowUnsafeCode: false,
    overrideReferences: false,
    precompiledReferences: [],
    autoReferenced: true,
    defineConstraints: [...spec.define_constraints],
    versionDefines: spec.version_defines.map((entry) => ({ ...entry })),
    noEngineReferences: false,
  };

  return { ...definition, ...spec.asmdef_extra };
}

export function serializeArtifact(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

// =============================================================================
// NAMESPACE DISCOVERY
// =============================================================================

// First `namespace` declaration among C# sources under `dir`, by sorted path.
export async function discoverNamespace(dir: string): Promise<string | null> {
  const sources = (await fg("**/*.cs", { cwd: dir, dot: false, onlyFiles: true })).sort();

  for (const relativePath of sources) {
    const content = await fs.readFile(path.join(dir, relativePath), "utf8");
    const match = NAMESPACE_DECLARATION.exec(stripComments(content));
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function stripComments(source: string): string {
  return source.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/.*$/gm, "");
}
