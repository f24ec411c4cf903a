/*
Purpose: derive the stable GUID bound to a package-relative path and render its .meta record.
Assumptions: the downstream importer binds references by GUID, so a path must map to the same
  token on every regeneration without any persisted mapping.
Usage: const token = deriveIdentity(packageRootToken(spec.name), "Runtime/Foo.cs").
*/

import { createHash } from "node:crypto";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type IdentityToken = string;

export type EntryKind = "file" | "directory";

export const IDENTITY_RECORD_SUFFIX = ".meta";

// Importer blocks Unity writes for common extensions; everything else is DefaultImporter.
const IMPORTER_BY_EXTENSION: Record<string, string> = {
  ".cs": "MonoImporter",
  ".asmdef": "AssemblyDefinitionImporter",
  ".asmref": "AssemblyDefinitionReferenceImporter",
  ".json": "TextScriptImporter",
  ".txt": "TextScriptImporter",
  ".md": "TextScriptImporter",
  ".xml": "TextScriptImporter",
  ".yaml": "TextScriptImporter",
  ".yml": "TextScriptImporter",
  ".bytes": "TextScriptImporter",
  ".dll": "PluginImporter",
};

// Managed assemblies load on every platform unless the package narrows them.
const PLUGIN_IMPORTER_BODY = [
  "  externalObjects: {}",
  "  serializedVersion: 2",
  "  iconMap: {}",
  "  executionOrder: {}",
  "  defineConstraints: []",
  "  isPreloaded: 0",
  "  isOverridable: 0",
  "  isExplicitlyReferenced: 0",
  "  validateReferences: 1",
  "  platformData:",
  "  - first:",
  "      Any: ",
  "    second:",
  "      enabled: 1",
  "      settings: {}",
] as const;

// =============================================================================
// DERIVATION
// =============================================================================

export function normalizeRelativePath(relativePath: string): string {
  const slashed = relativePath.replace(/\\/g, "/");
  const segments = slashed.split("/").filter((segment) => segment.length > 0 && segment !== ".");
  return segments.join("/");
}

export function packageRootToken(packageName: string): string {
  return createHash("sha256").update(`upm-mirror:package:${packageName}`).digest("hex");
}

export function deriveIdentity(rootToken: string, relativePath: string): IdentityToken {
  const normalized = normalizeRelativePath(relativePath);
  const hex = createHash("sha256").update(`${rootToken}/${normalized}`).digest("hex").slice(0, 32);
  return formatTokenGroups(hex);
}

export function identityRecordPath(relativePath: string): string {
  const normalized = normalizeRelativePath(relativePath);
  return `${normalized}${IDENTITY_RECORD_SUFFIX}`;
}

export function isIdentityRecordPath(relativePath: string): boolean {
  return path.posix.basename(normalizeRelativePath(relativePath)).endsWith(IDENTITY_RECORD_SUFFIX);
}

// =============================================================================
// RECORD RENDERING
// =============================================================================

export function resolveImporter(relativePath: string, kind: EntryKind): string {
  if (kind === "directory") return "DefaultImporter";
  const extension = path.posix.extname(normalizeRelativePath(relativePath)).toLowerCase();
  return IMPORTER_BY_EXTENSION[extension] ?? "DefaultImporter";
}

export function renderIdentityRecord(
  token: IdentityToken,
  relativePath: string,
  kind: EntryKind,
): string {
  const importer = resolveImporter(relativePath, kind);
  const lines = ["fileFormatVersion: 2", `guid: ${token}`];

  if (kind === "directory") {
    lines.push("folderAsset: yes");
  }

  lines.push(`${importer}:`);
  if (importer === "PluginImporter") {
    lines.push(...PLUGIN_IMPORTER_BODY);
  } else {
    if (importer === "MonoImporter") {
      lines.push(
        "  serializedVersion: 2",
        "  defaultReferences: []",
        "  executionOrder: 0",
        "  icon: {instanceID: 0}",
      );
    }
    lines.push("  externalObjects: {}");
  }
  lines.push(
    "  userData: ",
    "  assetBundleName: ",
    "  assetBundleVariant: ",
  );

  return `${lines.join("\n")}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatTokenGroups(hex: string): string {
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}
