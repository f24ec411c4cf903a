import path from "node:path";

import fse from "fs-extra";

import { sourceUrl, type PackageSpec } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

export type PackageDocsOptions = {
  spec: PackageSpec;
  sourceDir: string;
  stagingDir: string;
  namespace: string | null;
  copyLicense: boolean;
  generateReadme: boolean;
};

export type PackageDocsResult = {
  license: string | null;
  readmeSource: string | null;
};

export const LICENSE_CANDIDATES = [
  "LICENSE",
  "LICENSE.txt",
  "LICENSE.md",
  "License",
  "License.txt",
  "License.md",
  "license",
  "license.txt",
  "license.md",
  "COPYING",
  "COPYING.txt",
  "COPYRIGHT",
  "COPYRIGHT.txt",
] as const;

export const README_CANDIDATES = [
  "README.md",
  "README.MD",
  "Readme.md",
  "readme.md",
  "README.txt",
  "README.rst",
  "README",
  "readme",
] as const;

// Owners named as-is in the disclaimer rather than as "the <org> organization".
const WELL_KNOWN_OWNERS = new Set([
  "microsoft",
  "google",
  "facebook",
  "meta",
  "apple",
  "oracle",
  "ibm",
  "amazon",
  "aws",
]);

// =============================================================================
// PUBLIC API
// =============================================================================

export async function writePackageDocs(options: PackageDocsOptions): Promise<PackageDocsResult> {
  const result: PackageDocsResult = { license: null, readmeSource: null };

  if (options.copyLicense) {
    const license = await findFirstFile(options.sourceDir, LICENSE_CANDIDATES);
    if (license) {
      await fse.copy(path.join(options.sourceDir, license), path.join(options.stagingDir, "LICENSE"));
      result.license = license;
    }
  }

  if (options.generateReadme) {
    const readmeName = await findFirstFile(options.sourceDir, README_CANDIDATES);
    const upstream = readmeName
      ? await fse.readFile(path.join(options.sourceDir, readmeName), "utf8")
      : null;
    const content = renderReadme(options.spec, options.namespace, upstream);
    await fse.writeFile(path.join(options.stagingDir, "README.md"), content, "utf8");
    result.readmeSource = readmeName;
  }

  return result;
}

export function resolveUpstreamOwner(url: string): string {
  const match = /github\.com[/:]([^/]+)/i.exec(url);
  const org = match?.[1]?.replace(/\.git$/, "");
  if (!org) return "the original package author";

  if (WELL_KNOWN_OWNERS.has(org.toLowerCase())) {
    return org.charAt(0).toUpperCase() + org.slice(1).toLowerCase();
  }
  return `the ${org} organization`;
}

export function renderReadme(
  spec: PackageSpec,
  namespace: string | null,
  upstreamReadme: string | null,
): string {
  const upstreamUrl = sourceUrl(spec.source);
  const owner = resolveUpstreamOwner(upstreamUrl);
  const displayName = spec.display_name ?? spec.name;

  const parts: string[] = [
    `# ${displayName}\n\n`,
    "> **IMPORTANT DISCLAIMER**\n",
    ">\n",
    "> This Unity package is a community-created wrapper and is **NOT officially\n",
    `> affiliated with, endorsed by, or supported by ${owner}**.\n`,
    ">\n",
    `> - The wrapper author has **no affiliation** with ${owner}\n`,
    "> - This package is provided **as-is** for Unity developers' convenience\n",
    "> - For official support, please refer to the original repository\n",
    "> - Use at your own risk in production environments\n",
    "\n---\n\n",
  ];

  if (upstreamReadme !== null) {
    parts.push("## Original Package Documentation\n\n", upstreamReadme);
  } else {
    parts.push(
      "## Package Information\n\n",
      `This package wraps functionality from: ${upstreamUrl}\n\n`,
      "Please refer to the original repository for documentation and usage examples.\n",
    );
  }

  parts.push("\n---\n\n## Unity Package Information\n\n");
  parts.push(`- **Package Name**: \`${spec.name}\`\n`);
  parts.push(`- **Version**: ${spec.version}\n`);
  if (namespace) {
    parts.push(`- **Namespace**: \`${namespace}\`\n`);
  }
  parts.push(`- **Original Source**: ${upstreamUrl}\n`);

  return parts.join("");
}

// =============================================================================
// INTERNALS
// =============================================================================

// Exact-name lookup; readdir keeps case distinctions on case-insensitive filesystems.
async function findFirstFile(dir: string, candidates: readonly string[]): Promise<string | null> {
  const dirents = await fse.readdir(dir, { withFileTypes: true });
  const files = new Set(dirents.filter((d) => d.isFile()).map((d) => d.name));
  return candidates.find((name) => files.has(name)) ?? null;
}
