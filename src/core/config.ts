import path from "node:path";

import { z } from "zod";

// =============================================================================
// PRIMITIVES
// =============================================================================

// UPM requires lowercase reverse-domain names, e.g. com.example.wrapper.lib
export const PACKAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*(\.[a-z0-9][a-z0-9_-]*)+$/;

export const DEFAULT_NUGET_FEED = "https://api.nuget.org/v3-flatcontainer";
export const DEFAULT_NUGET_FRAMEWORK = "netstandard2.0";

// A name joined onto a directory must not leave it.
export function isSinglePathSegment(value: string): boolean {
  return (
    value !== "." &&
    value !== ".." &&
    !/[/\\]/.test(value) &&
    !/^[A-Za-z]:/.test(value)
  );
}

function pathSegmentSchema(field: string) {
  return z.string().min(1).refine(isSinglePathSegment, {
    message: `${field} must be a single name without path separators, "." or ".."`,
  });
}

const JsonValueSchema: z.ZodType<unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const ExtraFieldsSchema = z.record(JsonValueSchema).default({});

const ExtractPathSchema = z
  .string()
  .default(".")
  .transform((value) => value.replace(/\\/g, "/"))
  .refine((value) => !path.posix.isAbsolute(value) && !/^[A-Za-z]:/.test(value), {
    message: "extract_path must be relative to the repository root",
  })
  .transform((value) => {
    const normalized = path.posix.normalize(value).replace(/\/+$/, "");
    return normalized === "" ? "." : normalized;
  })
  .refine((value) => value !== ".." && !value.startsWith("../"), {
    message: "extract_path must stay inside the repository",
  });

// =============================================================================
// PACKAGE SPEC
// =============================================================================

const GitSourceSchema = z
  .object({
    type: z.literal("git").default("git"),
    url: z.string().min(1),
    ref: z.string().min(1),
  })
  .strict();

const NugetSourceSchema = z
  .object({
    type: z.literal("nuget"),
    id: z.string().regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/, {
      message: "id must be a NuGet package id (e.g. System.Buffers)",
    }),
    version: z.string().regex(/^[0-9A-Za-z][0-9A-Za-z.+-]*$/, {
      message: "version must be a NuGet package version (e.g. 4.6.1)",
    }),
    framework: z
      .string()
      .regex(/^[A-Za-z0-9][A-Za-z0-9.+-]*$/, { message: "framework must be a target framework moniker" })
      .default(DEFAULT_NUGET_FRAMEWORK),
    feed: z
      .string()
      .url()
      .default(DEFAULT_NUGET_FEED)
      .transform((value) => value.replace(/\/+$/, "")),
  })
  .strict();

const SourceSchema = z.union([GitSourceSchema, NugetSourceSchema]);

const VersionDefineSchema = z
  .object({
    name: z.string().min(1),
    expression: z.string(),
    define: z.string().min(1),
  })
  .strict();

export const PackageSpecSchema = z
  .object({
    name: z.string().regex(PACKAGE_NAME_PATTERN, {
      message: "name must be a lowercase reverse-domain identifier (e.g. com.example.lib)",
    }),
    display_name: z.string().min(1).optional(),
    description: z.string().default(""),
    version: z.string().min(1).default("1.0.0"),
    author: z.string().optional(),

    source: SourceSchema,
    extract_path: ExtractPathSchema,

    namespace: z.string().min(1).optional(),
    asmdef_name: pathSegmentSchema("asmdef_name").optional(),

    dependencies: z.record(z.string()).default({}),
    keywords: z.array(z.string()).default([]),

    assembly_references: z.array(z.string()).default([]),
    define_constraints: z.array(z.string()).default([]),
    version_defines: z.array(VersionDefineSchema).default([]),
    platforms: z.array(z.string()).default([]),
    exclude_platforms: z.array(z.string()).default([]),

    package_json_extra: ExtraFieldsSchema,
    asmdef_extra: ExtraFieldsSchema,
  })
  .strict()
  .superRefine((spec, ctx) => {
    if (spec.source.type === "nuget" && spec.extract_path !== ".") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["extract_path"],
        message: "extract_path is not supported for nuget sources",
      });
    }
  });

export type PackageSpec = z.infer<typeof PackageSpecSchema>;
export type PackageSpecInput = z.input<typeof PackageSpecSchema>;
export type SourceLocator = PackageSpec["source"];
export type GitSourceLocator = z.infer<typeof GitSourceSchema>;
export type NugetSourceLocator = z.infer<typeof NugetSourceSchema>;
export type SourceType = SourceLocator["type"];

// =============================================================================
// SETTINGS
// =============================================================================

const BuildPolicySchema = z
  .object({
    remove_project_files: z.boolean().default(true),
    nest_content: z.boolean().default(true),
    content_dir: pathSegmentSchema("content_dir").default("Runtime"),
    generate_identity_records: z.boolean().default(true),
    copy_license: z.boolean().default(true),
    generate_readme: z.boolean().default(true),
  })
  .strict();

export type BuildPolicy = z.infer<typeof BuildPolicySchema>;

export const SettingsSchema = z
  .object({
    output_dir: z.string().min(1).default("packages"),
    work_dir: z.string().min(1).optional(),
    home_dir: z.string().min(1).optional(),
    max_parallel: z.number().int().positive().default(4),
    git_timeout_seconds: z.number().int().positive().default(300),
    nuget_timeout_seconds: z.number().int().positive().default(60),
    unity: z
      .object({
        version: z.string().min(1).default("2019.4"),
        release: z.string().min(1).default("0f1"),
      })
      .strict()
      .default({}),
    defaults: z
      .object({
        author: z.string().default(""),
      })
      .strict()
      .default({}),
    registry: z
      .object({
        url: z.string().url(),
      })
      .strict()
      .optional(),
    build: BuildPolicySchema.default({}),
  })
  .strict();

export type MirrorSettings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

// =============================================================================
// CONFIG
// =============================================================================

export const MirrorConfigSchema = z
  .object({
    settings: SettingsSchema.default({}),
    packages: z.array(PackageSpecSchema).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Map<string, number>();
    config.packages.forEach((pkg, index) => {
      const key = pkg.name.toLowerCase();
      const previous = seen.get(key);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["packages", index, "name"],
          message: `Duplicate package name ${pkg.name} (already defined at packages.${previous})`,
        });
        return;
      }
      seen.set(key, index);
    });
  });

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;

export function parsePackageSpec(input: PackageSpecInput): PackageSpec {
  return PackageSpecSchema.parse(input);
}

// =============================================================================
// SOURCE HELPERS
// =============================================================================

// The ref a package asks for: a git ref, or a NuGet version.
export function requestedRef(locator: SourceLocator): string {
  return locator.type === "git" ? locator.ref : locator.version;
}

// Where the upstream content lives, for docs and messages.
export function sourceUrl(locator: SourceLocator): string {
  return locator.type === "git" ? locator.url : nugetPackageUrl(locator, locator.version);
}

export function describeSource(locator: SourceLocator): string {
  return locator.type === "git"
    ? `${locator.url}#${locator.ref}`
    : `nuget:${locator.id}@${locator.version}`;
}

// Flat-container download URL; ids and versions are lowercased by the feed.
export function nugetPackageUrl(locator: NugetSourceLocator, version: string): string {
  const id = locator.id.toLowerCase();
  const lowerVersion = version.toLowerCase();
  return `${locator.feed}/${id}/${lowerVersion}/${id}.${lowerVersion}.nupkg`;
}

export function nugetIndexUrl(locator: NugetSourceLocator): string {
  return `${locator.feed}/${locator.id.toLowerCase()}/index.json`;
}
