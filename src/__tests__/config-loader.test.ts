import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadMirrorConfig, parseMirrorConfig } from "../core/config-loader.js";
import { ConfigError, UserFacingError } from "../core/errors.js";

const tempDirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);

  const configPath = path.join(dir, "upm-mirror.yaml");
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function expectConfigError(doc: unknown): ConfigError {
  try {
    parseMirrorConfig(doc, "test.yaml");
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) return error;
  }
  throw new Error("Expected parseMirrorConfig to throw.");
}

const minimalPackage = {
  name: "com.example.lib",
  source: { url: "https://github.com/example/lib.git", ref: "v1.0" },
};

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadMirrorConfig", () => {
  it("expands environment variables and resolves relative paths", () => {
    const original = process.env.MIRROR_TEST_REF;
    process.env.MIRROR_TEST_REF = "v2.3";

    const configPath = writeConfig(`
settings:
  output_dir: out/packages
  work_dir: .cache/work
packages:
  - name: com.example.lib
    source:
      url: https://github.com/example/lib.git
      ref: \${MIRROR_TEST_REF}
    extract_path: src\\Lib/
`);

    try {
      const config = loadMirrorConfig(configPath);
      const configDir = path.dirname(configPath);

      expect(config.settings.output_dir).toBe(path.join(configDir, "out/packages"));
      expect(config.settings.work_dir).toBe(path.join(configDir, ".cache/work"));
      expect(config.settings.home_dir).toBeUndefined();
      expect(config.settings.max_parallel).toBe(4);
      expect(config.settings.unity).toEqual({ version: "2019.4", release: "0f1" });
      expect(config.settings.build.content_dir).toBe("Runtime");

      const [pkg] = config.packages;
      expect(pkg.source).toEqual({
        type: "git",
        url: "https://github.com/example/lib.git",
        ref: "v2.3",
      });
      expect(pkg.extract_path).toBe("src/Lib");
      expect(pkg.version).toBe("1.0.0");
      expect(pkg.dependencies).toEqual({});
      expect(pkg.package_json_extra).toEqual({});
    } finally {
      if (original === undefined) {
        delete process.env.MIRROR_TEST_REF;
      } else {
        process.env.MIRROR_TEST_REF = original;
      }
    }
  });

  it("reports a missing config with a hint", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
    tempDirs.push(dir);
    const configPath = path.join(dir, "upm-mirror.yaml");

    try {
      loadMirrorConfig(configPath);
      throw new Error("Expected loadMirrorConfig to throw.");
    } catch (error) {
      expect(error).toBeInstanceOf(UserFacingError);
      if (!(error instanceof UserFacingError)) return;
      expect(error.title).toBe("Mirror config missing.");
      expect(error.message).toBe(`Mirror config not found at ${configPath}.`);
      expect(error.hint).toBe("Create upm-mirror.yaml or pass --config <path>.");
    }
  });

  it("wraps YAML syntax errors with their location", () => {
    const configPath = writeConfig("packages:\n  - name: [unclosed\n");

    try {
      loadMirrorConfig(configPath);
      throw new Error("Expected loadMirrorConfig to throw.");
    } catch (error) {
      expect(error).toBeInstanceOf(UserFacingError);
      if (!(error instanceof UserFacingError)) return;
      expect(error.title).toBe("Mirror config invalid.");
      expect(error.cause).toBeInstanceOf(ConfigError);
      expect(String(error.cause)).toContain("(line ");
    }
  });

  it("names the unset environment variable and its location", () => {
    delete process.env.MIRROR_TEST_UNSET;
    const configPath = writeConfig(`
packages:
  - name: com.example.lib
    source: { url: "\${MIRROR_TEST_UNSET}", ref: main }
`);

    try {
      loadMirrorConfig(configPath);
      throw new Error("Expected loadMirrorConfig to throw.");
    } catch (error) {
      expect(error).toBeInstanceOf(UserFacingError);
      if (!(error instanceof UserFacingError)) return;
      expect(error.cause).toBeInstanceOf(ConfigError);
      if (!(error.cause instanceof ConfigError)) return;
      expect(error.cause.message).toBe(
        `Environment variable MIRROR_TEST_UNSET is not set but is referenced in ${configPath} (packages.0.source.url).`,
      );
    }
  });
});

describe("parseMirrorConfig", () => {
  it("accepts an empty document", () => {
    const config = parseMirrorConfig(null, "empty.yaml");

    expect(config.packages).toEqual([]);
    expect(config.settings.output_dir).toBe("packages");
  });

  it("rejects duplicate package names regardless of case", () => {
    const error = expectConfigError({
      packages: [minimalPackage, { ...minimalPackage, name: "com.example.LIB" }],
    });

    expect(error.message).toContain("packages.1.name: name must be a lowercase reverse-domain");
  });

  it("rejects exact duplicate package names", () => {
    const error = expectConfigError({ packages: [minimalPackage, minimalPackage] });

    expect(error.message).toBe(
      [
        "Invalid mirror config at test.yaml:",
        "packages.1.name: Duplicate package name com.example.lib (already defined at packages.0)",
      ].join("\n"),
    );
  });

  it("rejects extract paths that leave the repository", () => {
    const error = expectConfigError({
      packages: [{ ...minimalPackage, extract_path: "src/../../outside" }],
    });

    expect(error.message).toContain(
      "packages.0.extract_path: extract_path must stay inside the repository",
    );
  });

  it("rejects absolute extract paths", () => {
    const error = expectConfigError({
      packages: [{ ...minimalPackage, extract_path: "/etc" }],
    });

    expect(error.message).toContain(
      "packages.0.extract_path: extract_path must be relative to the repository root",
    );
  });

  it("rejects content directories that are not a single name", () => {
    for (const contentDir of ["..", ".", "Runtime/Sub", "..\\Outside", "C:Runtime"]) {
      const error = expectConfigError({ settings: { build: { content_dir: contentDir } } });

      expect(error.message).toBe(
        [
          "Invalid mirror config at test.yaml:",
          'settings.build.content_dir: content_dir must be a single name without path separators, "." or ".."',
        ].join("\n"),
      );
    }
  });

  it("rejects module definition names that would escape the content directory", () => {
    const error = expectConfigError({
      packages: [{ ...minimalPackage, asmdef_name: "../../../evil" }],
    });

    expect(error.message).toBe(
      [
        "Invalid mirror config at test.yaml:",
        'packages.0.asmdef_name: asmdef_name must be a single name without path separators, "." or ".."',
      ].join("\n"),
    );
  });

  it("accepts NuGet sources and fills in the framework and feed", () => {
    const config = parseMirrorConfig(
      {
        packages: [
          {
            name: "com.example.buffers",
            source: { type: "nuget", id: "Example.Buffers", version: "4.6.1" },
          },
        ],
      },
      "nuget.yaml",
    );

    expect(config.packages[0].source).toEqual({
      type: "nuget",
      id: "Example.Buffers",
      version: "4.6.1",
      framework: "netstandard2.0",
      feed: "https://api.nuget.org/v3-flatcontainer",
    });
    expect(config.packages[0].extract_path).toBe(".");
  });

  it("rejects an extract path on a NuGet source", () => {
    const error = expectConfigError({
      packages: [
        {
          name: "com.example.buffers",
          source: { type: "nuget", id: "Example.Buffers", version: "4.6.1" },
          extract_path: "lib",
        },
      ],
    });

    expect(error.message).toBe(
      [
        "Invalid mirror config at test.yaml:",
        "packages.0.extract_path: extract_path is not supported for nuget sources",
      ].join("\n"),
    );
  });

  it("rejects unknown keys", () => {
    const error = expectConfigError({
      packages: [{ ...minimalPackage, extra_fields: {} }],
    });

    expect(error.message).toContain("packages.0: Unrecognized keys: extra_fields");
  });

  it("keeps pass-through fields verbatim", () => {
    const config = parseMirrorConfig(
      {
        packages: [
          {
            ...minimalPackage,
            package_json_extra: { license: "MIT", samples: [{ path: "Samples~/Demo" }] },
          },
        ],
      },
      "extra.yaml",
    );

    expect(config.packages[0].package_json_extra).toEqual({
      license: "MIT",
      samples: [{ path: "Samples~/Demo" }],
    });
  });
});
