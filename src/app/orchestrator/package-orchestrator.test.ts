import fs from "node:fs";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import fg from "fast-glob";
import { afterEach, describe, expect, it, vi } from "vitest";

import { FakeNugetFeed } from "../../__tests__/helpers/fake-nuget-feed.js";
import { FakeSourceBackend, type FakeFiles } from "../../__tests__/helpers/fake-source-backend.js";
import {
  SettingsSchema,
  parsePackageSpec,
  type PackageSpec,
  type SettingsInput,
} from "../../core/config.js";
import { SyncError } from "../../core/errors.js";
import type { VersionControlBackend } from "../../core/source-extractor.js";

import { FakeClock, FakeLogSink, FakeStateRepository } from "./__tests__/fakes.js";
import { PackageOrchestrator } from "./package-orchestrator.js";
import { ResyncQueue } from "./resync-queue.js";
import { createNugetSourceBackend } from "./vcs/nuget-source-backend.js";
import { createSourceRouter } from "./vcs/source-router.js";

const FOO_TOKEN = "092de25a-91d0-a9e0-aef2-52d9da3788cb";

const V1_FILES: FakeFiles = {
  "src/Lib/Foo.cs": "namespace Example.Lib { class Foo {} }",
  "src/Lib/Bar.cs": "namespace Example.Lib { class Bar {} }",
  "src/Lib/Lib.csproj": "<Project />",
  "tests/FooTests.cs": "class FooTests {}",
};

const V11_FILES: FakeFiles = {
  "src/Lib/Foo.cs": "namespace Example.Lib { class Foo {} }",
  "tests/FooTests.cs": "class FooTests {}",
};

// An upstream directory named like the generated module definition.
const COLLIDING_FILES: FakeFiles = {
  "src/Lib/Foo.cs": "namespace Example.Lib { class Foo {} }",
  "src/Lib/com_example_lib.asmdef/Inner.cs": "class Inner {}",
};

const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeSpec(ref = "v1.0"): PackageSpec {
  return parsePackageSpec({
    name: "com.example.lib",
    source: { url: "https://example.com/lib.git", ref },
    extract_path: "src/Lib",
  });
}

function setup(options: { backend?: (fake: FakeSourceBackend) => VersionControlBackend } = {}) {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrator-"));
  tempDirs.push(tmpRoot);

  const outputDir = path.join(tmpRoot, "packages");
  const fakeBackend = new FakeSourceBackend(path.join(tmpRoot, "work"));
  const v1 = fakeBackend.commit("v1.0", V1_FILES);
  const v11 = fakeBackend.commit("v1.1", V11_FILES);

  const stateStore = new FakeStateRepository();
  const log = new FakeLogSink();
  const clock = new FakeClock();
  const ports = {
    backend: options.backend ? options.backend(fakeBackend) : fakeBackend,
    stateStore,
    log,
    clock,
  };
  // Same ports and output directory, different settings.
  const withSettings = (settings: SettingsInput): PackageOrchestrator =>
    new PackageOrchestrator({ settings: SettingsSchema.parse(settings), outputDir, ports });
  const orchestrator = withSettings({});

  const outputPath = path.join(outputDir, "com.example.lib");
  const readOutput = (file: string): string => fs.readFileSync(path.join(outputPath, file), "utf8");
  const outputHas = (file: string): boolean => fs.existsSync(path.join(outputPath, file));

  return {
    orchestrator,
    withSettings,
    tmpRoot,
    fakeBackend,
    stateStore,
    log,
    clock,
    outputDir,
    outputPath,
    readOutput,
    outputHas,
    v1,
    v11,
  };
}

function snapshotTree(root: string): Record<string, string> {
  const files = fg.sync("**", { cwd: root, dot: true, onlyFiles: true }).sort();
  return Object.fromEntries(files.map((file) => [file, fs.readFileSync(path.join(root, file), "utf8")]));
}

function guidOf(record: string): string {
  return /^guid: (.+)$/m.exec(record)?.[1] ?? "";
}

describe("PackageOrchestrator.sync", () => {
  it("builds the first sync into the package directory", async () => {
    const t = setup();

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toMatchObject({
      status: "built",
      package: "com.example.lib",
      resolvedRef: t.v1,
      reason: "first_sync",
      outputPath: t.outputPath,
      namespace: "Example.Lib",
      identityRecords: 7,
    });
    expect(fs.readdirSync(t.outputPath).sort()).toEqual([
      ".meta",
      "README.md",
      "README.md.meta",
      "Runtime",
      "Runtime.meta",
      "package.json",
      "package.json.meta",
    ]);
    expect(fs.readdirSync(path.join(t.outputPath, "Runtime")).sort()).toEqual([
      "Bar.cs",
      "Bar.cs.meta",
      "Foo.cs",
      "Foo.cs.meta",
      "com_example_lib.asmdef",
      "com_example_lib.asmdef.meta",
    ]);
    expect(guidOf(t.readOutput("Runtime/Foo.cs.meta"))).toBe(FOO_TOKEN);
    expect(JSON.parse(t.readOutput("package.json"))).toMatchObject({
      name: "com.example.lib",
      version: "1.0.0",
      namespace: "Example.Lib",
    });

    expect(t.stateStore.peek("com.example.lib")).toEqual({
      package: "com.example.lib",
      last_ref: t.v1,
      requested_ref: "v1.0",
      last_sync_at: "2024-01-01T00:00:00.000Z",
      last_attempt_at: "2024-01-01T00:00:00.000Z",
      last_outcome: "built",
      spec_fingerprint: expect.any(String),
      output_path: t.outputPath,
    });
    expect(fs.readdirSync(t.outputDir)).toEqual(["com.example.lib"]);
    expect(t.fakeBackend.liveWorkspaces).toBe(0);
    expect(t.log.types("com.example.lib")).toEqual([
      "sync.start",
      "sync.extract",
      "sync.stage",
      "sync.commit",
      "sync.built",
    ]);
  });

  it("skips an unchanged package without touching state or output", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toEqual({ status: "skipped", package: "com.example.lib", resolvedRef: t.v1 });
    expect(t.stateStore.putCalls).toHaveLength(1);
    expect(t.fakeBackend.materializeCalls).toHaveLength(1);
  });

  it("drops removed files and their records while keeping other tokens", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec("v1.0"));
    const runtimeToken = guidOf(t.readOutput("Runtime.meta"));

    const result = await t.orchestrator.sync(makeSpec("v1.1"));

    expect(result).toMatchObject({ status: "built", resolvedRef: t.v11, reason: "ref_changed" });
    if (result.status !== "built") return;
    expect(result.diff).toEqual({ added: [], updated: [], removed: ["Runtime/Bar.cs"], unchanged: 5 });
    expect(t.outputHas("Runtime/Bar.cs")).toBe(false);
    expect(t.outputHas("Runtime/Bar.cs.meta")).toBe(false);
    expect(guidOf(t.readOutput("Runtime/Foo.cs.meta"))).toBe(FOO_TOKEN);
    expect(guidOf(t.readOutput("Runtime.meta"))).toBe(runtimeToken);
    expect(t.stateStore.peek("com.example.lib")?.last_ref).toBe(t.v11);
  });

  it("rebuilds when forced or when the output was removed", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());

    const forced = await t.orchestrator.sync(makeSpec(), { force: true });
    fs.rmSync(t.outputPath, { recursive: true, force: true });
    const restored = await t.orchestrator.sync(makeSpec());

    expect(forced).toMatchObject({ status: "built", reason: "forced" });
    expect(restored).toMatchObject({ status: "built", reason: "output_missing" });
    expect(guidOf(t.readOutput("Runtime/Foo.cs.meta"))).toBe(FOO_TOKEN);
  });

  it("keeps the last good output and ref when the source is unreachable", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());
    t.clock.advanceByMs(60_000);
    t.fakeBackend.unreachable = true;

    const result = await t.orchestrator.sync(makeSpec("v1.1"));

    expect(result).toEqual({
      status: "failed",
      package: "com.example.lib",
      error: {
        kind: "SourceUnavailable",
        message: "Cannot reach https://example.com/lib.git.",
        retryable: true,
      },
    });
    expect(t.stateStore.peek("com.example.lib")).toMatchObject({
      last_ref: t.v1,
      last_sync_at: "2024-01-01T00:00:00.000Z",
      last_attempt_at: "2024-01-01T00:01:00.000Z",
      last_outcome: "failed",
      last_error: {
        kind: "SourceUnavailable",
        message: "Cannot reach https://example.com/lib.git.",
        at: "2024-01-01T00:01:00.000Z",
      },
    });
    expect(t.outputHas("Runtime/Bar.cs")).toBe(true);
  });

  it("leaves the previous output intact when generation fails", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());

    t.fakeBackend.commit("v1.2", COLLIDING_FILES);

    const result = await t.orchestrator.sync(makeSpec("v1.2"));

    expect(result).toMatchObject({ status: "failed", error: { kind: "StagingIOError", retryable: true } });
    expect(t.outputHas("Runtime/Bar.cs")).toBe(true);
    expect(fs.statSync(path.join(t.outputPath, "Runtime/com_example_lib.asmdef")).isFile()).toBe(true);
    expect(fs.readdirSync(t.outputDir)).toEqual(["com.example.lib"]);
    expect(t.fakeBackend.liveWorkspaces).toBe(0);
    expect(t.stateStore.peek("com.example.lib")?.last_ref).toBe(t.v1);
  });

  it("restores the previous output byte for byte when the new tree cannot be moved in", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());
    const before = snapshotTree(t.outputPath);
    const realRename = fsp.rename;
    vi.spyOn(fsp, "rename").mockImplementation(async (from, to) => {
      if (String(from).includes(".staging-")) {
        throw new Error("EXDEV: cross-device link not permitted");
      }
      return realRename(from, to);
    });

    const result = await t.orchestrator.sync(makeSpec("v1.1"));

    expect(result).toEqual({
      status: "failed",
      package: "com.example.lib",
      error: {
        kind: "CommitIOError",
        message: "Failed to commit com.example.lib: EXDEV: cross-device link not permitted",
        retryable: true,
      },
    });
    expect(snapshotTree(t.outputPath)).toEqual(before);
    expect(fs.readdirSync(t.outputDir)).toEqual(["com.example.lib"]);
    expect(t.stateStore.peek("com.example.lib")?.last_ref).toBe(t.v1);
  });

  it("reports a build even when releasing the workspace fails", async () => {
    const t = setup();
    t.fakeBackend.failRelease = new Error("EBUSY: resource busy or locked");

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toMatchObject({ status: "built", resolvedRef: t.v1 });
    expect(t.stateStore.peek("com.example.lib")?.last_ref).toBe(t.v1);
    expect(t.log.types("com.example.lib")).toEqual([
      "sync.start",
      "sync.extract",
      "sync.stage",
      "sync.commit",
      "sync.release_failed",
      "sync.built",
    ]);
    const released = t.log.events.find((event) => event.type === "sync.release_failed");
    expect(released?.payload).toMatchObject({ message: "EBUSY: resource busy or locked" });
  });

  it("rebuilds an unchanged ref when a setting that shapes the output changed", async () => {
    const t = setup();
    await t.orchestrator.sync(makeSpec());
    const flat = t.withSettings({ build: { nest_content: false }, unity: { version: "2022.3" } });

    const result = await flat.sync(makeSpec());

    expect(result).toMatchObject({ status: "built", resolvedRef: t.v1, reason: "spec_changed" });
    expect(t.outputHas("Foo.cs")).toBe(true);
    expect(t.outputHas("Runtime")).toBe(false);
    expect(JSON.parse(t.readOutput("package.json"))).toMatchObject({ unity: "2022.3" });
    expect(await flat.sync(makeSpec())).toMatchObject({ status: "skipped" });
  });

  it("creates no state when the first sync fails", async () => {
    const t = setup();
    t.fakeBackend.failMaterialize = new SyncError("SubtreeMissing", "Subtree src/Lib is not a directory.");

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toMatchObject({ status: "failed", error: { kind: "SubtreeMissing" } });
    expect(t.stateStore.peek("com.example.lib")).toBeUndefined();
    expect(fs.existsSync(t.outputPath)).toBe(false);
    expect(t.log.types("com.example.lib")).toEqual(["sync.start", "sync.failed"]);
  });

  it("classifies a state write failure after the swap as a commit failure", async () => {
    const t = setup();
    t.stateStore.failPut = new Error("read-only");

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toEqual({
      status: "failed",
      package: "com.example.lib",
      error: { kind: "CommitIOError", message: "read-only", retryable: true },
    });
    expect(t.outputHas("Runtime/Foo.cs")).toBe(true);
  });

  it("classifies a state read failure as a staging failure", async () => {
    const t = setup();
    t.stateStore.failGet = new Error("corrupt state");

    const result = await t.orchestrator.sync(makeSpec());

    expect(result).toMatchObject({
      status: "failed",
      error: { kind: "StagingIOError", message: "corrupt state" },
    });
    expect(t.fakeBackend.resolveCalls).toEqual([]);
  });

  it("stops before extraction when cancelled and leaves state untouched", async () => {
    const controller = new AbortController();
    const t = setup({
      backend: (fake) => ({
        resolveRef: async (locator, ref, options) => {
          const sha = await fake.resolveRef(locator, ref, options);
          if (ref === "v1.1") controller.abort("SIGINT");
          return sha;
        },
        materialize: (locator, resolvedRef, subtreePath, options) =>
          fake.materialize(locator, resolvedRef, subtreePath, options),
        release: (tree) => fake.release(tree),
      }),
    });
    await t.orchestrator.sync(makeSpec());
    const before = t.stateStore.peek("com.example.lib");

    const result = await t.orchestrator.sync(makeSpec("v1.1"), { signal: controller.signal });

    expect(result).toEqual({
      status: "failed",
      package: "com.example.lib",
      error: { kind: "Cancelled", message: "Sync cancelled: SIGINT", retryable: true },
    });
    expect(t.stateStore.peek("com.example.lib")).toEqual(before);
    expect(t.fakeBackend.materializeCalls).toHaveLength(1);
    expect(t.outputHas("Runtime/Bar.cs")).toBe(true);
  });

  it("serializes concurrent syncs of the same package", async () => {
    const t = setup();

    const [first, second] = await Promise.all([
      t.orchestrator.sync(makeSpec()),
      t.orchestrator.sync(makeSpec()),
    ]);

    expect(first.status).toBe("built");
    expect(second.status).toBe("skipped");
    expect(t.fakeBackend.materializeCalls).toHaveLength(1);
  });
});

describe("PackageOrchestrator with NuGet sources", () => {
  it("mirrors the managed assemblies of a NuGet package under Plugins", async () => {
    const feed = new FakeNugetFeed();
    feed.publish("Example.Buffers", "4.6.1", {
      "LICENSE.txt": "MIT License\n",
      "lib/netstandard2.0/Example.Buffers.dll": "assembly",
    });
    const t = setup({
      backend: (fake) =>
        createSourceRouter({
          git: fake,
          nuget: createNugetSourceBackend({ workDir: fake.workDir, client: feed }),
        }),
    });
    const spec = parsePackageSpec({
      name: "com.example.buffers",
      source: { type: "nuget", id: "Example.Buffers", version: "4.6.1" },
    });
    const outputPath = path.join(t.outputDir, "com.example.buffers");

    const result = await t.orchestrator.sync(spec);

    expect(result).toMatchObject({ status: "built", resolvedRef: "4.6.1", namespace: null });
    expect(fs.readdirSync(path.join(outputPath, "Plugins")).sort()).toEqual([
      "Example.Buffers.dll",
      "Example.Buffers.dll.meta",
    ]);
    expect(fs.readFileSync(path.join(outputPath, "Plugins/Example.Buffers.dll.meta"), "utf8")).toContain(
      "\nPluginImporter:\n",
    );
    expect(fs.readFileSync(path.join(outputPath, "LICENSE"), "utf8")).toBe("MIT License\n");
    expect(fg.sync("**/*.asmdef", { cwd: outputPath })).toEqual([]);
    expect(t.stateStore.peek("com.example.buffers")).toMatchObject({
      last_ref: "4.6.1",
      requested_ref: "4.6.1",
    });
    expect(await t.orchestrator.sync(spec)).toMatchObject({ status: "skipped", resolvedRef: "4.6.1" });
    expect(feed.downloads).toEqual(["example.buffers@4.6.1"]);
  });
});

describe("PackageOrchestrator.syncAll", () => {
  it("reports per-package outcomes in input order", async () => {
    const t = setup();
    const broken = parsePackageSpec({
      name: "com.example.broken",
      source: { url: "https://example.com/lib.git", ref: "v9.9" },
    });

    const report = await t.orchestrator.syncAll([makeSpec(), broken], { maxParallel: 2 });

    expect(report.results.map((result) => [result.package, result.status])).toEqual([
      ["com.example.lib", "built"],
      ["com.example.broken", "failed"],
    ]);
    expect(report.results[1]).toMatchObject({ error: { kind: "RefNotFound" } });
    expect(report.counts).toEqual({ built: 1, skipped: 0, failed: 1 });
    const types = t.log.types();
    expect(types[0]).toBe("run.start");
    expect(types[types.length - 1]).toBe("run.complete");
  });

  it("drains queued names and fails names missing from the config", async () => {
    const t = setup();
    const queue = new ResyncQueue();
    queue.pushAll(["com.example.lib", "com.example.unknown", "com.example.lib"]);

    const report = await t.orchestrator.syncQueued(queue, [makeSpec()]);

    expect(queue.size).toBe(0);
    expect(report.results[0]).toMatchObject({ package: "com.example.lib", status: "built" });
    expect(report.results[1]).toEqual({
      status: "failed",
      package: "com.example.unknown",
      error: {
        kind: "ConfigInvalid",
        message: "Package com.example.unknown is not defined in the mirror config.",
        retryable: false,
      },
    });
    expect(report.counts).toEqual({ built: 1, skipped: 0, failed: 1 });
  });
});

describe("PackageOrchestrator.check", () => {
  it("reports what a sync would do without writing anything", async () => {
    const t = setup();

    expect(await t.orchestrator.check([makeSpec()])).toEqual([
      { status: "needs_sync", package: "com.example.lib", resolvedRef: t.v1, reason: "first_sync" },
    ]);

    await t.orchestrator.sync(makeSpec());
    expect(await t.orchestrator.check([makeSpec()])).toEqual([
      { status: "up_to_date", package: "com.example.lib", resolvedRef: t.v1 },
    ]);

    t.fakeBackend.unreachable = true;
    expect(await t.orchestrator.check([makeSpec()])).toEqual([
      {
        status: "error",
        package: "com.example.lib",
        error: {
          kind: "SourceUnavailable",
          message: "Cannot reach https://example.com/lib.git.",
          retryable: true,
        },
      },
    ]);
    expect(t.stateStore.putCalls).toHaveLength(1);
  });
});
