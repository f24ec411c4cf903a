import type { AppContext } from "../app/context.js";
import { createOrchestrator } from "../app/orchestrator/create-orchestrator.js";
import { formatDuration } from "../app/orchestrator/helpers/time.js";
import type { SyncReport, SyncResult } from "../app/orchestrator/package-orchestrator.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { defaultRunId } from "../core/utils.js";

import { renderSyncFailure } from "./error-format.js";
import { selectPackages, shortRef } from "./packages.js";

export type BuildCommandOptions = {
  packages: string[];
  force: boolean;
  maxParallel?: number;
};

export async function buildCommand(
  appContext: AppContext,
  opts: BuildCommandOptions,
): Promise<SyncReport> {
  const specs = selectPackages(appContext.config.packages, opts.packages);
  if (specs.length === 0) {
    console.log("No packages configured.");
    return { results: [], counts: { built: 0, skipped: 0, failed: 0 } };
  }

  const runId = defaultRunId();
  const logPath = runLogPath(appContext.paths, runId);
  const logger = new JsonlLogger(logPath, { runId });
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort("SIGINT");
  process.once("SIGINT", onInterrupt);

  try {
    const orchestrator = createOrchestrator(appContext, logger);
    const report = await orchestrator.syncAll(specs, {
      force: opts.force,
      maxParallel: opts.maxParallel,
      signal: controller.signal,
    });

    for (const result of report.results) {
      console.log(formatSyncResult(result));
    }
    console.log("");
    console.log(formatReportCounts(report));
    console.log(`Log: ${logPath}`);

    if (report.counts.failed > 0) {
      process.exitCode = 1;
    }
    return report;
  } finally {
    process.off("SIGINT", onInterrupt);
    logger.close();
  }
}

export function formatSyncResult(result: SyncResult): string {
  switch (result.status) {
    case "skipped":
      return `= ${result.package} up to date at ${shortRef(result.resolvedRef)}`;
    case "built": {
      const { added, updated, removed } = result.diff;
      return (
        `+ ${result.package} built at ${shortRef(result.resolvedRef)} (${result.reason}; ` +
        `+${added.length} ~${updated.length} -${removed.length}) in ${formatDuration(result.durationMs)}`
      );
    }
    case "failed":
      return renderSyncFailure(result.package, result.error, { stream: process.stdout });
  }
}

export function formatReportCounts(report: SyncReport): string {
  const { built, skipped, failed } = report.counts;
  return `Built ${built}, skipped ${skipped}, failed ${failed}.`;
}
