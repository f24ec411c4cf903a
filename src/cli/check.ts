import type { AppContext } from "../app/context.js";
import { createOrchestrator } from "../app/orchestrator/create-orchestrator.js";
import type { CheckResult } from "../app/orchestrator/package-orchestrator.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { defaultRunId } from "../core/utils.js";

import { renderSyncFailure } from "./error-format.js";
import { selectPackages, shortRef } from "./packages.js";

export async function checkCommand(
  appContext: AppContext,
  opts: { packages: string[] },
): Promise<CheckResult[]> {
  const specs = selectPackages(appContext.config.packages, opts.packages);
  const runId = defaultRunId();
  const logger = new JsonlLogger(runLogPath(appContext.paths, runId), { runId });

  try {
    const results = await createOrchestrator(appContext, logger).check(specs);
    for (const result of results) {
      console.log(formatCheckResult(result));
    }

    const pending = results.filter((result) => result.status === "needs_sync").length;
    console.log("");
    console.log(`${pending} of ${results.length} package(s) need a rebuild.`);

    if (results.some((result) => result.status === "error")) {
      process.exitCode = 1;
    }
    return results;
  } finally {
    logger.close();
  }
}

export function formatCheckResult(result: CheckResult): string {
  switch (result.status) {
    case "up_to_date":
      return `= ${result.package} up to date at ${shortRef(result.resolvedRef)}`;
    case "needs_sync":
      return `* ${result.package} needs rebuild (${result.reason}) -> ${shortRef(result.resolvedRef)}`;
    case "error":
      return renderSyncFailure(result.package, result.error, { stream: process.stdout });
  }
}
